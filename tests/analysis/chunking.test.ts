import { describe, expect, test } from 'vitest';
import { hasSpeakers, hasTimes, hhmmss, segmentsToText, splitIntoChunks, transcriptText } from '../../src/analysis/chunking';

describe('chunking', () => {
    test('hhmmss should format seconds as a zero-padded clock', () => {
        expect(hhmmss(0)).toBe('00:00:00');
        expect(hhmmss(75.9)).toBe('00:01:15');
        expect(hhmmss(3725)).toBe('01:02:05');
        expect(hhmmss(-4)).toBe('00:00:00');
    });

    test('should detect timing and speaker information', () => {
        expect(hasTimes([{ start: 0, end: 1, text: 'a' }])).toBe(true);
        expect(hasTimes([{ start: 0, text: 'a' }])).toBe(false);
        expect(hasSpeakers([{ text: 'a' }, { speaker: 'SPEAKER_01', text: 'b' }])).toBe(true);
    });

    describe('segmentsToText', () => {
        const segments = [
            { start: 0, end: 4, speaker: 'SPEAKER_00', text: ' Welcome back to the show. ' },
            { start: 4, end: 5, speaker: 'SPEAKER_01', text: '   ' },
            { start: 65, end: 70, speaker: 'SPEAKER_01', text: 'Thanks for having me.' },
        ];

        test('should prefix time and speaker and skip empty segments', () => {
            expect(segmentsToText(segments, true, true)).toBe(
                '[00:00:00] SPEAKER_00: Welcome back to the show.\n[00:01:05] SPEAKER_01: Thanks for having me.');
        });

        test('should leave out prefixes that are not wanted', () => {
            expect(segmentsToText(segments, false, false)).toBe('Welcome back to the show.\nThanks for having me.');
        });
    });

    test('transcriptText should fall back to the plain text field', () => {
        expect(transcriptText({ segments: [], text: 'Plain transcript.' })).toBe('Plain transcript.');
        expect(transcriptText({ segments: [{ start: 1, end: 2, text: 'From segments.' }], text: 'ignored' }))
            .toBe('[00:00:01] From segments.');
        expect(transcriptText({})).toBe('');
    });

    describe('splitIntoChunks', () => {
        test('should keep short text in one chunk', () => {
            expect(splitIntoChunks('one\ntwo', 100)).toEqual(['one\ntwo']);
        });

        test('should split on line boundaries', () => {
            // Each line counts its length plus the newline: 5 characters
            expect(splitIntoChunks('aaaa\nbbbb\ncccc\ndddd', 10)).toEqual(['aaaa\nbbbb', 'cccc\ndddd']);
        });

        test('should give an over-long line a chunk of its own', () => {
            expect(splitIntoChunks('aa\nbbbbbbbbbbbb\ncc', 6)).toEqual(['aa', 'bbbbbbbbbbbb', 'cc']);
        });
    });
});
