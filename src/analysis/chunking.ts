import { Segment, Transcript } from './types';

export const hhmmss = (seconds: number): string => {
    const whole = Math.max(0, Math.floor(seconds));
    const h = Math.floor(whole / 3600);
    const m = Math.floor((whole % 3600) / 60);
    const s = whole % 60;
    return [h, m, s].map(part => String(part).padStart(2, '0')).join(':');
};

export const hasTimes = (segments: readonly Segment[]): boolean =>
    segments.some(segment => segment.start !== undefined && segment.end !== undefined);

export const hasSpeakers = (segments: readonly Segment[]): boolean =>
    segments.some(segment => segment.speaker !== undefined);

/** One line per non-empty segment: `[hh:mm:ss] SPEAKER: text`, each prefix optional. */
export const segmentsToText = (segments: readonly Segment[], withTime: boolean, withSpeaker: boolean): string => {
    const lines: string[] = [];
    for (const segment of segments) {
        const text = (segment.text ?? '').trim();
        if (!text) {
            continue;
        }
        const time = withTime && segment.start !== undefined ? `[${hhmmss(segment.start)}] ` : '';
        const speaker = withSpeaker && segment.speaker ? `${segment.speaker}: ` : '';
        lines.push(`${time}${speaker}${text}`);
    }
    return lines.join('\n');
};

export const transcriptText = (transcript: Transcript): string => {
    const segments = transcript.segments ?? [];
    const text = segmentsToText(segments, hasTimes(segments), hasSpeakers(segments));
    return text.trim() ? text : (transcript.text ?? '');
};

/**
 * Split on line boundaries into chunks of roughly `approxChars` characters.
 * A single line longer than the limit becomes a chunk of its own.
 */
export const splitIntoChunks = (text: string, approxChars: number): string[] => {
    if (text.length <= approxChars) {
        return [text];
    }

    const chunks: string[] = [];
    let current: string[] = [];
    let currentLength = 0;

    for (const line of text.split('\n')) {
        const length = line.length + 1;
        if (currentLength + length > approxChars && current.length > 0) {
            chunks.push(current.join('\n'));
            current = [];
            currentLength = 0;
        }
        current.push(line);
        currentLength += length;
    }
    if (current.length > 0) {
        chunks.push(current.join('\n'));
    }
    return chunks;
};
