import { describe, expect, test, vi } from 'vitest';
import * as Analysis from '../../src/analysis';
import { CompletionClient, CompletionRequest } from '../../src/analysis';
import { ConfigurationError } from '../../src/errors';

const options: Analysis.AnalysisOptions = {
    model: 'gpt-4.1',
    temperature: 0.2,
    type: 'general',
    maxCharsPerChunk: 60,
    concurrency: 2,
};

const transcript = {
    show: 'Example Show',
    episode_title: 'Growth',
    episode_published: '2024-05-01',
    segments: [
        { start: 0, end: 3, speaker: 'SPEAKER_00', text: 'We doubled revenue this year.' },
        { start: 3, end: 6, speaker: 'SPEAKER_01', text: 'How did you do it?' },
    ],
};

const REDUCE_RESPONSE = [
    '# Episode Summary',
    'Growth talk.',
    '---JSON---',
    '```json',
    '{"summary":"Growth talk.","key_points":["Revenue doubled"]}',
    '```',
].join('\n');

const fakeClient = (reduceResponse = REDUCE_RESPONSE) => {
    const requests: CompletionRequest[] = [];
    const client: CompletionClient = {
        complete: vi.fn(async (request: CompletionRequest) => {
            requests.push(request);
            if (request.prompt.startsWith('Extract key information')) {
                return request.prompt.includes('Chunk 1/2') ? 'notes one' : 'notes two';
            }
            return reduceResponse;
        }),
    };
    return { client, requests };
};

describe('Analysis', () => {
    describe('analyze', () => {
        test('should map each chunk and reduce the notes in chunk order', async () => {
            const { client, requests } = fakeClient();

            const result = await Analysis.create(client, options).analyze(transcript);

            const mapRequests = requests.filter(request => request.prompt.startsWith('Extract key information'));
            expect(mapRequests).toHaveLength(2);
            expect(mapRequests.map(request => request.prompt.split('\n').slice(-1)[0]).sort()).toEqual([
                '[00:00:00] SPEAKER_00: We doubled revenue this year.',
                '[00:00:03] SPEAKER_01: How did you do it?',
            ]);

            const reduce = requests[requests.length - 1];
            expect(reduce.prompt).toContain('Chunk notes:\n\nnotes one\n\n---\n\nnotes two');
            expect(reduce.prompt).toContain('---JSON---');
            expect(reduce.system).toContain('[HH:MM:SS] timecodes');
            expect(reduce.system).toContain('Preserve speaker labels');
            expect(requests.every(request => request.model === 'gpt-4.1' && request.temperature === 0.2)).toBe(true);

            expect(result).toEqual({
                markdown: '# Example Show\n## Growth\n**Released:** 2024-05-01\n\n---\n\n# Episode Summary\nGrowth talk.',
                structured: { summary: 'Growth talk.', key_points: ['Revenue doubled'] },
                chunks: 2,
            });
        });

        test('should reduce the notes in chunk order when the last chunk finishes first', async () => {
            const resolved: number[] = [];
            let reducePrompt = '';
            const client: CompletionClient = {
                complete: async (request: CompletionRequest) => {
                    const match = /Chunk (\d+)\/3:/.exec(request.prompt);
                    if (!match) {
                        reducePrompt = request.prompt;
                        return REDUCE_RESPONSE;
                    }
                    const chunk = Number(match[1]);
                    await new Promise(resolve => setTimeout(resolve, (4 - chunk) * 10));
                    resolved.push(chunk);
                    return `notes ${chunk}`;
                },
            };
            const threeChunks = {
                segments: [
                    ...transcript.segments,
                    { start: 6, end: 9, speaker: 'SPEAKER_00', text: 'We hired slowly and well.' },
                ],
            };

            const result = await Analysis.create(client, { ...options, concurrency: 3 }).analyze(threeChunks);

            expect(result.chunks).toBe(3);
            expect(resolved).toEqual([3, 2, 1]);
            expect(reducePrompt).toContain('Chunk notes:\n\nnotes 1\n\n---\n\nnotes 2\n\n---\n\nnotes 3');
        });

        test('should keep the Markdown when the response has no structured part', async () => {
            const { client } = fakeClient('# Episode Summary\nJust prose.');

            const result = await Analysis.create(client, { ...options, maxCharsPerChunk: 10000 })
                .analyze({ text: 'A plain transcript without segments.' });

            expect(result).toEqual({ markdown: '# Episode Summary\nJust prose.', chunks: 1 });
        });

        test('should write neutral instructions when timing and speakers are missing', async () => {
            const { client, requests } = fakeClient();

            await Analysis.create(client, { ...options, maxCharsPerChunk: 10000 }).analyze({ text: 'Plain.' });

            expect(requests[0].system).toContain('omit timecodes');
            expect(requests[0].system).toContain('write neutrally');
        });

        test('should refuse a transcript without text', async () => {
            const { client } = fakeClient();

            await expect(Analysis.create(client, options).analyze({ segments: [{ text: '  ' }] }))
                .rejects.toThrow(new ConfigurationError('No transcript text found in input'));
            expect(client.complete).not.toHaveBeenCalled();
        });

        test('should refuse a document that is not a transcript', async () => {
            const { client } = fakeClient();

            await expect(Analysis.create(client, options).analyze({ segments: 'none' })).rejects.toBeInstanceOf(ConfigurationError);
        });

        test('should add the specialization of the analysis type', async () => {
            const { client, requests } = fakeClient();

            await Analysis.create(client, { ...options, type: 'panel_discussion' }).analyze(transcript);

            expect(requests[0].system).toContain('Specialization: panel discussion analysis');
            expect(requests[0].prompt).toContain('Prioritize: distinct viewpoints');
        });
    });

    describe('splitResponse', () => {
        test('should return the whole response as Markdown without a separator', () => {
            expect(Analysis.splitResponse('  # Summary\n')).toEqual({ markdown: '# Summary' });
        });

        test('should drop a structured part that does not parse', () => {
            expect(Analysis.splitResponse('# Summary\n---JSON---\n{"summary": ')).toEqual({ markdown: '# Summary' });
            expect(Analysis.splitResponse('# Summary\n---JSON---\n[1, 2]')).toEqual({ markdown: '# Summary' });
        });

        test('should parse an unfenced structured part', () => {
            expect(Analysis.splitResponse('# Summary\n---JSON---\n{"actions": ["Read the book"]}')).toEqual({
                markdown: '# Summary',
                structured: { actions: ['Read the book'] },
            });
        });
    });

    test('episodeHeader should be empty without show or title', () => {
        expect(Analysis.episodeHeader({ episode_published: '2024-05-01' })).toBe('');
        expect(Analysis.episodeHeader({ episode_title: 'Growth' })).toBe('# Unknown Show\n## Growth\n**Released:** Unknown Date\n\n---\n\n');
    });

    test('toDocument should lift the structured fields to the top level', () => {
        const document = Analysis.toDocument(
            { markdown: '# Summary', structured: { summary: 'Short.' }, chunks: 3 },
            { model: 'gpt-4.1', track: null },
        );

        expect(document).toEqual({
            markdown: '# Summary',
            summary: 'Short.',
            analysis_metadata: { model: 'gpt-4.1', track: null, chunks: 3 },
        });
    });
});
