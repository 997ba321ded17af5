/**
 * Analysis
 *
 * Chunked map-reduce over a completion client: the transcript is flattened to
 * timestamped, speaker-labelled lines, split into chunks, each chunk is
 * summarised (map) with bounded concurrency, and the notes are combined in
 * chunk order into one brief plus an optional structured document (reduce).
 */

import { ConfigurationError } from '../errors';
import * as Logging from '../logging';
import { JsonObject, JsonObjectSchema } from '../types';
import { Semaphore, mapWithConcurrency } from '../util/concurrency';
import { hasSpeakers, hasTimes, splitIntoChunks, transcriptText } from './chunking';
import { JSON_SEPARATOR, mapPrompt, reducePrompt, systemPrompt } from './prompts';
import { AnalysisOptions, AnalysisResult, CompletionClient, CompletionRequest, Transcript, TranscriptSchema } from './types';

export interface Instance {
    analyze(transcript: unknown): Promise<AnalysisResult>;
}

export const parseTranscript = (document: unknown): Transcript => {
    const parsed = TranscriptSchema.safeParse(document);
    if (!parsed.success) {
        throw new ConfigurationError(`Transcript is not a valid document: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
    }
    return parsed.data;
};

const stripFence = (text: string): string => {
    let body = text.trim();
    if (body.startsWith('```json')) {
        body = body.slice(7);
    } else if (body.startsWith('```')) {
        body = body.slice(3);
    }
    if (body.endsWith('```')) {
        body = body.slice(0, -3);
    }
    return body.trim();
};

/** Split a reduce response into its Markdown and the JSON document after the separator, if any. */
export const splitResponse = (response: string): { markdown: string; structured?: JsonObject } => {
    const index = response.indexOf(JSON_SEPARATOR);
    if (index < 0) {
        return { markdown: response.trim() };
    }
    const markdown = response.slice(0, index).trim();
    let candidate: unknown;
    try {
        candidate = JSON.parse(stripFence(response.slice(index + JSON_SEPARATOR.length)));
    } catch {
        return { markdown };
    }
    const parsed = JsonObjectSchema.safeParse(candidate);
    return parsed.success ? { markdown, structured: parsed.data } : { markdown };
};

export const episodeHeader = (transcript: Transcript): string => {
    if (!transcript.show && !transcript.episode_title) {
        return '';
    }
    return [
        `# ${transcript.show ?? 'Unknown Show'}`,
        `## ${transcript.episode_title ?? 'Unknown Episode'}`,
        `**Released:** ${transcript.episode_published ?? 'Unknown Date'}`,
        '',
        '---',
        '',
        '',
    ].join('\n');
};

export const create = (client: CompletionClient, options: AnalysisOptions): Instance => {
    const logger = Logging.getLogger();

    const analyze = async (document: unknown): Promise<AnalysisResult> => {
        const transcript = parseTranscript(document);
        const segments = transcript.segments ?? [];
        const text = transcriptText(transcript);
        if (!text.trim()) {
            throw new ConfigurationError('No transcript text found in input');
        }

        const system = systemPrompt(options.type, hasTimes(segments), hasSpeakers(segments));
        const chunks = splitIntoChunks(text, options.maxCharsPerChunk);
        logger.info('Analyzing transcript in %d chunk(s) with %s', chunks.length, options.model);

        const notes = await mapWithConcurrency(chunks, options.concurrency, async (chunk, index) => {
            const note = await client.complete({
                system,
                prompt: mapPrompt(options.type, chunk, index, chunks.length),
                model: options.model,
                temperature: options.temperature,
                json: false,
            });
            logger.debug('Chunk %d/%d analyzed', index + 1, chunks.length);
            return note;
        });

        const response = await client.complete({
            system,
            prompt: reducePrompt(options.type, notes, true),
            model: options.model,
            temperature: options.temperature,
            json: false,
        });

        const { markdown, structured } = splitResponse(response);
        if (!structured) {
            logger.warn('Analysis response carried no structured section; keeping Markdown only');
        }
        return {
            markdown: episodeHeader(transcript) + markdown,
            ...(structured && { structured }),
            chunks: chunks.length,
        };
    };

    return { analyze };
};

/** Route every completion through one semaphore, so analyses running side by side share its limit. */
export const limitCompletions = (client: CompletionClient, semaphore: Semaphore): CompletionClient => ({
    complete: (request: CompletionRequest) => semaphore.use(() => client.complete(request)),
});

/** The analysis artifact: Markdown, the structured fields at top level, and how it was produced. */
export const toDocument = (result: AnalysisResult, metadata: JsonObject): JsonObject => ({
    markdown: result.markdown,
    ...result.structured,
    analysis_metadata: { ...metadata, chunks: result.chunks },
});

export * from './types';
export { hhmmss, segmentsToText, splitIntoChunks, transcriptText } from './chunking';
