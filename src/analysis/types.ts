/**
 * Analysis Types
 */

import { z } from 'zod';
import { JsonObject } from '../types';

export const ANALYSIS_TYPES = ['general', 'interview_guest_focused', 'panel_discussion', 'solo_commentary'] as const;

export type AnalysisType = typeof ANALYSIS_TYPES[number];

export const SegmentSchema = z.object({
    start: z.number().optional(),
    end: z.number().optional(),
    speaker: z.string().optional(),
    text: z.string().optional(),
}).passthrough();

export type Segment = z.infer<typeof SegmentSchema>;

/** The parts of a transcript document analysis reads; everything else passes through untouched. */
export const TranscriptSchema = z.object({
    segments: z.array(SegmentSchema).optional(),
    text: z.string().optional(),
    show: z.string().optional(),
    episode_title: z.string().optional(),
    episode_published: z.string().optional(),
    asr_model: z.string().optional(),
}).passthrough();

export type Transcript = z.infer<typeof TranscriptSchema>;

export interface CompletionRequest {
    system: string;
    prompt: string;
    model: string;
    temperature: number;
    /** The caller expects a JSON document back. */
    json: boolean;
}

/** Anything that can turn a prompt into text: an external step, a hosted API, a test double. */
export interface CompletionClient {
    complete(request: CompletionRequest): Promise<string>;
}

export interface AnalysisOptions {
    model: string;
    temperature: number;
    type: AnalysisType;
    maxCharsPerChunk: number;
    concurrency: number;
}

export interface AnalysisResult {
    markdown: string;
    /** Structured part of the reduce response, when the model supplied a parsable one. */
    structured?: JsonObject;
    chunks: number;
}
