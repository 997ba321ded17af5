/**
 * Core Types
 *
 * Names shared by every layer of the pipeline.
 */

import { z } from 'zod';

/** Every step the orchestrator knows how to run, in canonical order. */
export const STEP_KINDS = [
    'fetch',
    'transcode',
    'transcribe',
    'diarize',
    'preprocess',
    'analyze',
    'agreement',
    'consensus',
    'export',
    'publish',
] as const;

export type StepKind = typeof STEP_KINDS[number];

/** Steps that run once per track in dual-track mode. */
export const TRACK_STEP_KINDS: readonly StepKind[] = ['transcribe', 'diarize', 'preprocess', 'analyze'];

/** Steps whose failure is recorded as a warning instead of aborting the run. */
export const SOFT_STEP_KINDS: readonly StepKind[] = ['export', 'publish'];

export const TRACKS = ['precision', 'recall'] as const;

/** One independent run of the track steps in dual-track mode. */
export type Track = typeof TRACKS[number];

export const isStepKind = (value: string): value is StepKind =>
    (STEP_KINDS as readonly string[]).includes(value);

export const isTrack = (value: string): value is Track =>
    (TRACKS as readonly string[]).includes(value);

/** A JSON document exchanged with an external step. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const isJsonObject = (value: unknown): value is JsonObject =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() => z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
]));

export const JsonObjectSchema = z.record(JsonValueSchema);
