/**
 * State Graph Types
 */

import { ArtifactKind } from '../artifacts/types';

export const VARIANTS = ['base', 'diarized', 'preprocessed'] as const;

/** A named stage of transcript processing. */
export type Variant = typeof VARIANTS[number];

/** Operations that produce a new transcript variant. */
export type TransformOperation = 'diarize' | 'preprocess';

/** Operations that read a transcript without producing a new variant. */
export type ConsumeOperation = 'analyze' | 'export';

/**
 * Everything a caller may ask of a transcript. `align` is accepted as a
 * request only so it can be rejected with a precise message: alignment is
 * part of diarization, not a state of its own.
 */
export type TranscriptOperation = TransformOperation | ConsumeOperation | 'align';

export interface Transition {
    from: Variant;
    operation: TransformOperation;
    to: Variant;
}

export const VARIANT_ARTIFACT: Record<Variant, ArtifactKind> = {
    base: 'transcript-base',
    diarized: 'transcript-diarized',
    preprocessed: 'transcript-preprocessed',
};
