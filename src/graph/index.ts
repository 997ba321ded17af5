/**
 * State Graph
 *
 * Which transcript variant may be produced from which:
 *
 *   base -> diarized -> preprocessed
 *   base ------------> preprocessed
 *
 * `preprocessed` is terminal: merged segments and rewritten text no longer
 * line up word for word with the audio, so nothing can be diarized or
 * aligned from it. Requests are validated here, before any process spawns.
 */

import { ArtifactKind } from '../artifacts/types';
import { ConfigurationError } from '../errors';
import {
    ConsumeOperation,
    TranscriptOperation,
    Transition,
    VARIANTS,
    VARIANT_ARTIFACT,
    Variant,
} from './types';

export const TRANSITIONS: readonly Transition[] = [
    { from: 'base', operation: 'diarize', to: 'diarized' },
    { from: 'base', operation: 'preprocess', to: 'preprocessed' },
    { from: 'diarized', operation: 'preprocess', to: 'preprocessed' },
];

const CONSUMERS: readonly ConsumeOperation[] = ['analyze', 'export'];

const RANK: Record<Variant, number> = {
    base: 0,
    diarized: 1,
    preprocessed: 2,
};

const isConsumer = (operation: TranscriptOperation): operation is ConsumeOperation =>
    (CONSUMERS as readonly string[]).includes(operation);

export const isTerminal = (variant: Variant): boolean =>
    !TRANSITIONS.some(transition => transition.from === variant);

export const isLegal = (from: Variant, operation: TranscriptOperation): boolean =>
    isConsumer(operation) || TRANSITIONS.some(t => t.from === from && t.operation === operation);

const rejectionReason = (from: Variant, operation: TranscriptOperation): string => {
    if (isTerminal(from)) {
        return `Cannot ${operation} a ${from} transcript: ${from} is terminal because its text no longer corresponds word for word to the audio`;
    }
    if (operation === 'align') {
        return `Alignment is not a separate step; it runs as part of diarization (requested on a ${from} transcript)`;
    }
    return `Cannot ${operation} a ${from} transcript: no such transition`;
};

/**
 * The variant an operation produces from `from`; consumers leave the variant unchanged.
 * @throws ConfigurationError for any pair outside the transition table.
 */
export const next = (from: Variant, operation: TranscriptOperation): Variant => {
    if (isConsumer(operation)) {
        return from;
    }
    const transition = TRANSITIONS.find(t => t.from === from && t.operation === operation);
    if (!transition) {
        throw new ConfigurationError(rejectionReason(from, operation));
    }
    return transition.to;
};

/** Walk a whole sequence of operations from `start`, returning the final variant. */
export const validatePlan = (start: Variant, operations: readonly TranscriptOperation[]): Variant =>
    operations.reduce<Variant>((variant, operation) => next(variant, operation), start);

/**
 * The most processed of the available variants that `operation` accepts,
 * or `undefined` when none does.
 */
export const selectInput = (operation: TranscriptOperation, available: readonly Variant[]): Variant | undefined => {
    return [...available]
        .filter(variant => isLegal(variant, operation))
        .sort((a, b) => RANK[b] - RANK[a])[0];
};

/** The most processed variant present, regardless of operation. */
export const mostProcessed = (available: readonly Variant[]): Variant | undefined =>
    [...available].sort((a, b) => RANK[b] - RANK[a])[0];

export const variantOf = (kind: ArtifactKind): Variant | undefined =>
    VARIANTS.find(variant => VARIANT_ARTIFACT[variant] === kind);

export const artifactOf = (variant: Variant): ArtifactKind => VARIANT_ARTIFACT[variant];

export * from './types';
