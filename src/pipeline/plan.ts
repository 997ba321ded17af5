/**
 * Plan validation
 *
 * Two passes, both before any process is spawned:
 *
 * - `validateSteps` looks only at the descriptor list: order, duplicates,
 *   mode-dependent steps and the transcript transitions it implies.
 *   `checkOutputNames` then resolves every file the plan would write.
 * - `checkFeasibility` replays the plan against what the detector found and
 *   rejects steps whose input could never exist.
 */

import { ArtifactKey, Detection, Store } from '../artifacts';
import { ConfigurationError } from '../errors';
import * as Graph from '../graph';
import { STEP_KINDS, StepKind, TRACKS, TRACK_STEP_KINDS, Track } from '../types';
import { StepDescriptor, StepDescriptorOf } from './types';

export interface PlanIds {
    /** Sanitized speech-to-text model id. */
    asr: string;
    /** Sanitized analysis model id. */
    ai: string;
    destination: string;
}

export const findStep = <K extends StepKind>(steps: readonly StepDescriptor[], kind: K): StepDescriptorOf<K> | undefined => {
    for (const step of steps) {
        if (isKind(step, kind)) {
            return step;
        }
    }
    return undefined;
};

const isKind = <K extends StepKind>(step: StepDescriptor, kind: K): step is Extract<StepDescriptor, { kind: K }> & StepDescriptorOf<K> =>
    step.kind === kind;

export const isEnabled = (steps: readonly StepDescriptor[], kind: StepKind): boolean =>
    findStep(steps, kind)?.enabled ?? false;

export const identify = (steps: readonly StepDescriptor[]): PlanIds => ({
    asr: Store.sanitizeModelId(findStep(steps, 'transcribe')?.params.model ?? 'default'),
    ai: Store.sanitizeModelId(findStep(steps, 'analyze')?.params.model ?? 'default'),
    destination: Store.sanitizeModelId(findStep(steps, 'publish')?.params.destination ?? 'default'),
});

/** The artifact a step produces. Track steps take the track; shared steps ignore it. */
export const outputKey = (kind: StepKind, ids: PlanIds, track?: Track): ArtifactKey => {
    const tracked = track !== undefined ? { track } : {};
    switch (kind) {
        case 'fetch':
            return { kind: 'episode-meta' };
        case 'transcode':
            return { kind: 'audio-meta' };
        case 'transcribe':
            return { kind: 'transcript-base', modelId: ids.asr, ...tracked };
        case 'diarize':
            return { kind: 'transcript-diarized', modelId: ids.asr, ...tracked };
        case 'preprocess':
            return { kind: 'transcript-preprocessed', modelId: ids.asr, ...tracked };
        case 'analyze':
            return { kind: 'analysis', modelId: ids.ai, sourceModelId: ids.asr, ...tracked };
        case 'agreement':
            return { kind: 'agreement', modelId: ids.ai, sourceModelId: ids.asr };
        case 'consensus':
            return { kind: 'consensus', modelId: ids.ai, sourceModelId: ids.asr };
        case 'export':
            return { kind: 'export', modelId: ids.asr };
        case 'publish':
            return { kind: 'publish-receipt', modelId: ids.destination };
    }
};

export const transcriptKey = (variant: Graph.Variant, ids: PlanIds, track?: Track): ArtifactKey => ({
    kind: Graph.artifactOf(variant),
    modelId: ids.asr,
    ...(track !== undefined && { track }),
});

export const validateSteps = (steps: readonly StepDescriptor[], dual: boolean): void => {
    let previous = -1;
    for (const step of steps) {
        const position = STEP_KINDS.indexOf(step.kind);
        if (position === previous) {
            throw new ConfigurationError(`Step ${step.kind} appears more than once`);
        }
        if (position < previous) {
            throw new ConfigurationError(`Step ${step.kind} is out of order: it must come before ${STEP_KINDS[previous]}`);
        }
        previous = position;

        if (!Number.isInteger(step.retries) || step.retries < 0) {
            throw new ConfigurationError(`Step ${step.kind} has an invalid retry budget: ${step.retries}`);
        }
        if (!(step.timeoutMs > 0)) {
            throw new ConfigurationError(`Step ${step.kind} has an invalid timeout: ${step.timeoutMs}`);
        }
        if (step.force && !step.enabled) {
            throw new ConfigurationError(`Step ${step.kind} is forced but disabled`);
        }
    }

    for (const kind of ['agreement', 'consensus'] as const) {
        if (!isEnabled(steps, kind)) {
            continue;
        }
        if (!dual) {
            throw new ConfigurationError(`Step ${kind} compares two tracks and requires dual-track mode`);
        }
        if (!findStep(steps, 'analyze')) {
            throw new ConfigurationError(`Step ${kind} requires an analyze step`);
        }
    }

    const fetch = findStep(steps, 'fetch');
    if (fetch?.params.rssUrl && fetch.params.youtubeUrl) {
        throw new ConfigurationError('Give either an RSS feed or a YouTube URL, not both');
    }

    const operations = steps
        .filter(step => step.enabled)
        .map(step => step.kind)
        .filter((kind): kind is Graph.TransformOperation | Graph.ConsumeOperation =>
            kind === 'diarize' || kind === 'preprocess' || kind === 'analyze' || kind === 'export');
    Graph.validatePlan('base', operations);
};

/** Every artifact an enabled step would write must have a valid file name. */
export const checkOutputNames = (steps: readonly StepDescriptor[], ids: PlanIds, dual: boolean): void => {
    for (const step of steps) {
        if (!step.enabled) {
            continue;
        }
        const tracks: ReadonlyArray<Track | undefined> = dual && TRACK_STEP_KINDS.includes(step.kind) ? TRACKS : [undefined];
        for (const track of tracks) {
            Store.fileNameFor(outputKey(step.kind, ids, track));
        }
    }
};

/** True when the step is enabled and its artifact is missing or the step is forced. */
export const willRun = (step: StepDescriptor | undefined, detection: Detection, key: ArtifactKey): boolean =>
    step !== undefined && step.enabled && (step.force || !detection.has(key));

/** True when the artifact exists or an enabled step will produce it. */
const willExist = (step: StepDescriptor | undefined, detection: Detection, key: ArtifactKey): boolean =>
    detection.has(key) || (step?.enabled ?? false);

export const checkFeasibility = (
    steps: readonly StepDescriptor[],
    detection: Detection,
    ids: PlanIds,
    dual: boolean,
): void => {
    const step = <K extends StepKind>(kind: K) => findStep(steps, kind);

    const fetch = step('fetch');
    if (willRun(fetch, detection, outputKey('fetch', ids)) &&
        !fetch?.params.show && !fetch?.params.rssUrl && !fetch?.params.youtubeUrl) {
        throw new ConfigurationError('No episode yet: provide a show name, an RSS feed or a YouTube URL');
    }

    const hasEpisode = willExist(fetch, detection, outputKey('fetch', ids));
    if (willRun(step('transcode'), detection, outputKey('transcode', ids)) && !hasEpisode) {
        throw new ConfigurationError('transcode requires episode metadata, but fetch is disabled and episode-meta.json is missing');
    }
    const hasAudio = willExist(step('transcode'), detection, outputKey('transcode', ids));

    const tracks: ReadonlyArray<Track | undefined> = dual ? TRACKS : [undefined];
    for (const track of tracks) {
        const label = track ? ` (${track} track)` : '';
        const available = new Set<Graph.Variant>(
            Graph.VARIANTS.filter(variant => detection.has(transcriptKey(variant, ids, track))),
        );

        if (willRun(step('transcribe'), detection, outputKey('transcribe', ids, track)) && !hasAudio) {
            throw new ConfigurationError(`transcribe${label} requires audio metadata, but transcode is disabled and audio-meta.json is missing`);
        }
        if (step('transcribe')?.enabled) {
            available.add('base');
        }

        for (const operation of ['diarize', 'preprocess'] as const) {
            const transform = step(operation);
            if (!willRun(transform, detection, outputKey(operation, ids, track))) {
                if (transform?.enabled) {
                    available.add(Graph.next('base', operation));
                }
                continue;
            }
            const input = Graph.selectInput(operation, [...available]);
            if (input === undefined) {
                const most = Graph.mostProcessed([...available]);
                if (most !== undefined) {
                    // Throws with the reason the transition is illegal
                    Graph.next(most, operation);
                }
                throw new ConfigurationError(`${operation}${label} requires a transcript, but none exists and transcription is disabled`);
            }
            available.add(Graph.next(input, operation));
        }

        if (willRun(step('analyze'), detection, outputKey('analyze', ids, track)) && available.size === 0) {
            throw new ConfigurationError(`analyze${label} requires a transcript, but none exists and transcription is disabled`);
        }
    }

    const hasAnalysis = (track?: Track) => willExist(step('analyze'), detection, outputKey('analyze', ids, track));

    for (const kind of ['agreement', 'consensus'] as const) {
        if (willRun(step(kind), detection, outputKey(kind, ids)) && !TRACKS.every(track => hasAnalysis(track))) {
            throw new ConfigurationError(`${kind} requires an analysis for both tracks`);
        }
    }

    if (willRun(step('publish'), detection, outputKey('publish', ids))) {
        const publishable = dual
            ? willExist(step('consensus'), detection, outputKey('consensus', ids))
            : hasAnalysis();
        if (!publishable) {
            throw new ConfigurationError(`publish requires ${dual ? 'a consensus' : 'an analysis'}, but none exists and none will be produced`);
        }
    }
};
