/**
 * Artifact Types
 *
 * An artifact is a JSON file in an episode's working directory whose name
 * encodes what produced it. The name is the only thing detection looks at.
 */

import { StepKind, Track } from '../types';

export const ARTIFACT_KINDS = [
    'episode-meta',
    'audio-meta',
    'transcript-base',
    'transcript-diarized',
    'transcript-preprocessed',
    'analysis',
    'agreement',
    'consensus',
    'export',
    'publish-receipt',
] as const;

export type ArtifactKind = typeof ARTIFACT_KINDS[number];

export interface ArtifactKey {
    kind: ArtifactKind;
    /** Producing model or engine: ASR model for transcripts and exports, LLM for analyses, destination for receipts. */
    modelId?: string;
    /** ASR model of the transcript an analysis (or its agreement/consensus) was computed from. */
    sourceModelId?: string;
    track?: Track;
}

export interface ArtifactDescriptor extends ArtifactKey {
    fileName: string;
    path: string;
}

/** Which step produces each artifact kind. */
export const PRODUCING_STEP: Record<ArtifactKind, StepKind> = {
    'episode-meta': 'fetch',
    'audio-meta': 'transcode',
    'transcript-base': 'transcribe',
    'transcript-diarized': 'diarize',
    'transcript-preprocessed': 'preprocess',
    'analysis': 'analyze',
    'agreement': 'agreement',
    'consensus': 'consensus',
    'export': 'export',
    'publish-receipt': 'publish',
};

export interface StepParameters {
    modelId?: string;
    sourceModelId?: string;
    track?: Track;
    fileName: string;
}

export interface LineageRecord {
    artifact: string;
    kind: ArtifactKind;
    operation: StepKind;
    /** File name of the artifact this one was computed from, if any. */
    parent: string | null;
    parameters: Record<string, string | number | boolean | null>;
    createdAt: string;
    /** Incremented every time the artifact is rewritten in place. */
    revision: number;
}
