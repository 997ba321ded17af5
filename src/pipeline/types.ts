/**
 * Pipeline Types
 *
 * Step descriptors are built once from the resolved configuration and handed
 * to the orchestrator as opaque, ordered input. Everything the orchestrator
 * reports back is described here as well.
 */

import { AnalysisType } from '../analysis/types';
import { StepFailure, StepFailureKind } from '../errors';
import { StepKind, Track } from '../types';

export type AsrPreset = 'precision' | 'recall' | 'balanced';

export interface FetchParams {
    show?: string;
    rssUrl?: string;
    youtubeUrl?: string;
    date?: string;
    titleContains?: string;
}

export interface TranscodeParams {
    format: string;
}

export interface TranscribeParams {
    model: string;
    compute: string;
    provider: string;
    preset?: AsrPreset;
}

export type DiarizeParams = Record<string, never>;

export interface PreprocessParams {
    restore: boolean;
    restoreModel?: string;
}

export interface AnalyzeParams {
    model: string;
    temperature: number;
    type: AnalysisType;
    maxCharsPerChunk: number;
    concurrency: number;
}

export interface AgreementParams {
    model: string;
}

export interface ConsensusParams {
    model: string;
}

export interface ExportParams {
    formats: string[];
}

export interface PublishParams {
    destination: string;
    /** Destination property names, passed as `--<name>-prop <value>`. */
    properties: Record<string, string>;
}

export interface StepParamsByKind {
    fetch: FetchParams;
    transcode: TranscodeParams;
    transcribe: TranscribeParams;
    diarize: DiarizeParams;
    preprocess: PreprocessParams;
    analyze: AnalyzeParams;
    agreement: AgreementParams;
    consensus: ConsensusParams;
    export: ExportParams;
    publish: PublishParams;
}

interface DescriptorOf<K extends StepKind> {
    kind: K;
    enabled: boolean;
    params: StepParamsByKind[K];
    /** Run even when the step's artifact already exists. */
    force: boolean;
    /** A failure is recorded as a warning instead of aborting the run. */
    soft: boolean;
    /** Additional attempts after a failure. */
    retries: number;
    timeoutMs: number;
}

export type StepDescriptor = { [K in StepKind]: DescriptorOf<K> }[StepKind];

export type StepDescriptorOf<K extends StepKind> = K extends StepKind ? DescriptorOf<K> : never;

export type StepStatus = 'Pending' | 'Running' | 'Completed' | 'Failed' | 'Skipped';

export type RunStatus = 'Completed' | 'PartiallyCompleted' | 'Aborted';

export interface StepRecord {
    step: StepKind;
    track?: Track;
    status: StepStatus;
    attempts: number;
    /** File name of the artifact produced or found. */
    artifact?: string;
    durationMs?: number;
    failure?: StepFailure;
}

export interface RunFailure {
    step: StepKind;
    track?: Track;
    kind: StepFailureKind;
    message: string;
    diagnostic: string;
}

export interface RunRequest {
    workingDirectory: string;
    steps: readonly StepDescriptor[];
    /** Run the track steps twice, once per track, then reconcile. */
    dual: boolean;
}

export interface RunReport {
    status: RunStatus;
    workingDirectory: string;
    steps: StepRecord[];
    warnings: string[];
    failure?: RunFailure;
    /** Artifact file names present when the run ended. */
    artifacts: string[];
    durationMs: number;
}

/** Program (and fixed arguments) for every step that runs as an external process. */
export type StepCommands = Record<'fetch' | 'transcode' | 'transcribe' | 'diarize' | 'preprocess' | 'complete' | 'export' | 'publish', readonly string[]>;
