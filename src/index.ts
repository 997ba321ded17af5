/**
 * Podline Public API
 *
 * The modules behind the `podline` command, for embedding the pipeline in
 * other programs or driving it with custom step commands.
 */

export * as Artifacts from './artifacts';
export * as Graph from './graph';
export * as Contract from './contract';
export * as Executor from './executor';
export * as Analysis from './analysis';
export * as Consensus from './consensus';
export * as Pipeline from './pipeline';
export * as Status from './status';
export * as Logging from './logging';

export {
    ConfigurationError,
    DetectorIOError,
    PipelineError,
    StepError,
} from './errors';
export type { StepFailure, StepFailureKind } from './errors';
export { STEP_KINDS, TRACKS } from './types';
export type { StepKind, Track } from './types';
export { PROGRAM_NAME, VERSION } from './constants';
