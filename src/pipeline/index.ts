/**
 * Pipeline
 *
 * Configuration resolution, step descriptors and the orchestrator that runs
 * them against an episode's working directory.
 */

export * as Orchestrator from './orchestrator';
export * as Plan from './plan';
export {
    DEFAULT_LAYER,
    FIDELITY_LEVELS,
    PipelineConfigurationSchema,
    WORKFLOWS,
    fidelityPreset,
    isFidelity,
    isWorkflow,
    mergeLayers,
    readConfigFile,
    resolveConfiguration,
    validateConfiguration,
    workflowPreset,
} from './config';
export type { ConfigLayer, Fidelity, PipelineConfiguration, ResolveOptions, Workflow } from './config';
export { buildSteps } from './steps';
export * from './types';
