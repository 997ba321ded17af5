/**
 * Error taxonomy shared by every layer of the pipeline.
 *
 * Configuration and detector errors are thrown before any step runs. Step
 * failures are values (see `StepFailure`) and only become a `StepError` where
 * an in-process collaborator has to propagate them through a promise.
 */

export type StepFailureKind = 'StepFailed' | 'StepOutputInvalid' | 'StepTimedOut';

export interface StepFailure {
    kind: StepFailureKind;
    step: string;
    message: string;
    /** Captured stderr (or stdout) text from the external process. */
    diagnostic: string;
    exitCode?: number | null;
}

export class PipelineError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PipelineError';
    }
}

export class ConfigurationError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigurationError';
    }
}

export class DetectorIOError extends PipelineError {
    readonly directory: string;

    constructor(directory: string, options?: { cause?: unknown }) {
        const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
        super(`Cannot read working directory ${directory}${reason}`, options);
        this.name = 'DetectorIOError';
        this.directory = directory;
    }
}

export class StepError extends PipelineError {
    readonly failure: StepFailure;

    constructor(failure: StepFailure) {
        super(failure.message);
        this.name = 'StepError';
        this.failure = failure;
    }
}

export const describeFailure = (failure: StepFailure): string => {
    const diagnostic = failure.diagnostic.trim();
    return diagnostic ? `${failure.message}\n${diagnostic}` : failure.message;
};

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
