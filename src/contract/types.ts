/**
 * Command Contract Types
 *
 * Every external step is invoked the same way: at most one JSON document on
 * stdin, a list of string options, exactly one JSON document on stdout on
 * success, a non-zero exit status with diagnostics on stderr on failure.
 * Steps never prompt; interaction belongs to the CLI layer.
 */

import { JsonValue } from '../types';

export interface StepInvocation {
    /** Name used in logs and failures, e.g. "transcribe". */
    step: string;
    /** Program followed by any fixed arguments, e.g. ["podline-transcribe"]. */
    command: readonly string[];
    options: string[];
    input?: JsonValue;
    timeoutMs?: number;
    /** Also write the raw output document to this path, atomically. */
    persistTo?: string;
    cwd?: string;
}

export interface ProcessRequest {
    command: readonly string[];
    args: string[];
    stdin?: string;
    timeoutMs?: number;
    cwd?: string;
}

export interface ProcessOutcome {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
    /** Set when the process could not be started at all (missing executable, permissions). */
    spawnError?: Error;
}

export interface ProcessRunner {
    run(request: ProcessRequest): Promise<ProcessOutcome>;
}
