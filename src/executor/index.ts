/**
 * Step Executor
 *
 * Runs exactly one external step and translates what the process did into a
 * `StepResult`. Retries are the caller's decision; nothing here repeats a
 * step.
 */

import { ProcessOutcome, ProcessRunner, StepInvocation, serializeInput } from '../contract';
import { StepFailure, StepFailureKind, errorMessage } from '../errors';
import * as Logging from '../logging';
import { JsonValue } from '../types';
import * as Storage from '../util/storage';
import { StepResult } from './types';

export interface Config {
    runner: ProcessRunner;
}

export interface Instance {
    execute(invocation: StepInvocation): Promise<StepResult>;
}

const isDocument = (value: unknown): value is JsonValue =>
    typeof value === 'object' && value !== null;

export const parseOutput = (stdout: string): JsonValue | undefined => {
    const trimmed = stdout.trim();
    if (!trimmed) {
        return undefined;
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(trimmed);
    } catch {
        return undefined;
    }
    return isDocument(parsed) ? parsed : undefined;
};

const failureFrom = (step: string, outcome: ProcessOutcome): StepFailure | undefined => {
    const diagnostic = outcome.stderr.trim() || outcome.stdout.trim();
    const fail = (kind: StepFailureKind, message: string): StepFailure =>
        ({ kind, step, message, diagnostic, exitCode: outcome.exitCode });

    if (outcome.timedOut) {
        return fail('StepTimedOut', `Step ${step} timed out`);
    }
    if (outcome.spawnError) {
        return { ...fail('StepFailed', `Step ${step} could not be started: ${outcome.spawnError.message}`), diagnostic: diagnostic || outcome.spawnError.message };
    }
    if (outcome.exitCode !== 0) {
        const status = outcome.exitCode !== null ? `exit code ${outcome.exitCode}` : `signal ${outcome.signal ?? 'unknown'}`;
        return fail('StepFailed', `Step ${step} failed with ${status}`);
    }
    return undefined;
};

export const create = (config: Config): Instance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    const execute = async (invocation: StepInvocation): Promise<StepResult> => {
        const { step } = invocation;
        const startTime = Date.now();
        logger.verbose('Running step %s: %s %s', step, invocation.command.join(' '), invocation.options.join(' '));

        const outcome = await config.runner.run({
            command: invocation.command,
            args: invocation.options,
            stdin: serializeInput(invocation.input),
            timeoutMs: invocation.timeoutMs,
            cwd: invocation.cwd,
        });
        const durationMs = Date.now() - startTime;

        const failure = failureFrom(step, outcome);
        if (failure) {
            logger.debug('Step %s failed (%s): %s', step, failure.kind, failure.diagnostic);
            return { ok: false, failure, durationMs };
        }

        const output = parseOutput(outcome.stdout);
        if (output === undefined) {
            const diagnostic = outcome.stdout.trim()
                ? `Output is not a JSON object or array: ${outcome.stdout.trim().slice(0, 200)}`
                : 'Step produced no output';
            return {
                ok: false,
                failure: { kind: 'StepOutputInvalid', step, message: `Step ${step} produced invalid output`, diagnostic, exitCode: outcome.exitCode },
                durationMs,
            };
        }

        if (invocation.persistTo) {
            try {
                await storage.writeFileAtomic(invocation.persistTo, outcome.stdout);
            } catch (error) {
                logger.error('Could not persist output of %s to %s: %s', step, invocation.persistTo, errorMessage(error));
                return {
                    ok: false,
                    failure: { kind: 'StepFailed', step, message: `Step ${step} output could not be written to ${invocation.persistTo}`, diagnostic: errorMessage(error) },
                    durationMs,
                };
            }
        }

        logger.debug('Step %s completed in %.1fs', step, durationMs / 1000);
        return { ok: true, output, raw: outcome.stdout, durationMs };
    };

    return { execute };
};

export * from './types';
