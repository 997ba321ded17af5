import { describe, expect, test, vi } from 'vitest';
import * as AnalysisCommand from '../../src/analysis/command';
import { StepInvocation } from '../../src/contract';
import { StepError } from '../../src/errors';
import * as Executor from '../../src/executor';

const fakeExecutor = (result: Executor.StepResult) => {
    const invocations: StepInvocation[] = [];
    const executor: Executor.Instance = {
        execute: vi.fn(async (invocation: StepInvocation) => {
            invocations.push(invocation);
            return result;
        }),
    };
    return { executor, invocations };
};

const request = { system: 'Be brief.', prompt: 'Summarize.', model: 'gpt-4.1', temperature: 0.2, json: false };

describe('command completion client', () => {
    test('should send the request on stdin and return the content', async () => {
        const { executor, invocations } = fakeExecutor({ ok: true, output: { content: 'A summary.' }, raw: '{"content":"A summary."}', durationMs: 5 });

        const client = AnalysisCommand.create({ executor, command: ['podline-complete', '--provider', 'local'], timeoutMs: 1000, cwd: '/tmp/work' });

        await expect(client.complete(request)).resolves.toBe('A summary.');
        expect(invocations).toEqual([{
            step: 'complete',
            command: ['podline-complete', '--provider', 'local'],
            options: [],
            input: request,
            timeoutMs: 1000,
            cwd: '/tmp/work',
        }]);
    });

    test('should raise the step failure', async () => {
        const failure = { kind: 'StepFailed' as const, step: 'complete', message: 'Step complete failed with exit code 1', diagnostic: 'rate limited' };
        const { executor } = fakeExecutor({ ok: false, failure, durationMs: 5 });

        const error = await AnalysisCommand.create({ executor, command: ['podline-complete'] }).complete(request).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(StepError);
        expect(error instanceof StepError && error.failure).toEqual(failure);
    });

    test('should reject output without a content string', async () => {
        const { executor } = fakeExecutor({ ok: true, output: { text: 'wrong key' }, raw: '{"text":"wrong key"}', durationMs: 5 });

        const error = await AnalysisCommand.create({ executor, command: ['podline-complete'] }).complete(request).catch((e: unknown) => e);

        expect(error instanceof StepError && error.failure).toEqual({
            kind: 'StepOutputInvalid',
            step: 'complete',
            message: 'Completion output has no "content" string',
            diagnostic: '{"text":"wrong key"}',
        });
    });
});
