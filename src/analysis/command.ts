import { z } from 'zod';
import { StepError } from '../errors';
import * as Executor from '../executor';
import { CompletionClient, CompletionRequest } from './types';

const CompletionResponseSchema = z.object({ content: z.string() });

export interface CommandClientConfig {
    executor: Executor.Instance;
    command: readonly string[];
    timeoutMs?: number;
    cwd?: string;
}

/**
 * Completion through the external `complete` step: the request goes in on
 * stdin, `{ "content": "..." }` comes back on stdout.
 */
export const create = (config: CommandClientConfig): CompletionClient => {
    const complete = async (request: CompletionRequest): Promise<string> => {
        const result = await config.executor.execute({
            step: 'complete',
            command: config.command,
            options: [],
            input: {
                system: request.system,
                prompt: request.prompt,
                model: request.model,
                temperature: request.temperature,
                json: request.json,
            },
            timeoutMs: config.timeoutMs,
            cwd: config.cwd,
        });
        if (!result.ok) {
            throw new StepError(result.failure);
        }
        const parsed = CompletionResponseSchema.safeParse(result.output);
        if (!parsed.success) {
            throw new StepError({
                kind: 'StepOutputInvalid',
                step: 'complete',
                message: 'Completion output has no "content" string',
                diagnostic: result.raw.trim().slice(0, 200),
            });
        }
        return parsed.data.content;
    };

    return { complete };
};
