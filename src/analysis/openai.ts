import { createCompletion } from '../util/openai';
import { CompletionClient, CompletionRequest } from './types';

export interface OpenAIClientConfig {
    apiKey?: string;
    baseURL?: string;
}

export const create = (config: OpenAIClientConfig): CompletionClient => ({
    complete: (request: CompletionRequest) => createCompletion(
        [
            { role: 'system', content: request.system },
            { role: 'user', content: request.prompt },
        ],
        {
            apiKey: config.apiKey,
            baseURL: config.baseURL,
            model: request.model,
            temperature: request.temperature,
            json: request.json,
        },
    ),
});
