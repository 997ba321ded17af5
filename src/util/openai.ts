import { OpenAI } from 'openai';
import { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { getLogger } from '../logging';
import { errorMessage } from '../errors';

export class OpenAIError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'OpenAIError';
    }
}

export interface CompletionOptions {
    apiKey?: string;
    baseURL?: string;
    model: string;
    temperature?: number;
    /** Ask for a JSON object response. */
    json?: boolean;
}

export async function createCompletion(messages: ChatCompletionMessageParam[], options: CompletionOptions): Promise<string> {
    const logger = getLogger();
    if (!options.apiKey) {
        throw new OpenAIError('OPENAI_API_KEY is not set');
    }

    const openai = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
    });

    logger.debug('Sending prompt to OpenAI (%s): %j', options.model, messages);
    const startTime = Date.now();

    let response: string | undefined;
    try {
        const completion = await openai.chat.completions.create({
            model: options.model,
            messages,
            temperature: options.temperature,
            response_format: options.json ? { type: 'json_object' } : undefined,
        });
        response = completion.choices[0]?.message?.content?.trim();
    } catch (error) {
        logger.error('Error calling OpenAI API: %s', errorMessage(error));
        throw new OpenAIError(`Failed to create completion: ${errorMessage(error)}`, { cause: error });
    }

    const duration = ((Date.now() - startTime) / 1000).toFixed(1);
    logger.verbose('%s responded in %ss', options.model, duration);

    if (!response) {
        throw new OpenAIError('No response received from OpenAI');
    }
    return response;
}
