/**
 * Reasoning Client
 *
 * Chat completion wrapper: one system + user message pair per request,
 * a per-call timeout, and transport failures mapped to InferenceError.
 */

import OpenAI from 'openai';
import { ReasoningConfig, ReasoningRequest, ReasoningResponse } from './types';
import { Semaphore } from '../util/semaphore';
import * as OpenAIUtil from '../util/openai';
import * as Logging from '../logging';
import { InferenceError } from '../errors';
import { DEFAULT_MAX_TOKENS, DEFAULT_REQUEST_TIMEOUT_MS, DEFAULT_TEMPERATURE } from '../constants';

export interface ClientInstance {
    complete(request: ReasoningRequest): Promise<ReasoningResponse>;
}

export interface ClientOptions {
    openaiClient?: OpenAI;
    limiter?: Semaphore;
}

export const create = (config: ReasoningConfig, options: ClientOptions = {}): ClientInstance => {
    const logger = Logging.getLogger();
    const timeout = config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    // Lazy-initialize the SDK client (only when actually needed)
    let client: OpenAI | null = options.openaiClient ?? null;
    const getClient = (): OpenAI => {
        if (!client) {
            client = OpenAIUtil.createClient({ apiKey: config.apiKey, baseUrl: config.baseUrl, timeoutMs: timeout });
        }
        return client;
    };

    const send = async (request: ReasoningRequest): Promise<ReasoningResponse> => {
        if (request.signal?.aborted) {
            throw new InferenceError(`Model ${config.model} request aborted before sending`, 'aborted', { stage: request.stage });
        }
        const startTime = Date.now();
        logger.debug('Sending request to %s (%d prompt chars)', config.model, request.prompt.length);

        const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
        if (request.systemPrompt) {
            messages.push({ role: 'system', content: request.systemPrompt });
        }
        messages.push({ role: 'user', content: request.prompt });

        try {
            const response = await getClient().chat.completions.create(
                {
                    model: config.model,
                    messages,
                    max_tokens: request.maxTokens ?? config.maxTokens ?? DEFAULT_MAX_TOKENS,
                    temperature: request.temperature ?? config.temperature ?? DEFAULT_TEMPERATURE,
                    ...(request.responseFormat === 'json' && { response_format: { type: 'json_object' as const } }),
                },
                OpenAIUtil.requestOptions(timeout, request.signal),
            );

            const duration = Date.now() - startTime;
            const choice = response.choices[0];
            const content = choice?.message?.content?.trim() ?? '';
            logger.debug('Model %s responded in %dms with %d characters', config.model, duration, content.length);

            return {
                content,
                model: response.model,
                duration,
                finishReason: choice?.finish_reason,
                usage: response.usage
                    ? {
                        promptTokens: response.usage.prompt_tokens,
                        completionTokens: response.usage.completion_tokens,
                        totalTokens: response.usage.total_tokens,
                    }
                    : undefined,
            };
        } catch (error) {
            const failure = OpenAIUtil.toInferenceError(error, request.stage ?? 'summarization', config.model);
            logger.warn('Reasoning request failed: %s', failure.message);
            throw failure;
        }
    };

    const complete = (request: ReasoningRequest): Promise<ReasoningResponse> => {
        return options.limiter ? options.limiter.run(() => send(request)) : send(request);
    };

    return { complete };
};
