import OpenAI from 'openai';
import { InferenceError, InferenceFailureReason, PipelineStage } from '../errors';

export interface ClientOptions {
    apiKey?: string;
    baseUrl?: string;
    timeoutMs?: number;
}

/**
 * Builds the SDK client. Retries are disabled: the callers own the retry policy.
 * A local OpenAI-compatible server (vLLM and friends) does not need a real key.
 */
export const createClient = (options: ClientOptions = {}): OpenAI => {
    return new OpenAI({
        apiKey: options.apiKey ?? process.env.OPENAI_API_KEY ?? 'not-needed',
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        maxRetries: 0,
    });
};

export const classifyFailure = (error: unknown): InferenceFailureReason => {
    if (error instanceof OpenAI.APIUserAbortError) return 'aborted';
    // The timeout error is a subclass of the connection error, so it is checked first.
    if (error instanceof OpenAI.APIConnectionTimeoutError) return 'timeout';
    if (error instanceof OpenAI.APIConnectionError) return 'connection';
    if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) return 'timeout';
    if (error instanceof OpenAI.APIError) return 'server';
    return 'connection';
};

/** Per-call SDK options; the signal is only passed when there is one. */
export const requestOptions = (timeout: number, signal?: AbortSignal) => ({
    timeout,
    maxRetries: 0,
    ...(signal ? { signal } : {}),
});

export const toInferenceError = (error: unknown, stage: PipelineStage, model: string): InferenceError => {
    if (error instanceof InferenceError) return error;
    const reason = classifyFailure(error);
    const detail = error instanceof Error ? error.message : String(error);
    return new InferenceError(`Model ${model} request failed (${reason}): ${detail}`, reason, { cause: error, stage });
};
