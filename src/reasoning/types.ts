/**
 * Reasoning System Types
 *
 * Contract for the chat-completion endpoint every enrichment stage talks to.
 */

import { PipelineStage } from '../errors';

export type ResponseFormat = 'json' | 'text';

export interface ReasoningConfig {
    model: string;
    maxTokens?: number;
    temperature?: number;
    timeoutMs?: number;
    apiKey?: string;
    baseUrl?: string;
}

export interface ReasoningRequest {
    prompt: string;
    systemPrompt?: string;
    maxTokens?: number;
    temperature?: number;
    responseFormat?: ResponseFormat;
    // Recorded on the InferenceError when the request fails.
    stage?: PipelineStage;
    // Aborting cancels the request, or skips it while it still waits for a slot.
    signal?: AbortSignal;
}

export interface ReasoningResponse {
    content: string;
    model: string;
    usage?: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    finishReason?: string;
    duration?: number;
}
