/**
 * Transcription System
 *
 * Entry point for the speech-to-text adapter. Produces raw timed segments;
 * structuring and explanation happen later in the summarization pass.
 */

import OpenAI from 'openai';
import { AudioInput, TranscriptionConfig, TranscriptionResult, TranscriptionModel } from './types';
import * as Service from './service';
import * as OpenAIUtil from '../util/openai';

export interface TranscriptionInstance {
    transcribe(audio: AudioInput, options?: Partial<TranscriptionConfig>): Promise<TranscriptionResult>;
}

export interface CreateOptions {
    apiKey?: string;
    baseUrl?: string;
    defaultModel?: TranscriptionModel;
    timeoutMs?: number;
    openaiClient?: OpenAI;
}

export const create = (options: CreateOptions = {}): TranscriptionInstance => {
    // Lazy-initialize the SDK client (only when actually needed for transcription)
    let service: Service.ServiceInstance | null = null;
    const getService = (): Service.ServiceInstance => {
        if (!service) {
            const openai = options.openaiClient ?? OpenAIUtil.createClient({
                apiKey: options.apiKey,
                baseUrl: options.baseUrl,
                timeoutMs: options.timeoutMs,
            });
            service = Service.create(openai);
        }
        return service;
    };

    const defaultModel: TranscriptionModel = options.defaultModel ?? 'whisper-1';

    return {
        transcribe: (audio, configOptions = {}) => getService().transcribe(audio, {
            timeoutMs: options.timeoutMs,
            ...configOptions,
            model: configOptions.model ?? defaultModel,
        }),
    };
};

export * from './types';
export { normalizeSegments, joinSegments } from './normalize';
