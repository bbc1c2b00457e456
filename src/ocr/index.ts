/**
 * OCR
 *
 * Text extraction through a vision-capable chat model. No text is a valid
 * result (empty string); only transport failures and timeouts raise.
 */

import OpenAI from 'openai';
import { ImageInput } from '../types';
import { OcrUnavailableError } from '../errors';
import { buildChatPrompt } from '../prompt/chat';
import { Semaphore } from '../util/semaphore';
import * as OpenAIUtil from '../util/openai';
import * as Logging from '../logging';
import { DEFAULT_REQUEST_TIMEOUT_MS, DEFAULT_VISION_MODEL } from '../constants';

export interface OcrInstance {
    extractText(image: ImageInput, signal?: AbortSignal): Promise<string>;
}

export interface OcrConfig {
    model?: string;
    timeoutMs?: number;
    apiKey?: string;
    baseUrl?: string;
    openaiClient?: OpenAI;
    limiter?: Semaphore;
}

const MIME_TYPES: Record<string, string> = {
    png: 'image/png',
    jpg: 'image/jpeg',
    jpeg: 'image/jpeg',
    gif: 'image/gif',
    webp: 'image/webp',
};

// Models sometimes answer "no text" in words despite being asked for an empty reply.
const NO_TEXT_REPLIES = /^(\(?no (visible )?text( (found|detected))?\)?\.?|none\.?|n\/a)$/i;

export const resolveMimeType = (image: ImageInput): string => {
    if (image.mimeType) return image.mimeType;
    const extension = image.filename?.split('.').pop()?.toLowerCase() ?? '';
    return MIME_TYPES[extension] ?? 'image/png';
};

export const toDataUrl = (image: ImageInput): string => {
    return `data:${resolveMimeType(image)};base64,${Buffer.from(image.data).toString('base64')}`;
};

export const create = (config: OcrConfig = {}): OcrInstance => {
    const logger = Logging.getLogger();
    const model = config.model ?? DEFAULT_VISION_MODEL;
    const timeout = config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    let client: OpenAI | null = config.openaiClient ?? null;
    const getClient = (): OpenAI => {
        if (!client) {
            client = OpenAIUtil.createClient({ apiKey: config.apiKey, baseUrl: config.baseUrl, timeoutMs: timeout });
        }
        return client;
    };

    const send = async (image: ImageInput, signal?: AbortSignal): Promise<string> => {
        if (signal?.aborted) {
            throw new OcrUnavailableError(`OCR with ${model} aborted before sending`);
        }
        const { systemPrompt, prompt } = await buildChatPrompt({
            template: 'ocr',
            content: [{ title: 'Task', content: 'Transcribe the text in this image.' }],
        });
        try {
            const response = await getClient().chat.completions.create(
                {
                    model,
                    temperature: 0,
                    messages: [
                        { role: 'system', content: systemPrompt },
                        {
                            role: 'user',
                            content: [
                                { type: 'text', text: prompt },
                                { type: 'image_url', image_url: { url: toDataUrl(image) } },
                            ],
                        },
                    ],
                },
                OpenAIUtil.requestOptions(timeout, signal),
            );
            const text = response.choices[0]?.message?.content?.trim() ?? '';
            return NO_TEXT_REPLIES.test(text) ? '' : text;
        } catch (error) {
            const reason = OpenAIUtil.classifyFailure(error);
            const detail = error instanceof Error ? error.message : String(error);
            logger.warn('OCR failed for %s (%s): %s', image.filename ?? 'image', reason, detail);
            throw new OcrUnavailableError(`OCR with ${model} failed (${reason}): ${detail}`, { cause: error });
        }
    };

    return {
        extractText: (image, signal) => config.limiter ? config.limiter.run(() => send(image, signal)) : send(image, signal),
    };
};
