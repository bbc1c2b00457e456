/**
 * Transcription Service
 *
 * Sends the audio bytes to the OpenAI transcription endpoint and normalizes
 * the verbose response into ordered timed segments.
 */

import OpenAI, { toFile } from 'openai';
import { z } from 'zod';
import {
    AudioInput,
    TranscriptionConfig,
    TranscriptionResult,
    MODEL_CAPABILITIES,
} from './types';
import { normalizeSegments, joinSegments, RawSegment } from './normalize';
import { TranscriptionError } from '../errors';
import * as OpenAIUtil from '../util/openai';
import * as Logging from '../logging';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../constants';

export interface ServiceInstance {
    transcribe(audio: AudioInput, config: TranscriptionConfig): Promise<TranscriptionResult>;
}

const VerboseTranscriptionSchema = z.object({
    text: z.string().default(''),
    language: z.string().optional(),
    duration: z.number().optional(),
    segments: z.array(z.object({
        start: z.number(),
        end: z.number(),
        text: z.string(),
    })).optional(),
});

const MIME_EXTENSIONS: Record<string, string> = {
    mpeg: 'mp3',
    'x-m4a': 'm4a',
    mp4: 'mp4',
    wav: 'wav',
    'x-wav': 'wav',
    webm: 'webm',
    ogg: 'ogg',
};

export const resolveExtension = (formatHint?: string): string => {
    if (!formatHint) return 'wav';
    const hint = formatHint.toLowerCase().replace(/^\./, '');
    if (hint.includes('/')) {
        const subtype = hint.split('/')[1] ?? '';
        return MIME_EXTENSIONS[subtype] ?? (subtype || 'wav');
    }
    return hint;
};

export const create = (openai: OpenAI): ServiceInstance => {
    const logger = Logging.getLogger();

    const transcribe = async (audio: AudioInput, config: TranscriptionConfig): Promise<TranscriptionResult> => {
        const limit = MODEL_CAPABILITIES[config.model]?.maxFileSize;
        if (limit !== undefined && audio.data.byteLength > limit) {
            throw new TranscriptionError(
                `Audio is ${audio.data.byteLength} bytes, over the ${limit} byte limit of ${config.model}`,
            );
        }

        const extension = resolveExtension(audio.formatHint);
        logger.info('Transcribing %d bytes of %s audio with %s', audio.data.byteLength, extension, config.model);
        const startTime = Date.now();

        let raw: unknown;
        try {
            const file = await toFile(audio.data, `audio.${extension}`);
            raw = await openai.audio.transcriptions.create(
                {
                    model: config.model,
                    file,
                    response_format: MODEL_CAPABILITIES[config.model]?.timestampedSegments === false ? 'json' : 'verbose_json',
                    ...(config.language && { language: config.language }),
                    ...(config.temperature !== undefined && { temperature: config.temperature }),
                    ...(config.prompt && { prompt: config.prompt }),
                },
                { timeout: config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS, maxRetries: 0 },
            );
        } catch (error) {
            const reason = OpenAIUtil.classifyFailure(error);
            const detail = error instanceof Error ? error.message : String(error);
            logger.error('Transcription failed (%s): %s', reason, detail);
            throw new TranscriptionError(`Transcription with ${config.model} failed (${reason}): ${detail}`, { cause: error });
        }

        const parsed = VerboseTranscriptionSchema.safeParse(raw);
        if (!parsed.success) {
            throw new TranscriptionError(`Unexpected transcription response: ${parsed.error.message}`);
        }

        const language = parsed.data.language ?? config.language ?? 'unknown';
        const rawSegments: RawSegment[] = parsed.data.segments
            ?? [{ start: 0, end: parsed.data.duration ?? 0, text: parsed.data.text }];
        const segments = normalizeSegments(rawSegments, language);
        const duration = Date.now() - startTime;

        logger.info('Transcription: %d segments in %.1fs', segments.length, duration / 1000);

        return {
            segments,
            text: joinSegments(segments),
            language,
            model: config.model,
            duration,
        };
    };

    return { transcribe };
};
