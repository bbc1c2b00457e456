/**
 * Vision Analyzer
 *
 * One ImageRecord per uploaded image: OCR text plus a model description,
 * keywords and category. A failing image yields a degraded record
 * (category "unknown", confidence 0) instead of failing the request.
 */

import { ReasoningInstance } from '../reasoning';
import { OcrInstance } from '../ocr';
import { DegradationReason, ImageInput, ImageRecord } from '../types';
import { extractStructured, describeFailure } from '../extraction';
import { InferenceError, OcrUnavailableError } from '../errors';
import { buildImageAnalysisPrompt } from '../prompt/vision';
import { ImageAnalysisSchema } from './schema';
import { mapBounded } from '../util/semaphore';
import { hashBytes } from '../util/general';
import { ImageInfo, readImageInfo } from '../util/image';
import * as Logging from '../logging';
import { DEFAULT_IMAGE_CONCURRENCY } from '../constants';

export interface VisionConfig {
    concurrency?: number;
    context?: string;
    maxTokens?: number;
}

export interface VisionInstance {
    analyze(image: ImageInput, sourceId: string, signal?: AbortSignal): Promise<ImageRecord>;
    /** Aborting `signal` cancels outstanding calls; the affected images come back degraded. */
    analyzeAll(images: readonly ImageInput[], signal?: AbortSignal): Promise<ImageRecord[]>;
}

/**
 * Content-derived ids, so the same file gets the same id on every run.
 * Identical uploads are told apart by a positional suffix.
 */
export const assignSourceIds = (images: readonly ImageInput[]): string[] => {
    const counts = new Map<string, number>();
    return images.map(image => {
        const base = `img-${hashBytes(image.data)}`;
        const seen = (counts.get(base) ?? 0) + 1;
        counts.set(base, seen);
        return seen === 1 ? base : `${base}-${seen}`;
    });
};

// Fields every record carries from the file itself.
const fileFields = (image: ImageInput, info: ImageInfo | undefined = readImageInfo(image.data)) => ({
    ...(image.filename ? { filename: image.filename } : {}),
    ...info,
});

export const degradedRecord = (
    sourceId: string,
    image: ImageInput,
    ocrText: string,
    reason: DegradationReason,
): ImageRecord => {
    const record: ImageRecord = {
        sourceId,
        ...fileFields(image),
        ocrText,
        description: '',
        keywords: [],
        category: 'unknown',
        confidence: 0,
        degraded: reason,
    };
    return Object.freeze(record);
};

export const create = (reasoning: ReasoningInstance, ocr: OcrInstance, config: VisionConfig = {}): VisionInstance => {
    const logger = Logging.getLogger();
    const concurrency = config.concurrency ?? DEFAULT_IMAGE_CONCURRENCY;

    const readText = async (image: ImageInput, signal?: AbortSignal): Promise<{ text: string; degraded?: DegradationReason }> => {
        try {
            return { text: await ocr.extractText(image, signal) };
        } catch (error) {
            const detail = error instanceof OcrUnavailableError ? error.message : String(error);
            logger.warn('OCR unavailable for %s: %s', image.filename ?? 'image', detail);
            return { text: '', degraded: 'ocr-unavailable' };
        }
    };

    const analyze = async (image: ImageInput, sourceId: string, signal?: AbortSignal): Promise<ImageRecord> => {
        const ocrResult = await readText(image, signal);
        const info = readImageInfo(image.data);
        const { systemPrompt, prompt } = await buildImageAnalysisPrompt({
            ocrText: ocrResult.text,
            filename: image.filename,
            byteLength: image.data.byteLength,
            info,
            context: config.context,
        });

        let content: string;
        try {
            const response = await reasoning.complete({
                prompt,
                systemPrompt,
                maxTokens: config.maxTokens,
                responseFormat: 'json',
                stage: 'vision',
                signal,
            });
            content = response.content;
        } catch (error) {
            const detail = error instanceof InferenceError ? `${error.reason}: ${error.message}` : String(error);
            logger.warn('Image analysis failed for %s (%s), using degraded record', sourceId, detail);
            return degradedRecord(sourceId, image, ocrResult.text, 'inference-failed');
        }

        const extracted = extractStructured(content, ImageAnalysisSchema);
        if (extracted.kind !== 'success') {
            logger.warn('Image analysis for %s unusable (%s), using degraded record', sourceId, describeFailure(extracted));
            return degradedRecord(sourceId, image, ocrResult.text, 'malformed-output');
        }

        const analysis = extracted.value;
        logger.debug('Analyzed %s: %s (%d keywords)', sourceId, analysis.category, analysis.keywords.length);
        const record: ImageRecord = {
            sourceId,
            ...fileFields(image, info),
            ocrText: ocrResult.text,
            description: analysis.description,
            keywords: analysis.keywords,
            category: analysis.category,
            confidence: analysis.confidence,
            ...(ocrResult.degraded ? { degraded: ocrResult.degraded } : {}),
        };
        return Object.freeze(record);
    };

    const analyzeAll = async (images: readonly ImageInput[], signal?: AbortSignal): Promise<ImageRecord[]> => {
        if (images.length === 0) return [];
        const ids = assignSourceIds(images);
        logger.info('Analyzing %d image(s), %d at a time', images.length, concurrency);
        return mapBounded(images, concurrency, (image, index) => analyze(image, ids[index], signal));
    };

    return { analyze, analyzeAll };
};
