/**
 * Pipeline Orchestrator
 *
 * One coordinating task per request:
 * validate → transcribe → (summarize ∥ analyze images) → place → render.
 * The enriched document is assembled only after both branches have settled.
 */

import { PipelineConfig, PipelineDependencies, ProcessOptions } from './types';
import { ImageMetadata, ImageRecord, PlacementDecision, ProcessingRequest, ProcessingResult, SectionMetadata, StructuredDocument } from '../types';
import * as Depth from '../depth';
import * as Transcription from '../transcription';
import * as Reasoning from '../reasoning';
import * as Ocr from '../ocr';
import * as Summary from '../summary';
import * as Vision from '../vision';
import * as Placement from '../placement';
import { renderMarkdown } from '../output/markdown';
import { ValidationError } from '../errors';
import { Semaphore } from '../util/semaphore';
import { slugify } from '../util/general';
import * as Logging from '../logging';
import {
    DEFAULT_IMAGE_CONCURRENCY,
    DEFAULT_MAX_CONCURRENT_REQUESTS,
    DEFAULT_MODEL,
    DEFAULT_REQUEST_TIMEOUT_MS,
    DEFAULT_TRANSCRIPTION_MODEL,
    DEFAULT_VISION_MODEL,
    UNTITLED,
} from '../constants';

export interface OrchestratorInstance {
    process(request: ProcessingRequest, options?: ProcessOptions): Promise<ProcessingResult>;
}

export const validateRequest = (request: ProcessingRequest): Depth.DepthProfile => {
    const profile = Depth.resolve(request.understandingLevel);
    if (request.audio.data.byteLength === 0) {
        throw new ValidationError('audio must not be empty');
    }
    request.images.forEach((image, index) => {
        if (image.data.byteLength === 0) {
            throw new ValidationError(`image ${index + 1} (${image.filename ?? 'unnamed'}) is empty`);
        }
    });
    return profile;
};

export const resolveTitle = (request: ProcessingRequest, document: StructuredDocument): string => {
    return request.title?.trim() || document.title?.trim() || UNTITLED;
};

export const buildSectionsMetadata = (
    document: StructuredDocument,
    attachments: ReadonlyMap<string, readonly ImageRecord[]>,
): SectionMetadata[] => {
    return document.sections.map(section => ({
        id: section.id,
        title: section.title,
        orderIndex: section.orderIndex,
        imageCount: attachments.get(section.id)?.length ?? 0,
    }));
};

export const buildImagesMetadata = (
    images: readonly ImageRecord[],
    placements: readonly PlacementDecision[],
): ImageMetadata[] => {
    const decisionFor = new Map(placements.map(decision => [decision.imageSourceId, decision]));
    return images.map(image => {
        const decision = decisionFor.get(image.sourceId);
        return {
            sourceId: image.sourceId,
            ...(image.filename ? { filename: image.filename } : {}),
            sectionId: decision?.targetSectionId ?? null,
            confidence: image.confidence,
            category: image.category,
            ...(image.degraded ? { degraded: image.degraded } : {}),
            ...(image.width !== undefined ? { width: image.width } : {}),
            ...(image.height !== undefined ? { height: image.height } : {}),
            ...(image.format !== undefined ? { format: image.format } : {}),
            placementScore: decision?.score ?? 0,
            placementMethod: decision?.method ?? 'none',
        };
    });
};

export const create = (config: PipelineConfig = {}, dependencies: PipelineDependencies = {}): OrchestratorInstance => {
    const logger = Logging.getLogger();
    const timeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const imageConcurrency = config.imageConcurrency ?? DEFAULT_IMAGE_CONCURRENCY;

    // Model and OCR calls share one bound, so a single-slot inference server is never oversubscribed.
    const limiter = new Semaphore(config.maxConcurrentRequests ?? DEFAULT_MAX_CONCURRENT_REQUESTS);
    const connection = { apiKey: config.apiKey, baseUrl: config.baseUrl, timeoutMs };

    const transcription = dependencies.transcription ?? Transcription.create({
        ...connection,
        defaultModel: config.transcriptionModel ?? DEFAULT_TRANSCRIPTION_MODEL,
    });
    const reasoning = dependencies.reasoning ?? Reasoning.create({
        ...connection,
        model: config.model ?? DEFAULT_MODEL,
        maxTokens: config.maxTokens,
        temperature: config.temperature,
    }, { limiter });
    const visionReasoning = dependencies.visionReasoning ?? dependencies.reasoning ?? Reasoning.create({
        ...connection,
        model: config.visionModel ?? DEFAULT_VISION_MODEL,
        temperature: config.temperature,
    }, { limiter });
    const ocr = dependencies.ocr ?? Ocr.create({
        ...connection,
        model: config.visionModel ?? DEFAULT_VISION_MODEL,
        limiter,
    });

    const summary = Summary.create(reasoning, {
        maxTokens: config.maxTokens,
        temperature: config.temperature,
        maxWindowChars: config.maxWindowChars,
        windowStrategy: config.windowStrategy,
        skipSummary: config.skipSummary,
    });
    const placement = Placement.create(reasoning, {
        minPlacementScore: config.minPlacementScore,
        concurrency: imageConcurrency,
    });

    const process = async (request: ProcessingRequest, options: ProcessOptions = {}): Promise<ProcessingResult> => {
        const profile = validateRequest(request);
        logger.info('Processing request: %d image(s), understanding level %d (%s)',
            request.images.length, profile.level, profile.label);

        const transcript = await transcription.transcribe(request.audio);
        logger.info('Transcribed %d segment(s) in %s', transcript.segments.length, transcript.language || 'unknown language');

        const vision = Vision.create(visionReasoning, ocr, {
            concurrency: imageConcurrency,
            context: request.context,
        });
        // A failed summary fails the request, so the image calls still in flight are cancelled.
        const controller = new AbortController();
        const [document, images] = await Promise.all([
            summary.summarize(transcript.segments, profile, { title: request.title, context: request.context })
                .catch((error: unknown) => {
                    controller.abort();
                    throw error;
                }),
            vision.analyzeAll(request.images, controller.signal),
        ]);

        const placements = await placement.place(document.sections, images);
        const enriched = Placement.applyPlacements(document, images, placements);

        const title = resolveTitle(request, document);
        const markdown = renderMarkdown(enriched, {
            title,
            transcriptLink: options.transcriptLink,
            resolveImagePath: options.resolveImagePath,
        });

        const imagesMetadata = buildImagesMetadata(images, placements);
        const degraded = imagesMetadata.filter(image => image.degraded).length;
        if (degraded > 0) {
            logger.warn('%d of %d image(s) could not be fully analyzed', degraded, images.length);
        }

        return {
            title,
            slug: slugify(title, 'session'),
            markdown,
            document,
            enriched,
            images,
            transcript: {
                language: transcript.language,
                segments: transcript.segments,
                text: transcript.text,
            },
            sectionsMetadata: buildSectionsMetadata(document, enriched.attachments),
            imagesMetadata,
        };
    };

    return { process };
};
