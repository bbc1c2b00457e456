/**
 * Image Placement Engine
 *
 * Decides, per image, which document section it belongs to. Lexical overlap
 * ranks the sections and gates placement; a model call adjudicates between
 * candidates. When adjudication fails the lexical ranking decides alone.
 * Decisions are independent of each other and of completion order.
 */

import { z } from 'zod';
import { ReasoningInstance } from '../reasoning';
import { DocumentSection, EnrichedDocument, ImageRecord, PlacementDecision, StructuredDocument } from '../types';
import { extractStructured, describeFailure } from '../extraction';
import { InferenceError } from '../errors';
import { buildPlacementPrompt } from '../prompt/placement';
import { mapBounded } from '../util/semaphore';
import { rankSections } from './scoring';
import { AdjudicationOutcome, PlacementConfig, SectionScore } from './types';
import * as Logging from '../logging';
import { DEFAULT_IMAGE_CONCURRENCY, DEFAULT_MIN_PLACEMENT_SCORE } from '../constants';

export interface PlacementInstance {
    place(sections: readonly DocumentSection[], images: readonly ImageRecord[]): Promise<PlacementDecision[]>;
}

const AdjudicationSchema = z.object({
    section_id: z.string().trim().min(1).nullable(),
    reason: z.string().trim().default(''),
});

const unplaced = (image: ImageRecord, rationale: string, score: number, method: PlacementDecision['method']): PlacementDecision => ({
    imageSourceId: image.sourceId,
    targetSectionId: null,
    rationale,
    score,
    method,
});

export const create = (reasoning: ReasoningInstance, config: PlacementConfig = {}): PlacementInstance => {
    const logger = Logging.getLogger();
    const threshold = config.minPlacementScore ?? DEFAULT_MIN_PLACEMENT_SCORE;
    const concurrency = config.concurrency ?? DEFAULT_IMAGE_CONCURRENCY;

    const adjudicate = async (image: ImageRecord, sections: readonly DocumentSection[]): Promise<AdjudicationOutcome> => {
        const { systemPrompt, prompt } = await buildPlacementPrompt(image, sections);
        let content: string;
        try {
            const response = await reasoning.complete({
                prompt,
                systemPrompt,
                maxTokens: config.maxTokens,
                responseFormat: 'json',
                stage: 'placement',
            });
            content = response.content;
        } catch (error) {
            const detail = error instanceof InferenceError ? `${error.reason}: ${error.message}` : String(error);
            return { kind: 'failed', reason: `adjudication unavailable (${detail})` };
        }

        const extracted = extractStructured(content, AdjudicationSchema);
        if (extracted.kind !== 'success') {
            return { kind: 'failed', reason: `adjudication unusable (${describeFailure(extracted)})` };
        }
        const sectionId = extracted.value.section_id;
        if (sectionId !== null && !sections.some(section => section.id === sectionId)) {
            return { kind: 'failed', reason: `adjudication named unknown section "${sectionId}"` };
        }
        return { kind: 'decided', adjudication: { sectionId, reason: extracted.value.reason } };
    };

    // Only reached once the top score has cleared the threshold.
    const lexicalFallback = (image: ImageRecord, top: SectionScore): PlacementDecision => ({
        imageSourceId: image.sourceId,
        targetSectionId: top.sectionId,
        rationale: 'Best keyword overlap with this section',
        score: top.score,
        method: 'lexical',
    });

    const placeOne = async (image: ImageRecord, sections: readonly DocumentSection[]): Promise<PlacementDecision> => {
        const ranking = rankSections(image, sections);
        const top = ranking[0];
        if (top === undefined) {
            return unplaced(image, 'Document has no sections', 0, 'none');
        }
        if (top.score < threshold) {
            return unplaced(image, 'No section overlaps enough with this image', top.score, 'none');
        }

        const outcome = await adjudicate(image, sections);
        if (outcome.kind === 'failed') {
            logger.warn('Placement of %s falls back to keyword overlap: %s', image.sourceId, outcome.reason);
            return lexicalFallback(image, top);
        }

        const { sectionId, reason } = outcome.adjudication;
        if (sectionId === null) {
            return unplaced(image, reason || 'No section fits this image', top.score, 'adjudicated');
        }
        const chosen = ranking.find(candidate => candidate.sectionId === sectionId);
        return {
            imageSourceId: image.sourceId,
            targetSectionId: sectionId,
            rationale: reason || 'Chosen as the best fit for this section',
            score: chosen ? chosen.score : 0,
            method: 'adjudicated',
        };
    };

    const place = async (sections: readonly DocumentSection[], images: readonly ImageRecord[]): Promise<PlacementDecision[]> => {
        if (images.length === 0) return [];
        if (sections.length === 0) {
            return images.map(image => unplaced(image, 'Document has no sections', 0, 'none'));
        }
        const decisions = await mapBounded(images, concurrency, image => placeOne(image, sections));
        const placed = decisions.filter(decision => decision.targetSectionId !== null).length;
        logger.info('Placed %d of %d image(s)', placed, images.length);
        return decisions;
    };

    return { place };
};

/**
 * Joins the placement decisions onto the document. Attachments keep the
 * order of `images`; every image ends up either attached or unplaced.
 */
export const applyPlacements = (
    document: StructuredDocument,
    images: readonly ImageRecord[],
    placements: readonly PlacementDecision[],
): EnrichedDocument => {
    const decisionFor = new Map(placements.map(decision => [decision.imageSourceId, decision]));
    const sectionIds = new Set(document.sections.map(section => section.id));
    const attachments = new Map<string, ImageRecord[]>();
    const unplacedImages: ImageRecord[] = [];

    for (const image of images) {
        const target = decisionFor.get(image.sourceId)?.targetSectionId ?? null;
        if (target === null || !sectionIds.has(target)) {
            unplacedImages.push(image);
            continue;
        }
        const attached = attachments.get(target) ?? [];
        attached.push(image);
        attachments.set(target, attached);
    }

    return Object.freeze({
        document,
        attachments,
        unplaced: unplacedImages,
        placements: [...placements],
    });
};

export { tokenize, lexicalScore, rankSections } from './scoring';
export * from './types';
