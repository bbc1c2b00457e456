/**
 * Core Types
 *
 * Shared shapes that flow between the enrichment stages.
 */

import { IMAGE_CATEGORIES } from './constants';
import { TranscriptSegment } from './transcription/types';

export interface DocumentSection {
    readonly id: string;
    readonly title: string;
    readonly bodyText: string;
    readonly keyPoints: readonly string[];
    readonly orderIndex: number;
    readonly background?: string;
}

export interface StructuredDocument {
    readonly title?: string;
    readonly overview: string;
    readonly sections: readonly DocumentSection[];
    readonly glossary: Readonly<Record<string, string>>;
    readonly followUpQuestions: readonly string[];
}

export type ImageCategory = typeof IMAGE_CATEGORIES[number];

export type DegradationReason = 'ocr-unavailable' | 'inference-failed' | 'malformed-output';

export interface ImageInput {
    data: Uint8Array;
    filename?: string;
    mimeType?: string;
}

export interface ImageRecord {
    readonly sourceId: string;
    readonly filename?: string;
    readonly ocrText: string;
    readonly description: string;
    readonly keywords: readonly string[];
    readonly category: ImageCategory;
    readonly confidence: number;
    readonly degraded?: DegradationReason;
    /** Pixel size and format, when the header could be read. */
    readonly width?: number;
    readonly height?: number;
    readonly format?: string;
}

export type PlacementMethod = 'adjudicated' | 'lexical' | 'none';

export interface PlacementDecision {
    readonly imageSourceId: string;
    readonly targetSectionId: string | null;
    readonly rationale: string;
    readonly score: number;
    readonly method: PlacementMethod;
}

export interface EnrichedDocument {
    readonly document: StructuredDocument;
    readonly attachments: ReadonlyMap<string, readonly ImageRecord[]>;
    readonly unplaced: readonly ImageRecord[];
    readonly placements: readonly PlacementDecision[];
}

export interface ProcessingRequest {
    audio: { data: Uint8Array; formatHint?: string };
    images: ImageInput[];
    title?: string;
    understandingLevel: number;
    context?: string;
}

export interface SectionMetadata {
    id: string;
    title: string;
    orderIndex: number;
    imageCount: number;
}

export interface ImageMetadata {
    sourceId: string;
    filename?: string;
    sectionId: string | null;
    confidence: number;
    category: ImageCategory;
    degraded?: DegradationReason;
    width?: number;
    height?: number;
    format?: string;
    placementScore: number;
    placementMethod: PlacementMethod;
}

export interface ProcessingResult {
    title: string;
    slug: string;
    markdown: string;
    document: StructuredDocument;
    enriched: EnrichedDocument;
    images: ImageRecord[];
    transcript: {
        language: string;
        segments: TranscriptSegment[];
        text: string;
    };
    sectionsMetadata: SectionMetadata[];
    imagesMetadata: ImageMetadata[];
}
