/**
 * Pipeline Types
 */

import { ReasoningInstance } from '../reasoning';
import { TranscriptionInstance } from '../transcription';
import { OcrInstance } from '../ocr';
import { WindowStrategy } from '../summary/windowing';
import { ImageRecord } from '../types';

/**
 * Everything the pipeline reads at construction. Absent values fall back to
 * the documented defaults; nothing is read from the environment here.
 */
export interface PipelineConfig {
    model?: string;
    visionModel?: string;
    transcriptionModel?: string;
    apiKey?: string;
    baseUrl?: string;
    requestTimeoutMs?: number;
    maxConcurrentRequests?: number;
    imageConcurrency?: number;
    minPlacementScore?: number;
    maxWindowChars?: number;
    temperature?: number;
    maxTokens?: number;
    skipSummary?: boolean;
    windowStrategy?: WindowStrategy;
}

// Collaborators the pipeline would otherwise build from the config; tests pass fakes.
export interface PipelineDependencies {
    transcription?: TranscriptionInstance;
    reasoning?: ReasoningInstance;
    visionReasoning?: ReasoningInstance;
    ocr?: OcrInstance;
}

export interface ProcessOptions {
    transcriptLink?: string;
    resolveImagePath?: (image: ImageRecord) => string;
}
