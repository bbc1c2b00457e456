/**
 * Error taxonomy for the enrichment pipeline.
 *
 * Every error carries the stage that raised it and a stable kind, so a failed
 * request can be reported as `{ stage, kind, message }` without string matching.
 */

export type PipelineStage =
    | 'validation'
    | 'configuration'
    | 'transcription'
    | 'summarization'
    | 'vision'
    | 'ocr'
    | 'placement'
    | 'render';

export type ErrorKind =
    | 'ValidationError'
    | 'ConfigurationError'
    | 'TranscriptionError'
    | 'InferenceError'
    | 'ModelUnavailable'
    | 'MalformedOutput'
    | 'EmptyTranscript'
    | 'OCRUnavailable';

export type InferenceFailureReason = 'timeout' | 'connection' | 'server' | 'aborted';

export type ExtractionFailureKind = 'no-structure' | 'incomplete-structure';

export class PipelineError extends Error {
    readonly stage: PipelineStage;
    readonly kind: ErrorKind;

    constructor(message: string, stage: PipelineStage, kind: ErrorKind, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PipelineError';
        this.stage = stage;
        this.kind = kind;
    }
}

export class ValidationError extends PipelineError {
    constructor(message: string) {
        super(message, 'validation', 'ValidationError');
        this.name = 'ValidationError';
    }
}

export class ConfigurationError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'configuration', 'ConfigurationError', options);
        this.name = 'ConfigurationError';
    }
}

export class TranscriptionError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'transcription', 'TranscriptionError', options);
        this.name = 'TranscriptionError';
    }
}

export class InferenceError extends PipelineError {
    readonly reason: InferenceFailureReason;

    constructor(message: string, reason: InferenceFailureReason, options?: { cause?: unknown; stage?: PipelineStage }) {
        super(message, options?.stage ?? 'summarization', 'InferenceError', options);
        this.name = 'InferenceError';
        this.reason = reason;
    }
}

export class ModelUnavailableError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'summarization', 'ModelUnavailable', options);
        this.name = 'ModelUnavailableError';
    }
}

export class MalformedOutputError extends PipelineError {
    readonly extraction: ExtractionFailureKind;

    constructor(message: string, extraction: ExtractionFailureKind) {
        super(message, 'summarization', 'MalformedOutput');
        this.name = 'MalformedOutputError';
        this.extraction = extraction;
    }
}

export class EmptyTranscriptError extends PipelineError {
    constructor(message = 'Transcript is empty') {
        super(message, 'summarization', 'EmptyTranscript');
        this.name = 'EmptyTranscriptError';
    }
}

export class OcrUnavailableError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'ocr', 'OCRUnavailable', options);
        this.name = 'OcrUnavailableError';
    }
}

export interface ErrorReport {
    stage: PipelineStage | 'unknown';
    kind: ErrorKind | 'UnexpectedError';
    message: string;
}

export const toErrorReport = (error: unknown): ErrorReport => {
    if (error instanceof PipelineError) {
        return { stage: error.stage, kind: error.kind, message: error.message };
    }
    return {
        stage: 'unknown',
        kind: 'UnexpectedError',
        message: error instanceof Error ? error.message : String(error),
    };
};
