/**
 * Transcription System Types
 *
 * The speech engine returns timed segments; everything downstream works on
 * the normalized, ordered TranscriptSegment list.
 */

export type TranscriptionModel =
    | 'whisper-1'
    | 'gpt-4o-mini-transcribe'
    | 'gpt-4o-transcribe'
    | string;

export interface AudioInput {
    data: Uint8Array;
    formatHint?: string;    // File extension or mime subtype, e.g. "m4a" or "audio/mpeg"
}

export interface TranscriptionConfig {
    model: TranscriptionModel;
    language?: string;
    prompt?: string;
    temperature?: number;
    timeoutMs?: number;
}

export interface TranscriptSegment {
    readonly startTime: number;
    readonly endTime: number;
    readonly text: string;
    readonly detectedLanguage: string;
}

export interface TranscriptionResult {
    segments: TranscriptSegment[];
    text: string;
    language: string;
    model: string;
    duration: number;
}

export interface ModelCapabilities {
    timestampedSegments: boolean;
    maxFileSize: number;
}

export const MODEL_CAPABILITIES: Record<string, ModelCapabilities> = {
    'whisper-1': {
        timestampedSegments: true,
        maxFileSize: 25 * 1024 * 1024,  // 25 MB
    },
    'gpt-4o-mini-transcribe': {
        timestampedSegments: false,
        maxFileSize: 25 * 1024 * 1024,
    },
    'gpt-4o-transcribe': {
        timestampedSegments: false,
        maxFileSize: 25 * 1024 * 1024,
    },
};
