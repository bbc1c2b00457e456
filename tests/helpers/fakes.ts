import { vi } from 'vitest';
import { ReasoningInstance, ReasoningRequest, ReasoningResponse } from '../../src/reasoning';
import { TranscriptionInstance, TranscriptSegment } from '../../src/transcription';
import { OcrInstance } from '../../src/ocr';
import { DocumentSection, ImageRecord } from '../../src/types';
import { sectionId } from '../../src/summary';

export type Reply = string | Error;

/**
 * Reasoning fake answering per request. `route` picks the reply from the
 * request, so concurrent callers get deterministic answers.
 */
export const fakeReasoning = (route: (request: ReasoningRequest) => Reply) => {
    const complete = vi.fn(async (request: ReasoningRequest): Promise<ReasoningResponse> => {
        const reply = route(request);
        if (reply instanceof Error) {
            throw reply;
        }
        return { content: reply, model: 'test-model', duration: 1 };
    });
    const instance: ReasoningInstance = { complete };
    return { instance, complete };
};

/** Replies in order; the last one repeats. */
export const sequencedReasoning = (...replies: Reply[]) => {
    let call = 0;
    return fakeReasoning(() => {
        const reply = replies[Math.min(call, replies.length - 1)];
        call++;
        return reply;
    });
};

export const segment = (startTime: number, endTime: number, text: string): TranscriptSegment => ({
    startTime,
    endTime,
    text,
    detectedLanguage: 'en',
});

export const fakeTranscription = (segments: TranscriptSegment[], language = 'en') => {
    const transcribe = vi.fn(async () => ({
        segments,
        text: segments.map(item => item.text).join(' '),
        language,
        model: 'whisper-1',
        duration: 5,
    }));
    const instance: TranscriptionInstance = { transcribe };
    return { instance, transcribe };
};

export const fakeOcr = (reply: (filename: string | undefined) => string | Error) => {
    const extractText = vi.fn(async (image: { filename?: string }, _signal?: AbortSignal) => {
        const result = reply(image.filename);
        if (result instanceof Error) {
            throw result;
        }
        return result;
    });
    const instance: OcrInstance = { extractText };
    return { instance, extractText };
};

export const section = (orderIndex: number, title: string, bodyText: string, keyPoints: string[] = []): DocumentSection => ({
    id: sectionId(orderIndex, title),
    title,
    bodyText,
    keyPoints,
    orderIndex,
});

export const imageRecord = (sourceId: string, overrides: Partial<ImageRecord> = {}): ImageRecord => ({
    sourceId,
    ocrText: '',
    description: '',
    keywords: [],
    category: 'slide',
    confidence: 0.9,
    ...overrides,
});

export const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

/** The signature and IHDR chunk of a PNG; enough for header-based size detection. */
export const pngHeader = (width: number, height: number): Uint8Array => {
    const data = new Uint8Array(33);
    const view = new DataView(data.buffer);
    data.set([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], 0);
    view.setUint32(8, 13);
    data.set(new TextEncoder().encode('IHDR'), 12);
    view.setUint32(16, width);
    view.setUint32(20, height);
    data.set([8, 6, 0, 0, 0], 24);
    return data;
};
