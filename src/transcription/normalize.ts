import { TranscriptSegment } from './types';

export interface RawSegment {
    start: number;
    end: number;
    text: string;
}

/**
 * Orders segments by start time and removes overlaps so that times are
 * non-decreasing. Segments with no text after trimming are dropped.
 */
export const normalizeSegments = (raw: readonly RawSegment[], language: string): TranscriptSegment[] => {
    const ordered = raw
        .map((segment, index) => ({ segment, index }))
        .filter(({ segment }) => segment.text.trim().length > 0)
        .sort((a, b) => a.segment.start - b.segment.start || a.index - b.index);

    const segments: TranscriptSegment[] = [];
    let previousEnd = 0;
    for (const { segment } of ordered) {
        const startTime = Math.max(segment.start, previousEnd, 0);
        const endTime = Math.max(segment.end, startTime);
        segments.push(Object.freeze({
            startTime,
            endTime,
            text: segment.text.trim(),
            detectedLanguage: language,
        }));
        previousEnd = endTime;
    }
    return segments;
};

export const joinSegments = (segments: readonly TranscriptSegment[]): string => {
    return segments.map(segment => segment.text).join(' ').trim();
};
