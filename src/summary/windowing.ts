import { TranscriptSegment } from '../transcription/types';

/**
 * Splits a transcript into windows that each fit one summarization call.
 * Implementations must keep segment order and lose no segment.
 */
export interface WindowStrategy {
    split(segments: readonly TranscriptSegment[]): TranscriptSegment[][];
}

/**
 * Packs whole segments into windows of at most `maxChars` characters.
 * A single segment longer than the budget gets a window of its own.
 */
export const byCharacterBudget = (maxChars: number): WindowStrategy => ({
    split: (segments) => {
        const windows: TranscriptSegment[][] = [];
        let current: TranscriptSegment[] = [];
        let size = 0;

        for (const segment of segments) {
            const length = segment.text.length + 1;
            if (current.length > 0 && size + length > maxChars) {
                windows.push(current);
                current = [];
                size = 0;
            }
            current.push(segment);
            size += length;
        }
        if (current.length > 0) {
            windows.push(current);
        }
        return windows;
    },
});
