/**
 * Lexical overlap between an image and the document sections.
 *
 * Score = weighted shared tokens / image tokens, where a token found in the
 * section title counts twice. Capped at 1.
 */

import { DocumentSection, ImageRecord } from '../types';
import { SectionScore } from './types';
import STOP_WORD_LIST from './stop-words.json';

const STOP_WORDS: ReadonlySet<string> = new Set(STOP_WORD_LIST);
const MIN_TOKEN_LENGTH = 3;
const MIN_UNSPACED_TOKEN_LENGTH = 2;
const TITLE_WEIGHT = 2;

// Word boundaries come from ICU, so scripts written without spaces split into words too.
const segmenter = new Intl.Segmenter(undefined, { granularity: 'word' });
const UNSPACED_SCRIPT = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Thai}]/u;
const NON_WORD = /[^\p{L}\p{N}]+/u;

const keepToken = (token: string): boolean => {
    const minimum = UNSPACED_SCRIPT.test(token) ? MIN_UNSPACED_TOKEN_LENGTH : MIN_TOKEN_LENGTH;
    return token.length >= minimum && !STOP_WORDS.has(token);
};

export const tokenize = (...texts: readonly string[]): Set<string> => {
    const tokens = new Set<string>();
    for (const text of texts) {
        for (const { segment, isWordLike } of segmenter.segment(text.normalize('NFKC').toLowerCase())) {
            if (!isWordLike) continue;
            for (const token of segment.split(NON_WORD)) {
                if (keepToken(token)) {
                    tokens.add(token);
                }
            }
        }
    }
    return tokens;
};

export const imageTokens = (image: ImageRecord): Set<string> => {
    return tokenize(...image.keywords, image.ocrText, image.description);
};

export const lexicalScore = (tokens: ReadonlySet<string>, section: DocumentSection): number => {
    if (tokens.size === 0) return 0;

    const titleTokens = tokenize(section.title);
    const bodyTokens = tokenize(section.bodyText, ...section.keyPoints);

    let weighted = 0;
    for (const token of tokens) {
        if (titleTokens.has(token)) {
            weighted += TITLE_WEIGHT;
        } else if (bodyTokens.has(token)) {
            weighted += 1;
        }
    }
    return Math.min(1, weighted / tokens.size);
};

/**
 * Every section scored against the image, best first. Ties go to the
 * earlier section.
 */
export const rankSections = (image: ImageRecord, sections: readonly DocumentSection[]): SectionScore[] => {
    const tokens = imageTokens(image);
    return sections
        .map(section => ({
            sectionId: section.id,
            orderIndex: section.orderIndex,
            score: lexicalScore(tokens, section),
        }))
        .sort((a, b) => b.score - a.score || a.orderIndex - b.orderIndex);
};
