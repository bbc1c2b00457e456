/**
 * Staged JSON recovery for free-form model output.
 *
 * Attempts, first success wins:
 *   1. the whole text as JSON
 *   2. the largest balanced {...} substring
 *   3. the text with code fences, surrounding prose and trailing commas removed, then 1 and 2 again
 */

import { ExtractionStage, JsonScanResult } from './types';

type Attempt = { ok: true; value: unknown } | { ok: false };

const tryParse = (value: string): Attempt => {
    try {
        return { ok: true, value: JSON.parse(value) };
    } catch {
        return { ok: false };
    }
};

// Scalars parse as JSON too, but they are not the structure we are after.
const isStructure = (value: unknown): boolean => typeof value === 'object' && value !== null;

/**
 * Index of the brace closing the one at `start`, or -1 when it never closes.
 * Braces inside JSON string literals are ignored.
 */
const findClosingBrace = (text: string, start: number): number => {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
        const char = text[i];
        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (char === '\\') {
                escaped = true;
            } else if (char === '"') {
                inString = false;
            }
            continue;
        }
        if (char === '"') {
            inString = true;
        } else if (char === '{') {
            depth++;
        } else if (char === '}') {
            depth--;
            if (depth === 0) return i;
        }
    }
    return -1;
};

/**
 * Balanced brace-delimited substrings, longest first. Nested spans are kept as
 * well: when prose wraps the JSON in braces the outer span fails to parse and
 * the inner one is the answer.
 */
export const balancedCandidates = (text: string): string[] => {
    const spans: Array<[number, number]> = [];

    for (let i = 0; i < text.length; i++) {
        if (text[i] !== '{') continue;
        const end = findClosingBrace(text, i);
        if (end !== -1) {
            spans.push([i, end]);
        }
    }

    return spans
        .sort((a, b) => (b[1] - b[0]) - (a[1] - a[0]) || a[0] - b[0])
        .map(([start, end]) => text.slice(start, end + 1));
};

/**
 * Drops commas that directly precede a closing brace or bracket. Commas
 * inside string literals are left alone.
 */
export const removeTrailingCommas = (text: string): string => {
    let result = '';
    let inString = false;
    let escaped = false;

    for (let i = 0; i < text.length; i++) {
        const char = text[i];
        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (char === '\\') {
                escaped = true;
            } else if (char === '"') {
                inString = false;
            }
        } else if (char === '"') {
            inString = true;
        } else if (char === ',' && /^\s*[}\]]/.test(text.slice(i + 1))) {
            continue;
        }
        result += char;
    }
    return result;
};

export const stripArtifacts = (text: string): string => {
    let stripped = text.trim();

    const fenced = stripped.match(/```[\w-]*[^\S\n]*\n?([\s\S]*?)```/);
    if (fenced?.[1] !== undefined) {
        stripped = fenced[1].trim();
    } else {
        stripped = stripped.replace(/^```[\w-]*\s*/gm, '').replace(/```\s*$/gm, '').trim();
    }

    const first = stripped.search(/[{[]/);
    const last = Math.max(stripped.lastIndexOf('}'), stripped.lastIndexOf(']'));
    if (first !== -1 && last > first) {
        stripped = stripped.slice(first, last + 1);
    }

    return removeTrailingCommas(stripped);
};

const scan = (text: string, strictStage: ExtractionStage, balancedStage: ExtractionStage): JsonScanResult | null => {
    const strict = tryParse(text.trim());
    if (strict.ok && isStructure(strict.value)) {
        return { kind: 'parsed', value: strict.value, stage: strictStage };
    }

    for (const candidate of balancedCandidates(text)) {
        const parsed = tryParse(candidate);
        if (parsed.ok) {
            return { kind: 'parsed', value: parsed.value, stage: balancedStage };
        }
    }
    return null;
};

export const extractJson = (text: string): JsonScanResult => {
    if (text.trim().length === 0) {
        return { kind: 'no-structure', reason: 'empty response' };
    }

    const direct = scan(text, 'strict', 'balanced');
    if (direct) return direct;

    const stripped = stripArtifacts(text);
    if (stripped !== text) {
        const repaired = scan(stripped, 'stripped-strict', 'stripped-balanced');
        if (repaired) return repaired;
    }

    return { kind: 'no-structure', reason: 'no parseable JSON object in response' };
};
