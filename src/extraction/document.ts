import { z } from 'zod';
import { ExtractionResult } from './types';
import { extractStructured } from './structured';
import { GlossaryEntry } from '../depth/types';

const optionalText = z.unknown().transform((value): string | undefined => {
    return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
});

const textList = z.unknown().transform((value): string[] => {
    if (!Array.isArray(value)) return [];
    return value
        .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
        .map(item => String(item).trim())
        .filter(item => item.length > 0);
});

const technicality = z.unknown().transform((value): number | undefined => {
    const numeric = typeof value === 'string' ? Number(value) : value;
    if (typeof numeric !== 'number' || !Number.isFinite(numeric)) return undefined;
    return Math.min(5, Math.max(1, Math.round(numeric)));
});

const GlossaryItemSchema = z.object({
    term: z.string().trim().min(1),
    definition: z.string().trim().min(1),
    technicality,
});

const glossary = z.unknown().transform((value): GlossaryEntry[] => {
    if (Array.isArray(value)) {
        return value.flatMap(item => {
            const parsed = GlossaryItemSchema.safeParse(item);
            return parsed.success ? [parsed.data] : [];
        });
    }
    if (typeof value === 'object' && value !== null) {
        return Object.entries(value).flatMap(([term, definition]) => {
            return typeof definition === 'string' && term.trim() && definition.trim()
                ? [{ term: term.trim(), definition: definition.trim() }]
                : [];
        });
    }
    return [];
});

export interface RawSection {
    title?: string;
    bodyText: string;
    keyPoints: string[];
    background?: string;
}

const SectionObjectSchema = z.object({
    title: optionalText,
    body_text: optionalText,
    summary: optionalText,
    key_points: textList,
    background: optionalText,
}).transform((section): RawSection => ({
    title: section.title,
    bodyText: section.body_text ?? section.summary ?? '',
    keyPoints: section.key_points,
    background: section.background,
}));

const SectionSchema = z.union([
    SectionObjectSchema,
    z.string().trim().min(1).transform((title): RawSection => ({ title, bodyText: '', keyPoints: [] })),
]);

export const RawDocumentSchema = z.object({
    title: optionalText,
    overview: optionalText,
    sections: z.array(SectionSchema).min(1, 'sections must not be empty'),
    glossary,
    follow_up_questions: textList,
}).transform(document => ({
    title: document.title,
    overview: document.overview ?? '',
    sections: document.sections,
    glossary: document.glossary,
    followUpQuestions: document.follow_up_questions,
}));

export type RawDocument = z.output<typeof RawDocumentSchema>;

export const extractDocument = (text: string): ExtractionResult<RawDocument> => {
    return extractStructured(text, RawDocumentSchema);
};
