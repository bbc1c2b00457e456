import { z } from 'zod';
import { ImageCategory } from '../types';
import { IMAGE_CATEGORIES } from '../constants';

const MAX_KEYWORDS = 12;

const isCategory = (value: string): value is ImageCategory => {
    return IMAGE_CATEGORIES.some(category => category === value);
};

const keywords = z.unknown().transform((value): string[] => {
    const items = Array.isArray(value)
        ? value
        : typeof value === 'string' ? value.split(',') : [];
    const seen = new Set<string>();
    const result: string[] = [];
    for (const item of items) {
        if (typeof item !== 'string') continue;
        const keyword = item.trim();
        if (!keyword || seen.has(keyword.toLowerCase())) continue;
        seen.add(keyword.toLowerCase());
        result.push(keyword);
    }
    return result.slice(0, MAX_KEYWORDS);
});

const confidence = z.unknown().transform((value): number => {
    const numeric = typeof value === 'string' ? Number(value) : value;
    if (typeof numeric !== 'number' || !Number.isFinite(numeric)) return 0.5;
    return Math.min(1, Math.max(0, numeric));
});

/**
 * Accepts `category` directly, or the is_slide / is_diagram / is_photo
 * flags some models answer with instead.
 */
export const ImageAnalysisSchema = z.object({
    description: z.string().trim().min(1),
    keywords,
    category: z.unknown(),
    is_slide: z.unknown(),
    is_diagram: z.unknown(),
    is_photo: z.unknown(),
    confidence,
}).transform(analysis => {
    const raw = typeof analysis.category === 'string' ? analysis.category.trim().toLowerCase() : '';
    let category: ImageCategory = 'unknown';
    if (isCategory(raw)) {
        category = raw;
    } else if (analysis.is_slide === true) {
        category = 'slide';
    } else if (analysis.is_diagram === true) {
        category = 'diagram';
    } else if (analysis.is_photo === true) {
        category = 'photo';
    }
    return {
        description: analysis.description,
        keywords: analysis.keywords,
        category,
        confidence: analysis.confidence,
    };
});

export type ImageAnalysis = z.output<typeof ImageAnalysisSchema>;
