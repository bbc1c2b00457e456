import { DepthProfile } from '../depth/types';
import * as Depth from '../depth';
import { RawDocument } from '../extraction';
import { DocumentSection, StructuredDocument } from '../types';
import { slugify } from '../util/general';

export const sectionId = (orderIndex: number, title: string): string => {
    return `s${orderIndex + 1}-${slugify(title, 'section')}`;
};

/**
 * Joins per-window documents in transcript order. The first definition of a
 * glossary term wins; repeated follow-up questions are dropped.
 */
export const mergeWindows = (parts: readonly RawDocument[]): RawDocument => {
    const [first, ...rest] = parts;
    if (!first) {
        throw new RangeError('mergeWindows needs at least one document');
    }
    if (rest.length === 0) {
        return first;
    }

    const seenQuestions = new Set<string>();
    return {
        title: first.title,
        overview: parts.map(part => part.overview).filter(Boolean).join('\n\n'),
        sections: parts.flatMap(part => part.sections),
        glossary: parts.flatMap(part => part.glossary),
        followUpQuestions: parts.flatMap(part => part.followUpQuestions).filter(question => {
            const key = question.toLowerCase();
            if (seenQuestions.has(key)) return false;
            seenQuestions.add(key);
            return true;
        }),
    };
};

/**
 * Finalizes extracted output: section ids and order, glossary filtered by
 * the depth profile, background kept only when the profile asks for it.
 */
export const buildDocument = (raw: RawDocument, profile: DepthProfile): StructuredDocument => {
    const usedIds = new Set<string>();
    const sections: DocumentSection[] = raw.sections.map((section, orderIndex) => {
        const title = section.title ?? `Section ${orderIndex + 1}`;
        let id = sectionId(orderIndex, title);
        // Ids embed the position, so this only triggers on pathological slugs.
        while (usedIds.has(id)) {
            id = `${id}-x`;
        }
        usedIds.add(id);

        return Object.freeze({
            id,
            title,
            bodyText: section.bodyText,
            keyPoints: Object.freeze([...section.keyPoints]),
            orderIndex,
            ...(profile.includeBackground && section.background ? { background: section.background } : {}),
        });
    });

    const glossary: Record<string, string> = {};
    const seenTerms = new Set<string>();
    for (const entry of Depth.filterGlossary(raw.glossary, profile)) {
        const key = entry.term.toLowerCase();
        if (seenTerms.has(key)) continue;
        seenTerms.add(key);
        glossary[entry.term] = entry.definition;
    }

    return Object.freeze({
        ...(raw.title ? { title: raw.title } : {}),
        overview: raw.overview,
        sections: Object.freeze(sections),
        glossary: Object.freeze(glossary),
        followUpQuestions: Object.freeze([...raw.followUpQuestions]),
    });
};
