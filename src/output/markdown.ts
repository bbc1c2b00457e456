/**
 * Markdown Renderer
 *
 * Pure serialization of an EnrichedDocument. Same input, same bytes.
 * Unplaced images are listed under "Additional Images" so none is dropped.
 */

import { EnrichedDocument, ImageRecord } from '../types';
import { UNTITLED } from '../constants';

export interface RenderOptions {
    title?: string;
    resolveImagePath?: (image: ImageRecord) => string;
    transcriptLink?: string;
}

const inline = (text: string): string => text.replace(/\s+/g, ' ').trim();

export const altText = (image: ImageRecord): string => {
    const alt = inline(image.description) || image.filename || image.sourceId;
    return alt.replace(/[[\]]/g, '\\$&');
};

export const defaultImagePath = (image: ImageRecord): string => `images/${image.filename ?? image.sourceId}`;

const bulletList = (items: readonly string[]): string => items.map(item => `- ${inline(item)}`).join('\n');

export const renderMarkdown = (enriched: EnrichedDocument, options: RenderOptions = {}): string => {
    const { document } = enriched;
    const resolvePath = options.resolveImagePath ?? defaultImagePath;
    const title = inline(options.title ?? '') || inline(document.title ?? '') || UNTITLED;
    const rationales = new Map(enriched.placements.map(decision => [decision.imageSourceId, inline(decision.rationale)]));

    const image = (record: ImageRecord): string => `![${altText(record)}](${resolvePath(record)})`;

    const blocks: string[] = [`# ${title}`];

    if (document.overview.trim()) {
        blocks.push(`## Overview\n${document.overview.trim()}`);
    }

    const sections = [...document.sections].sort((a, b) => a.orderIndex - b.orderIndex);
    for (const section of sections) {
        const body = section.bodyText.trim();
        blocks.push(body ? `## ${inline(section.title)}\n${body}` : `## ${inline(section.title)}`);

        if (section.background?.trim()) {
            blocks.push(`> **Background:** ${inline(section.background)}`);
        }

        for (const record of enriched.attachments.get(section.id) ?? []) {
            const rationale = rationales.get(record.sourceId);
            blocks.push(rationale ? `${image(record)}\n*${rationale}*` : image(record));
        }

        if (section.keyPoints.length > 0) {
            blocks.push(`### Key Points\n${bulletList(section.keyPoints)}`);
        }
    }

    if (enriched.unplaced.length > 0) {
        blocks.push('## Additional Images');
        blocks.push(...enriched.unplaced.map(image));
    }

    const glossary = Object.entries(document.glossary);
    if (glossary.length > 0) {
        blocks.push(`## Glossary\n${glossary.map(([term, definition]) => `- **${inline(term)}**: ${inline(definition)}`).join('\n')}`);
    }

    if (document.followUpQuestions.length > 0) {
        blocks.push(`## Follow-up Questions\n${bulletList(document.followUpQuestions)}`);
    }

    if (options.transcriptLink) {
        blocks.push(`## Transcript\n[Download transcript](${options.transcriptLink})`);
    }

    return `${blocks.join('\n\n').trim()}\n`;
};
