import { describe, it, expect } from 'vitest';
import { renderMarkdown, altText } from '../../src/output';
import { EnrichedDocument, StructuredDocument } from '../../src/types';
import { imageRecord } from '../helpers/fakes';

const archImage = imageRecord('img-a', { filename: 'arch.png', description: 'Architecture diagram' });
const loneImage = imageRecord('img-b');

const document: StructuredDocument = {
    title: 'Doc Title',
    overview: 'An overview.',
    sections: [
        { id: 's1-intro', title: 'Intro', bodyText: 'Hello.', keyPoints: ['Point one'], orderIndex: 0, background: 'Some context.' },
        { id: 's2-details', title: 'Details', bodyText: 'More.', keyPoints: [], orderIndex: 1 },
    ],
    glossary: { API: 'Interface' },
    followUpQuestions: ['Why?'],
};

const enriched: EnrichedDocument = {
    document,
    attachments: new Map([['s1-intro', [archImage]]]),
    unplaced: [loneImage],
    placements: [
        { imageSourceId: 'img-a', targetSectionId: 's1-intro', rationale: 'Matches intro', score: 0.5, method: 'adjudicated' },
        { imageSourceId: 'img-b', targetSectionId: null, rationale: 'No fit', score: 0, method: 'none' },
    ],
};

describe('renderMarkdown', () => {
    it('should render the full layout', () => {
        const markdown = renderMarkdown(enriched, { title: 'My Talk', transcriptLink: 'transcript.txt' });

        expect(markdown).toBe([
            '# My Talk',
            '',
            '## Overview',
            'An overview.',
            '',
            '## Intro',
            'Hello.',
            '',
            '> **Background:** Some context.',
            '',
            '![Architecture diagram](images/arch.png)',
            '*Matches intro*',
            '',
            '### Key Points',
            '- Point one',
            '',
            '## Details',
            'More.',
            '',
            '## Additional Images',
            '',
            '![img-b](images/img-b)',
            '',
            '## Glossary',
            '- **API**: Interface',
            '',
            '## Follow-up Questions',
            '- Why?',
            '',
            '## Transcript',
            '[Download transcript](transcript.txt)',
            '',
        ].join('\n'));
    });

    it('should be deterministic', () => {
        expect(renderMarkdown(enriched)).toBe(renderMarkdown(enriched));
    });

    it('should fall back to the document title, then a placeholder', () => {
        expect(renderMarkdown(enriched).split('\n')[0]).toBe('# Doc Title');
        const untitled = { ...enriched, document: { ...document, title: undefined } };
        expect(renderMarkdown(untitled).split('\n')[0]).toBe('# Untitled Session');
    });

    it('should follow section order rather than list order', () => {
        const reversed = { ...enriched, document: { ...document, sections: [...document.sections].reverse() } };
        const markdown = renderMarkdown(reversed);

        expect(markdown.indexOf('## Intro')).toBeLessThan(markdown.indexOf('## Details'));
    });

    it('should omit empty optional parts', () => {
        const bare: EnrichedDocument = {
            document: { overview: '', sections: [{ id: 's1-only', title: 'Only', bodyText: 'Body.', keyPoints: [], orderIndex: 0 }], glossary: {}, followUpQuestions: [] },
            attachments: new Map(),
            unplaced: [],
            placements: [],
        };

        expect(renderMarkdown(bare, { title: 'T' })).toBe('# T\n\n## Only\nBody.\n');
    });

    it('should use the image path resolver', () => {
        const markdown = renderMarkdown(enriched, { resolveImagePath: (image) => `assets/${image.sourceId}.png` });

        expect(markdown).toContain('![Architecture diagram](assets/img-a.png)');
        expect(markdown).toContain('![img-b](assets/img-b.png)');
    });
});

describe('altText', () => {
    it('should prefer description, then filename, then source id', () => {
        expect(altText(archImage)).toBe('Architecture diagram');
        expect(altText(imageRecord('img-c', { filename: 'c.png' }))).toBe('c.png');
        expect(altText(loneImage)).toBe('img-b');
    });

    it('should escape brackets and flatten whitespace', () => {
        expect(altText(imageRecord('img-d', { description: 'Chart [2024]\nresults' }))).toBe('Chart \\[2024\\] results');
    });
});
