/**
 * Prompt Templates
 *
 * Each enrichment call has a persona, a list of constraints and a tone,
 * registered with RiotPrompt and cooked by name in `./chat`.
 */

import { registerTemplates, getTemplates, clearTemplates } from '@kjerneverk/riotprompt';
import type { TemplateConfig } from '@kjerneverk/riotprompt';

export type TemplateName = 'summary' | 'image-analysis' | 'image-placement' | 'ocr';

export const TEMPLATES: Record<TemplateName, TemplateConfig> = {
    'summary': {
        persona: {
            content: 'You are an expert technical note-taker. Given a transcript of a talk, you craft a modular summary with clear sections, expand acronyms and explain jargon, varying depth with the listener\'s self-rated understanding.'
        },
        constraints: [
            { content: 'Only use information present in the transcript; never invent facts.' },
            { content: 'Keep the order in which the talk covers its topics.' },
            { content: 'Respond with a single JSON object and nothing else.' }
        ],
        tone: [
            { content: 'Clear and well structured.' }
        ]
    },

    'image-analysis': {
        persona: {
            content: 'You are an image analysis assistant. From the text extracted from an image and its file details you describe the image, list its keywords and classify it.'
        },
        constraints: [
            { content: 'Base the description on the extracted text; say so when there is too little to go on.' },
            { content: 'Respond with JSON only.' }
        ]
    },

    'image-placement': {
        persona: {
            content: 'You are a document layout assistant. You decide which section of a document an image illustrates best.'
        },
        constraints: [
            { content: 'Choose exactly one section id from the list, or null when no section fits.' },
            { content: 'An unplaced image is better than an image in the wrong section.' },
            { content: 'Respond with JSON only.' }
        ]
    },

    'ocr': {
        persona: {
            content: 'You are an OCR engine.'
        },
        constraints: [
            { content: 'Transcribe all text visible in the image verbatim, keeping line breaks.' },
            { content: 'Do not describe the image or add commentary.' },
            { content: 'If the image contains no text, reply with an empty message.' }
        ]
    },
};

/**
 * Register the templates with RiotPrompt.
 * `./chat` calls this on module load.
 */
export const initializeTemplates = (): void => {
    registerTemplates(TEMPLATES);
};

export const getTemplateNames = (): string[] => {
    return Object.keys(getTemplates());
};

export const getTemplate = (name: string): TemplateConfig | undefined => {
    return getTemplates()[name];
};

export const clearAllTemplates = (): void => {
    clearTemplates();
};
