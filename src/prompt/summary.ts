import { DepthProfile } from '../depth/types';
import * as Depth from '../depth';
import { buildChatPrompt, ChatPrompt, PromptContent } from './chat';

export interface SummaryPromptOptions {
    title?: string;
    context?: string;
    window?: { index: number; total: number };
    strict?: boolean;
}

const BASE_WORDS_PER_SECTION = 120;

export const OUTPUT_SCHEMA = JSON.stringify({
    title: 'short title for the talk',
    overview: 'one paragraph overview',
    sections: [{
        title: 'section title',
        body_text: 'explanatory summary of this part of the talk',
        key_points: ['key point'],
        background: 'context paragraph (only when requested)',
    }],
    glossary: [{ term: 'term or acronym', definition: 'plain-language definition', technicality: 3 }],
    follow_up_questions: ['question worth exploring next'],
});

export const STRICT_INSTRUCTION = 'IMPORTANT: your previous reply could not be used. Return ONLY the JSON object described above: no prose, no markdown, no code fences.';

export const wordsPerSection = (profile: DepthProfile): number => {
    return Math.round(BASE_WORDS_PER_SECTION * profile.verbosityMultiplier);
};

export const buildSummaryPrompt = async (
    transcript: string,
    profile: DepthProfile,
    options: SummaryPromptOptions = {},
): Promise<ChatPrompt> => {
    const instructions = [
        profile.framing,
        `Guidance: ${Depth.describe(profile)}`,
        `Produce JSON with this shape:\n${OUTPUT_SCHEMA}`,
        '"sections" must contain at least one section. Each section needs title, body_text and key_points.',
        `Aim for about ${wordsPerSection(profile)} words of body_text per section.`,
        'In "glossary", list every acronym and technical term from the transcript, rating its technicality from 1 (everyday word) to 5 (specialist jargon).',
        'Add follow_up_questions where knowledge gaps remain.',
    ];
    if (options.window && options.window.total > 1) {
        instructions.push(`This is part ${options.window.index + 1} of ${options.window.total} of the transcript. Summarize only this part.`);
    }
    if (options.strict) {
        instructions.push(STRICT_INSTRUCTION);
    }

    const content: PromptContent[] = [];
    const about: string[] = [];
    if (options.title) {
        about.push(`Title: ${options.title}`);
    }
    if (options.context) {
        about.push(`Context: ${options.context}`);
    }
    if (about.length > 0) {
        content.push({ title: 'Talk', content: about.join('\n') });
    }
    content.push({ title: 'Transcript', content: transcript });

    return buildChatPrompt({ template: 'summary', instructions, content });
};
