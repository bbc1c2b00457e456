/**
 * Depth Policy
 *
 * Maps the listener's self-rated understanding (0 = complete novice, 5 = expert)
 * to the knobs that shape the summarization prompt. Lower levels always ask for
 * at least as much explanation as higher ones.
 */

import { DepthProfile, GlossaryEntry, UnderstandingLevel } from './types';
import { ValidationError } from '../errors';
import { MAX_UNDERSTANDING_LEVEL, MIN_UNDERSTANDING_LEVEL } from '../constants';

export const DEFAULT_TECHNICALITY = 3;

const PROFILES: Record<UnderstandingLevel, DepthProfile> = {
    0: {
        level: 0,
        label: 'complete novice',
        glossaryMinTechnicality: 1,
        verbosityMultiplier: 2,
        includeBackground: true,
        assumedBackground: 'no prior exposure to the field; everyday vocabulary only',
        framing: 'Explain everything from first principles, define every acronym and piece of jargon, and use real-world analogies.',
    },
    1: {
        level: 1,
        label: 'beginner',
        glossaryMinTechnicality: 1,
        verbosityMultiplier: 1.75,
        includeBackground: true,
        assumedBackground: 'general technical literacy but little knowledge of this topic',
        framing: 'Include extensive explanations, define acronyms and jargon, and add analogies where they help.',
    },
    2: {
        level: 2,
        label: 'some familiarity',
        glossaryMinTechnicality: 2,
        verbosityMultiplier: 1.5,
        includeBackground: true,
        assumedBackground: 'has met the main concepts before but not worked with them',
        framing: 'Explain the important concepts, expand acronyms, and give short context where the talk assumes it.',
    },
    3: {
        level: 3,
        label: 'working knowledge',
        glossaryMinTechnicality: 3,
        verbosityMultiplier: 1,
        includeBackground: false,
        assumedBackground: 'comfortable with the common vocabulary of the field',
        framing: 'Provide moderate enrichment with key clarifications only.',
    },
    4: {
        level: 4,
        label: 'practitioner',
        glossaryMinTechnicality: 4,
        verbosityMultiplier: 0.75,
        includeBackground: false,
        assumedBackground: 'works in the field day to day',
        framing: 'Keep enrichment light: focus on concise bullet summaries and call out only non-intuitive terms.',
    },
    5: {
        level: 5,
        label: 'expert',
        glossaryMinTechnicality: 5,
        verbosityMultiplier: 0.5,
        includeBackground: false,
        assumedBackground: 'expert in the field',
        framing: 'Be terse: summarize the substance without explanations; define only genuinely obscure terms.',
    },
};

export const isUnderstandingLevel = (value: unknown): value is UnderstandingLevel => {
    return typeof value === 'number'
        && Number.isInteger(value)
        && value >= MIN_UNDERSTANDING_LEVEL
        && value <= MAX_UNDERSTANDING_LEVEL;
};

export const validateLevel = (value: unknown): UnderstandingLevel => {
    if (!isUnderstandingLevel(value)) {
        throw new ValidationError(
            `understanding level must be an integer between ${MIN_UNDERSTANDING_LEVEL} and ${MAX_UNDERSTANDING_LEVEL}, got ${String(value)}`,
        );
    }
    return value;
};

export const resolve = (level: number): DepthProfile => {
    return PROFILES[validateLevel(level)];
};

export const filterGlossary = (entries: readonly GlossaryEntry[], profile: DepthProfile): GlossaryEntry[] => {
    return entries.filter(entry => (entry.technicality ?? DEFAULT_TECHNICALITY) >= profile.glossaryMinTechnicality);
};

/**
 * Prompt guidance sentence for the profile, including how the glossary
 * should be rated so that the threshold can be applied afterwards.
 */
export const describe = (profile: DepthProfile): string => {
    const background = profile.includeBackground
        ? 'For each section add a short "background" paragraph with the context a newcomer needs.'
        : 'Do not add background paragraphs.';
    return [
        `The listener rated their understanding at ${profile.level}/5 (${profile.label}; ${profile.assumedBackground}).`,
        profile.framing,
        background,
    ].join(' ');
};

export * from './types';
