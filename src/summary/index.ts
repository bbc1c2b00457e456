/**
 * Summarization Orchestrator
 *
 * Turns ordered transcript segments into a StructuredDocument. Each window
 * gets one model call plus one stricter retry; after that the failure is
 * terminal (ModelUnavailable or MalformedOutput).
 */

import { DepthProfile } from '../depth/types';
import { ReasoningInstance } from '../reasoning';
import { TranscriptSegment } from '../transcription/types';
import { joinSegments } from '../transcription/normalize';
import { StructuredDocument } from '../types';
import { extractDocument, describeFailure, ExtractionFailure, RawDocument } from '../extraction';
import { EmptyTranscriptError, InferenceError, MalformedOutputError, ModelUnavailableError } from '../errors';
import { buildSummaryPrompt } from '../prompt/summary';
import { byCharacterBudget, WindowStrategy } from './windowing';
import { buildDocument, mergeWindows } from './document';
import * as Logging from '../logging';
import { DEFAULT_MAX_TOKENS, DEFAULT_MAX_WINDOW_CHARS, DEFAULT_TEMPERATURE, SKIP_SUMMARY_OVERVIEW_CHARS } from '../constants';
import { truncate } from '../util/general';

export interface SummaryConfig {
    maxTokens?: number;
    temperature?: number;
    maxWindowChars?: number;
    windowStrategy?: WindowStrategy;
    skipSummary?: boolean;
}

export interface SummarizeOptions {
    title?: string;
    context?: string;
}

export interface SummaryInstance {
    summarize(
        segments: readonly TranscriptSegment[],
        profile: DepthProfile,
        options?: SummarizeOptions
    ): Promise<StructuredDocument>;
}

type AttemptOutcome =
    | { ok: true; document: RawDocument }
    | { ok: false; failure: ExtractionFailure }
    | { ok: false; error: InferenceError };

export const create = (reasoning: ReasoningInstance, config: SummaryConfig = {}): SummaryInstance => {
    const logger = Logging.getLogger();
    const windowStrategy = config.windowStrategy ?? byCharacterBudget(config.maxWindowChars ?? DEFAULT_MAX_WINDOW_CHARS);

    const attempt = async (
        text: string,
        profile: DepthProfile,
        options: SummarizeOptions,
        window: { index: number; total: number },
        strict: boolean,
    ): Promise<AttemptOutcome> => {
        const { systemPrompt, prompt } = await buildSummaryPrompt(text, profile, { ...options, window, strict });
        let content: string;
        try {
            const response = await reasoning.complete({
                prompt,
                systemPrompt,
                maxTokens: Math.round((config.maxTokens ?? DEFAULT_MAX_TOKENS) * profile.verbosityMultiplier),
                temperature: config.temperature ?? DEFAULT_TEMPERATURE,
                responseFormat: 'json',
                stage: 'summarization',
            });
            content = response.content;
        } catch (error) {
            if (error instanceof InferenceError) {
                return { ok: false, error };
            }
            throw error;
        }

        const extracted = extractDocument(content);
        if (extracted.kind === 'success') {
            logger.debug('Extracted %d sections (stage: %s)', extracted.value.sections.length, extracted.stage);
            return { ok: true, document: extracted.value };
        }
        return { ok: false, failure: extracted };
    };

    const summarizeWindow = async (
        text: string,
        profile: DepthProfile,
        options: SummarizeOptions,
        window: { index: number; total: number },
    ): Promise<RawDocument> => {
        const first = await attempt(text, profile, options, window, false);
        if (first.ok) return first.document;

        logger.warn('Summary attempt failed (%s), retrying with strict JSON instructions',
            'error' in first ? first.error.message : describeFailure(first.failure));

        const second = await attempt(text, profile, options, window, true);
        if (second.ok) return second.document;

        if ('error' in second) {
            throw new ModelUnavailableError(`Summarization failed twice: ${second.error.message}`, { cause: second.error });
        }
        throw new MalformedOutputError(
            `Model output could not be used after retry: ${describeFailure(second.failure)}`,
            second.failure.kind,
        );
    };

    const summarize = async (
        segments: readonly TranscriptSegment[],
        profile: DepthProfile,
        options: SummarizeOptions = {},
    ): Promise<StructuredDocument> => {
        const fullText = joinSegments(segments);
        if (segments.length === 0 || fullText.length === 0) {
            throw new EmptyTranscriptError();
        }

        if (config.skipSummary) {
            logger.info('Summary skipped; using the full transcript as a single section');
            return buildDocument({
                title: options.title,
                overview: truncate(fullText, SKIP_SUMMARY_OVERVIEW_CHARS),
                sections: [{ title: 'Full Transcript', bodyText: fullText, keyPoints: [] }],
                glossary: [],
                followUpQuestions: [],
            }, profile);
        }

        const windows = windowStrategy.split(segments).filter(window => joinSegments(window).length > 0);
        logger.info('Summarizing %d characters in %d window(s) at level %d', fullText.length, windows.length, profile.level);

        // Windows run one after another; the reasoning client already bounds endpoint concurrency.
        const parts: RawDocument[] = [];
        for (let index = 0; index < windows.length; index++) {
            parts.push(await summarizeWindow(joinSegments(windows[index]), profile, options, { index, total: windows.length }));
        }

        const document = buildDocument(mergeWindows(parts), profile);
        logger.info('Summary: %d sections, %d glossary terms', document.sections.length, Object.keys(document.glossary).length);
        return document;
    };

    return { summarize };
};

export { byCharacterBudget } from './windowing';
export type { WindowStrategy } from './windowing';
export { buildDocument, mergeWindows, sectionId } from './document';
