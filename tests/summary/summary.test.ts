import { describe, it, expect } from 'vitest';
import * as Summary from '../../src/summary';
import * as Depth from '../../src/depth';
import { STRICT_INSTRUCTION } from '../../src/prompt/summary';
import {
    EmptyTranscriptError,
    InferenceError,
    MalformedOutputError,
    ModelUnavailableError,
} from '../../src/errors';
import { fakeReasoning, segment, sequencedReasoning } from '../helpers/fakes';

const REDFISH_REPLY = JSON.stringify({
    title: 'Redfish',
    overview: 'Redfish manages hardware over REST.',
    sections: [{
        title: 'What Redfish Is',
        body_text: 'Redfish is a REST API for hardware management.',
        key_points: ['Standard API for servers'],
        background: 'Servers have long had management controllers.',
    }],
    glossary: [
        { term: 'Redfish', definition: 'A DMTF standard for managing hardware over HTTP', technicality: 3 },
        { term: 'REST API', definition: 'An interface that exposes resources over HTTP', technicality: 2 },
    ],
    follow_up_questions: ['How does Redfish compare to IPMI?'],
});

const VALID_REPLY = JSON.stringify({ overview: 'x', sections: [{ title: 'A', body_text: 'b', key_points: [] }] });

const redfishSegments = [segment(0, 5, 'Redfish is a REST API for hardware management')];

describe('Summarization Orchestrator', () => {
    describe('adaptive depth', () => {
        it('should define Redfish and REST API for a novice', async () => {
            const { instance, complete } = fakeReasoning(() => REDFISH_REPLY);
            const summary = Summary.create(instance);

            const document = await summary.summarize(redfishSegments, Depth.resolve(0));

            expect(Object.keys(document.glossary)).toEqual(['Redfish', 'REST API']);
            expect(document.sections[0].background).toBe('Servers have long had management controllers.');
            expect(complete).toHaveBeenCalledTimes(1);
            expect(complete.mock.calls[0][0].prompt).toContain('Redfish is a REST API for hardware management');
            expect(complete.mock.calls[0][0].maxTokens).toBe(8192);
            expect(complete.mock.calls[0][0].responseFormat).toBe('json');
        });

        it('should leave the glossary empty for an expert given the same reply', async () => {
            const { instance, complete } = fakeReasoning(() => REDFISH_REPLY);
            const summary = Summary.create(instance);

            const document = await summary.summarize(redfishSegments, Depth.resolve(5));

            expect(document.glossary).toEqual({});
            expect(document.sections[0].background).toBeUndefined();
            expect(complete.mock.calls[0][0].maxTokens).toBe(2048);
        });

        it('should pass the title and context into the prompt', async () => {
            const { instance, complete } = fakeReasoning(() => REDFISH_REPLY);
            const summary = Summary.create(instance);

            await summary.summarize(redfishSegments, Depth.resolve(3), { title: 'Datacenter Day', context: 'server management' });

            const prompt = complete.mock.calls[0][0].prompt;
            expect(prompt).toContain('Title: Datacenter Day');
            expect(prompt).toContain('Context: server management');
        });
    });

    describe('document building', () => {
        it('should turn the fenced reply into one section titled A', async () => {
            const { instance } = fakeReasoning(() => '```json\n{"overview":"x","sections":[{"title":"A","body_text":"b","key_points":[]}],"glossary":{},"follow_up_questions":[]}\n```');
            const summary = Summary.create(instance);

            const document = await summary.summarize(redfishSegments, Depth.resolve(3));

            expect(document.overview).toBe('x');
            expect(document.sections).toEqual([{ id: 's1-a', title: 'A', bodyText: 'b', keyPoints: [], orderIndex: 0 }]);
        });

        it('should name untitled sections by position', async () => {
            const { instance } = fakeReasoning(() => '{"sections": [{"body_text": "first"}, {"body_text": "second"}]}');
            const document = await Summary.create(instance).summarize(redfishSegments, Depth.resolve(3));

            expect(document.sections.map(section => section.id)).toEqual(['s1-section-1', 's2-section-2']);
        });
    });

    describe('retry policy', () => {
        it('should retry once with a strict instruction', async () => {
            const { instance, complete } = sequencedReasoning('Sorry, here is a summary in words.', VALID_REPLY);
            const summary = Summary.create(instance);

            const document = await summary.summarize(redfishSegments, Depth.resolve(3));

            expect(document.sections[0].title).toBe('A');
            expect(complete).toHaveBeenCalledTimes(2);
            expect(complete.mock.calls[0][0].prompt).not.toContain(STRICT_INSTRUCTION);
            expect(complete.mock.calls[1][0].prompt).toContain(STRICT_INSTRUCTION);
        });

        it('should fail with MalformedOutput when prose comes back twice', async () => {
            const { instance, complete } = sequencedReasoning('The talk covered hardware management.');
            const summary = Summary.create(instance);

            const error = await summary.summarize(redfishSegments, Depth.resolve(3)).catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(MalformedOutputError);
            expect(error).toMatchObject({ stage: 'summarization', kind: 'MalformedOutput', extraction: 'no-structure' });
            expect(complete).toHaveBeenCalledTimes(2);
        });

        it('should tag a twice-incomplete document as incomplete structure', async () => {
            const { instance } = sequencedReasoning('{"overview": "x", "sections": []}');

            await expect(Summary.create(instance).summarize(redfishSegments, Depth.resolve(3)))
                .rejects.toMatchObject({ kind: 'MalformedOutput', extraction: 'incomplete-structure' });
        });

        it('should recover when the first call times out', async () => {
            const { instance, complete } = sequencedReasoning(new InferenceError('timed out', 'timeout'), VALID_REPLY);

            const document = await Summary.create(instance).summarize(redfishSegments, Depth.resolve(3));

            expect(document.sections).toHaveLength(1);
            expect(complete).toHaveBeenCalledTimes(2);
        });

        it('should fail with ModelUnavailable when both calls fail in transport', async () => {
            const { instance } = sequencedReasoning(new InferenceError('connection refused', 'connection'));

            await expect(Summary.create(instance).summarize(redfishSegments, Depth.resolve(3)))
                .rejects.toBeInstanceOf(ModelUnavailableError);
        });

        it('should not swallow unexpected errors', async () => {
            const { instance, complete } = sequencedReasoning(new TypeError('bug'));

            await expect(Summary.create(instance).summarize(redfishSegments, Depth.resolve(3))).rejects.toThrow('bug');
            expect(complete).toHaveBeenCalledTimes(1);
        });
    });

    describe('input validation', () => {
        it('should reject an empty segment list without calling the model', async () => {
            const { instance, complete } = fakeReasoning(() => VALID_REPLY);

            await expect(Summary.create(instance).summarize([], Depth.resolve(3))).rejects.toBeInstanceOf(EmptyTranscriptError);
            expect(complete).not.toHaveBeenCalled();
        });

        it('should reject whitespace-only text without calling the model', async () => {
            const { instance, complete } = fakeReasoning(() => VALID_REPLY);

            await expect(Summary.create(instance).summarize([segment(0, 1, '  '), segment(1, 2, '\n')], Depth.resolve(3)))
                .rejects.toMatchObject({ kind: 'EmptyTranscript' });
            expect(complete).not.toHaveBeenCalled();
        });
    });

    describe('skipSummary', () => {
        it('should keep the whole transcript as one section', async () => {
            const { instance, complete } = fakeReasoning(() => VALID_REPLY);
            const text = 'a'.repeat(600);

            const document = await Summary.create(instance, { skipSummary: true })
                .summarize([segment(0, 60, text)], Depth.resolve(3), { title: 'Raw' });

            expect(complete).not.toHaveBeenCalled();
            expect(document.title).toBe('Raw');
            expect(document.overview).toBe(`${'a'.repeat(500)}...`);
            expect(document.sections).toHaveLength(1);
            expect(document.sections[0]).toMatchObject({ id: 's1-full-transcript', title: 'Full Transcript', bodyText: text });
        });
    });

    describe('windowing', () => {
        const segments = [
            segment(0, 10, 'first part of the talk'),
            segment(10, 20, 'second part of the talk'),
            segment(20, 30, 'third part of the talk'),
        ];

        const replyFor = (part: number): string => JSON.stringify({
            title: `Talk ${part}`,
            overview: `Overview ${part}`,
            sections: [{ title: `Part ${part}`, body_text: `Body ${part}`, key_points: [] }],
            glossary: [{ term: 'Talk', definition: `Definition ${part}`, technicality: 3 }],
            follow_up_questions: ['Shared question?', `Question ${part}?`],
        });

        it('should summarize each window and merge in order', async () => {
            const { instance, complete } = fakeReasoning((request) => {
                const match = request.prompt.match(/part (\d) of 3/);
                return replyFor(match ? Number(match[1]) : 0);
            });

            const document = await Summary.create(instance, { maxWindowChars: 30 }).summarize(segments, Depth.resolve(3));

            expect(complete).toHaveBeenCalledTimes(3);
            expect(document.title).toBe('Talk 1');
            expect(document.overview).toBe('Overview 1\n\nOverview 2\n\nOverview 3');
            expect(document.sections.map(section => section.id)).toEqual(['s1-part-1', 's2-part-2', 's3-part-3']);
            expect(document.sections.map(section => section.orderIndex)).toEqual([0, 1, 2]);
            expect(document.glossary).toEqual({ Talk: 'Definition 1' });
            expect(document.followUpQuestions).toEqual(['Shared question?', 'Question 1?', 'Question 2?', 'Question 3?']);
        });

        it('should use a single call when the transcript fits', async () => {
            const { instance, complete } = fakeReasoning(() => replyFor(1));

            await Summary.create(instance).summarize(segments, Depth.resolve(3));

            expect(complete).toHaveBeenCalledTimes(1);
            expect(complete.mock.calls[0][0].prompt).not.toContain('part 1 of');
        });

        it('should accept a custom window strategy', async () => {
            const { instance, complete } = fakeReasoning(() => replyFor(1));
            const windowStrategy = { split: (items: readonly ReturnType<typeof segment>[]) => items.map(item => [item]) };

            const document = await Summary.create(instance, { windowStrategy }).summarize(segments, Depth.resolve(3));

            expect(complete).toHaveBeenCalledTimes(3);
            expect(document.sections).toHaveLength(3);
        });
    });
});

describe('byCharacterBudget', () => {
    it('should keep every segment in order', () => {
        const segments = [segment(0, 1, 'aaaa'), segment(1, 2, 'bbbb'), segment(2, 3, 'cccc')];
        const windows = Summary.byCharacterBudget(10).split(segments);

        expect(windows.map(window => window.map(item => item.text))).toEqual([['aaaa', 'bbbb'], ['cccc']]);
    });

    it('should give an oversized segment its own window', () => {
        const segments = [segment(0, 1, 'a'.repeat(50)), segment(1, 2, 'b')];

        expect(Summary.byCharacterBudget(10).split(segments)).toHaveLength(2);
    });
});
