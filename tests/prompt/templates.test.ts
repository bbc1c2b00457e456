import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import {
    initializeTemplates,
    getTemplateNames,
    getTemplate,
    clearAllTemplates,
    TEMPLATES,
} from '../../src/prompt/templates';

describe('Prompt Templates', () => {
    beforeAll(() => {
        initializeTemplates();
    });

    afterAll(() => {
        clearAllTemplates();
    });

    it('registers every template', () => {
        const names = getTemplateNames();
        expect(names).toContain('summary');
        expect(names).toContain('image-analysis');
        expect(names).toContain('image-placement');
        expect(names).toContain('ocr');
    });

    it('can retrieve individual templates', () => {
        const template = getTemplate('summary');
        expect(template).toBeDefined();
        expect(template?.persona).toEqual(TEMPLATES.summary.persona);
        expect(template?.constraints).toEqual(TEMPLATES.summary.constraints);
    });

    it('returns undefined for an unknown template', () => {
        expect(getTemplate('transcription-standard')).toBeUndefined();
    });
});
