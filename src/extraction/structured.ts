import { z } from 'zod';
import { ExtractionResult } from './types';
import { extractJson } from './json';

export const formatIssues = (error: z.ZodError): string[] => {
    return error.issues.map(issue => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
    });
};

export const extractStructured = <S extends z.ZodTypeAny>(text: string, schema: S): ExtractionResult<z.output<S>> => {
    const scanned = extractJson(text);
    if (scanned.kind === 'no-structure') {
        return scanned;
    }

    const validated = schema.safeParse(scanned.value);
    if (!validated.success) {
        return { kind: 'incomplete-structure', issues: formatIssues(validated.error), value: scanned.value };
    }
    return { kind: 'success', value: validated.data, stage: scanned.stage };
};
