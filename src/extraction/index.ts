/**
 * Response Extraction Layer
 *
 * Recovers JSON from model text and validates it against a zod schema.
 * "Nothing parseable" and "parsed but missing required fields" stay distinct.
 */

export { extractStructured, formatIssues } from './structured';
export { extractJson, stripArtifacts, balancedCandidates, removeTrailingCommas } from './json';
export { extractDocument, RawDocumentSchema } from './document';
export type { RawDocument, RawSection } from './document';
export * from './types';
