/**
 * Tagged outcomes of pulling structured data out of model text.
 * Extraction never throws; callers branch on `kind`.
 */

export type JsonScanResult =
    | { kind: 'parsed'; value: unknown; stage: ExtractionStage }
    | { kind: 'no-structure'; reason: string };

export type ExtractionStage = 'strict' | 'balanced' | 'stripped-strict' | 'stripped-balanced';

export interface Success<T> {
    kind: 'success';
    value: T;
    stage: ExtractionStage;
}

export interface NoStructureFound {
    kind: 'no-structure';
    reason: string;
}

export interface IncompleteStructure {
    kind: 'incomplete-structure';
    issues: string[];
    value: unknown;
}

export type ExtractionResult<T> = Success<T> | NoStructureFound | IncompleteStructure;

export type ExtractionFailure = NoStructureFound | IncompleteStructure;

export const describeFailure = (failure: ExtractionFailure): string => {
    return failure.kind === 'no-structure'
        ? `no structure found (${failure.reason})`
        : `incomplete structure: ${failure.issues.join('; ')}`;
};
