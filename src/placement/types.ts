export interface SectionScore {
    sectionId: string;
    orderIndex: number;
    score: number;
}

export interface PlacementConfig {
    minPlacementScore?: number;
    concurrency?: number;
    maxTokens?: number;
}

export interface Adjudication {
    sectionId: string | null;
    reason: string;
}

export type AdjudicationOutcome =
    | { kind: 'decided'; adjudication: Adjudication }
    | { kind: 'failed'; reason: string };
