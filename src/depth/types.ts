export type UnderstandingLevel = 0 | 1 | 2 | 3 | 4 | 5;

export interface DepthProfile {
    level: UnderstandingLevel;
    label: string;
    // A glossary term is kept only when the model rates its technicality (1-5) at or above this.
    glossaryMinTechnicality: number;
    verbosityMultiplier: number;
    includeBackground: boolean;
    assumedBackground: string;
    framing: string;
}

export interface GlossaryEntry {
    term: string;
    definition: string;
    technicality?: number;
}
