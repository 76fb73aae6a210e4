/**
 * Screening verdicts. Serialized as their string tag.
 */
export enum InclusionDecision {
    INCLUDE = 'include',
    EXCLUDE = 'exclude',
    UNCERTAIN = 'uncertain',
}

export type ScreeningStage = 'title_abstract' | 'fulltext';

export const SCREENING_STAGES: readonly ScreeningStage[] = ['title_abstract', 'fulltext'];

/**
 * What produced a screening verdict.
 */
export type DecisionSource =
    | 'rule'
    | 'keyword_filter'
    | 'llm_schema'
    | 'llm_text'
    | 'fallback'
    | 'circuit_open'
    | 'degraded';

/**
 * One verdict for one paper at one stage. Never mutated after creation.
 */
export interface ScreeningResult {
    paper_id: string;
    stage: ScreeningStage;
    decision: InclusionDecision;
    /** 0.0 to 1.0 */
    confidence: number;
    reasoning: string;
    exclusion_reason: string | null;
    source: DecisionSource;
}

/**
 * Per-stage outcome after routing every result.
 */
export interface StageOutcome {
    stage: ScreeningStage;
    results: ScreeningResult[];
    included: string[];
    excluded: string[];
    uncertain: string[];
}
