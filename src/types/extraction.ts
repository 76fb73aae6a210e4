/**
 * Structured data extracted from one included paper.
 */
export interface ExtractedData {
    paper_id: string;
    title: string;
    objectives: string | null;
    methodology: string | null;
    study_design: string | null;
    participants: string | null;
    outcomes: string | null;
    key_findings: string[];
    limitations: string | null;
    /** Review-specific fields requested through `extraction.fields` */
    domain_fields: Record<string, string>;
    status: 'complete' | 'failed';
}

export type QualityRating = 'high' | 'moderate' | 'low' | 'unclear';

/**
 * Study quality appraisal for one included paper.
 */
export interface QualityAssessment {
    paper_id: string;
    rating: QualityRating;
    score: number;
    rationale: string;
    status: 'complete' | 'failed';
}
