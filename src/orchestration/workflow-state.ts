import {
    WRITING_SECTIONS,
    type ExtractedData,
    type Paper,
    type PhasePayload,
    type QualityAssessment,
    type StageOutcome,
    type WritingSection,
} from '../types/index.js';

/**
 * In-memory outputs of the phases run (or replayed) so far.
 *
 * Phases never write here directly: the executor folds each phase's payload
 * in through {@link apply}, the same path a resumed run takes when it replays
 * checkpoints. A field left `undefined` means its phase has not run; `null`
 * means a non-critical phase failed and produced nothing.
 */
export class WorkflowState {
    searchResults: Paper[] | undefined;
    queries: Record<string, string> = {};
    uniquePapers: Paper[] | undefined;
    duplicatesRemoved = 0;
    titleAbstract: StageOutcome | undefined;
    fulltext: StageOutcome | undefined;
    fulltextMissing: string[] = [];
    enrichedPapers: Paper[] | null | undefined;
    extracted: ExtractedData[] | undefined;
    assessments: QualityAssessment[] | undefined;
    prismaDiagramPath: string | null | undefined;
    visualizations: string[] | null | undefined;
    readonly sections = new Map<WritingSection, string>();
    reportPath: string | undefined;

    apply(payload: PhasePayload): void {
        switch (payload.kind) {
            case 'search_databases':
                this.searchResults = payload.papers;
                this.queries = payload.queries;
                break;
            case 'deduplication':
                this.uniquePapers = payload.unique_papers;
                this.duplicatesRemoved = payload.duplicates_removed;
                break;
            case 'title_abstract_screening':
                this.titleAbstract = payload.outcome;
                break;
            case 'fulltext_screening':
                this.fulltext = payload.outcome;
                this.fulltextMissing = payload.fulltext_missing;
                break;
            case 'paper_enrichment':
                this.enrichedPapers = payload.papers;
                break;
            case 'data_extraction':
                this.extracted = payload.extracted;
                break;
            case 'quality_assessment':
                this.assessments = payload.assessments;
                break;
            case 'prisma_generation':
                this.prismaDiagramPath = payload.diagram_path;
                break;
            case 'visualization_generation':
                this.visualizations = payload.artifacts;
                break;
            case 'article_section':
                this.sections.set(payload.section, payload.content);
                break;
            case 'article_writing':
                for (const section of WRITING_SECTIONS) {
                    const content = payload.sections[section];
                    if (content !== undefined) this.sections.set(section, content);
                }
                break;
            case 'report_generation':
                this.reportPath = payload.report_path;
                break;
        }
    }

    /**
     * Record that a non-critical phase produced no output.
     */
    markFailed(phase: string): void {
        switch (phase) {
            case 'paper_enrichment':
                this.enrichedPapers = null;
                break;
            case 'prisma_generation':
                this.prismaDiagramPath = null;
                break;
            case 'visualization_generation':
                this.visualizations = null;
                break;
        }
    }

    /**
     * Papers included after full-text screening, in their enriched form when
     * enrichment ran.
     */
    includedPapers(): Paper[] {
        const outcome = requireOutput(this.fulltext, 'fulltext_screening');
        const included = new Set(outcome.included);
        const pool = this.enrichedPapers ?? requireOutput(this.uniquePapers, 'deduplication');
        return pool.filter((paper) => included.has(paper.id));
    }

    /** Every known paper by id, enriched versions taking precedence */
    paperIndex(): Map<string, Paper> {
        const index = new Map<string, Paper>();
        for (const paper of this.uniquePapers ?? []) index.set(paper.id, paper);
        for (const paper of this.enrichedPapers ?? []) index.set(paper.id, paper);
        return index;
    }
}

/**
 * Narrow a phase output that a later phase needs, or fail naming the phase.
 */
export function requireOutput<T>(value: T | null | undefined, phase: string): T {
    if (value === undefined || value === null) {
        throw new Error(`Output of phase "${phase}" is not available`);
    }
    return value;
}

