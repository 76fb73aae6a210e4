import { z } from 'zod';
import { WRITING_SECTIONS } from './config.js';
import { InclusionDecision } from './screening.js';

/**
 * Strict decoders for checkpoint files. Every phase payload is a tagged,
 * versioned variant; unknown or renamed fields fail the decode.
 */

export const CHECKPOINT_SCHEMA_VERSION = 1;

export const PaperSchema = z
    .object({
        id: z.string(),
        title: z.string(),
        abstract: z.string().nullable(),
        authors: z.array(z.string()),
        year: z.number().int().nullable(),
        doi: z.string().nullable(),
        journal: z.string().nullable(),
        database: z.string(),
        url: z.string().nullable(),
        keywords: z.array(z.string()),
        affiliations: z.array(z.string()),
        country: z.string().nullable(),
    })
    .strict();

export const ScreeningResultSchema = z
    .object({
        paper_id: z.string(),
        stage: z.enum(['title_abstract', 'fulltext']),
        decision: z.nativeEnum(InclusionDecision),
        confidence: z.number().min(0).max(1),
        reasoning: z.string(),
        exclusion_reason: z.string().nullable(),
        source: z.enum(['rule', 'keyword_filter', 'llm_schema', 'llm_text', 'fallback', 'circuit_open', 'degraded']),
    })
    .strict();

export const StageOutcomeSchema = z
    .object({
        stage: z.enum(['title_abstract', 'fulltext']),
        results: z.array(ScreeningResultSchema),
        included: z.array(z.string()),
        excluded: z.array(z.string()),
        uncertain: z.array(z.string()),
    })
    .strict();

export const ExtractedDataSchema = z
    .object({
        paper_id: z.string(),
        title: z.string(),
        objectives: z.string().nullable(),
        methodology: z.string().nullable(),
        study_design: z.string().nullable(),
        participants: z.string().nullable(),
        outcomes: z.string().nullable(),
        key_findings: z.array(z.string()),
        limitations: z.string().nullable(),
        domain_fields: z.record(z.string()),
        status: z.enum(['complete', 'failed']),
    })
    .strict();

export const QualityAssessmentSchema = z
    .object({
        paper_id: z.string(),
        rating: z.enum(['high', 'moderate', 'low', 'unclear']),
        score: z.number().min(0).max(1),
        rationale: z.string(),
        status: z.enum(['complete', 'failed']),
    })
    .strict();

export const TopicContextSnapshotSchema = z
    .object({
        topic: z.string(),
        keywords: z.array(z.string()),
        domain: z.string(),
        scope: z.string(),
        research_question: z.string(),
        context: z.string(),
        insights: z.array(z.string()),
        findings: z.array(z.string()),
        extracted_data_summary: z.string().nullable(),
    })
    .strict();

const count = z.number().int().nonnegative().optional();

export const PrismaCountsSchema = z
    .object({
        found: count,
        found_other: count,
        no_dupes: count,
        screened: count,
        screen_exclusions: count,
        full_text_sought: count,
        full_text_not_retrieved: count,
        full_text_assessed: count,
        full_text_exclusions: count,
        qualitative: count,
        quantitative: count,
        database_breakdown: z.record(z.number().int().nonnegative()),
    })
    .strict();

// ─── Phase payloads ───────────────────────────────────────

const version = z.literal(CHECKPOINT_SCHEMA_VERSION);

export const PhasePayloadSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('search_databases'),
        schema_version: version,
        papers: z.array(PaperSchema),
        queries: z.record(z.string()),
    }).strict(),
    z.object({
        kind: z.literal('deduplication'),
        schema_version: version,
        unique_papers: z.array(PaperSchema),
        duplicates_removed: z.number().int().nonnegative(),
    }).strict(),
    z.object({
        kind: z.literal('title_abstract_screening'),
        schema_version: version,
        outcome: StageOutcomeSchema,
    }).strict(),
    z.object({
        kind: z.literal('fulltext_screening'),
        schema_version: version,
        outcome: StageOutcomeSchema,
        fulltext_missing: z.array(z.string()),
    }).strict(),
    z.object({
        kind: z.literal('paper_enrichment'),
        schema_version: version,
        papers: z.array(PaperSchema),
    }).strict(),
    z.object({
        kind: z.literal('data_extraction'),
        schema_version: version,
        extracted: z.array(ExtractedDataSchema),
    }).strict(),
    z.object({
        kind: z.literal('quality_assessment'),
        schema_version: version,
        assessments: z.array(QualityAssessmentSchema),
    }).strict(),
    z.object({
        kind: z.literal('prisma_generation'),
        schema_version: version,
        diagram_path: z.string(),
    }).strict(),
    z.object({
        kind: z.literal('visualization_generation'),
        schema_version: version,
        artifacts: z.array(z.string()),
    }).strict(),
    z.object({
        kind: z.literal('article_section'),
        schema_version: version,
        section: z.enum(WRITING_SECTIONS),
        content: z.string(),
    }).strict(),
    z.object({
        kind: z.literal('article_writing'),
        schema_version: version,
        sections: z.record(z.enum(WRITING_SECTIONS), z.string()),
    }).strict(),
    z.object({
        kind: z.literal('report_generation'),
        schema_version: version,
        report_path: z.string(),
    }).strict(),
]);

export const CheckpointRecordSchema = z
    .object({
        phase: z.string(),
        timestamp: z.string().datetime(),
        workflow_id: z.string(),
        topic_context: TopicContextSnapshotSchema,
        data: PhasePayloadSchema,
        dependencies: z.array(z.string()),
        prisma_counts: PrismaCountsSchema,
    })
    .strict();

export type PhasePayload = z.output<typeof PhasePayloadSchema>;
export type PhasePayloadKind = PhasePayload['kind'];
export type CheckpointRecord = z.output<typeof CheckpointRecordSchema>;
