import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { ResponseCache } from '../cache/response-cache.js';
import type { PaperEnricher } from '../enrichment/paper-enricher.js';
import { DataExtractor } from '../extraction/data-extractor.js';
import type { LlmRuntime } from '../llm/runtime.js';
import type { ObservabilityContext } from '../observability/context.js';
import type { PrismaCounter } from '../prisma/prisma-counter.js';
import { renderPrismaDiagram } from '../prisma/prisma-diagram.js';
import { QualityAssessor } from '../quality/quality-assessor.js';
import { writeReport } from '../report/report-builder.js';
import { buildAdjudicationQueue, writeAdjudicationQueue } from '../screening/adjudication.js';
import { FulltextScreener } from '../screening/fulltext-screener.js';
import type { FulltextSource } from '../screening/fulltext-source.js';
import { KeywordFilter } from '../screening/keyword-filter.js';
import { runScreeningStage } from '../screening/screening-pipeline.js';
import { TitleAbstractScreener } from '../screening/title-abstract-screener.js';
import { searchDatabases } from '../search/database-search.js';
import { deduplicatePapers } from '../search/deduplication.js';
import { buildSearchStrategy, describeSearchStrategy, type SearchStrategy } from '../search/search-strategy.js';
import {
    CHECKPOINT_SCHEMA_VERSION,
    WRITING_SECTIONS,
    type PhasePayload,
    type ReviewConfig,
    type RunOptions,
    type SourceAdapter,
    type StageOutcome,
    type WritingSection,
} from '../types/index.js';
import { buildDistributions, writeDistributions } from '../visualization/charts.js';
import { SectionWriter } from '../writing/section-writer.js';
import { getLogger } from '../utils/logger.js';
import type { CheckpointManager } from './checkpoint-manager.js';
import { PhaseRegistry, type PhaseHandler } from './phase-registry.js';
import type { TopicContext } from './topic-context.js';
import { requireOutput, type WorkflowState } from './workflow-state.js';

const logger = getLogger();

/**
 * Everything a phase handler can reach during one run.
 */
export interface WorkflowContext {
    workflowId: string;
    config: ReviewConfig;
    options: RunOptions;
    /** `<output dir>/<workflow id>` */
    outputDir: string;
    topic: TopicContext;
    state: WorkflowState;
    prisma: PrismaCounter;
    runtime: LlmRuntime;
    observability: ObservabilityContext;
    checkpoints: CheckpointManager;
    connectors: readonly SourceAdapter[];
    cache: ResponseCache | null;
    fulltext: FulltextSource;
    enricher: PaperEnricher;
    /** Rebuilt on every run by `build_search_strategy` */
    strategy: SearchStrategy | null;
    clock: () => Date;
}

/** A phase returns the payload to checkpoint, or null when it has none */
export type PhaseOutput = PhasePayload | null;

export type WorkflowPhaseRegistry = PhaseRegistry<WorkflowContext, PhaseOutput>;

export const STANDARD_PHASE_NAMES = [
    'build_search_strategy',
    'search_databases',
    'deduplication',
    'title_abstract_screening',
    'fulltext_screening',
    'paper_enrichment',
    'data_extraction',
    'quality_assessment',
    'prisma_generation',
    'visualization_generation',
    'article_writing',
    'report_generation',
] as const;
export type StandardPhase = (typeof STANDARD_PHASE_NAMES)[number];

interface PhaseSpec {
    dependencies: StandardPhase[];
    critical: boolean;
    checkpoint: boolean;
    parallel: boolean;
    handler: PhaseHandler<WorkflowContext, PhaseOutput>;
}

// ─── Handlers ────────────────────────────────────────────

async function buildStrategy(ctx: WorkflowContext): Promise<PhaseOutput> {
    ctx.strategy = buildSearchStrategy(ctx.config, { quickSearch: ctx.options.quickSearch });
    logger.info(
        { groups: ctx.strategy.termGroups.length, limitPerDatabase: ctx.strategy.limitPerDatabase },
        'Search strategy built'
    );
    return null;
}

async function searchPhase(ctx: WorkflowContext, signal: AbortSignal): Promise<PhaseOutput> {
    const strategy = requireOutput(ctx.strategy, 'build_search_strategy');
    const result = await searchDatabases(strategy, ctx.connectors, ctx.cache, signal);

    ctx.prisma.set('found', result.papers.length);
    ctx.prisma.setDatabaseBreakdown(result.breakdown);

    return {
        kind: 'search_databases',
        schema_version: CHECKPOINT_SCHEMA_VERSION,
        papers: result.papers,
        queries: result.queries,
    };
}

async function deduplicationPhase(ctx: WorkflowContext): Promise<PhaseOutput> {
    const papers = requireOutput(ctx.state.searchResults, 'search_databases');
    const result = deduplicatePapers(papers);

    ctx.prisma.set('no_dupes', result.unique.length);

    return {
        kind: 'deduplication',
        schema_version: CHECKPOINT_SCHEMA_VERSION,
        unique_papers: result.unique,
        duplicates_removed: result.duplicatesRemoved,
    };
}

async function titleAbstractPhase(ctx: WorkflowContext, signal: AbortSignal): Promise<PhaseOutput> {
    const papers = requireOutput(ctx.state.uniquePapers, 'deduplication');
    const filterConfig = ctx.config.screening.keywordFilter;
    const screener = new TitleAbstractScreener(
        { client: ctx.runtime.clientFor('titleAbstractScreener'), topic: ctx.topic, criteria: ctx.config.criteria },
        filterConfig.enabled ? new KeywordFilter(filterConfig, ctx.config.criteria.inclusion) : null
    );

    const outcome = await runScreeningStage(papers, (paper, s) => screener.screen(paper, s), {
        stage: 'title_abstract',
        concurrency: ctx.config.workflow.concurrency,
        signal,
        onProgress: progressLogger('title_abstract'),
    });

    ctx.prisma.set('screened', papers.length);
    ctx.prisma.set('screen_exclusions', papers.length - outcome.included.length);
    ctx.topic.enrich([stageInsight('Title/abstract screening', outcome)]);
    exportAdjudication(ctx, [outcome]);

    return { kind: 'title_abstract_screening', schema_version: CHECKPOINT_SCHEMA_VERSION, outcome };
}

async function fulltextPhase(ctx: WorkflowContext, signal: AbortSignal): Promise<PhaseOutput> {
    const previous = requireOutput(ctx.state.titleAbstract, 'title_abstract_screening');
    const unique = requireOutput(ctx.state.uniquePapers, 'deduplication');
    const sought = new Set(previous.included);
    const papers = unique.filter((paper) => sought.has(paper.id));
    const previousById = new Map(previous.results.map((result) => [result.paper_id, result]));

    const screener = new FulltextScreener(
        { client: ctx.runtime.clientFor('fulltextScreener'), topic: ctx.topic, criteria: ctx.config.criteria },
        ctx.config.screening
    );

    const missing = new Set<string>();
    const outcome = await runScreeningStage(
        papers,
        async (paper, s) => {
            const text = await ctx.fulltext.load(paper.id);
            if (text === null) missing.add(paper.id);
            return screener.screen(paper, text, previousById.get(paper.id), s);
        },
        {
            stage: 'fulltext',
            concurrency: ctx.config.workflow.concurrency,
            signal,
            onProgress: progressLogger('fulltext'),
        }
    );

    // Papers without a full text are still assessed, on their title/abstract decision
    ctx.prisma.set('full_text_sought', papers.length);
    ctx.prisma.set('full_text_not_retrieved', missing.size);
    ctx.prisma.set('full_text_assessed', papers.length);
    ctx.prisma.set('full_text_exclusions', papers.length - outcome.included.length);

    if (missing.size > 0) {
        logger.warn({ missing: missing.size, sought: papers.length }, 'Full text unavailable, screened in degraded mode');
    }
    ctx.topic.enrich([stageInsight('Full-text screening', outcome)]);
    exportAdjudication(ctx, [previous, outcome]);

    return {
        kind: 'fulltext_screening',
        schema_version: CHECKPOINT_SCHEMA_VERSION,
        outcome,
        // Input order, so the checkpoint is stable across runs
        fulltext_missing: papers.map((paper) => paper.id).filter((id) => missing.has(id)),
    };
}

async function enrichmentPhase(ctx: WorkflowContext, signal: AbortSignal): Promise<PhaseOutput> {
    const outcome = requireOutput(ctx.state.fulltext, 'fulltext_screening');
    const included = new Set(outcome.included);
    const papers = requireOutput(ctx.state.uniquePapers, 'deduplication').filter((paper) => included.has(paper.id));

    const result = await ctx.enricher.enrich(papers, signal);
    return { kind: 'paper_enrichment', schema_version: CHECKPOINT_SCHEMA_VERSION, papers: result.papers };
}

async function extractionPhase(ctx: WorkflowContext, signal: AbortSignal): Promise<PhaseOutput> {
    const papers = ctx.state.includedPapers();
    const extractor = new DataExtractor({
        client: ctx.runtime.clientFor('extractor'),
        topic: ctx.topic,
        fulltext: ctx.fulltext,
        fields: ctx.config.extraction.fields,
        maxChars: ctx.config.screening.fulltextMaxChars,
        concurrency: ctx.config.workflow.concurrency,
    });

    const extracted = await extractor.extractAll(papers, signal);

    ctx.prisma.set('qualitative', extracted.length);
    ctx.topic.accumulateFindings(extracted);

    return { kind: 'data_extraction', schema_version: CHECKPOINT_SCHEMA_VERSION, extracted };
}

async function qualityPhase(ctx: WorkflowContext, signal: AbortSignal): Promise<PhaseOutput> {
    const extracted = requireOutput(ctx.state.extracted, 'data_extraction');
    const assessor = new QualityAssessor(
        ctx.runtime.clientFor('qualityAssessor'),
        ctx.topic,
        ctx.config.workflow.concurrency
    );
    const assessments = await assessor.assessAll(extracted, signal);
    return { kind: 'quality_assessment', schema_version: CHECKPOINT_SCHEMA_VERSION, assessments };
}

async function prismaPhase(ctx: WorkflowContext): Promise<PhaseOutput> {
    const problems = ctx.prisma.validateFunnel();
    if (problems.length > 0) {
        logger.warn({ problems }, 'PRISMA funnel is inconsistent');
    }

    const path = join(ctx.outputDir, 'prisma_diagram.md');
    mkdirSync(ctx.outputDir, { recursive: true });
    writeFileSync(path, renderPrismaDiagram(ctx.prisma.toJSON(), ctx.topic.topic), 'utf-8');
    logger.info({ path }, 'PRISMA diagram written');

    return { kind: 'prisma_generation', schema_version: CHECKPOINT_SCHEMA_VERSION, diagram_path: path };
}

async function visualizationPhase(ctx: WorkflowContext): Promise<PhaseOutput> {
    const papers = ctx.state.includedPapers();
    const artifacts = writeDistributions(
        buildDistributions(papers, requireOutput(ctx.state.assessments, 'quality_assessment')),
        join(ctx.outputDir, 'visualizations')
    );
    logger.info({ artifacts: artifacts.length }, 'Visualizations written');
    return { kind: 'visualization_generation', schema_version: CHECKPOINT_SCHEMA_VERSION, artifacts };
}

async function writingPhase(ctx: WorkflowContext, signal: AbortSignal): Promise<PhaseOutput> {
    const writer = new SectionWriter(ctx.runtime.clientFor('writer'), ctx.config.writing);
    const inputs = {
        topic: ctx.topic,
        criteria: ctx.config.criteria,
        counts: ctx.prisma.toJSON(),
        searchSummary: describeSearchStrategy(requireOutput(ctx.strategy, 'build_search_strategy')),
        papers: ctx.state.includedPapers(),
        extracted: requireOutput(ctx.state.extracted, 'data_extraction'),
        assessments: requireOutput(ctx.state.assessments, 'quality_assessment'),
    };

    const sections: Partial<Record<WritingSection, string>> = {};
    for (const section of WRITING_SECTIONS) {
        const restored = ctx.state.sections.get(section);
        if (restored !== undefined) {
            logger.info({ section }, 'Section restored from checkpoint');
            sections[section] = restored;
            continue;
        }

        signal.throwIfAborted();
        const content = await writer.write(section, inputs, sections, signal);
        sections[section] = content;
        ctx.checkpoints.saveSection(ctx.workflowId, section, content, {
            topicContext: ctx.topic.toSnapshot(),
            dependencies: ['quality_assessment'],
            prismaCounts: ctx.prisma.toJSON(),
        });
    }

    return { kind: 'article_writing', schema_version: CHECKPOINT_SCHEMA_VERSION, sections };
}

async function reportPhase(ctx: WorkflowContext): Promise<PhaseOutput> {
    const section = (name: WritingSection): string =>
        requireOutput(ctx.state.sections.get(name), 'article_writing');
    const sections: Record<WritingSection, string> = {
        introduction: section('introduction'),
        methods: section('methods'),
        results: section('results'),
        discussion: section('discussion'),
        abstract: section('abstract'),
    };

    const cost = ctx.observability.costs.getSummary();
    const path = writeReport(
        {
            topic: ctx.topic.topic,
            workflowId: ctx.workflowId,
            sections,
            papers: [...ctx.state.paperIndex().values()],
            counts: ctx.prisma.toJSON(),
            prismaDiagramPath: ctx.state.prismaDiagramPath ?? null,
            visualizations: ctx.state.visualizations ?? null,
            cost: { totalCostUsd: cost.totalCostUsd, calls: cost.calls },
            generatedAt: ctx.clock(),
        },
        join(ctx.outputDir, 'final_report.md')
    );

    return { kind: 'report_generation', schema_version: CHECKPOINT_SCHEMA_VERSION, report_path: path };
}

// ─── Registry ────────────────────────────────────────────

const STANDARD_PHASES: Record<StandardPhase, PhaseSpec> = {
    build_search_strategy: { dependencies: [], critical: true, checkpoint: false, parallel: false, handler: buildStrategy },
    search_databases: { dependencies: ['build_search_strategy'], critical: true, checkpoint: true, parallel: false, handler: searchPhase },
    deduplication: { dependencies: ['search_databases'], critical: true, checkpoint: true, parallel: false, handler: deduplicationPhase },
    title_abstract_screening: { dependencies: ['deduplication'], critical: true, checkpoint: true, parallel: false, handler: titleAbstractPhase },
    fulltext_screening: { dependencies: ['title_abstract_screening'], critical: true, checkpoint: true, parallel: false, handler: fulltextPhase },
    paper_enrichment: { dependencies: ['fulltext_screening'], critical: false, checkpoint: true, parallel: false, handler: enrichmentPhase },
    data_extraction: { dependencies: ['paper_enrichment'], critical: true, checkpoint: true, parallel: false, handler: extractionPhase },
    quality_assessment: { dependencies: ['data_extraction'], critical: true, checkpoint: true, parallel: true, handler: qualityPhase },
    prisma_generation: { dependencies: ['data_extraction'], critical: false, checkpoint: true, parallel: true, handler: prismaPhase },
    visualization_generation: { dependencies: ['quality_assessment'], critical: false, checkpoint: true, parallel: true, handler: visualizationPhase },
    article_writing: { dependencies: ['quality_assessment'], critical: true, checkpoint: true, parallel: true, handler: writingPhase },
    report_generation: {
        dependencies: ['article_writing', 'prisma_generation', 'visualization_generation'],
        critical: true,
        checkpoint: true,
        parallel: false,
        handler: reportPhase,
    },
};

/**
 * Register the standard review phases, in declaration order.
 */
export function registerStandardPhases(registry: WorkflowPhaseRegistry): WorkflowPhaseRegistry {
    for (const name of STANDARD_PHASE_NAMES) {
        const { dependencies, ...options } = STANDARD_PHASES[name];
        registry.register(name, dependencies, options);
    }
    return registry;
}

export function createStandardRegistry(): WorkflowPhaseRegistry {
    return registerStandardPhases(new PhaseRegistry<WorkflowContext, PhaseOutput>());
}

// ─── Helpers ─────────────────────────────────────────────

function stageInsight(label: string, outcome: StageOutcome): string {
    return (
        `${label}: ${outcome.included.length} included, ${outcome.excluded.length} excluded, ` +
        `${outcome.uncertain.length} uncertain of ${outcome.results.length}`
    );
}

function exportAdjudication(ctx: WorkflowContext, outcomes: readonly StageOutcome[]): void {
    const queue = buildAdjudicationQueue(outcomes, ctx.state.paperIndex(), ctx.clock());
    const path = writeAdjudicationQueue(queue, join(ctx.outputDir, 'adjudication_queue.json'));
    if (queue.summary.total_uncertain > 0) {
        logger.info({ path, uncertain: queue.summary.total_uncertain }, 'Adjudication queue exported');
    }
}

function progressLogger(stage: string): (done: number, total: number) => void {
    const step = 25;
    return (done, total) => {
        if (done % step === 0 || done === total) {
            logger.debug({ stage, done, total }, 'Screening progress');
        }
    };
}

