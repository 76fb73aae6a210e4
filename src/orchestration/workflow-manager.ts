import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { ResponseCache } from '../cache/response-cache.js';
import { CrossrefAffiliationLookup, type AffiliationLookup } from '../enrichment/crossref.js';
import { CountryResolver, PaperEnricher, type CountryList } from '../enrichment/paper-enricher.js';
import type { ProviderFactory } from '../llm/providers/index.js';
import { LlmRuntime } from '../llm/runtime.js';
import { ObservabilityContext, type ObservabilitySummary } from '../observability/context.js';
import type { PricingTable } from '../observability/cost-tracker.js';
import { PrismaCounter } from '../prisma/prisma-counter.js';
import { DirectoryFulltextSource, NoFulltextSource, type FulltextSource } from '../screening/fulltext-source.js';
import { buildSearchStrategy, describeSearchStrategy } from '../search/search-strategy.js';
import { createConnector } from '../sources/index.js';
import { WorkflowRegistry } from '../storage/workflow-registry.js';
import type {
    CheckpointRecord,
    PrismaCounts,
    ReviewConfig,
    RunOptions,
    SourceAdapter,
    WorkflowRecord,
} from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { getApiKey, hashConfig } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';
import { CheckpointManager, type ChainPhase, type WorkflowMatch } from './checkpoint-manager.js';
import { PhaseExecutor, planGroups, type ExecutionSummary } from './phase-executor.js';
import { createStandardRegistry, type WorkflowContext, type WorkflowPhaseRegistry } from './phases.js';
import { TopicContext } from './topic-context.js';
import { WorkflowState } from './workflow-state.js';

const logger = getLogger();

/**
 * Collaborators a run can be given instead of the defaults built from config.
 * Tests use these to swap in fake providers, connectors and clocks.
 */
export interface WorkflowDependencies {
    providerFactory?: ProviderFactory;
    connectors?: SourceAdapter[];
    fulltext?: FulltextSource;
    /** `null` disables the affiliation lookup */
    affiliationLookup?: AffiliationLookup | null;
    countries?: CountryList;
    pricing?: PricingTable;
    /** `null` runs without the SQLite registry */
    store?: WorkflowRegistry | null;
    phases?: WorkflowPhaseRegistry;
    clock?: () => Date;
    random?: () => number;
}

export interface WorkflowPlan {
    order: string[];
    groups: string[][];
    problems: string[];
    strategy: string;
    unsupportedDatabases: string[];
}

export interface WorkflowRunResult {
    workflowId: string;
    outputDir: string;
    reportPath: string | null;
    /** Phases restored from checkpoints instead of being run */
    resumed: string[];
    summary: ExecutionSummary;
    prismaCounts: PrismaCounts;
    observability: ObservabilitySummary;
}

export interface PhaseStatus {
    phase: string;
    status: 'complete' | 'pending' | 'rebuilt';
    timestamp: string | null;
}

export interface WorkflowStatusReport {
    match: WorkflowMatch | null;
    phases: PhaseStatus[];
    nextPhase: string | null;
    runs: WorkflowRecord[];
}

interface ResumePoint {
    workflowId: string;
    kept: Map<string, CheckpointRecord>;
    /** Non-critical phases whose null output is carried over */
    failed: string[];
    reuseSections: boolean;
}

/**
 * Drives one review: resolves the resume point, replays checkpoints,
 * runs the remaining phases and records the run.
 */
export class WorkflowManager {
    readonly phases: WorkflowPhaseRegistry;
    readonly checkpoints: CheckpointManager;
    private readonly clock: () => Date;

    constructor(
        private readonly config: ReviewConfig,
        private readonly options: RunOptions,
        private readonly deps: WorkflowDependencies = {}
    ) {
        this.phases = deps.phases ?? createStandardRegistry();
        this.clock = deps.clock ?? (() => new Date());
        this.checkpoints = new CheckpointManager(config.output.checkpointDirectory, this.clock);
    }

    /**
     * Execution plan and validation, without any network or LLM call.
     */
    plan(): WorkflowPlan {
        const problems = this.phases.validateDependencies();
        const order = problems.length === 0 ? this.phases.getExecutionOrder() : [];
        const strategy = buildSearchStrategy(this.config, { quickSearch: this.options.quickSearch });

        return {
            order,
            groups: planGroups(order, this.phases).map((group) => group.map((phase) => phase.name)),
            problems,
            strategy: describeSearchStrategy(strategy),
            unsupportedDatabases: this.config.workflow.databases.filter((database) => createConnector(database) === null),
        };
    }

    /**
     * Checkpoint status of the latest workflow for the configured topic.
     */
    status(): WorkflowStatusReport {
        const chainPhases = this.chainPhases();
        const match = this.checkpoints.findByTopic(this.config.topic.topic, chainPhases);
        const kept = match ? this.checkpoints.loadChain(match.directory, chainPhases) : new Map<string, CheckpointRecord>();

        const phases = chainPhases.map((phase): PhaseStatus => {
            const record = kept.get(phase.name);
            if (!phase.checkpoint) return { phase: phase.name, status: 'rebuilt', timestamp: null };
            return { phase: phase.name, status: record ? 'complete' : 'pending', timestamp: record?.timestamp ?? null };
        });

        const completed = new Set(chainPhases.filter((phase) => !phase.checkpoint || kept.has(phase.name)).map((p) => p.name));
        const store = this.openStore();
        try {
            return {
                match,
                phases,
                nextPhase: this.phases.nextPhase(completed),
                runs: store ? store.findByTopic(this.config.topic.topic) : [],
            };
        } finally {
            if (store && this.deps.store === undefined) store.close();
        }
    }

    async run(signal?: AbortSignal): Promise<WorkflowRunResult> {
        const order = this.phases.getExecutionOrder();
        const resumePoint = this.resolveResumePoint(order);
        const observability = new ObservabilityContext({ pricing: this.deps.pricing });
        const runtime = new LlmRuntime(
            this.config,
            observability,
            this.deps.providerFactory,
            () => this.clock().getTime(),
            this.deps.random
        );
        await runtime.verifyCredentials();

        const workflowId = resumePoint?.workflowId ?? CheckpointManager.createWorkflowId(this.config.topic.topic, this.clock());
        const kept = resumePoint?.kept ?? new Map<string, CheckpointRecord>();
        const outputDir = join(this.config.output.directory, workflowId);
        mkdirSync(outputDir, { recursive: true });

        // Latest kept checkpoint carries the topic context and counts to continue from
        const latest = [...kept.values()].pop();
        const topic = latest ? TopicContext.fromSnapshot(latest.topic_context) : TopicContext.fromConfig(this.config.topic);
        const prisma = latest ? PrismaCounter.fromJSON(latest.prisma_counts) : new PrismaCounter();

        const carriedFailures = resumePoint?.failed ?? [];
        const state = new WorkflowState();
        for (const record of kept.values()) state.apply(record.data);
        for (const phase of carriedFailures) state.markFailed(phase);
        if (resumePoint?.reuseSections) {
            for (const [section, content] of this.checkpoints.loadSections(this.checkpoints.workflowDir(workflowId))) {
                state.apply({ kind: 'article_section', schema_version: 1, section, content });
            }
        }

        const context: WorkflowContext = {
            workflowId,
            config: this.config,
            options: this.options,
            outputDir,
            topic,
            state,
            prisma,
            runtime,
            observability,
            checkpoints: this.checkpoints,
            connectors: this.deps.connectors ?? this.createConnectors(),
            cache: this.createCache(),
            fulltext: this.deps.fulltext ?? this.createFulltextSource(),
            enricher: new PaperEnricher(
                new CountryResolver(this.deps.countries),
                this.deps.affiliationLookup === undefined
                    ? new CrossrefAffiliationLookup(getApiKey('CROSSREF_MAILTO'))
                    : this.deps.affiliationLookup
            ),
            strategy: null,
            clock: this.clock,
        };

        const store = this.openStore();
        store?.start({
            workflow_id: workflowId,
            topic: this.config.topic.topic,
            config_hash: hashConfig(this.config),
            checkpoint_dir: this.checkpoints.workflowDir(workflowId),
        });

        logger.info(
            { workflowId, resumed: kept.size, quickSearch: this.options.quickSearch },
            kept.size > 0 ? 'Resuming workflow' : 'Starting workflow'
        );

        const executor = new PhaseExecutor(this.phases, {
            isComplete: (phase) => kept.has(phase) || carriedFailures.includes(phase),
            onComplete: (phase, output) => {
                if (!output) return;
                state.apply(output);
                if (phase.checkpoint) {
                    this.checkpoints.savePhase(workflowId, phase.name, {
                        topicContext: topic.toSnapshot(),
                        data: output,
                        dependencies: phase.dependencies,
                        prismaCounts: prisma.toJSON(),
                    });
                }
                store?.heartbeat(workflowId);
            },
            onFailure: (phase) => state.markFailed(phase.name),
        });

        try {
            const summary = await executor.run(context, signal);
            store?.setStatus(workflowId, 'completed');

            const result: WorkflowRunResult = {
                workflowId,
                outputDir,
                reportPath: state.reportPath ?? null,
                resumed: [...kept.keys()],
                summary,
                prismaCounts: prisma.toJSON(),
                observability: observability.getSummary(),
            };
            logger.info(
                { workflowId, completed: summary.completed.length, failed: summary.failed.length, report: result.reportPath },
                'Workflow finished'
            );
            return result;
        } catch (error) {
            store?.setStatus(workflowId, 'failed');
            throw error;
        } finally {
            observability.writeSummary(join(outputDir, 'observability_summary.json'));
            if (store && this.deps.store === undefined) store.close();
        }
    }

    /**
     * Which workflow to continue and which of its checkpoints to keep.
     * `--resume-from` discards the named phase and everything after it.
     */
    private resolveResumePoint(order: readonly string[]): ResumePoint | null {
        const { resume, resumeFrom } = this.options;
        if (resumeFrom !== undefined && !order.includes(resumeFrom)) {
            throw new ConfigError(`Unknown phase "${resumeFrom}". Known phases: ${order.join(', ')}`, 'resumeFrom');
        }
        if (!resume && resumeFrom === undefined) return null;

        const chainPhases = this.chainPhases();
        const match = this.checkpoints.findByTopic(this.config.topic.topic, chainPhases);
        if (!match) {
            logger.info({ topic: this.config.topic.topic }, 'No checkpoint found for topic, starting a new workflow');
            return null;
        }

        const kept = this.checkpoints.loadChain(match.directory, chainPhases);
        const forced = new Set(resumeFrom === undefined ? [] : order.slice(order.indexOf(resumeFrom)));
        for (const phase of forced) {
            if (kept.delete(phase)) logger.info({ phase }, 'Discarding checkpoint, phase will re-run');
        }

        // A non-critical phase that failed on that run stays failed when later phases were kept
        const failed = chainPhases
            .filter(
                (phase) =>
                    !phase.critical &&
                    !kept.has(phase.name) &&
                    !forced.has(phase.name) &&
                    chainPhases.some((other) => kept.has(other.name) && other.dependencies.includes(phase.name))
            )
            .map((phase) => phase.name);

        return {
            workflowId: match.workflowId,
            kept,
            failed,
            reuseSections: !kept.has('article_writing') && !forced.has('article_writing'),
        };
    }

    private chainPhases(): ChainPhase[] {
        return this.phases.getExecutionOrder().flatMap((name) => {
            const phase = this.phases.get(name);
            return phase
                ? [{ name, dependencies: phase.dependencies, checkpoint: phase.checkpoint, critical: phase.critical }]
                : [];
        });
    }

    private createConnectors(): SourceAdapter[] {
        const connectors: SourceAdapter[] = [];
        for (const database of this.config.workflow.databases) {
            const connector = createConnector(database);
            if (connector) {
                connectors.push(connector);
            } else {
                logger.warn({ database }, 'No connector for database, skipping');
            }
        }
        return connectors;
    }

    private createCache(): ResponseCache | null {
        const cache = this.config.workflow.cache;
        if (!cache.enabled) return null;
        return new ResponseCache({ cacheDir: cache.directory, ttlHours: cache.ttlHours, enabled: true });
    }

    private createFulltextSource(): FulltextSource {
        const directory = this.config.workflow.fulltextDir;
        if (!directory) {
            logger.warn('No fulltextDir configured, full-text screening will run in degraded mode');
            return new NoFulltextSource();
        }
        return new DirectoryFulltextSource(directory);
    }

    private openStore(): WorkflowRegistry | null {
        if (this.deps.store !== undefined) return this.deps.store;
        return new WorkflowRegistry(this.config.output.registryPath, this.clock);
    }
}
