import { z } from 'zod';

/**
 * Log level options.
 */
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * LLM providers selectable per agent.
 */
export const PROVIDER_NAMES = ['openai', 'anthropic', 'ollama'] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

/**
 * Agents the workflow calls. A `default` agent entry covers any that are not configured.
 */
export const AGENT_NAMES = [
    'titleAbstractScreener',
    'fulltextScreener',
    'extractor',
    'qualityAssessor',
    'writer',
] as const;
export type AgentName = (typeof AGENT_NAMES)[number];

/**
 * Manuscript sections, in writing order. The abstract is drafted last.
 */
export const WRITING_SECTIONS = ['introduction', 'methods', 'results', 'discussion', 'abstract'] as const;
export type WritingSection = (typeof WRITING_SECTIONS)[number];

// ─── Schemas ──────────────────────────────────────────────

export const TopicConfigSchema = z.object({
    topic: z.string().trim().min(1),
    keywords: z.array(z.string()).default([]),
    domain: z.string().default('general'),
    scope: z.string().default(''),
    researchQuestion: z.string().optional(),
    context: z.string().default(''),
});

export const AgentConfigSchema = z.object({
    role: z.string().min(1),
    goal: z.string().default(''),
    provider: z.enum(PROVIDER_NAMES).default('openai'),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2).default(0.2),
    maxTokens: z.number().int().positive().default(1500),
    tools: z.array(z.string()).default([]),
    /** Overrides `resilience.callTimeoutMs` for this agent */
    timeoutMs: z.number().int().positive().optional(),
    /** Custom endpoint (Ollama server, OpenAI-compatible gateway) */
    baseUrl: z.string().optional(),
});

export const WorkflowConfigSchema = z.object({
    databases: z.array(z.string().min(1)).min(1),
    dateRange: z
        .object({
            start: z.number().int().optional(),
            end: z.number().int().optional(),
        })
        .default({}),
    maxResultsPerDatabase: z.number().int().positive().default(100),
    concurrency: z.number().int().positive().default(4),
    /** Directory of `<sanitized paper id>.txt` full texts */
    fulltextDir: z.string().optional(),
    cache: z
        .object({
            enabled: z.boolean().default(true),
            ttlHours: z.number().positive().default(24),
            directory: z.string().default('.reviewflow-cache'),
        })
        .default({}),
});

export const CriteriaConfigSchema = z.object({
    inclusion: z.array(z.string()),
    exclusion: z.array(z.string()),
});

export const OutputConfigSchema = z.object({
    directory: z.string().default('data/outputs'),
    formats: z.array(z.enum(['markdown', 'json'])).default(['markdown', 'json']),
    checkpointDirectory: z.string().default('data/checkpoints'),
    registryPath: z.string().default('data/workflows.db'),
});

export const KeywordFilterConfigSchema = z.object({
    enabled: z.boolean().default(true),
    exclusionThreshold: z.number().min(0).max(1).default(0.8),
    inclusionThreshold: z.number().min(0).max(1).default(0.75),
    minGroups: z.number().int().nonnegative().default(3),
    groupRatio: z.number().min(0).max(1).default(0.6),
    /** Concept groups: OR within a group, counted across groups */
    searchTerms: z.record(z.array(z.string())).default({}),
    exclusionPhrases: z.array(z.string()).default([]),
});

export const ScreeningConfigSchema = z.object({
    keywordFilter: KeywordFilterConfigSchema.default({}),
    degradedConfidenceFactor: z.number().min(0).max(1).default(0.7),
    minIncludeConfidence: z.number().min(0).max(1).default(0.5),
    fulltextMaxChars: z.number().int().positive().default(8000),
});

export const RetryConfigSchema = z.object({
    maxAttempts: z.number().int().positive().default(3),
    initialDelayMs: z.number().nonnegative().default(1000),
    maxDelayMs: z.number().nonnegative().default(60000),
    backoffBase: z.number().min(1).default(2),
    jitter: z.number().min(0).max(1).default(0.2),
});

export const CircuitBreakerConfigSchema = z.object({
    failureThreshold: z.number().int().positive().default(5),
    successThreshold: z.number().int().positive().default(2),
    cooldownMs: z.number().int().nonnegative().default(60000),
});

export const ResilienceConfigSchema = z.object({
    retry: RetryConfigSchema.default({}),
    circuitBreaker: CircuitBreakerConfigSchema.default({}),
    callTimeoutMs: z.number().int().positive().default(120000),
});

export const WritingConfigSchema = z.object({
    maxSectionAttempts: z.number().int().positive().default(3),
    wordLimit: z.number().int().positive().optional(),
});

export const ExtractionConfigSchema = z.object({
    /** Domain-specific fields: name → description shown to the extractor */
    fields: z.record(z.string()).default({}),
});

export const ReviewConfigSchema = z.object({
    topic: TopicConfigSchema,
    agents: z.record(AgentConfigSchema),
    workflow: WorkflowConfigSchema,
    criteria: CriteriaConfigSchema,
    output: OutputConfigSchema,
    screening: ScreeningConfigSchema.default({}),
    resilience: ResilienceConfigSchema.default({}),
    writing: WritingConfigSchema.default({}),
    extraction: ExtractionConfigSchema.default({}),
});

// ─── Types ────────────────────────────────────────────────

export type TopicConfig = z.output<typeof TopicConfigSchema>;
export type AgentConfig = z.output<typeof AgentConfigSchema>;
export type WorkflowConfig = z.output<typeof WorkflowConfigSchema>;
export type CriteriaConfig = z.output<typeof CriteriaConfigSchema>;
export type OutputConfig = z.output<typeof OutputConfigSchema>;
export type KeywordFilterConfig = z.output<typeof KeywordFilterConfigSchema>;
export type ScreeningConfig = z.output<typeof ScreeningConfigSchema>;
export type RetryConfig = z.output<typeof RetryConfigSchema>;
export type CircuitBreakerConfig = z.output<typeof CircuitBreakerConfigSchema>;
export type ResilienceConfig = z.output<typeof ResilienceConfigSchema>;
export type WritingConfig = z.output<typeof WritingConfigSchema>;
export type ReviewConfig = z.output<typeof ReviewConfigSchema>;
export type ReviewConfigInput = z.input<typeof ReviewConfigSchema>;

/**
 * Command-line run options, layered on top of the file configuration.
 */
export interface RunOptions {
    resume: boolean;
    resumeFrom?: string;
    dryRun: boolean;
    quickSearch: boolean;
    logLevel: LogLevel;
    jsonLogs: boolean;
}

export const DEFAULT_RUN_OPTIONS: RunOptions = {
    resume: false,
    dryRun: false,
    quickSearch: false,
    logLevel: 'info',
    jsonLogs: false,
};

/** Per-database cap applied by `--quick-search` */
export const QUICK_SEARCH_LIMIT = 10;

export type WorkflowStatus = 'running' | 'completed' | 'failed';

/**
 * Workflow metadata stored in the SQLite `workflows` table.
 */
export interface WorkflowRecord {
    workflow_id: string;
    topic: string;
    config_hash: string;
    checkpoint_dir: string;
    status: WorkflowStatus;
    created_at: string;
    updated_at: string;
    heartbeat_at: string;
}
