/**
 * Barrel export for all shared types.
 */
export type { Paper } from './paper.js';
export { makePaperId } from './paper.js';
export { InclusionDecision, SCREENING_STAGES } from './screening.js';
export type { ScreeningStage, ScreeningResult, StageOutcome, DecisionSource } from './screening.js';
export type { ExtractedData, QualityAssessment, QualityRating } from './extraction.js';
export type { TopicContextSnapshot, AgentKind } from './topic.js';
export { PRISMA_COUNT_KEYS } from './prisma.js';
export type { PrismaCountKey, PrismaCounts } from './prisma.js';
export {
    LOG_LEVELS,
    PROVIDER_NAMES,
    AGENT_NAMES,
    WRITING_SECTIONS,
    DEFAULT_RUN_OPTIONS,
    QUICK_SEARCH_LIMIT,
    ReviewConfigSchema,
} from './config.js';
export type {
    LogLevel,
    ProviderName,
    AgentName,
    WritingSection,
    TopicConfig,
    AgentConfig,
    WorkflowConfig,
    CriteriaConfig,
    OutputConfig,
    KeywordFilterConfig,
    ScreeningConfig,
    RetryConfig,
    CircuitBreakerConfig,
    ResilienceConfig,
    WritingConfig,
    ReviewConfig,
    ReviewConfigInput,
    RunOptions,
    WorkflowStatus,
    WorkflowRecord,
} from './config.js';
export { CHECKPOINT_SCHEMA_VERSION, CheckpointRecordSchema, PhasePayloadSchema } from './checkpoint.js';
export type { CheckpointRecord, PhasePayload, PhasePayloadKind } from './checkpoint.js';
export type { SourceAdapter, SourceAdapterOptions, SearchParams } from './source-adapter.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
