import type { ResilientLlmClient } from '../llm/resilient-client.js';
import type { TopicContext } from '../orchestration/topic-context.js';
import { InclusionDecision, type CriteriaConfig, type Paper, type ScreeningResult } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import type { KeywordFilter } from './keyword-filter.js';
import { buildScreeningPrompt } from './prompts.js';
import {
    parseScreeningText,
    screeningFallback,
    ScreeningResponseSchema,
    toScreeningResult,
} from './response.js';

const logger = getLogger();

export interface ScreenerDeps {
    client: ResilientLlmClient;
    topic: TopicContext;
    criteria: CriteriaConfig;
}

/**
 * Title/abstract screening: a rule for empty records, then the keyword
 * filter, then the LLM for everything the filter could not decide.
 */
export class TitleAbstractScreener {
    constructor(
        private readonly deps: ScreenerDeps,
        private readonly keywordFilter: KeywordFilter | null
    ) {}

    async screen(paper: Paper, signal?: AbortSignal): Promise<ScreeningResult> {
        const title = paper.title.trim();
        const abstract = paper.abstract?.trim() ?? '';

        if (!title && !abstract) {
            logger.warn({ paperId: paper.id }, 'Paper has no title or abstract, marking uncertain');
            return {
                paper_id: paper.id,
                stage: 'title_abstract',
                decision: InclusionDecision.UNCERTAIN,
                confidence: 0.3,
                reasoning: 'Paper has no title or abstract available for screening',
                exclusion_reason: null,
                source: 'rule',
            };
        }

        if (this.keywordFilter) {
            const verdict = this.keywordFilter.evaluate(title, abstract);
            if (verdict.kind !== 'needs_llm') {
                logger.debug({ paperId: paper.id, decision: verdict.decision }, 'Decided by keyword filter');
                return {
                    paper_id: paper.id,
                    stage: 'title_abstract',
                    decision: verdict.decision,
                    confidence: verdict.confidence,
                    reasoning: verdict.reasoning,
                    exclusion_reason: verdict.kind === 'exclude' ? verdict.matchedPhrases.join(', ') : null,
                    source: 'keyword_filter',
                };
            }
        }

        const input = {
            role: this.deps.client.identity.role,
            topic: this.deps.topic,
            criteria: this.deps.criteria,
            paper,
        };
        const outcome = await this.deps.client.callStructured({
            prompt: buildScreeningPrompt(input, 'json'),
            schema: ScreeningResponseSchema,
            textFallback: { prompt: buildScreeningPrompt(input, 'text'), parse: parseScreeningText },
            fallback: screeningFallback,
            signal,
        });

        return toScreeningResult(paper, 'title_abstract', outcome);
    }
}
