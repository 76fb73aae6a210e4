import { InclusionDecision, type Paper, type ScreeningConfig, type ScreeningResult } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { buildScreeningPrompt } from './prompts.js';
import {
    clampConfidence,
    parseScreeningText,
    screeningFallback,
    ScreeningResponseSchema,
    toScreeningResult,
} from './response.js';
import type { ScreenerDeps } from './title-abstract-screener.js';

const logger = getLogger();

export const DEGRADED_PREFIX = 'DEGRADED MODE: full-text unavailable';

/**
 * Full-text screening. Without a full text the title/abstract verdict is
 * carried forward at reduced confidence.
 */
export class FulltextScreener {
    constructor(
        private readonly deps: ScreenerDeps,
        private readonly config: ScreeningConfig
    ) {}

    async screen(
        paper: Paper,
        fullText: string | null,
        previous: ScreeningResult | undefined,
        signal?: AbortSignal
    ): Promise<ScreeningResult> {
        if (fullText === null || fullText.trim() === '') {
            return this.degraded(paper, previous);
        }

        const input = {
            role: this.deps.client.identity.role,
            topic: this.deps.topic,
            criteria: this.deps.criteria,
            paper,
            fullText: fullText.slice(0, this.config.fulltextMaxChars),
        };
        const outcome = await this.deps.client.callStructured({
            prompt: buildScreeningPrompt(input, 'json'),
            schema: ScreeningResponseSchema,
            textFallback: { prompt: buildScreeningPrompt(input, 'text'), parse: parseScreeningText },
            fallback: screeningFallback,
            signal,
        });

        return toScreeningResult(paper, 'fulltext', outcome);
    }

    /**
     * Reuse the title/abstract decision with confidence scaled by
     * `degradedConfidenceFactor`. A weak include is demoted to uncertain.
     */
    degraded(paper: Paper, previous: ScreeningResult | undefined): ScreeningResult {
        if (!previous) {
            return {
                paper_id: paper.id,
                stage: 'fulltext',
                decision: InclusionDecision.UNCERTAIN,
                confidence: 0.3,
                reasoning: `${DEGRADED_PREFIX}; no title/abstract decision to reuse`,
                exclusion_reason: null,
                source: 'degraded',
            };
        }

        const confidence = clampConfidence(previous.confidence * this.config.degradedConfidenceFactor);
        const demoted =
            previous.decision === InclusionDecision.INCLUDE && confidence < this.config.minIncludeConfidence;
        const decision = demoted ? InclusionDecision.UNCERTAIN : previous.decision;

        logger.debug({ paperId: paper.id, decision, confidence }, 'Full text unavailable, reusing title/abstract decision');

        return {
            paper_id: paper.id,
            stage: 'fulltext',
            decision,
            confidence,
            reasoning: `${DEGRADED_PREFIX}. ${previous.reasoning}`,
            exclusion_reason: decision === InclusionDecision.EXCLUDE ? previous.exclusion_reason : null,
            source: 'degraded',
        };
    }
}
