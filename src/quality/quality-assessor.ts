import pLimit from 'p-limit';
import { z } from 'zod';
import type { ResilientLlmClient } from '../llm/resilient-client.js';
import type { TopicContext } from '../orchestration/topic-context.js';
import type { ExtractedData, QualityAssessment } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export const QualityResponseSchema = z.object({
    rating: z.preprocess(
        (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
        z.enum(['high', 'moderate', 'low', 'unclear'])
    ),
    score: z.number().min(0).max(1),
    rationale: z.string().trim().min(1),
});

/**
 * Study quality appraisal over the extracted data of each included paper.
 */
export class QualityAssessor {
    constructor(
        private readonly client: ResilientLlmClient,
        private readonly topic: TopicContext,
        private readonly concurrency: number
    ) {}

    async assessAll(extracted: readonly ExtractedData[], signal?: AbortSignal): Promise<QualityAssessment[]> {
        const limit = pLimit(this.concurrency);
        const assessments = await Promise.all(extracted.map((item) => limit(() => this.assess(item, signal))));

        const byRating = assessments.reduce<Record<string, number>>((acc, assessment) => {
            acc[assessment.rating] = (acc[assessment.rating] ?? 0) + 1;
            return acc;
        }, {});
        logger.info({ papers: extracted.length, byRating }, 'Quality assessment complete');
        return assessments;
    }

    async assess(data: ExtractedData, signal?: AbortSignal): Promise<QualityAssessment> {
        signal?.throwIfAborted();
        const outcome = await this.client.callStructured({
            prompt: this.buildPrompt(data),
            schema: QualityResponseSchema,
            fallback: (reason) => ({
                rating: 'unclear' as const,
                score: 0,
                rationale:
                    reason.kind === 'unavailable'
                        ? 'Quality assessment skipped: LLM service unavailable'
                        : 'Quality assessment failed: no valid response',
            }),
            signal,
        });

        const failed = outcome.source === 'fallback' || outcome.source === 'circuit_open';
        return { paper_id: data.paper_id, ...outcome.value, status: failed ? 'failed' : 'complete' };
    }

    private buildPrompt(data: ExtractedData): string {
        const field = (label: string, value: string | null): string => `${label}: ${value ?? 'not reported'}`;
        return [
            `You are ${this.client.identity.role}. Appraise the methodological quality of this study.`,
            this.topic.forAgent('quality'),
            [
                `Title: ${data.title}`,
                field('Study design', data.study_design),
                field('Methodology', data.methodology),
                field('Participants', data.participants),
                field('Outcomes', data.outcomes),
                field('Limitations', data.limitations),
            ].join('\n'),
            [
                'Return ONLY valid JSON:',
                '{"rating": "high|moderate|low|unclear", "score": 0.0, "rationale": "..."}',
                'score is a number between 0.0 and 1.0.',
            ].join('\n'),
        ].join('\n\n');
    }
}
