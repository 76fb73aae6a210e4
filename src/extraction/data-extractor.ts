import pLimit from 'p-limit';
import { z } from 'zod';
import type { ResilientLlmClient } from '../llm/resilient-client.js';
import type { TopicContext } from '../orchestration/topic-context.js';
import type { FulltextSource } from '../screening/fulltext-source.js';
import type { ExtractedData, Paper } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const nullableText = z
    .string()
    .nullish()
    .transform((value) => (value && value.trim() !== '' ? value.trim() : null));

export const ExtractionResponseSchema = z.object({
    objectives: nullableText,
    methodology: nullableText,
    study_design: nullableText,
    participants: nullableText,
    outcomes: nullableText,
    key_findings: z.array(z.string()).default([]),
    limitations: nullableText,
    domain_fields: z.record(z.string()).default({}),
});

export type ExtractionResponse = z.output<typeof ExtractionResponseSchema>;

export interface DataExtractorOptions {
    client: ResilientLlmClient;
    topic: TopicContext;
    fulltext: FulltextSource;
    /** Review-specific fields: name → description */
    fields: Readonly<Record<string, string>>;
    maxChars: number;
    concurrency: number;
}

/**
 * Structured data extraction for included papers. A paper whose extraction
 * fails is kept with `status: 'failed'` and null fields.
 */
export class DataExtractor {
    constructor(private readonly options: DataExtractorOptions) {}

    async extractAll(papers: readonly Paper[], signal?: AbortSignal): Promise<ExtractedData[]> {
        const limit = pLimit(this.options.concurrency);
        const results = await Promise.all(papers.map((paper) => limit(() => this.extract(paper, signal))));

        const failed = results.filter((item) => item.status === 'failed').length;
        logger.info({ papers: papers.length, failed }, 'Data extraction complete');
        return results;
    }

    async extract(paper: Paper, signal?: AbortSignal): Promise<ExtractedData> {
        signal?.throwIfAborted();
        const fullText = await this.options.fulltext.load(paper.id);

        const outcome = await this.options.client.callStructured({
            prompt: this.buildPrompt(paper, fullText),
            schema: ExtractionResponseSchema,
            fallback: emptyExtraction,
            signal,
        });

        const failed = outcome.source === 'fallback' || outcome.source === 'circuit_open';
        return {
            paper_id: paper.id,
            title: paper.title,
            ...outcome.value,
            status: failed ? 'failed' : 'complete',
        };
    }

    private buildPrompt(paper: Paper, fullText: string | null): string {
        const fieldLines = Object.entries(this.options.fields).map(([name, description]) => `- ${name}: ${description}`);
        const source = fullText
            ? `Full text (truncated):\n${fullText.slice(0, this.options.maxChars)}`
            : `Abstract: ${paper.abstract ?? '(missing)'}`;

        return [
            `You are ${this.options.client.identity.role}. Extract structured data from this study.`,
            this.options.topic.forAgent('extraction'),
            `Title: ${paper.title}\nAuthors: ${paper.authors.join(', ') || 'unknown'}\nYear: ${paper.year ?? 'unknown'}`,
            source,
            fieldLines.length > 0 ? `Also fill domain_fields with:\n${fieldLines.join('\n')}` : 'Leave domain_fields empty.',
            [
                'Return ONLY valid JSON with these keys:',
                '{"objectives": "...", "methodology": "...", "study_design": "...", "participants": "...",',
                ' "outcomes": "...", "key_findings": ["..."], "limitations": "...", "domain_fields": {}}',
                'Use null for anything the paper does not report.',
            ].join('\n'),
        ].join('\n\n');
    }
}

function emptyExtraction(): ExtractionResponse {
    return {
        objectives: null,
        methodology: null,
        study_design: null,
        participants: null,
        outcomes: null,
        key_findings: [],
        limitations: null,
        domain_fields: {},
    };
}
