import type { AgentKind, ExtractedData, TopicConfig, TopicContextSnapshot } from '../types/index.js';
import { researchQuestionOf } from '../utils/config.js';

const MAX_FINDINGS = 10;
const MAX_INSIGHTS = 10;

/**
 * Review topic threaded through every agent prompt.
 *
 * Created once per run and enriched by phases as they complete (insights
 * from screening, findings from extraction). Serialized into every checkpoint.
 */
export class TopicContext {
    readonly topic: string;
    readonly keywords: readonly string[];
    readonly domain: string;
    readonly scope: string;
    readonly researchQuestion: string;
    readonly context: string;
    private insights: string[] = [];
    private findings: string[] = [];
    private extractedDataSummary: string | null = null;

    constructor(fields: {
        topic: string;
        keywords: readonly string[];
        domain: string;
        scope: string;
        researchQuestion: string;
        context: string;
    }) {
        this.topic = fields.topic;
        this.keywords = fields.keywords;
        this.domain = fields.domain || 'general';
        this.scope = fields.scope;
        this.researchQuestion = fields.researchQuestion || fields.topic;
        this.context = fields.context;
    }

    static fromConfig(topic: TopicConfig): TopicContext {
        return new TopicContext({
            topic: topic.topic,
            keywords: topic.keywords,
            domain: topic.domain,
            scope: topic.scope,
            researchQuestion: researchQuestionOf(topic),
            context: topic.context,
        });
    }

    static fromSnapshot(snapshot: TopicContextSnapshot): TopicContext {
        const context = new TopicContext({
            topic: snapshot.topic,
            keywords: snapshot.keywords,
            domain: snapshot.domain,
            scope: snapshot.scope,
            researchQuestion: snapshot.research_question,
            context: snapshot.context,
        });
        context.insights = [...snapshot.insights];
        context.findings = [...snapshot.findings];
        context.extractedDataSummary = snapshot.extracted_data_summary;
        return context;
    }

    /**
     * Add insights learned by a phase (deduplicated).
     */
    enrich(insights: readonly string[]): void {
        for (const insight of insights) {
            if (!this.insights.includes(insight)) this.insights.push(insight);
        }
    }

    /**
     * Fold extracted data into the findings list, keeping the most recent ten.
     */
    accumulateFindings(extracted: readonly ExtractedData[]): void {
        const summaries = extracted
            .filter((item) => item.key_findings.length > 0)
            .map((item) => `${item.title}: ${item.key_findings.slice(0, 2).join(', ')}`);

        this.findings = [...this.findings, ...summaries].slice(-MAX_FINDINGS);
        if (summaries.length > 0) {
            this.extractedDataSummary = summaries.slice(0, MAX_FINDINGS).join('\n');
        }
    }

    getInsights(): readonly string[] {
        return this.insights;
    }

    getFindings(): readonly string[] {
        return this.findings;
    }

    getExtractedDataSummary(): string | null {
        return this.extractedDataSummary;
    }

    /**
     * Render the context block prepended to an agent's prompt.
     * Writers also see insights and findings; extractors see the free-text context.
     */
    forAgent(kind: AgentKind): string {
        const lines = [
            `Topic: ${this.topic}`,
            `Domain: ${this.domain}`,
            `Research question: ${this.researchQuestion}`,
        ];
        if (this.scope) lines.push(`Scope: ${this.scope}`);
        if (this.keywords.length > 0) lines.push(`Keywords: ${this.keywords.join(', ')}`);

        if (kind === 'extraction' && this.context) {
            lines.push(`Domain context: ${this.context}`);
        }

        if (kind === 'writing') {
            const insights = this.insights.slice(-MAX_INSIGHTS);
            if (insights.length > 0) {
                lines.push('Insights:', ...insights.map((insight) => `- ${insight}`));
            }
            if (this.extractedDataSummary) {
                lines.push('Findings summary:', this.extractedDataSummary);
            }
        }

        return lines.join('\n');
    }

    toSnapshot(): TopicContextSnapshot {
        return {
            topic: this.topic,
            keywords: [...this.keywords],
            domain: this.domain,
            scope: this.scope,
            research_question: this.researchQuestion,
            context: this.context,
            insights: [...this.insights],
            findings: [...this.findings],
            extracted_data_summary: this.extractedDataSummary,
        };
    }
}
