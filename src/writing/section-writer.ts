import type { ResilientLlmClient } from '../llm/resilient-client.js';
import { failure, ok, type ParseFailure, type Result } from '../llm/result.js';
import type { TopicContext } from '../orchestration/topic-context.js';
import type {
    CriteriaConfig,
    ExtractedData,
    Paper,
    PrismaCounts,
    QualityAssessment,
    WritingConfig,
    WritingSection,
} from '../types/index.js';
import { SectionWriteError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const PREVIOUS_SECTION_CHARS = 1500;

/**
 * Everything a section prompt may draw on.
 */
export interface WritingInputs {
    topic: TopicContext;
    criteria: CriteriaConfig;
    counts: PrismaCounts;
    searchSummary: string;
    papers: readonly Paper[];
    extracted: readonly ExtractedData[];
    assessments: readonly QualityAssessment[] | null;
}

const SECTION_BRIEFS: Record<WritingSection, string> = {
    introduction:
        'Write the introduction: background, why the research question matters, the gap this review addresses and its objective.',
    methods:
        'Write the methods section following PRISMA 2020: search strategy, databases, eligibility criteria, screening process, data extraction and quality appraisal.',
    results:
        'Write the results section: study selection (cite the PRISMA counts), study characteristics and a synthesis of findings across the included studies.',
    discussion:
        'Write the discussion: principal findings, comparison with prior work, strengths and limitations of the evidence and of this review, and implications.',
    abstract:
        'Write a structured abstract (Background, Methods, Results, Conclusions) summarizing the sections below.',
};

/**
 * Drafts one manuscript section per call, retried up to
 * `writing.maxSectionAttempts` times.
 */
export class SectionWriter {
    constructor(
        private readonly client: ResilientLlmClient,
        private readonly config: WritingConfig
    ) {}

    /**
     * @param previous - sections already written, shown to the abstract writer
     * @throws SectionWriteError when every attempt failed
     */
    async write(
        section: WritingSection,
        inputs: WritingInputs,
        previous: Partial<Record<WritingSection, string>>,
        signal?: AbortSignal
    ): Promise<string> {
        const prompt = this.buildPrompt(section, inputs, previous);
        const attempts = this.config.maxSectionAttempts;

        logger.info({ section, attempts }, 'Writing section');
        const result = await this.client.callText(prompt, {
            signal,
            maxAttempts: attempts,
            validate: (text) => validateSection(section, text),
        });

        if (!result.ok) {
            throw new SectionWriteError(section, attempts, `${result.error.kind}: ${result.error.message}`);
        }
        logger.info({ section, words: result.value.split(/\s+/).length }, 'Section written');
        return result.value;
    }

    buildPrompt(
        section: WritingSection,
        inputs: WritingInputs,
        previous: Partial<Record<WritingSection, string>>
    ): string {
        const blocks = [
            `You are ${this.client.identity.role}. ${SECTION_BRIEFS[section]}`,
            inputs.topic.forAgent('writing'),
            prismaBlock(inputs.counts),
        ];

        if (section === 'methods') {
            blocks.push(
                `Search strategy:\n${inputs.searchSummary}`,
                `Inclusion criteria:\n${inputs.criteria.inclusion.map((c) => `- ${c}`).join('\n')}`,
                `Exclusion criteria:\n${inputs.criteria.exclusion.map((c) => `- ${c}`).join('\n')}`
            );
        }

        if (section === 'results' || section === 'discussion') {
            blocks.push(`Extracted data:\n${summarizeExtraction(inputs.extracted, inputs.assessments)}`);
        }

        if (section === 'abstract') {
            const drafted = (['introduction', 'methods', 'results', 'discussion'] as const)
                .map((name) => {
                    const text = previous[name];
                    return text ? `### ${name}\n${text.slice(0, PREVIOUS_SECTION_CHARS)}` : null;
                })
                .filter((block): block is string => block !== null);
            if (drafted.length > 0) blocks.push(`Sections written so far:\n${drafted.join('\n\n')}`);
        }

        if (section !== 'abstract' && section !== 'methods') {
            blocks.push(`Citable studies (cite with the bracketed key, e.g. [@key]):\n${citationCatalog(inputs.papers)}`);
        }

        const limit = this.config.wordLimit && section === 'abstract' ? ` Keep it under ${this.config.wordLimit} words.` : '';
        blocks.push(`Return only the section body in Markdown, without the section heading.${limit}`);
        return blocks.join('\n\n');
    }
}

/**
 * Reject empty output and strip a leading heading naming the section.
 */
export function validateSection(section: WritingSection, text: string): Result<string, ParseFailure> {
    const body = text.replace(new RegExp(`^#{1,6}\\s*${section}\\s*\\n+`, 'i'), '').trim();
    if (body === '') return failure('empty', `Empty ${section} section`);
    return ok(body);
}

function prismaBlock(counts: PrismaCounts): string {
    const line = (label: string, value: number | undefined): string => `- ${label}: ${value ?? 'not reported'}`;
    return [
        'PRISMA counts:',
        line('Records identified', counts.found),
        line('Records after duplicates removed', counts.no_dupes),
        line('Records screened', counts.screened),
        line('Records excluded at screening', counts.screen_exclusions),
        line('Full-text reports assessed', counts.full_text_assessed),
        line('Studies included', counts.qualitative),
    ].join('\n');
}

function summarizeExtraction(
    extracted: readonly ExtractedData[],
    assessments: readonly QualityAssessment[] | null
): string {
    if (extracted.length === 0) return '(no studies included)';
    const quality = new Map((assessments ?? []).map((a) => [a.paper_id, a.rating]));
    return extracted
        .map((item) => {
            const parts = [
                `[@${item.paper_id}] ${item.title}`,
                item.study_design ? `  design: ${item.study_design}` : null,
                item.participants ? `  participants: ${item.participants}` : null,
                item.outcomes ? `  outcomes: ${item.outcomes}` : null,
                item.key_findings.length > 0 ? `  findings: ${item.key_findings.join('; ')}` : null,
                quality.has(item.paper_id) ? `  quality: ${quality.get(item.paper_id)}` : null,
            ];
            return parts.filter((part): part is string => part !== null).join('\n');
        })
        .join('\n');
}

function citationCatalog(papers: readonly Paper[]): string {
    if (papers.length === 0) return '(none)';
    return papers
        .map((paper) => `[@${paper.id}] ${paper.authors[0] ?? 'Unknown'} (${paper.year ?? 'n.d.'}). ${paper.title}`)
        .join('\n');
}
