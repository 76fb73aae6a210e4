import type { TopicContext } from '../orchestration/topic-context.js';
import type { CriteriaConfig, Paper } from '../types/index.js';

const JSON_SCHEMA_BLOCK = [
    'Return ONLY valid JSON matching this exact schema:',
    '{"decision": "include|exclude|uncertain", "confidence": 0.0, "reasoning": "...", "exclusion_reason": "... or null"}',
    'confidence is a number between 0.0 and 1.0.',
].join('\n');

const TEXT_FORMAT_BLOCK = [
    'Answer using exactly these four lines:',
    'DECISION: include, exclude or uncertain',
    'CONFIDENCE: a number between 0.0 and 1.0',
    'REASONING: one or two sentences',
    'EXCLUSION_REASON: the criterion violated, or none',
].join('\n');

export type ResponseFormat = 'json' | 'text';

interface ScreeningPromptInput {
    role: string;
    topic: TopicContext;
    criteria: CriteriaConfig;
    paper: Paper;
    fullText?: string;
}

function criteriaBlock(criteria: CriteriaConfig): string {
    const list = (items: readonly string[]): string =>
        items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : '- (none)';
    return `Inclusion criteria:\n${list(criteria.inclusion)}\n\nExclusion criteria:\n${list(criteria.exclusion)}`;
}

function paperBlock(paper: Paper, fullText?: string): string {
    const lines = [
        `Paper ID: ${paper.id}`,
        `Title: ${paper.title || '(missing)'}`,
        `Authors: ${paper.authors.join(', ') || 'unknown'}`,
        `Year: ${paper.year ?? 'unknown'}`,
        `Abstract: ${paper.abstract ?? '(missing)'}`,
    ];
    if (fullText !== undefined) lines.push('', `Full text (truncated):\n${fullText}`);
    return lines.join('\n');
}

/**
 * Screening prompt. The JSON variant is the primary request; the text variant
 * is the marker-based fallback.
 */
export function buildScreeningPrompt(input: ScreeningPromptInput, format: ResponseFormat): string {
    const stage = input.fullText === undefined ? 'title and abstract' : 'full text';
    return [
        `You are ${input.role}. Screen this paper at the ${stage} stage of a systematic review.`,
        input.topic.forAgent('screening'),
        criteriaBlock(input.criteria),
        paperBlock(input.paper, input.fullText),
        'Use "uncertain" when the available information is not enough to decide.',
        format === 'json' ? JSON_SCHEMA_BLOCK : TEXT_FORMAT_BLOCK,
    ].join('\n\n');
}
