import { z } from 'zod';
import { extractMarkers } from '../llm/text-markers.js';
import { failure, ok, type ParseFailure, type Result } from '../llm/result.js';
import type { FallbackReason, StructuredOutcome } from '../llm/resilient-client.js';
import {
    InclusionDecision,
    type DecisionSource,
    type Paper,
    type ScreeningResult,
    type ScreeningStage,
} from '../types/index.js';

export const SCREENING_MARKERS = ['DECISION', 'CONFIDENCE', 'REASONING', 'EXCLUSION_REASON'] as const;

const NULLISH_TEXT = new Set(['', 'none', 'null', 'n/a', 'na', '-']);
const NO_REASONING = 'No reasoning provided';

/**
 * JSON shape requested from screening agents. An out-of-range confidence is
 * clamped and a missing reasoning is filled in rather than retried.
 */
export const ScreeningResponseSchema = z.object({
    decision: z.preprocess(
        (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
        z.nativeEnum(InclusionDecision)
    ),
    confidence: z.number().transform(clampConfidence),
    reasoning: z.preprocess(
        (value) =>
            value === undefined || value === null || (typeof value === 'string' && value.trim() === '')
                ? NO_REASONING
                : value,
        z.string().trim()
    ),
    exclusion_reason: z.string().nullable().optional(),
});

export type ScreeningResponse = z.output<typeof ScreeningResponseSchema>;

/**
 * Parse a `DECISION: / CONFIDENCE: / REASONING: / EXCLUSION_REASON:` answer.
 * Missing markers default to uncertain at 0.5; a response with no marker at
 * all is unparseable.
 */
export function parseScreeningText(text: string): Result<ScreeningResponse, ParseFailure> {
    const markers = extractMarkers(text, SCREENING_MARKERS);
    if (markers.size === 0) {
        return failure('unparseable_text', 'No DECISION, CONFIDENCE or REASONING markers found');
    }

    const exclusion = markers.get('EXCLUSION_REASON');
    return ok({
        decision: parseDecision(markers.get('DECISION')),
        confidence: parseConfidence(markers.get('CONFIDENCE')),
        reasoning: markers.get('REASONING') ?? NO_REASONING,
        exclusion_reason: exclusion !== undefined && !NULLISH_TEXT.has(exclusion.toLowerCase()) ? exclusion : null,
    });
}

function parseDecision(value: string | undefined): InclusionDecision {
    const match = value?.toLowerCase().match(/\b(include|exclude|uncertain)/);
    switch (match?.[1]) {
        case 'include':
            return InclusionDecision.INCLUDE;
        case 'exclude':
            return InclusionDecision.EXCLUDE;
        default:
            return InclusionDecision.UNCERTAIN;
    }
}

function parseConfidence(value: string | undefined): number {
    const match = value?.match(/-?\d+(?:\.\d+)?/);
    if (!match) return 0.5;
    return clampConfidence(parseFloat(match[0]));
}

export function clampConfidence(value: number): number {
    if (Number.isNaN(value)) return 0;
    return Math.min(1, Math.max(0, value));
}

/**
 * Synthetic verdict for when every attempt failed or the breaker is open.
 */
export function screeningFallback(reason: FallbackReason): ScreeningResponse {
    return {
        decision: InclusionDecision.UNCERTAIN,
        confidence: 0.0,
        reasoning:
            reason.kind === 'unavailable'
                ? 'LLM service unavailable (circuit open). Manual adjudication required.'
                : 'Automated screening failed due to structured-output parsing errors. Manual adjudication required.',
        exclusion_reason: null,
    };
}

const SOURCE_BY_OUTCOME: Record<StructuredOutcome<ScreeningResponse>['source'], DecisionSource> = {
    schema: 'llm_schema',
    text: 'llm_text',
    fallback: 'fallback',
    circuit_open: 'circuit_open',
};

export function toScreeningResult(
    paper: Paper,
    stage: ScreeningStage,
    outcome: StructuredOutcome<ScreeningResponse>
): ScreeningResult {
    const { value } = outcome;
    return {
        paper_id: paper.id,
        stage,
        decision: value.decision,
        confidence: clampConfidence(value.confidence),
        reasoning: value.reasoning,
        exclusion_reason: value.decision === InclusionDecision.EXCLUDE ? value.exclusion_reason ?? null : null,
        source: SOURCE_BY_OUTCOME[outcome.source],
    };
}
