import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import {
    InclusionDecision,
    SCREENING_STAGES,
    type Paper,
    type ScreeningStage,
    type StageOutcome,
} from '../types/index.js';

export interface AdjudicationEntry {
    paper_id: string;
    title: string;
    stage: ScreeningStage;
    decision: InclusionDecision;
    confidence: number;
    reasoning: string;
}

export interface AdjudicationQueue {
    export_timestamp: string;
    summary: {
        total_uncertain: number;
        by_stage: Record<ScreeningStage, number>;
    };
    stages: Record<ScreeningStage, AdjudicationEntry[]>;
    instructions: string;
}

const INSTRUCTIONS =
    'Review each paper and record a final include or exclude decision. ' +
    'Uncertain papers were not carried into later phases.';

/**
 * Collect every UNCERTAIN result of the given stage outcomes.
 */
export function buildAdjudicationQueue(
    outcomes: readonly StageOutcome[],
    papers: ReadonlyMap<string, Paper>,
    now: Date = new Date()
): AdjudicationQueue {
    const stages: Record<ScreeningStage, AdjudicationEntry[]> = { title_abstract: [], fulltext: [] };

    for (const outcome of outcomes) {
        for (const result of outcome.results) {
            if (result.decision !== InclusionDecision.UNCERTAIN) continue;
            stages[outcome.stage].push({
                paper_id: result.paper_id,
                title: papers.get(result.paper_id)?.title ?? '',
                stage: result.stage,
                decision: result.decision,
                confidence: result.confidence,
                reasoning: result.reasoning,
            });
        }
    }

    const byStage: Record<ScreeningStage, number> = { title_abstract: 0, fulltext: 0 };
    for (const stage of SCREENING_STAGES) byStage[stage] = stages[stage].length;

    return {
        export_timestamp: now.toISOString(),
        summary: {
            total_uncertain: byStage.title_abstract + byStage.fulltext,
            by_stage: byStage,
        },
        stages,
        instructions: INSTRUCTIONS,
    };
}

/**
 * Write the queue as `adjudication_queue.json`. Returns the path.
 */
export function writeAdjudicationQueue(queue: AdjudicationQueue, path: string): string {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(queue, null, 2), 'utf-8');
    return path;
}
