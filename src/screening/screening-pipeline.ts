import pLimit from 'p-limit';
import {
    InclusionDecision,
    type Paper,
    type ScreeningResult,
    type ScreeningStage,
    type StageOutcome,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Single collector for one stage. Tasks finish in any order; routing happens
 * here so every result lands in exactly one bucket.
 */
export class StageAggregator {
    private readonly results = new Map<string, ScreeningResult>();

    constructor(
        readonly stage: ScreeningStage,
        private readonly order: readonly string[]
    ) {}

    add(result: ScreeningResult): void {
        if (result.stage !== this.stage) {
            throw new Error(`Result for stage ${result.stage} added to ${this.stage} aggregator`);
        }
        this.results.set(result.paper_id, result);
    }

    get size(): number {
        return this.results.size;
    }

    /**
     * Results in input order, routed by decision. Uncertain papers are never included.
     */
    toOutcome(): StageOutcome {
        const outcome: StageOutcome = { stage: this.stage, results: [], included: [], excluded: [], uncertain: [] };
        for (const paperId of this.order) {
            const result = this.results.get(paperId);
            if (!result) continue;
            outcome.results.push(result);
            switch (result.decision) {
                case InclusionDecision.INCLUDE:
                    outcome.included.push(paperId);
                    break;
                case InclusionDecision.EXCLUDE:
                    outcome.excluded.push(paperId);
                    break;
                case InclusionDecision.UNCERTAIN:
                    outcome.uncertain.push(paperId);
                    break;
            }
        }
        return outcome;
    }
}

export interface StageRunOptions {
    stage: ScreeningStage;
    concurrency: number;
    signal?: AbortSignal;
    /** Called after each paper, for progress logging */
    onProgress?: (done: number, total: number) => void;
}

/**
 * Screen every paper with bounded concurrency.
 */
export async function runScreeningStage(
    papers: readonly Paper[],
    screenOne: (paper: Paper, signal?: AbortSignal) => Promise<ScreeningResult>,
    options: StageRunOptions
): Promise<StageOutcome> {
    const limit = pLimit(options.concurrency);
    const aggregator = new StageAggregator(options.stage, papers.map((paper) => paper.id));

    logger.info({ stage: options.stage, papers: papers.length, concurrency: options.concurrency }, 'Screening started');

    await Promise.all(
        papers.map((paper) =>
            limit(async () => {
                options.signal?.throwIfAborted();
                aggregator.add(await screenOne(paper, options.signal));
                options.onProgress?.(aggregator.size, papers.length);
            })
        )
    );

    const outcome = aggregator.toOutcome();
    logger.info(
        {
            stage: options.stage,
            included: outcome.included.length,
            excluded: outcome.excluded.length,
            uncertain: outcome.uncertain.length,
        },
        'Screening completed'
    );
    return outcome;
}
