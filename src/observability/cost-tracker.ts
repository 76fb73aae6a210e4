import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const PricingTableSchema = z.record(
    z.record(z.object({ input: z.number().nonnegative(), output: z.number().nonnegative() }))
);

/**
 * USD per 1M tokens, keyed by provider then model name (or model prefix).
 */
export type PricingTable = z.infer<typeof PricingTableSchema>;

const DEFAULT_PRICING_URL = new URL('../../data/pricing.json', import.meta.url);

/**
 * Load a pricing table from JSON. Defaults to the bundled `data/pricing.json`.
 */
export function loadPricing(path: string | URL = DEFAULT_PRICING_URL): PricingTable {
    return PricingTableSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

export interface UsageRecord {
    agent: string;
    provider: string;
    model: string;
    promptTokens: number;
    completionTokens: number;
}

interface Bucket {
    calls: number;
    promptTokens: number;
    completionTokens: number;
    costUsd: number;
}

export interface CostSummary {
    totalCostUsd: number;
    totalTokens: number;
    calls: number;
    byProvider: Record<string, Bucket>;
    byModel: Record<string, Bucket>;
    byAgent: Record<string, Bucket>;
}

/**
 * Aggregates token usage and USD cost for one workflow run.
 * Updates are synchronous, so concurrent phases never lose increments.
 */
export class CostTracker {
    private readonly byProvider = new Map<string, Bucket>();
    private readonly byModel = new Map<string, Bucket>();
    private readonly byAgent = new Map<string, Bucket>();
    private readonly unpriced = new Set<string>();

    constructor(private readonly pricing: PricingTable = loadPricing()) {}

    /**
     * Record one completion and return its cost in USD.
     */
    record(usage: UsageRecord): number {
        const cost = this.calculateCost(usage.provider, usage.model, usage.promptTokens, usage.completionTokens);

        for (const [map, key] of [
            [this.byProvider, usage.provider],
            [this.byModel, `${usage.provider}/${usage.model}`],
            [this.byAgent, usage.agent],
        ] as const) {
            const bucket = map.get(key) ?? { calls: 0, promptTokens: 0, completionTokens: 0, costUsd: 0 };
            bucket.calls += 1;
            bucket.promptTokens += usage.promptTokens;
            bucket.completionTokens += usage.completionTokens;
            bucket.costUsd += cost;
            map.set(key, bucket);
        }

        return cost;
    }

    /**
     * Cost of one call. Models match exactly, else by the longest priced prefix
     * (`gpt-4o-mini-2024-07-18` → `gpt-4o-mini`). Unpriced models cost 0.
     */
    calculateCost(provider: string, model: string, promptTokens: number, completionTokens: number): number {
        const models = this.pricing[provider];
        if (!models) {
            this.warnUnpriced(provider, model);
            return 0;
        }

        let price = models[model];
        if (!price) {
            const prefix = Object.keys(models)
                .filter((name) => model.startsWith(name))
                .sort((a, b) => b.length - a.length)[0];
            price = prefix ? models[prefix] : undefined;
        }

        if (!price) {
            if (provider !== 'ollama') this.warnUnpriced(provider, model);
            return 0;
        }

        return (promptTokens / 1_000_000) * price.input + (completionTokens / 1_000_000) * price.output;
    }

    getSummary(): CostSummary {
        let totalCostUsd = 0;
        let totalTokens = 0;
        let calls = 0;
        for (const bucket of this.byProvider.values()) {
            totalCostUsd += bucket.costUsd;
            totalTokens += bucket.promptTokens + bucket.completionTokens;
            calls += bucket.calls;
        }
        return {
            totalCostUsd,
            totalTokens,
            calls,
            byProvider: Object.fromEntries(this.byProvider),
            byModel: Object.fromEntries(this.byModel),
            byAgent: Object.fromEntries(this.byAgent),
        };
    }

    private warnUnpriced(provider: string, model: string): void {
        const key = `${provider}/${model}`;
        if (this.unpriced.has(key)) return;
        this.unpriced.add(key);
        logger.warn({ provider, model }, 'No pricing entry, cost recorded as 0');
    }
}
