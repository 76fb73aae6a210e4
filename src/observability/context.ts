import { writeFileSync } from 'node:fs';
import { CostTracker, type CostSummary, type PricingTable } from './cost-tracker.js';
import { MetricsCollector, type AgentMetrics } from './metrics.js';

export interface ObservabilitySummary {
    metrics: Record<string, AgentMetrics>;
    costs: CostSummary;
}

/**
 * Metrics and cost aggregation for one workflow run.
 * Created once by the workflow manager and handed to every component that records events.
 */
export class ObservabilityContext {
    readonly metrics: MetricsCollector;
    readonly costs: CostTracker;

    constructor(options: { pricing?: PricingTable } = {}) {
        this.metrics = new MetricsCollector();
        this.costs = new CostTracker(options.pricing);
    }

    getSummary(): ObservabilitySummary {
        return {
            metrics: this.metrics.getSummary(),
            costs: this.costs.getSummary(),
        };
    }

    writeSummary(path: string): void {
        writeFileSync(path, JSON.stringify(this.getSummary(), null, 2), 'utf-8');
    }
}
