/**
 * Per-agent call metrics for one workflow run.
 */

export interface CallObservation {
    success: boolean;
    durationMs: number;
    /** Failure classification (`timeout`, `schema_violation`, ...) */
    errorKind?: string;
    /** True when the circuit breaker answered without calling the provider */
    shortCircuited?: boolean;
}

export interface AgentMetrics {
    totalCalls: number;
    successfulCalls: number;
    failedCalls: number;
    shortCircuitedCalls: number;
    minDurationMs: number | null;
    maxDurationMs: number | null;
    avgDurationMs: number | null;
    errors: Record<string, number>;
}

interface MutableMetrics {
    totalCalls: number;
    successfulCalls: number;
    failedCalls: number;
    shortCircuitedCalls: number;
    totalDurationMs: number;
    timedCalls: number;
    minDurationMs: number | null;
    maxDurationMs: number | null;
    errors: Map<string, number>;
}

export class MetricsCollector {
    private readonly agents = new Map<string, MutableMetrics>();

    recordCall(agent: string, observation: CallObservation): void {
        const metrics = this.agents.get(agent) ?? {
            totalCalls: 0,
            successfulCalls: 0,
            failedCalls: 0,
            shortCircuitedCalls: 0,
            totalDurationMs: 0,
            timedCalls: 0,
            minDurationMs: null,
            maxDurationMs: null,
            errors: new Map<string, number>(),
        };

        metrics.totalCalls += 1;
        if (observation.success) {
            metrics.successfulCalls += 1;
        } else {
            metrics.failedCalls += 1;
        }

        if (observation.shortCircuited) {
            metrics.shortCircuitedCalls += 1;
        } else {
            metrics.timedCalls += 1;
            metrics.totalDurationMs += observation.durationMs;
            metrics.minDurationMs = Math.min(metrics.minDurationMs ?? Infinity, observation.durationMs);
            metrics.maxDurationMs = Math.max(metrics.maxDurationMs ?? -Infinity, observation.durationMs);
        }

        if (observation.errorKind) {
            metrics.errors.set(observation.errorKind, (metrics.errors.get(observation.errorKind) ?? 0) + 1);
        }

        this.agents.set(agent, metrics);
    }

    getAgentMetrics(agent: string): AgentMetrics | null {
        const metrics = this.agents.get(agent);
        if (!metrics) return null;
        return {
            totalCalls: metrics.totalCalls,
            successfulCalls: metrics.successfulCalls,
            failedCalls: metrics.failedCalls,
            shortCircuitedCalls: metrics.shortCircuitedCalls,
            minDurationMs: metrics.minDurationMs,
            maxDurationMs: metrics.maxDurationMs,
            avgDurationMs: metrics.timedCalls > 0 ? metrics.totalDurationMs / metrics.timedCalls : null,
            errors: Object.fromEntries(metrics.errors),
        };
    }

    getSummary(): Record<string, AgentMetrics> {
        const summary: Record<string, AgentMetrics> = {};
        for (const agent of this.agents.keys()) {
            const metrics = this.getAgentMetrics(agent);
            if (metrics) summary[agent] = metrics;
        }
        return summary;
    }
}
