import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { ObservabilityContext } from '../observability/context.js';
import { CostTracker, loadPricing, type PricingTable } from '../observability/cost-tracker.js';
import { MetricsCollector } from '../observability/metrics.js';
import { makeTempDir, removeDir } from './fixtures.js';

const PRICING: PricingTable = {
    openai: {
        'gpt-4o': { input: 5, output: 15 },
        'gpt-4o-mini': { input: 0.15, output: 0.6 },
    },
    ollama: {},
};

describe('CostTracker', () => {
    it('should price exact model names per million tokens', () => {
        const tracker = new CostTracker(PRICING);
        expect(tracker.calculateCost('openai', 'gpt-4o', 1000, 500)).toBeCloseTo(0.0125);
    });

    it('should match dated model names by the longest priced prefix', () => {
        const tracker = new CostTracker(PRICING);
        expect(tracker.calculateCost('openai', 'gpt-4o-mini-2024-07-18', 2000, 1000)).toBeCloseTo(0.0009);
    });

    it('should record unpriced models at zero cost', () => {
        const tracker = new CostTracker(PRICING);
        expect(tracker.calculateCost('ollama', 'llama3', 5000, 5000)).toBe(0);
        expect(tracker.calculateCost('anthropic', 'claude-3-haiku', 5000, 5000)).toBe(0);
    });

    it('should aggregate by provider, model and agent', () => {
        const tracker = new CostTracker(PRICING);
        tracker.record({ agent: 'screener', provider: 'openai', model: 'gpt-4o', promptTokens: 1000, completionTokens: 500 });
        tracker.record({ agent: 'screener', provider: 'ollama', model: 'llama3', promptTokens: 100, completionTokens: 50 });
        tracker.record({ agent: 'writer', provider: 'openai', model: 'gpt-4o', promptTokens: 1000, completionTokens: 500 });

        const summary = tracker.getSummary();
        expect(summary.calls).toBe(3);
        expect(summary.totalTokens).toBe(3150);
        expect(summary.totalCostUsd).toBeCloseTo(0.025);
        expect(Object.keys(summary.byModel)).toEqual(['openai/gpt-4o', 'ollama/llama3']);
        expect(summary.byAgent['screener']).toMatchObject({ calls: 2, promptTokens: 1100, completionTokens: 550 });
        expect(summary.byProvider['ollama']?.costUsd).toBe(0);
    });

    it('should load the bundled pricing table', () => {
        const pricing = loadPricing();
        expect(pricing['openai']?.['gpt-4o-mini']).toEqual({ input: 0.15, output: 0.6 });
        expect(pricing['ollama']).toEqual({});
    });
});

describe('MetricsCollector', () => {
    it('should count outcomes and time only calls that reached the provider', () => {
        const metrics = new MetricsCollector();
        metrics.recordCall('screener', { success: true, durationMs: 100 });
        metrics.recordCall('screener', { success: false, durationMs: 300, errorKind: 'timeout' });
        metrics.recordCall('screener', { success: false, durationMs: 0, errorKind: 'circuit_open', shortCircuited: true });

        expect(metrics.getAgentMetrics('screener')).toEqual({
            totalCalls: 3,
            successfulCalls: 1,
            failedCalls: 2,
            shortCircuitedCalls: 1,
            minDurationMs: 100,
            maxDurationMs: 300,
            avgDurationMs: 200,
            errors: { timeout: 1, circuit_open: 1 },
        });
    });

    it('should report no durations when every call was short-circuited', () => {
        const metrics = new MetricsCollector();
        metrics.recordCall('writer', { success: false, durationMs: 0, errorKind: 'circuit_open', shortCircuited: true });

        expect(metrics.getAgentMetrics('writer')).toMatchObject({ minDurationMs: null, avgDurationMs: null });
        expect(metrics.getAgentMetrics('extractor')).toBeNull();
        expect(Object.keys(metrics.getSummary())).toEqual(['writer']);
    });
});

describe('ObservabilityContext', () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    it('should write metrics and costs as JSON', () => {
        const context = new ObservabilityContext({ pricing: PRICING });
        context.metrics.recordCall('screener', { success: true, durationMs: 50 });
        context.costs.record({ agent: 'screener', provider: 'openai', model: 'gpt-4o', promptTokens: 1000, completionTokens: 500 });

        const file = path.join(dir, 'observability.json');
        context.writeSummary(file);

        const written: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
        expect(written).toMatchObject({
            metrics: { screener: { totalCalls: 1, avgDurationMs: 50 } },
            costs: { calls: 1, totalTokens: 1500 },
        });
    });
});
