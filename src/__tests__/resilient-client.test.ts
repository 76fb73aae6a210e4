import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { CircuitBreaker } from '../llm/circuit-breaker.js';
import { extractJson, parseStructured, stripCodeFences } from '../llm/json.js';
import { failure, ok } from '../llm/result.js';
import { extractMarkers } from '../llm/text-markers.js';
import { ObservabilityContext } from '../observability/context.js';
import { ScreeningResponseSchema, parseScreeningText, screeningFallback } from '../screening/response.js';
import { InclusionDecision } from '../types/index.js';
import { computeBackoff } from '../utils/retry.js';
import { FakeProvider, makeClient, sequence } from './fixtures.js';

const VALID = JSON.stringify({ decision: 'include', confidence: 0.8, reasoning: 'On topic', exclusion_reason: null });

function screeningRequest(textFallback = true) {
    return {
        prompt: 'Screen this paper',
        schema: ScreeningResponseSchema,
        textFallback: textFallback ? { prompt: 'Answer with markers', parse: parseScreeningText } : undefined,
        fallback: screeningFallback,
    };
}

describe('ResilientLlmClient', () => {
    describe('callStructured', () => {
        it('should return the first valid schema response', async () => {
            const provider = new FakeProvider(sequence(VALID));
            const outcome = await makeClient(provider).callStructured(screeningRequest());

            expect(outcome.source).toBe('schema');
            expect(outcome.attempts).toBe(1);
            expect(outcome.value).toEqual({
                decision: InclusionDecision.INCLUDE,
                confidence: 0.8,
                reasoning: 'On topic',
                exclusion_reason: null,
            });
        });

        it('should retry empty and malformed responses', async () => {
            const provider = new FakeProvider(sequence('', 'not json', VALID));
            const outcome = await makeClient(provider).callStructured(screeningRequest());

            expect(outcome.source).toBe('schema');
            expect(outcome.attempts).toBe(3);
            expect(outcome.failures.map((f) => f.kind)).toEqual(['empty', 'malformed_json']);
        });

        it('should fall back to the synthetic verdict on whitespace-only responses', async () => {
            const provider = new FakeProvider(sequence('  \n\t '));
            const outcome = await makeClient(provider).callStructured(screeningRequest());

            expect(outcome.source).toBe('fallback');
            expect(outcome.attempts).toBe(4);
            expect(outcome.failures.map((f) => f.kind)).toEqual(['empty', 'empty', 'empty', 'empty']);
            expect(outcome.value.decision).toBe(InclusionDecision.UNCERTAIN);
            expect(outcome.value.confidence).toBe(0);
        });

        it('should clamp an out-of-range confidence instead of retrying', async () => {
            const provider = new FakeProvider(
                sequence(JSON.stringify({ decision: 'include', confidence: 1.5, reasoning: 'Strong match' }))
            );
            const outcome = await makeClient(provider).callStructured(screeningRequest());

            expect(outcome.source).toBe('schema');
            expect(outcome.attempts).toBe(1);
            expect(outcome.value.decision).toBe(InclusionDecision.INCLUDE);
            expect(outcome.value.confidence).toBe(1);
        });

        it('should fill in a missing reasoning', async () => {
            const provider = new FakeProvider(
                sequence(JSON.stringify({ decision: 'exclude', confidence: -0.2, exclusion_reason: 'Not peer reviewed' }))
            );
            const outcome = await makeClient(provider).callStructured(screeningRequest());

            expect(outcome.source).toBe('schema');
            expect(outcome.value).toEqual({
                decision: InclusionDecision.EXCLUDE,
                confidence: 0,
                reasoning: 'No reasoning provided',
                exclusion_reason: 'Not peer reviewed',
            });
        });

        it('should fall back to the text markers after the schema attempts', async () => {
            const provider = new FakeProvider(sequence('nope', 'nope', 'DECISION: include\nCONFIDENCE: 0.8\nREASONING: fits'));
            const outcome = await makeClient(provider, { maxAttempts: 2 }).callStructured(screeningRequest());

            expect(outcome.source).toBe('text');
            expect(outcome.attempts).toBe(3);
            expect(outcome.value).toEqual({
                decision: InclusionDecision.INCLUDE,
                confidence: 0.8,
                reasoning: 'fits',
                exclusion_reason: null,
            });
            expect(provider.prompts[2]).toBe('Answer with markers');
        });

        it('should return the synthetic verdict when every attempt fails', async () => {
            const provider = new FakeProvider(sequence('nope'));
            const outcome = await makeClient(provider, { maxAttempts: 2 }).callStructured(screeningRequest());

            expect(outcome.source).toBe('fallback');
            expect(outcome.attempts).toBe(3);
            expect(outcome.value.decision).toBe(InclusionDecision.UNCERTAIN);
            expect(outcome.value.confidence).toBe(0);
            expect(outcome.failures.map((f) => f.kind)).toEqual([
                'malformed_json',
                'malformed_json',
                'unparseable_text',
            ]);
        });

        it('should stop calling the provider once the circuit opens', async () => {
            const provider = new FakeProvider(sequence(''));
            const observability = new ObservabilityContext({ pricing: {} });
            const breaker = new CircuitBreaker('test', { failureThreshold: 2, successThreshold: 1, cooldownMs: 60000 }, () => 0);

            const outcome = await makeClient(provider, { breaker, observability }).callStructured(screeningRequest());

            expect(outcome.source).toBe('circuit_open');
            expect(outcome.attempts).toBe(2);
            expect(outcome.value.reasoning).toBe('LLM service unavailable (circuit open). Manual adjudication required.');
            expect(provider.prompts).toHaveLength(2);
            expect(breaker.getState()).toBe('OPEN');
            expect(observability.metrics.getAgentMetrics('titleAbstractScreener')).toMatchObject({
                totalCalls: 3,
                failedCalls: 3,
                shortCircuitedCalls: 1,
                errors: { empty: 2, circuit_open: 1 },
            });
        });

        it('should classify a hung call as a timeout', async () => {
            const provider = new FakeProvider(() => new Promise<string>(() => undefined));
            const outcome = await makeClient(provider, { maxAttempts: 1, timeoutMs: 20 }).callStructured(
                screeningRequest(false)
            );

            expect(outcome.source).toBe('fallback');
            expect(outcome.failures).toEqual([{ kind: 'timeout', message: 'No response within 20ms' }]);
        });

        it('should propagate cancellation from the caller', async () => {
            const controller = new AbortController();
            controller.abort(new Error('stop'));
            const provider = new FakeProvider(sequence(VALID));

            await expect(
                makeClient(provider).callStructured({ ...screeningRequest(), signal: controller.signal })
            ).rejects.toThrow('stop');
        });

        it('should record token usage for every completion', async () => {
            const observability = new ObservabilityContext({ pricing: {} });
            const provider = new FakeProvider(sequence('', VALID));
            await makeClient(provider, { observability }).callStructured(screeningRequest());

            const costs = observability.costs.getSummary();
            expect(costs.calls).toBe(2);
            expect(costs.totalTokens).toBe(30);
            expect(costs.byAgent['titleAbstractScreener']?.calls).toBe(2);
        });
    });

    describe('callText', () => {
        it('should retry until the trimmed text validates', async () => {
            const provider = new FakeProvider(sequence('   ', 'too short', '  A full paragraph of text.  '));
            const result = await makeClient(provider).callText('Write', {
                validate: (text) => (text.length > 10 ? ok(text) : failure('empty', 'Too short')),
            });

            expect(result).toEqual({ ok: true, value: 'A full paragraph of text.' });
            expect(provider.prompts).toHaveLength(3);
        });

        it('should return the last failure when attempts run out', async () => {
            const provider = new FakeProvider(sequence(''));
            const result = await makeClient(provider).callText('Write', { maxAttempts: 2 });

            expect(result).toEqual({ ok: false, error: { kind: 'empty', message: 'Empty response' } });
            expect(provider.prompts).toHaveLength(2);
        });
    });
});

describe('CircuitBreaker', () => {
    const config = { failureThreshold: 2, successThreshold: 2, cooldownMs: 1000 };

    function breakerAt(): { breaker: CircuitBreaker; advance(ms: number): void } {
        let now = 0;
        const breaker = new CircuitBreaker('test', config, () => now);
        return {
            breaker,
            advance: (ms) => {
                now += ms;
            },
        };
    }

    it('should open after consecutive failures', () => {
        const { breaker } = breakerAt();
        breaker.recordFailure();
        expect(breaker.getState()).toBe('CLOSED');
        breaker.recordFailure();
        expect(breaker.getState()).toBe('OPEN');
        expect(breaker.allowRequest()).toBe(false);
    });

    it('should reset the failure count on success', () => {
        const { breaker } = breakerAt();
        breaker.recordFailure();
        breaker.recordSuccess();
        breaker.recordFailure();
        expect(breaker.getState()).toBe('CLOSED');
    });

    it('should admit one probe at a time after the cooldown and close after enough successes', () => {
        const { breaker, advance } = breakerAt();
        breaker.recordFailure();
        breaker.recordFailure();
        advance(1000);

        expect(breaker.getState()).toBe('HALF_OPEN');
        expect(breaker.allowRequest()).toBe(true);
        expect(breaker.allowRequest()).toBe(false);
        breaker.recordSuccess();
        expect(breaker.getState()).toBe('HALF_OPEN');
        expect(breaker.allowRequest()).toBe(true);
        breaker.recordSuccess();
        expect(breaker.getState()).toBe('CLOSED');
    });

    it('should reopen when a probe fails', () => {
        const { breaker, advance } = breakerAt();
        breaker.recordFailure();
        breaker.recordFailure();
        advance(1000);
        expect(breaker.allowRequest()).toBe(true);

        breaker.recordFailure();
        expect(breaker.getState()).toBe('OPEN');
        advance(999);
        expect(breaker.getState()).toBe('OPEN');
        advance(1);
        expect(breaker.getState()).toBe('HALF_OPEN');
    });

    it('should free the probe slot when a probe is released', () => {
        const { breaker, advance } = breakerAt();
        breaker.recordFailure();
        breaker.recordFailure();
        advance(1000);
        expect(breaker.allowRequest()).toBe(true);
        breaker.releaseProbe();
        expect(breaker.allowRequest()).toBe(true);
    });
});

describe('computeBackoff', () => {
    const policy = { maxAttempts: 5, initialDelayMs: 1000, maxDelayMs: 5000, backoffBase: 2, jitter: 0.2 };

    it('should grow exponentially up to the cap', () => {
        const middle = () => 0.5;
        expect(computeBackoff(0, policy, middle)).toBe(1000);
        expect(computeBackoff(1, policy, middle)).toBe(2000);
        expect(computeBackoff(5, policy, middle)).toBe(5000);
    });

    it('should spread by the jitter fraction', () => {
        expect(computeBackoff(0, policy, () => 0)).toBe(800);
        expect(computeBackoff(0, policy, () => 1)).toBe(1200);
    });
});

describe('response parsing', () => {
    it('should strip code fences', () => {
        expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    });

    it('should find the JSON object inside prose', () => {
        expect(extractJson('Here you go: {"a": 1} Thanks!')).toEqual({ ok: true, value: { a: 1 } });
    });

    it('should describe schema violations by path', () => {
        const result = parseStructured('{"n": "x"}', z.object({ n: z.number() }));
        expect(result).toEqual({
            ok: false,
            error: { kind: 'schema_violation', message: 'n: Expected number, received string' },
        });
    });

    it('should read markers with markdown emphasis and multi-line values', () => {
        const markers = extractMarkers('**DECISION:** Exclude\n**Confidence**: 0.4\nReasoning: off topic\nacross lines', [
            'DECISION',
            'CONFIDENCE',
            'REASONING',
        ]);

        expect([...markers.entries()]).toEqual([
            ['DECISION', 'Exclude'],
            ['CONFIDENCE', '0.4'],
            ['REASONING', 'off topic\nacross lines'],
        ]);
    });

    it('should clamp confidence and drop placeholder exclusion reasons', () => {
        const result = parseScreeningText(
            'Decision: Exclude\nConfidence: 1.7\nReasoning: wrong population\nExclusion_reason: none'
        );

        expect(result).toEqual({
            ok: true,
            value: {
                decision: InclusionDecision.EXCLUDE,
                confidence: 1,
                reasoning: 'wrong population',
                exclusion_reason: null,
            },
        });
    });

    it('should default missing markers to uncertain at 0.5', () => {
        const result = parseScreeningText('REASONING: unclear abstract');
        expect(result).toEqual({
            ok: true,
            value: {
                decision: InclusionDecision.UNCERTAIN,
                confidence: 0.5,
                reasoning: 'unclear abstract',
                exclusion_reason: null,
            },
        });
    });

    it('should reject text without any marker', () => {
        expect(parseScreeningText('I think it is relevant').ok).toBe(false);
    });
});
