import type { z } from 'zod';
import type { ObservabilityContext } from '../observability/context.js';
import type { AgentName, LlmCompletionParams, LlmCompletionResult, LlmProvider } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { computeBackoff, sleep, type RetryPolicy } from '../utils/retry.js';
import type { CircuitBreaker } from './circuit-breaker.js';
import { parseStructured } from './json.js';
import { failure, ok, type ParseFailure, type Result } from './result.js';

const logger = getLogger();

/**
 * Who is calling: agent name plus the model settings from its config.
 */
export interface AgentIdentity {
    agent: AgentName;
    role: string;
    model: string;
    temperature: number;
    maxTokens: number;
}

export interface ResilientClientOptions {
    identity: AgentIdentity;
    provider: LlmProvider;
    breaker: CircuitBreaker;
    observability: ObservabilityContext;
    retry: RetryPolicy;
    timeoutMs: number;
    /** Jitter source, injectable for tests */
    random?: () => number;
}

export interface FallbackReason {
    /** `unavailable` when the circuit breaker refused the call */
    kind: 'failed' | 'unavailable';
    failures: ParseFailure[];
}

export interface StructuredRequest<T> {
    prompt: string;
    systemPrompt?: string;
    schema: z.ZodType<T, z.ZodTypeDef, unknown>;
    /** Free-text request parsed for markers once schema attempts are exhausted */
    textFallback?: {
        prompt: string;
        parse(text: string): Result<T, ParseFailure>;
    };
    /** Synthetic value returned when every attempt failed */
    fallback(reason: FallbackReason): T;
    signal?: AbortSignal;
}

export type OutcomeSource = 'schema' | 'text' | 'fallback' | 'circuit_open';

export interface StructuredOutcome<T> {
    value: T;
    source: OutcomeSource;
    /** Provider calls made, including the text fallback */
    attempts: number;
    failures: ParseFailure[];
}

export interface TextCallOptions {
    systemPrompt?: string;
    signal?: AbortSignal;
    maxAttempts?: number;
    /** Extra validation of the trimmed response */
    validate?: (text: string) => Result<string, ParseFailure>;
}

/**
 * Wraps one agent's provider with per-call timeouts, retry with backoff,
 * a circuit breaker and a free-text fallback.
 *
 * Expected failures (empty output, bad JSON, schema violations, timeouts,
 * provider errors) never escape as exceptions: structured calls always
 * return a value, text calls return a `Result`. Only cancellation through
 * the caller's signal propagates.
 */
export class ResilientLlmClient {
    readonly identity: AgentIdentity;
    private readonly provider: LlmProvider;
    private readonly breaker: CircuitBreaker;
    private readonly observability: ObservabilityContext;
    private readonly retry: RetryPolicy;
    private readonly timeoutMs: number;
    private readonly random: () => number;

    constructor(options: ResilientClientOptions) {
        this.identity = options.identity;
        this.provider = options.provider;
        this.breaker = options.breaker;
        this.observability = options.observability;
        this.retry = options.retry;
        this.timeoutMs = options.timeoutMs;
        this.random = options.random ?? Math.random;
    }

    /**
     * Schema-constrained call. Tries JSON mode up to `retry.maxAttempts` times,
     * then the text fallback, then the caller's synthetic value.
     */
    async callStructured<T>(request: StructuredRequest<T>): Promise<StructuredOutcome<T>> {
        const failures: ParseFailure[] = [];
        let attempts = 0;

        const unavailable = (): StructuredOutcome<T> => {
            this.observability.metrics.recordCall(this.identity.agent, {
                success: false,
                durationMs: 0,
                errorKind: 'circuit_open',
                shortCircuited: true,
            });
            logger.warn({ agent: this.identity.agent, breaker: this.breaker.name }, 'Circuit open, skipping LLM call');
            return {
                value: request.fallback({ kind: 'unavailable', failures }),
                source: 'circuit_open',
                attempts,
                failures,
            };
        };

        for (let attempt = 0; attempt < this.retry.maxAttempts; attempt++) {
            if (!this.breaker.allowRequest()) return unavailable();

            attempts += 1;
            const result = await this.attempt(
                request.prompt,
                { systemPrompt: request.systemPrompt, jsonMode: true },
                (text) => parseStructured(text, request.schema),
                request.signal
            );
            if (result.ok) {
                return { value: result.value, source: 'schema', attempts, failures };
            }

            failures.push(result.error);
            logger.debug(
                { agent: this.identity.agent, attempt: attempt + 1, kind: result.error.kind, reason: result.error.message },
                'Structured attempt failed'
            );

            if (attempt < this.retry.maxAttempts - 1) {
                await sleep(computeBackoff(attempt, this.retry, this.random), request.signal);
            }
        }

        if (request.textFallback) {
            if (!this.breaker.allowRequest()) return unavailable();

            attempts += 1;
            const result = await this.attempt(
                request.textFallback.prompt,
                { systemPrompt: request.systemPrompt, jsonMode: false },
                request.textFallback.parse,
                request.signal
            );
            if (result.ok) {
                logger.info({ agent: this.identity.agent, attempts }, 'Recovered through text fallback');
                return { value: result.value, source: 'text', attempts, failures };
            }
            failures.push(result.error);
        }

        logger.warn(
            { agent: this.identity.agent, attempts, kinds: failures.map((f) => f.kind) },
            'LLM call failed, using fallback result'
        );
        return {
            value: request.fallback({ kind: 'failed', failures }),
            source: 'fallback',
            attempts,
            failures,
        };
    }

    /**
     * Plain-text call with the same retry, breaker and timeout handling.
     */
    async callText(prompt: string, options: TextCallOptions = {}): Promise<Result<string, ParseFailure>> {
        const maxAttempts = options.maxAttempts ?? this.retry.maxAttempts;
        const validate = options.validate ?? ((text: string) => ok(text));
        let last: ParseFailure = { kind: 'provider_error', message: 'No attempt made' };

        for (let attempt = 0; attempt < maxAttempts; attempt++) {
            if (!this.breaker.allowRequest()) {
                this.observability.metrics.recordCall(this.identity.agent, {
                    success: false,
                    durationMs: 0,
                    errorKind: 'circuit_open',
                    shortCircuited: true,
                });
                return failure('provider_error', `Circuit open for ${this.breaker.name}`);
            }

            const result = await this.attempt(
                prompt,
                { systemPrompt: options.systemPrompt, jsonMode: false },
                (text) => validate(text.trim()),
                options.signal
            );
            if (result.ok) return result;

            last = result.error;
            logger.warn(
                { agent: this.identity.agent, attempt: attempt + 1, maxAttempts, kind: last.kind, reason: last.message },
                'Text call attempt failed'
            );
            if (attempt < maxAttempts - 1) {
                await sleep(computeBackoff(attempt, this.retry, this.random), options.signal);
            }
        }

        return { ok: false, error: last };
    }

    // ─── Single attempt ───────────────────────────────────

    private async attempt<T>(
        prompt: string,
        params: Pick<LlmCompletionParams, 'systemPrompt' | 'jsonMode'>,
        parse: (text: string) => Result<T, ParseFailure>,
        signal: AbortSignal | undefined
    ): Promise<Result<T, ParseFailure>> {
        const started = Date.now();
        let result: Result<T, ParseFailure>;

        try {
            const completion = await this.invoke(prompt, params, signal);
            if (!completion.ok) {
                result = completion;
            } else {
                this.recordUsage(completion.value);
                result = completion.value.text.trim() === ''
                    ? failure('empty', 'Empty response')
                    : parse(completion.value.text);
            }
        } catch (error) {
            this.breaker.releaseProbe();
            throw error;
        }

        const durationMs = Date.now() - started;
        if (result.ok) {
            this.breaker.recordSuccess();
            this.observability.metrics.recordCall(this.identity.agent, { success: true, durationMs });
        } else {
            this.breaker.recordFailure();
            this.observability.metrics.recordCall(this.identity.agent, {
                success: false,
                durationMs,
                errorKind: result.error.kind,
            });
        }
        return result;
    }

    /**
     * Call the provider under the per-call timeout. Caller cancellation rethrows.
     */
    private async invoke(
        prompt: string,
        params: Pick<LlmCompletionParams, 'systemPrompt' | 'jsonMode'>,
        signal: AbortSignal | undefined
    ): Promise<Result<LlmCompletionResult, ParseFailure>> {
        const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
        const callSignal = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

        try {
            const completion = await raceAbort(
                this.provider.complete(prompt, {
                    ...params,
                    model: this.identity.model,
                    temperature: this.identity.temperature,
                    maxTokens: this.identity.maxTokens,
                    signal: callSignal,
                }),
                callSignal
            );
            return ok(completion);
        } catch (error) {
            if (signal?.aborted) throw signal.reason;
            if (timeoutSignal.aborted) {
                return failure('timeout', `No response within ${this.timeoutMs}ms`);
            }
            return failure('provider_error', error instanceof Error ? error.message : String(error));
        }
    }

    private recordUsage(completion: LlmCompletionResult): void {
        this.observability.costs.record({
            agent: this.identity.agent,
            provider: completion.provider,
            model: completion.model,
            promptTokens: completion.usage.promptTokens,
            completionTokens: completion.usage.completionTokens,
        });
    }
}

/**
 * Settle with the signal's reason as soon as it aborts, even if the
 * underlying request ignores the signal.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const onAbort = (): void => reject(signal.reason);
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
        if (signal.aborted) {
            onAbort();
            return;
        }
        signal.addEventListener('abort', onAbort, { once: true });
    });
}
