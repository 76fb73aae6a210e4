import { getLogger } from './logger.js';
import { computeBackoff, sleep, type RetryPolicy } from './retry.js';

const logger = getLogger();

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

const HTTP_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 4,
    initialDelayMs: 1000,
    maxDelayMs: 30000,
    backoffBase: 2,
    jitter: 0.25,
};

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, RateLimit> = {
    openalex: { tokensPerSecond: 10, maxBurst: 10 },        // polite pool
    semantic_scholar: { tokensPerSecond: 1, maxBurst: 1 },  // unauthenticated tier
    crossref: { tokensPerSecond: 10, maxBurst: 10 },        // public pool
    ollama: { tokensPerSecond: 100, maxBurst: 100 },        // local server
};

const DEFAULT_RATE_LIMIT: RateLimit = { tokensPerSecond: 5, maxBurst: 5 };

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
    /** Per-source rate limiting bucket */
    source?: string;
    /** Caller cancellation, combined with the timeout */
    signal?: AbortSignal;
}

/**
 * HTTP response wrapper. `data` is the parsed JSON body, or the text body.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: unknown;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Centralized HTTP client with per-source rate limiting and retry logic.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;

    constructor(options?: { timeout?: number; version?: string; email?: string }) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '0.1.0';
        const contact = options?.email ? ` (mailto:${options.email})` : '';
        this.userAgent = `reviewflow/${version}${contact}`;
    }

    /**
     * Make an HTTP request with rate limiting and retry.
     */
    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
            signal,
        } = options;

        await this.getBucket(source).acquire();
        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (body !== undefined) {
            if (typeof body === 'object') {
                requestBody = JSON.stringify(body);
                requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
            } else {
                requestBody = body;
            }
        }

        const lastAttempt = HTTP_RETRY_POLICY.maxAttempts - 1;

        for (let attempt = 0; ; attempt++) {
            const timeoutSignal = AbortSignal.timeout(timeout);
            const requestSignal = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

            try {
                const response = await fetch(url, {
                    method,
                    headers: requestHeaders,
                    body: requestBody,
                    signal: requestSignal,
                });

                const contentType = response.headers.get('content-type') ?? '';
                const data: unknown = contentType.includes('application/json')
                    ? await response.json()
                    : await response.text();

                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < lastAttempt) {
                        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = retryAfter ?? computeBackoff(attempt, HTTP_RETRY_POLICY);

                        logger.warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: Math.round(backoff), url },
                            'Retryable HTTP error, backing off'
                        );
                        await sleep(backoff, signal);
                        continue;
                    }

                    throw new HttpError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable,
                        data
                    );
                }

                return { status: response.status, headers: responseHeaders, data };
            } catch (error) {
                if (error instanceof HttpError) throw error;
                if (signal?.aborted) throw error;

                const errorCode = networkErrorCode(error);
                const timedOut = timeoutSignal.aborted;
                const retryable = timedOut || (errorCode !== undefined && RETRYABLE_ERROR_CODES.has(errorCode));

                if (retryable && attempt < lastAttempt) {
                    const backoff = computeBackoff(attempt, HTTP_RETRY_POLICY);
                    logger.warn(
                        { errorCode, timedOut, attempt: attempt + 1, backoffMs: Math.round(backoff), url },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff, signal);
                    continue;
                }

                if (timedOut) {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            }
        }
    }

    /**
     * Convenience method for GET requests.
     */
    async get(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'GET' });
    }

    /**
     * Convenience method for POST requests.
     */
    async post(url: string, body: string | object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'POST', body });
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? DEFAULT_RATE_LIMIT;
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }
}

/**
 * Node's fetch wraps socket errors: the errno code sits on `error.cause`.
 */
function networkErrorCode(error: unknown): string | undefined {
    const candidates = error instanceof Error ? [error, error.cause] : [error];
    for (const candidate of candidates) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: { timeout?: number; version?: string; email?: string }): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}
