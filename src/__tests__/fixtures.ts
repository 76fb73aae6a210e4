import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CircuitBreaker } from '../llm/circuit-breaker.js';
import { ResilientLlmClient } from '../llm/resilient-client.js';
import { ObservabilityContext } from '../observability/context.js';
import type { FulltextSource } from '../screening/fulltext-source.js';
import type {
    AgentName,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProvider,
    Paper,
    ReviewConfig,
    SearchParams,
    SourceAdapter,
} from '../types/index.js';
import { parseReviewConfig } from '../utils/config.js';

/**
 * Shared builders for the test suites.
 */

export function makeTempDir(prefix = 'reviewflow-test-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

export function makePaper(overrides: Partial<Paper> & { id: string }): Paper {
    return {
        title: `Paper ${overrides.id}`,
        abstract: null,
        authors: [],
        year: null,
        doi: null,
        journal: null,
        database: 'openalex',
        url: null,
        keywords: [],
        affiliations: [],
        country: null,
        ...overrides,
    };
}

export type Responder = (prompt: string, params: LlmCompletionParams) => string | Promise<string>;

/**
 * Scripted provider: answers every prompt through `respond` and keeps the prompts it saw.
 */
export class FakeProvider implements LlmProvider {
    readonly name = 'openai' as const;
    readonly prompts: string[] = [];

    constructor(private readonly respond: Responder) {}

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        this.prompts.push(prompt);
        const text = await this.respond(prompt, params);
        return {
            text,
            usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
            model: params.model ?? 'fake-model',
            provider: this.name,
        };
    }

    async isAvailable(): Promise<boolean> {
        return true;
    }

    count(fragment: string): number {
        return this.prompts.filter((prompt) => prompt.includes(fragment)).length;
    }
}

/**
 * Answers the same text to every prompt, one entry per call, repeating the last.
 */
export function sequence(...answers: string[]): Responder {
    let index = 0;
    return () => {
        const answer = answers[Math.min(index, answers.length - 1)] ?? '';
        index += 1;
        return answer;
    };
}

export interface ClientOptions {
    agent?: AgentName;
    maxAttempts?: number;
    timeoutMs?: number;
    breaker?: CircuitBreaker;
    observability?: ObservabilityContext;
}

export function makeClient(provider: LlmProvider, options: ClientOptions = {}): ResilientLlmClient {
    return new ResilientLlmClient({
        identity: {
            agent: options.agent ?? 'titleAbstractScreener',
            role: 'a systematic reviewer',
            model: 'gpt-4o-mini',
            temperature: 0.2,
            maxTokens: 500,
        },
        provider,
        breaker:
            options.breaker ??
            new CircuitBreaker('test:openai', { failureThreshold: 5, successThreshold: 2, cooldownMs: 60000 }),
        observability: options.observability ?? new ObservabilityContext({ pricing: {} }),
        retry: { maxAttempts: options.maxAttempts ?? 3, initialDelayMs: 0, maxDelayMs: 0, backoffBase: 2, jitter: 0 },
        timeoutMs: options.timeoutMs ?? 5000,
        random: () => 0.5,
    });
}

/**
 * Valid configuration rooted in `root`, with the cache and keyword filter off
 * and zero retry delays.
 */
export function makeConfig(root: string, overrides: Record<string, unknown> = {}): ReviewConfig {
    return parseReviewConfig(
        {
            topic: {
                topic: 'Chatbots for medication adherence',
                keywords: ['chatbot', 'medication adherence'],
                domain: 'digital health',
            },
            agents: {
                default: { role: 'a systematic reviewer of {domain}', model: 'gpt-4o-mini' },
            },
            workflow: {
                databases: ['openalex'],
                concurrency: 2,
                cache: { enabled: false },
            },
            criteria: {
                inclusion: ['Evaluates a chatbot intervention'],
                exclusion: ['Not peer reviewed'],
            },
            output: {
                directory: path.join(root, 'outputs'),
                checkpointDirectory: path.join(root, 'checkpoints'),
                registryPath: path.join(root, 'workflows.db'),
            },
            screening: { keywordFilter: { enabled: false } },
            resilience: { retry: { initialDelayMs: 0, maxDelayMs: 0 } },
            ...overrides,
        },
        {}
    );
}

/**
 * In-process connector returning fixed records.
 */
export class FakeConnector implements SourceAdapter {
    readonly searches: SearchParams[] = [];

    constructor(
        readonly name: string,
        private readonly papers: readonly Paper[]
    ) {}

    async search(params: SearchParams): Promise<Paper[]> {
        this.searches.push(params);
        return this.papers.map((paper) => ({ ...paper }));
    }
}

export class MapFulltextSource implements FulltextSource {
    constructor(private readonly texts: ReadonlyMap<string, string>) {}

    async load(paperId: string): Promise<string | null> {
        return this.texts.get(paperId) ?? null;
    }
}

/**
 * Clock that moves one second forward on every reading.
 */
export function steppingClock(start = '2026-03-01T09:00:00.000Z'): () => Date {
    let now = Date.parse(start);
    return () => {
        const current = new Date(now);
        now += 1000;
        return current;
    };
}
