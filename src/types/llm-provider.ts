import type { ProviderName } from './config.js';

/**
 * Interface for LLM provider adapters (OpenAI, Anthropic, Ollama).
 */
export interface LlmProvider {
    /** Provider name */
    readonly name: ProviderName;

    /**
     * Send a completion request to the LLM.
     * Throws on transport or API errors; the resilience wrapper classifies them.
     */
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult>;

    /**
     * Check if the provider is reachable (API key present, Ollama server up).
     */
    isAvailable(): Promise<boolean>;
}

/**
 * Parameters for LLM completion requests.
 */
export interface LlmCompletionParams {
    /** Model to use (overrides default) */
    model?: string;
    /** Temperature (0.0 to 2.0) */
    temperature?: number;
    /** Maximum tokens in response */
    maxTokens?: number;
    /** Whether to request JSON response format */
    jsonMode?: boolean;
    /** System prompt */
    systemPrompt?: string;
    /** Aborts the in-flight request (per-call timeout, group cancellation) */
    signal?: AbortSignal;
}

/**
 * Result from an LLM completion request.
 */
export interface LlmCompletionResult {
    /** Raw response text */
    text: string;
    /** Token usage */
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    /** Model used */
    model: string;
    /** Provider name */
    provider: ProviderName;
}

/**
 * LLM provider initialization options.
 */
export interface LlmProviderOptions {
    /** API key (for cloud providers) */
    apiKey?: string;
    /** Base URL (for Ollama or custom endpoints) */
    baseUrl?: string;
    /** Default model */
    model: string;
}
