import OpenAI from 'openai';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../../types/index.js';
import { getApiKey } from '../../utils/config.js';

/**
 * OpenAI chat completions provider. JSON mode maps to `response_format: json_object`.
 * The SDK's own retries are disabled; the resilience wrapper owns retrying.
 */
export class OpenAiProvider implements LlmProvider {
    readonly name = 'openai' as const;
    private client: OpenAI | null = null;

    constructor(private readonly options: LlmProviderOptions) {}

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const systemMessages = params.systemPrompt
            ? [{ role: 'system' as const, content: params.systemPrompt }]
            : [];

        const response = await this.getClient().chat.completions.create(
            {
                model: params.model ?? this.options.model,
                temperature: params.temperature,
                max_tokens: params.maxTokens,
                response_format: params.jsonMode ? { type: 'json_object' } : undefined,
                messages: [...systemMessages, { role: 'user' as const, content: prompt }],
            },
            { signal: params.signal }
        );

        const promptTokens = response.usage?.prompt_tokens ?? 0;
        const completionTokens = response.usage?.completion_tokens ?? 0;

        return {
            text: response.choices[0]?.message.content ?? '',
            usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
            model: response.model,
            provider: this.name,
        };
    }

    async isAvailable(): Promise<boolean> {
        return Boolean(this.options.apiKey ?? getApiKey('OPENAI_API_KEY'));
    }

    private getClient(): OpenAI {
        if (!this.client) {
            this.client = new OpenAI({
                apiKey: this.options.apiKey ?? getApiKey('OPENAI_API_KEY'),
                baseURL: this.options.baseUrl,
                maxRetries: 0,
            });
        }
        return this.client;
    }
}
