import Anthropic from '@anthropic-ai/sdk';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../../types/index.js';
import { getApiKey } from '../../utils/config.js';

const JSON_INSTRUCTION = '\n\nRespond with a single JSON object and nothing else.';

/**
 * Anthropic Messages API provider. There is no native JSON mode, so JSON
 * requests append an instruction and rely on response validation.
 */
export class AnthropicProvider implements LlmProvider {
    readonly name = 'anthropic' as const;
    private client: Anthropic | null = null;

    constructor(private readonly options: LlmProviderOptions) {}

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const message = await this.getClient().messages.create(
            {
                model: params.model ?? this.options.model,
                max_tokens: params.maxTokens ?? 1500,
                temperature: params.temperature,
                system: params.systemPrompt,
                messages: [{ role: 'user', content: params.jsonMode ? `${prompt}${JSON_INSTRUCTION}` : prompt }],
            },
            { signal: params.signal }
        );

        const text = message.content
            .flatMap((block) => (block.type === 'text' ? [block.text] : []))
            .join('\n');

        return {
            text,
            usage: {
                promptTokens: message.usage.input_tokens,
                completionTokens: message.usage.output_tokens,
                totalTokens: message.usage.input_tokens + message.usage.output_tokens,
            },
            model: message.model,
            provider: this.name,
        };
    }

    async isAvailable(): Promise<boolean> {
        return Boolean(this.options.apiKey ?? getApiKey('ANTHROPIC_API_KEY'));
    }

    private getClient(): Anthropic {
        if (!this.client) {
            this.client = new Anthropic({
                apiKey: this.options.apiKey ?? getApiKey('ANTHROPIC_API_KEY'),
                baseURL: this.options.baseUrl,
                maxRetries: 0,
            });
        }
        return this.client;
    }
}
