import { z } from 'zod';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../../types/index.js';
import { getHttpClient, type HttpClient } from '../../utils/http-client.js';

const DEFAULT_BASE_URL = 'http://localhost:11434';

const OllamaChatResponseSchema = z.object({
    model: z.string(),
    message: z.object({ content: z.string() }),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
});

/**
 * Local Ollama server provider, called through the shared HTTP client.
 */
export class OllamaProvider implements LlmProvider {
    readonly name = 'ollama' as const;
    private httpClient: HttpClient;
    private readonly baseUrl: string;

    constructor(private readonly options: LlmProviderOptions) {
        this.baseUrl = (options.baseUrl ?? process.env['OLLAMA_BASE_URL'] ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const messages = [
            ...(params.systemPrompt ? [{ role: 'system', content: params.systemPrompt }] : []),
            { role: 'user', content: prompt },
        ];

        const response = await this.httpClient.post(
            `${this.baseUrl}/api/chat`,
            {
                model: params.model ?? this.options.model,
                messages,
                stream: false,
                ...(params.jsonMode ? { format: 'json' } : {}),
                options: {
                    temperature: params.temperature,
                    num_predict: params.maxTokens,
                },
            },
            { source: 'ollama', signal: params.signal }
        );

        const parsed = OllamaChatResponseSchema.parse(response.data);
        const promptTokens = parsed.prompt_eval_count ?? 0;
        const completionTokens = parsed.eval_count ?? 0;

        return {
            text: parsed.message.content,
            usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
            model: parsed.model,
            provider: this.name,
        };
    }

    async isAvailable(): Promise<boolean> {
        try {
            await this.httpClient.get(`${this.baseUrl}/api/tags`, { source: 'ollama', timeout: 3000 });
            return true;
        } catch {
            return false;
        }
    }
}
