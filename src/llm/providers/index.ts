import type { AgentConfig, LlmProvider, ProviderName } from '../../types/index.js';
import { AnthropicProvider } from './anthropic.js';
import { OllamaProvider } from './ollama.js';
import { OpenAiProvider } from './openai.js';

export type ProviderFactory = (agent: AgentConfig) => LlmProvider;

/**
 * Environment variable holding each cloud provider's API key.
 */
export const API_KEY_ENV: Partial<Record<ProviderName, string>> = {
    openai: 'OPENAI_API_KEY',
    anthropic: 'ANTHROPIC_API_KEY',
};

/**
 * Select the provider implementation for an agent's configuration.
 */
export const createProvider: ProviderFactory = (agent) => {
    const options = { model: agent.model, baseUrl: agent.baseUrl };
    switch (agent.provider) {
        case 'openai':
            return new OpenAiProvider(options);
        case 'anthropic':
            return new AnthropicProvider(options);
        case 'ollama':
            return new OllamaProvider(options);
    }
};
