import type { ObservabilityContext } from '../observability/context.js';
import { AGENT_NAMES, type AgentName, type LlmProvider, type ReviewConfig } from '../types/index.js';
import { resolveAgentConfig } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { API_KEY_ENV, createProvider, type ProviderFactory } from './providers/index.js';
import { ResilientLlmClient } from './resilient-client.js';

const logger = getLogger();

/**
 * Builds one resilient client per agent for a workflow run.
 * Breakers are shared per `agent:provider` pair, so every call an agent
 * makes during the run counts toward the same failure streak.
 */
export class LlmRuntime {
    private readonly providers = new Map<AgentName, LlmProvider>();
    private readonly clients = new Map<AgentName, ResilientLlmClient>();
    private readonly breakers = new Map<string, CircuitBreaker>();

    constructor(
        private readonly config: ReviewConfig,
        private readonly observability: ObservabilityContext,
        private readonly providerFactory: ProviderFactory = createProvider,
        private readonly clock: () => number = Date.now,
        private readonly random: () => number = Math.random
    ) {}

    clientFor(agent: AgentName): ResilientLlmClient {
        const existing = this.clients.get(agent);
        if (existing) return existing;

        const agentConfig = resolveAgentConfig(this.config, agent);
        const client = new ResilientLlmClient({
            identity: {
                agent,
                role: agentConfig.role,
                model: agentConfig.model,
                temperature: agentConfig.temperature,
                maxTokens: agentConfig.maxTokens,
            },
            provider: this.providerFor(agent),
            breaker: this.breakerFor(`${agent}:${agentConfig.provider}`),
            observability: this.observability,
            retry: this.config.resilience.retry,
            timeoutMs: agentConfig.timeoutMs ?? this.config.resilience.callTimeoutMs,
            random: this.random,
        });
        this.clients.set(agent, client);
        return client;
    }

    /**
     * Fail before any phase runs when a cloud provider an agent uses has no API key.
     * Ollama is local and keyless, so it is left to the first call.
     */
    async verifyCredentials(): Promise<void> {
        for (const agent of AGENT_NAMES) {
            const agentConfig = resolveAgentConfig(this.config, agent);
            const envVar = API_KEY_ENV[agentConfig.provider];
            if (!envVar) continue;

            if (!(await this.providerFor(agent).isAvailable())) {
                throw new ConfigError(
                    `${envVar} is not set; agents.${agent}.provider is '${agentConfig.provider}'`,
                    `agents.${agent}.provider`
                );
            }
        }
        logger.debug({ agents: AGENT_NAMES.length }, 'Provider credentials present');
    }

    private providerFor(agent: AgentName): LlmProvider {
        let provider = this.providers.get(agent);
        if (!provider) {
            provider = this.providerFactory(resolveAgentConfig(this.config, agent));
            this.providers.set(agent, provider);
        }
        return provider;
    }

    breakerFor(name: string): CircuitBreaker {
        let breaker = this.breakers.get(name);
        if (!breaker) {
            breaker = new CircuitBreaker(name, this.config.resilience.circuitBreaker, this.clock);
            this.breakers.set(name, breaker);
        }
        return breaker;
    }
}
