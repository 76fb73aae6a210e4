import { createHash } from 'node:crypto';
import { resolve } from 'node:path';
import { cosmiconfig } from 'cosmiconfig';
import {
    AGENT_NAMES,
    ReviewConfigSchema,
    type AgentConfig,
    type AgentName,
    type ReviewConfig,
    type TopicConfig,
} from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

const REQUIRED_SECTIONS = ['topic', 'agents', 'workflow', 'criteria', 'output'] as const;

const ENV_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Load, substitute and validate a review configuration file (YAML or JSON).
 *
 * - `${VAR}` references are replaced from `env`; an unset variable is a ConfigError.
 * - `{topic}`, `{domain}`, `{research_question}`, `{scope}`, `{keywords}` and `{context}`
 *   placeholders in criteria and agent prompts are filled from the topic section.
 */
export async function loadReviewConfig(
    configPath: string,
    env: NodeJS.ProcessEnv = process.env
): Promise<ReviewConfig> {
    const explorer = cosmiconfig('reviewflow', {
        searchPlaces: ['reviewflow.yaml', 'reviewflow.yml', 'reviewflow.config.json'],
    });

    const absolutePath = resolve(configPath);
    let raw: unknown;
    try {
        const result = await explorer.load(absolutePath);
        if (!result || result.isEmpty) {
            throw new ConfigError(`Config file is empty: ${absolutePath}`, 'file');
        }
        raw = result.config;
    } catch (error) {
        if (error instanceof ConfigError) throw error;
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Cannot read config file ${absolutePath}: ${reason}`, 'file');
    }

    getLogger().debug({ path: absolutePath }, 'Loaded config file');
    return parseReviewConfig(raw, env);
}

/**
 * Validate an already-parsed configuration object.
 */
export function parseReviewConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): ReviewConfig {
    const substituted = substituteEnv(raw, env, '');

    if (!isRecord(substituted)) {
        throw new ConfigError('Config root must be a mapping', 'root');
    }

    for (const section of REQUIRED_SECTIONS) {
        if (substituted[section] === undefined || substituted[section] === null) {
            throw new ConfigError(`Missing required config section: ${section}`, section);
        }
    }

    const parsed = ReviewConfigSchema.safeParse(substituted);
    if (!parsed.success) {
        const issues = parsed.error.issues;
        const field = issues[0]?.path.join('.') || 'root';
        const details = issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`).join('; ');
        throw new ConfigError(`Invalid configuration: ${details}`, field);
    }

    const config = applyPlaceholders(parsed.data);

    for (const agent of AGENT_NAMES) {
        if (!config.agents[agent] && !config.agents['default']) {
            throw new ConfigError(`Missing agent configuration: agents.${agent} (or agents.default)`, `agents.${agent}`);
        }
    }

    return config;
}

/**
 * Resolve the configuration for an agent, falling back to `agents.default`.
 */
export function resolveAgentConfig(config: ReviewConfig, agent: AgentName): AgentConfig {
    const resolved = config.agents[agent] ?? config.agents['default'];
    if (!resolved) {
        throw new ConfigError(`Missing agent configuration: agents.${agent}`, `agents.${agent}`);
    }
    return resolved;
}

/**
 * Stable hash of the effective configuration, recorded with each workflow.
 */
export function hashConfig(config: ReviewConfig): string {
    return createHash('sha256').update(JSON.stringify(config)).digest('hex').slice(0, 16);
}

/**
 * Research question, defaulting to the topic itself.
 */
export function researchQuestionOf(topic: TopicConfig): string {
    return topic.researchQuestion ?? topic.topic;
}

/**
 * Get API key from environment variable.
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}

// ─── Substitution ─────────────────────────────────────────

function substituteEnv(value: unknown, env: NodeJS.ProcessEnv, path: string): unknown {
    if (typeof value === 'string') {
        return value.replace(ENV_PATTERN, (_match, name: string) => {
            const replacement = env[name];
            if (replacement === undefined) {
                throw new ConfigError(`Environment variable ${name} is not set (referenced by ${path || 'root'})`, path || name);
            }
            return replacement;
        });
    }
    if (Array.isArray(value)) {
        return value.map((item, index) => substituteEnv(item, env, `${path}[${index}]`));
    }
    if (isRecord(value)) {
        const result: Record<string, unknown> = {};
        for (const [key, child] of Object.entries(value)) {
            result[key] = substituteEnv(child, env, path ? `${path}.${key}` : key);
        }
        return result;
    }
    return value;
}

function applyPlaceholders(config: ReviewConfig): ReviewConfig {
    const { topic } = config;
    const values: Record<string, string> = {
        topic: topic.topic,
        domain: topic.domain,
        research_question: researchQuestionOf(topic),
        scope: topic.scope,
        keywords: topic.keywords.join(', '),
        context: topic.context,
    };

    const fill = (text: string): string =>
        text.replace(/\{(\w+)\}/g, (match, name: string) => values[name] ?? match);

    const agents: ReviewConfig['agents'] = {};
    for (const [name, agent] of Object.entries(config.agents)) {
        agents[name] = { ...agent, role: fill(agent.role), goal: fill(agent.goal) };
    }

    return {
        ...config,
        agents,
        criteria: {
            inclusion: config.criteria.inclusion.map(fill),
            exclusion: config.criteria.exclusion.map(fill),
        },
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
