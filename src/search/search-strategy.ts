import { QUICK_SEARCH_LIMIT, type ReviewConfig } from '../types/index.js';

/**
 * A concept with its interchangeable terms. Terms are OR-ed, groups AND-ed.
 */
export interface TermGroup {
    name: string;
    terms: string[];
}

/**
 * Search plan for one run. Not checkpointed: it is rebuilt from config on
 * every run, without LLM calls.
 */
export interface SearchStrategy {
    topic: string;
    termGroups: TermGroup[];
    yearFrom?: number;
    yearTo?: number;
    limitPerDatabase: number;
    queries: Record<string, string>;
}

/**
 * Build the per-database queries from the topic keywords and the configured
 * keyword-filter concept groups.
 */
export function buildSearchStrategy(config: ReviewConfig, options: { quickSearch?: boolean } = {}): SearchStrategy {
    const termGroups = buildTermGroups(config);
    const queries: Record<string, string> = {};
    for (const database of config.workflow.databases) {
        queries[database] = buildDatabaseQuery(database, termGroups);
    }

    const limit = config.workflow.maxResultsPerDatabase;
    return {
        topic: config.topic.topic,
        termGroups,
        yearFrom: config.workflow.dateRange.start,
        yearTo: config.workflow.dateRange.end,
        limitPerDatabase: options.quickSearch ? Math.min(limit, QUICK_SEARCH_LIMIT) : limit,
        queries,
    };
}

function buildTermGroups(config: ReviewConfig): TermGroup[] {
    const configured = Object.entries(config.screening.keywordFilter.searchTerms)
        .map(([name, terms]) => ({ name, terms: unique(terms) }))
        .filter((group) => group.terms.length > 0);
    if (configured.length > 0) return configured;

    const keywords = unique(config.topic.keywords);
    return [{ name: 'topic', terms: keywords.length > 0 ? keywords : [config.topic.topic] }];
}

/**
 * Boolean syntax for OpenAlex and unknown databases; Semantic Scholar's
 * search endpoint takes plain text, so it gets the leading term of each group.
 */
export function buildDatabaseQuery(database: string, groups: readonly TermGroup[]): string {
    if (database.toLowerCase() === 'semantic_scholar') {
        return groups
            .map((group) => group.terms[0])
            .filter((term): term is string => term !== undefined)
            .join(' ');
    }

    const clauses = groups.map((group) => group.terms.map(quoteTerm).join(' OR '));
    if (clauses.length === 1) return clauses[0] ?? '';
    return clauses.map((clause) => `(${clause})`).join(' AND ');
}

/**
 * Human-readable summary, used by `--dry-run` and the methods section.
 */
export function describeSearchStrategy(strategy: SearchStrategy): string {
    const lines = strategy.termGroups.map((group, i) => `${i + 1}. ${group.name}: ${group.terms.join(', ')}`);
    lines.push(`Date range: ${strategy.yearFrom ?? 'any'} to ${strategy.yearTo ?? 'present'}`);
    lines.push(`Results per database: ${strategy.limitPerDatabase}`);
    for (const [database, query] of Object.entries(strategy.queries)) {
        lines.push(`${database}: ${query}`);
    }
    return lines.join('\n');
}

function quoteTerm(term: string): string {
    return /\s/.test(term) ? `"${term}"` : term;
}

function unique(terms: readonly string[]): string[] {
    return [...new Set(terms.map((term) => term.trim()).filter(Boolean))];
}
