import { z } from 'zod';
import type { ResponseCache } from '../cache/response-cache.js';
import { PaperSchema } from '../types/checkpoint.js';
import type { Paper, SourceAdapter } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import type { SearchStrategy } from './search-strategy.js';

const logger = getLogger();

const CachedPapersSchema = z.array(PaperSchema);

export interface DatabaseSearchResult {
    papers: Paper[];
    queries: Record<string, string>;
    /** Records retrieved per database */
    breakdown: Record<string, number>;
}

/**
 * Run the strategy against every connector, serving repeated queries from
 * the response cache. A failing database is logged and counted as zero;
 * the search only fails when no database answered.
 */
export async function searchDatabases(
    strategy: SearchStrategy,
    connectors: readonly SourceAdapter[],
    cache: ResponseCache | null,
    signal?: AbortSignal
): Promise<DatabaseSearchResult> {
    if (connectors.length === 0) {
        throw new Error('No database connectors available for the configured databases');
    }

    const papers: Paper[] = [];
    const queries: Record<string, string> = {};
    const breakdown: Record<string, number> = {};
    const failed: string[] = [];

    for (const connector of connectors) {
        signal?.throwIfAborted();
        const query = strategy.queries[connector.name] ?? '';
        queries[connector.name] = query;

        const cacheKey = [
            connector.name,
            query,
            String(strategy.limitPerDatabase),
            String(strategy.yearFrom ?? ''),
            String(strategy.yearTo ?? ''),
        ];

        const cached = CachedPapersSchema.safeParse(cache?.get(cacheKey) ?? null);
        if (cached.success) {
            logger.info({ database: connector.name, count: cached.data.length }, 'Search results served from cache');
            papers.push(...cached.data);
            breakdown[connector.name] = cached.data.length;
            continue;
        }

        try {
            const results = await connector.search({
                query,
                limit: strategy.limitPerDatabase,
                yearFrom: strategy.yearFrom,
                yearTo: strategy.yearTo,
            });
            cache?.set(cacheKey, results);
            papers.push(...results);
            breakdown[connector.name] = results.length;
            logger.info({ database: connector.name, count: results.length }, 'Database searched');
        } catch (error) {
            failed.push(connector.name);
            breakdown[connector.name] = 0;
            logger.error({ database: connector.name, error }, 'Database search failed');
        }
    }

    if (failed.length === connectors.length) {
        throw new Error(`All database searches failed: ${failed.join(', ')}`);
    }

    return { papers, queries, breakdown };
}
