import type { Paper } from './paper.js';

/**
 * Search parameters passed to every database connector.
 */
export interface SearchParams {
    query: string;
    limit: number;
    yearFrom?: number;
    yearTo?: number;
}

/**
 * Interface for bibliographic database connectors (OpenAlex, Semantic Scholar, ...).
 * Each connector normalizes results into the common Paper interface.
 */
export interface SourceAdapter {
    /** Database name as written in `workflow.databases` */
    readonly name: string;

    /**
     * Run one search query. Returns normalized papers.
     */
    search(params: SearchParams): Promise<Paper[]>;
}

/**
 * Options for source adapter initialization.
 */
export interface SourceAdapterOptions {
    /** API key (from environment variable) */
    apiKey?: string;

    /** Contact email for polite pool (OpenAlex) */
    email?: string;
}
