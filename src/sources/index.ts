import type { SourceAdapter } from '../types/index.js';
import { OpenAlexAdapter } from './openalex.js';
import { SemanticScholarAdapter } from './semantic-scholar.js';

/**
 * Connector factories keyed by the names accepted in `workflow.databases`.
 */
const CONNECTORS: Record<string, () => SourceAdapter> = {
    openalex: () => new OpenAlexAdapter(),
    semantic_scholar: () => new SemanticScholarAdapter(),
};

export const SUPPORTED_DATABASES = Object.keys(CONNECTORS);

/**
 * Create the connector for a database name, or null when none is available.
 */
export function createConnector(database: string): SourceAdapter | null {
    const factory = CONNECTORS[database.toLowerCase()];
    return factory ? factory() : null;
}
