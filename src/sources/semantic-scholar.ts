import { z } from 'zod';
import { makePaperId, type Paper, type SearchParams, type SourceAdapter, type SourceAdapterOptions } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { stripDoiPrefix } from './utils.js';

const logger = getLogger();

const S2_BASE = 'https://api.semanticscholar.org/graph/v1';

/** Fields to request from S2 API */
const PAPER_FIELDS = [
    'paperId', 'externalIds', 'title', 'abstract', 'year', 'venue',
    'fieldsOfStudy', 'authors', 'url',
].join(',');

const S2PaperSchema = z.object({
    paperId: z.string(),
    externalIds: z.object({ DOI: z.string().nullish() }).nullish(),
    title: z.string().nullish(),
    abstract: z.string().nullish(),
    year: z.number().int().nullish(),
    venue: z.string().nullish(),
    fieldsOfStudy: z.array(z.string()).nullish(),
    authors: z.array(z.object({ name: z.string().nullish() })).nullish(),
    url: z.string().nullish(),
});

const S2SearchSchema = z.object({
    data: z.array(S2PaperSchema).nullish(),
});

type S2Paper = z.infer<typeof S2PaperSchema>;

/**
 * Semantic Scholar connector.
 *
 * @see https://api.semanticscholar.org/
 */
export class SemanticScholarAdapter implements SourceAdapter {
    readonly name = 'semantic_scholar';
    private httpClient: HttpClient;
    private readonly apiKey?: string;

    constructor(options?: SourceAdapterOptions) {
        this.apiKey = options?.apiKey ?? process.env['S2_API_KEY'];
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async search(params: SearchParams): Promise<Paper[]> {
        const query = new URLSearchParams({
            query: cleanSearchQuery(params.query),
            limit: String(Math.min(params.limit, 100)),
            fields: PAPER_FIELDS,
        });

        if (params.yearFrom !== undefined || params.yearTo !== undefined) {
            query.set('year', `${params.yearFrom ?? ''}-${params.yearTo ?? ''}`);
        }

        const url = `${S2_BASE}/paper/search?${query.toString()}`;
        logger.debug({ url }, 'Semantic Scholar search');

        const response = await this.httpClient.get(url, {
            source: 'semantic_scholar',
            headers: this.buildHeaders(),
        });

        const parsed = S2SearchSchema.parse(response.data);
        return (parsed.data ?? []).map((paper) => this.normalizeS2Paper(paper));
    }

    normalizeS2Paper(paper: S2Paper): Paper {
        const doi = stripDoiPrefix(paper.externalIds?.DOI);

        return {
            id: makePaperId(this.name, paper.paperId, doi),
            title: paper.title ?? '',
            abstract: paper.abstract ?? null,
            authors: (paper.authors ?? [])
                .map((a) => a.name)
                .filter((name): name is string => !!name),
            year: paper.year ?? null,
            doi,
            journal: paper.venue || null,
            database: this.name,
            url: paper.url ?? (doi ? `https://doi.org/${doi}` : null),
            keywords: paper.fieldsOfStudy ?? [],
            affiliations: [],
            country: null,
        };
    }

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {};
        if (this.apiKey) {
            headers['x-api-key'] = this.apiKey;
        }
        return headers;
    }
}

/**
 * Semantic Scholar treats hyphens and plus signs as operators.
 */
export function cleanSearchQuery(query: string): string {
    return query
        .replace(/[-+]/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}
