import { z } from 'zod';
import { makePaperId, type Paper, type SearchParams, type SourceAdapter, type SourceAdapterOptions } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { invertedIndexToText, stripDoiPrefix } from './utils.js';

const logger = getLogger();

const OPENALEX_BASE = 'https://api.openalex.org';

/**
 * OpenAlex work (subset of relevant fields).
 */
const OpenAlexWorkSchema = z.object({
    id: z.string(),
    doi: z.string().nullish(),
    title: z.string().nullish(),
    display_name: z.string().nullish(),
    publication_year: z.number().int().nullish(),
    abstract_inverted_index: z.record(z.array(z.number())).nullish(),
    primary_location: z
        .object({
            source: z.object({ display_name: z.string().nullish() }).nullish(),
            landing_page_url: z.string().nullish(),
        })
        .nullish(),
    authorships: z
        .array(
            z.object({
                author: z.object({ display_name: z.string().nullish() }).nullish(),
                institutions: z.array(z.object({ display_name: z.string().nullish() })).nullish(),
            })
        )
        .nullish(),
    keywords: z.array(z.object({ display_name: z.string().nullish() })).nullish(),
});

const OpenAlexSearchSchema = z.object({
    results: z.array(OpenAlexWorkSchema),
});

type OpenAlexWork = z.infer<typeof OpenAlexWorkSchema>;

/**
 * OpenAlex connector.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexAdapter implements SourceAdapter {
    readonly name = 'openalex';
    private httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly email?: string;

    constructor(options?: SourceAdapterOptions) {
        this.apiKey = options?.apiKey ?? process.env['OPENALEX_API_KEY'];
        this.email = options?.email ?? process.env['OPENALEX_EMAIL'];
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
            search: params.query,
            per_page: String(Math.min(params.limit, 200)),
        });

        const yearFilter = buildYearFilter(params.yearFrom, params.yearTo);
        if (yearFilter) query.set('filter', yearFilter);
        if (this.apiKey) query.set('api_key', this.apiKey);
        if (this.email) query.set('mailto', this.email);

        const url = `${OPENALEX_BASE}/works?${query.toString()}`;
        logger.debug({ url }, 'OpenAlex search');

        const response = await this.httpClient.get(url, { source: 'openalex' });
        const parsed = OpenAlexSearchSchema.parse(response.data);
        return parsed.results.slice(0, params.limit).map((work) => this.normalizeWork(work));
    }

    normalizeWork(work: OpenAlexWork): Paper {
        const sourceId = work.id.replace('https://openalex.org/', '');
        const doi = stripDoiPrefix(work.doi);

        const authors = (work.authorships ?? [])
            .map((a) => a.author?.display_name)
            .filter((name): name is string => !!name);

        const affiliations = [
            ...new Set(
                (work.authorships ?? [])
                    .flatMap((a) => a.institutions ?? [])
                    .map((i) => i.display_name)
                    .filter((name): name is string => !!name)
            ),
        ];

        const keywords = (work.keywords ?? [])
            .map((k) => k.display_name)
            .filter((k): k is string => !!k);

        return {
            id: makePaperId(this.name, sourceId, doi),
            title: work.display_name ?? work.title ?? '',
            abstract: invertedIndexToText(work.abstract_inverted_index),
            authors,
            year: work.publication_year ?? null,
            doi,
            journal: work.primary_location?.source?.display_name ?? null,
            database: this.name,
            url: work.primary_location?.landing_page_url ?? (doi ? `https://doi.org/${doi}` : null),
            keywords,
            affiliations,
            country: null,
        };
    }
}

/**
 * OpenAlex year filter: `publication_year:2015-2020`, `>2014` or `<2021`.
 */
export function buildYearFilter(from?: number, to?: number): string | null {
    if (from !== undefined && to !== undefined) return `publication_year:${from}-${to}`;
    if (from !== undefined) return `publication_year:>${from - 1}`;
    if (to !== undefined) return `publication_year:<${to + 1}`;
    return null;
}
