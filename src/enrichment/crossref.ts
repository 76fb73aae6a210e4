import { z } from 'zod';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';

const CROSSREF_BASE = 'https://api.crossref.org';

const CrossrefWorkSchema = z.object({
    message: z.object({
        author: z
            .array(
                z.object({
                    affiliation: z.array(z.object({ name: z.string() })).optional(),
                })
            )
            .optional(),
    }),
});

/**
 * Looks up author affiliations for a DOI.
 */
export interface AffiliationLookup {
    affiliationsForDoi(doi: string): Promise<string[]>;
}

/**
 * Crossref `/works/{doi}` lookup. A 404 means no record and yields no affiliations.
 */
export class CrossrefAffiliationLookup implements AffiliationLookup {
    private httpClient: HttpClient;

    constructor(private readonly email?: string) {
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async affiliationsForDoi(doi: string): Promise<string[]> {
        const query = this.email ? `?mailto=${encodeURIComponent(this.email)}` : '';
        let data: unknown;
        try {
            const response = await this.httpClient.get(`${CROSSREF_BASE}/works/${encodeURIComponent(doi)}${query}`, {
                source: 'crossref',
            });
            data = response.data;
        } catch (error) {
            if (error instanceof HttpError && error.status === 404) return [];
            throw error;
        }

        const work = CrossrefWorkSchema.parse(data);
        const names = (work.message.author ?? []).flatMap((author) =>
            (author.affiliation ?? []).map((affiliation) => affiliation.name.trim())
        );
        return [...new Set(names.filter(Boolean))];
    }
}
