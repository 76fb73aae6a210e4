import { describe, it, expect, vi, afterEach } from 'vitest';
import { CrossrefAffiliationLookup, type AffiliationLookup } from '../enrichment/crossref.js';
import { CountryResolver, PaperEnricher } from '../enrichment/paper-enricher.js';
import { HttpClient } from '../utils/http-client.js';
import { makePaper } from './fixtures.js';

const COUNTRIES = [
    { name: 'United States', aliases: ['USA'] },
    { name: 'United Kingdom', aliases: ['UK', 'England'] },
    { name: 'Germany', aliases: [] },
];

class MapLookup implements AffiliationLookup {
    readonly requested: string[] = [];

    constructor(private readonly byDoi: Record<string, string[]>) {}

    async affiliationsForDoi(doi: string): Promise<string[]> {
        this.requested.push(doi);
        const found = this.byDoi[doi];
        if (!found) throw new Error(`No record for ${doi}`);
        return found;
    }
}

describe('CountryResolver', () => {
    const resolver = new CountryResolver(COUNTRIES);

    it('should resolve the country from the last part of an affiliation', () => {
        expect(resolver.resolve('Department of Medicine, University of Oxford, Oxford, UK')).toBe('United Kingdom');
        expect(resolver.resolve('Institute of Informatics, Munich, Germany')).toBe('Germany');
    });

    it('should fall back to the whole affiliation', () => {
        expect(resolver.resolve('University of Leeds, England, Leeds')).toBe('United Kingdom');
    });

    it('should match short uppercase aliases case-sensitively', () => {
        expect(resolver.resolve('Ukulele Institute, Honolulu')).toBeNull();
        expect(resolver.resolve('Center for Health, usa')).toBeNull();
    });

    it('should pick the most frequent country of a paper', () => {
        expect(
            resolver.resolvePaper(['Lab A, Berlin, Germany', 'Lab B, London, UK', 'Lab C, Hamburg, Germany'])
        ).toBe('Germany');
        expect(resolver.resolvePaper(['Lab B, London, UK', 'Lab A, Berlin, Germany'])).toBe('United Kingdom');
        expect(resolver.resolvePaper([])).toBeNull();
    });

    it('should load the bundled country list by default', () => {
        expect(new CountryResolver().resolve('MIT, Cambridge, MA, USA')).toBe('United States');
    });
});

describe('PaperEnricher', () => {
    it('should backfill affiliations and countries without mutating the input', async () => {
        const lookup = new MapLookup({ '10.1000/b': ['School of Public Health, Boston, USA'] });
        const papers = [
            makePaper({ id: 'a', affiliations: ['Charité, Berlin, Germany'] }),
            makePaper({ id: 'b', doi: '10.1000/b' }),
            makePaper({ id: 'c', doi: '10.1000/c' }),
            makePaper({ id: 'd', country: 'United Kingdom', affiliations: ['Lab, Berlin, Germany'] }),
        ];

        const { papers: enriched, stats } = await new PaperEnricher(new CountryResolver(COUNTRIES), lookup).enrich(papers);

        expect(enriched.map((paper) => paper.country)).toEqual(['Germany', 'United States', null, 'United Kingdom']);
        expect(enriched[1]?.affiliations).toEqual(['School of Public Health, Boston, USA']);
        expect(stats).toEqual({ affiliationsAdded: 1, countriesResolved: 2, lookupFailures: 1 });
        expect(lookup.requested).toEqual(['10.1000/b', '10.1000/c']);
        expect(papers[1]?.affiliations).toEqual([]);
        expect(papers[1]?.country).toBeNull();
    });

    it('should work without a lookup', async () => {
        const { papers } = await new PaperEnricher(new CountryResolver(COUNTRIES), null).enrich([
            makePaper({ id: 'a', doi: '10.1000/a' }),
        ]);
        expect(papers[0]?.country).toBeNull();
    });
});

describe('CrossrefAffiliationLookup', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    function lookupWith(response: () => Response) {
        const fetch = vi.fn(async () => response());
        vi.stubGlobal('fetch', fetch);
        const lookup = new CrossrefAffiliationLookup('reviewer@example.org');
        lookup.setHttpClient(new HttpClient());
        return { lookup, fetch };
    }

    it('should collect distinct affiliation names across authors', async () => {
        const { lookup, fetch } = lookupWith(
            () =>
                new Response(
                    JSON.stringify({
                        message: {
                            author: [
                                { affiliation: [{ name: ' University of Oxford, UK ' }] },
                                { affiliation: [{ name: 'University of Oxford, UK' }, { name: 'MIT, USA' }] },
                                {},
                            ],
                        },
                    }),
                    { status: 200, headers: { 'content-type': 'application/json' } }
                )
        );

        await expect(lookup.affiliationsForDoi('10.1000/a')).resolves.toEqual(['University of Oxford, UK', 'MIT, USA']);
        expect(fetch).toHaveBeenCalledWith(
            'https://api.crossref.org/works/10.1000%2Fa?mailto=reviewer%40example.org',
            expect.objectContaining({ method: 'GET' })
        );
    });

    it('should return no affiliations for an unknown DOI', async () => {
        const { lookup } = lookupWith(() => new Response('Resource not found.', { status: 404 }));
        await expect(lookup.affiliationsForDoi('10.1000/missing')).resolves.toEqual([]);
    });
});
