import { describe, it, expect, vi, afterEach } from 'vitest';
import { OpenAlexAdapter, buildYearFilter } from '../sources/openalex.js';
import { SemanticScholarAdapter, cleanSearchQuery } from '../sources/semantic-scholar.js';
import { SUPPORTED_DATABASES, createConnector } from '../sources/index.js';
import { invertedIndexToText, stripDoiPrefix } from '../sources/utils.js';
import { makePaperId } from '../types/index.js';
import { HttpClient } from '../utils/http-client.js';

function stubJson(body: unknown) {
    const fetch = vi.fn(async (_url: string, _init: RequestInit) =>
        new Response(JSON.stringify(body), { status: 200, headers: { 'content-type': 'application/json' } })
    );
    vi.stubGlobal('fetch', fetch);
    return fetch;
}

describe('Source Utils', () => {
    describe('invertedIndexToText', () => {
        it('should reconstruct text in position order', () => {
            expect(invertedIndexToText({ world: [1], Hello: [0] })).toBe('Hello world');
        });

        it('should handle repeated words', () => {
            expect(invertedIndexToText({ the: [0, 3], cat: [1], chased: [2], mouse: [4] })).toBe(
                'the cat chased the mouse'
            );
        });

        it('should return null for missing or empty indexes', () => {
            expect(invertedIndexToText(null)).toBeNull();
            expect(invertedIndexToText(undefined)).toBeNull();
            expect(invertedIndexToText({})).toBeNull();
        });
    });

    describe('stripDoiPrefix', () => {
        it('should strip URL and scheme prefixes and lower-case the DOI', () => {
            expect(stripDoiPrefix('https://doi.org/10.1234/Test')).toBe('10.1234/test');
            expect(stripDoiPrefix('http://dx.doi.org/10.1234/x')).toBe('10.1234/x');
            expect(stripDoiPrefix('doi: 10.1234/y')).toBe('10.1234/y');
        });

        it('should return null for empty values', () => {
            expect(stripDoiPrefix(null)).toBeNull();
            expect(stripDoiPrefix('   ')).toBeNull();
        });
    });

    describe('makePaperId', () => {
        it('should prefer the DOI over the source id', () => {
            expect(makePaperId('openalex', 'W1', '10.1000/ABC')).toBe('doi:10.1000/abc');
            expect(makePaperId('openalex', 'W1', null)).toBe('openalex:W1');
        });
    });
});

describe('OpenAlexAdapter', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    const adapter = new OpenAlexAdapter({ apiKey: 'test-key', email: 'reviewer@example.org' });

    it('should normalize a work into a paper', () => {
        const paper = adapter.normalizeWork({
            id: 'https://openalex.org/W123',
            doi: 'https://doi.org/10.1000/ABC',
            display_name: 'Chatbots for adherence',
            publication_year: 2022,
            abstract_inverted_index: { Hello: [0], world: [1] },
            primary_location: { source: { display_name: 'Journal of Digital Health' }, landing_page_url: null },
            authorships: [
                { author: { display_name: 'Ada Lovelace' }, institutions: [{ display_name: 'University X' }] },
                { author: { display_name: 'Grace Hopper' }, institutions: [{ display_name: 'University X' }] },
            ],
            keywords: [{ display_name: 'chatbot' }],
        });

        expect(paper).toEqual({
            id: 'doi:10.1000/abc',
            title: 'Chatbots for adherence',
            abstract: 'Hello world',
            authors: ['Ada Lovelace', 'Grace Hopper'],
            year: 2022,
            doi: '10.1000/abc',
            journal: 'Journal of Digital Health',
            database: 'openalex',
            url: 'https://doi.org/10.1000/abc',
            keywords: ['chatbot'],
            affiliations: ['University X'],
            country: null,
        });
    });

    it('should build the search URL and respect the limit', async () => {
        const fetch = stubJson({
            results: [
                { id: 'https://openalex.org/W1', display_name: 'First' },
                { id: 'https://openalex.org/W2', display_name: 'Second' },
            ],
        });
        adapter.setHttpClient(new HttpClient());

        const papers = await adapter.search({ query: 'chatbot adherence', limit: 1, yearFrom: 2015, yearTo: 2020 });

        expect(papers.map((paper) => paper.id)).toEqual(['openalex:W1']);
        expect(fetch.mock.calls[0]?.[0]).toBe(
            'https://api.openalex.org/works?search=chatbot+adherence&per_page=1&filter=publication_year%3A2015-2020&api_key=test-key&mailto=reviewer%40example.org'
        );
    });

    it('should build open-ended year filters', () => {
        expect(buildYearFilter(2015)).toBe('publication_year:>2014');
        expect(buildYearFilter(undefined, 2020)).toBe('publication_year:<2021');
        expect(buildYearFilter()).toBeNull();
    });
});

describe('SemanticScholarAdapter', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    const adapter = new SemanticScholarAdapter({ apiKey: 'test-key' });

    it('should normalize a paper without a DOI', () => {
        const paper = adapter.normalizeS2Paper({
            paperId: 'abc',
            externalIds: { DOI: null },
            title: 'Reminder apps',
            venue: '',
            authors: [{ name: 'Ada Lovelace' }, { name: null }],
            fieldsOfStudy: null,
        });

        expect(paper).toMatchObject({
            id: 'semantic_scholar:abc',
            journal: null,
            url: null,
            authors: ['Ada Lovelace'],
            keywords: [],
            abstract: null,
            year: null,
        });
    });

    it('should send the API key and an open year range', async () => {
        const fetch = stubJson({ data: [{ paperId: 'p1', title: 'One' }] });
        adapter.setHttpClient(new HttpClient());

        const papers = await adapter.search({ query: 'covid-19 chatbot', limit: 5, yearFrom: 2015 });

        expect(papers.map((paper) => paper.id)).toEqual(['semantic_scholar:p1']);
        const [url, init] = fetch.mock.calls[0] ?? [];
        expect(url).toContain('query=covid+19+chatbot&limit=5&fields=');
        expect(url).toContain('&year=2015-');
        expect(init?.headers).toMatchObject({ 'x-api-key': 'test-key' });
    });

    it('should treat a missing data array as no results', async () => {
        stubJson({ total: 0 });
        adapter.setHttpClient(new HttpClient());

        await expect(adapter.search({ query: 'nothing', limit: 5 })).resolves.toEqual([]);
    });

    it('should strip query operators', () => {
        expect(cleanSearchQuery('covid-19 + chatbot')).toBe('covid 19 chatbot');
    });
});

describe('createConnector', () => {
    it('should create connectors by case-insensitive name', () => {
        expect(SUPPORTED_DATABASES).toEqual(['openalex', 'semantic_scholar']);
        expect(createConnector('OpenAlex')).toBeInstanceOf(OpenAlexAdapter);
        expect(createConnector('semantic_scholar')).toBeInstanceOf(SemanticScholarAdapter);
        expect(createConnector('scopus')).toBeNull();
    });
});
