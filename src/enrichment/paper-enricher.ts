import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Paper } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import type { AffiliationLookup } from './crossref.js';

const logger = getLogger();

const CountryListSchema = z.array(z.object({ name: z.string(), aliases: z.array(z.string()) }));

export type CountryList = z.infer<typeof CountryListSchema>;

const DEFAULT_COUNTRIES_URL = new URL('../../data/countries.json', import.meta.url);

export function loadCountries(path: string | URL = DEFAULT_COUNTRIES_URL): CountryList {
    return CountryListSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

interface CountryMatcher {
    name: string;
    patterns: RegExp[];
}

/**
 * Resolves countries from affiliation strings. Short all-caps aliases
 * ("UK", "USA") match case-sensitively so they never hit ordinary words.
 */
export class CountryResolver {
    private readonly matchers: CountryMatcher[];

    constructor(countries: CountryList = loadCountries()) {
        this.matchers = countries.map((country) => ({
            name: country.name,
            patterns: [country.name, ...country.aliases].map((alias) => {
                const flags = /^[A-Z.]{2,6}$/.test(alias) ? '' : 'i';
                return new RegExp(`(?:^|[^\\p{L}])${escapeRegExp(alias)}(?:$|[^\\p{L}])`, `u${flags}`);
            }),
        }));
    }

    /**
     * Country named in one affiliation. The last comma-separated part is
     * tried first, since affiliations usually end with the country.
     */
    resolve(affiliation: string): string | null {
        const parts = affiliation.split(',').map((part) => part.trim());
        const last = parts[parts.length - 1] ?? '';
        return this.find(last) ?? this.find(affiliation);
    }

    /**
     * Most frequent country across a paper's affiliations; the first seen wins ties.
     */
    resolvePaper(affiliations: readonly string[]): string | null {
        const counts = new Map<string, number>();
        for (const affiliation of affiliations) {
            const country = this.resolve(affiliation);
            if (country) counts.set(country, (counts.get(country) ?? 0) + 1);
        }

        let best: string | null = null;
        let bestCount = 0;
        for (const [country, count] of counts) {
            if (count > bestCount) {
                best = country;
                bestCount = count;
            }
        }
        return best;
    }

    private find(text: string): string | null {
        if (!text) return null;
        for (const matcher of this.matchers) {
            if (matcher.patterns.some((pattern) => pattern.test(text))) return matcher.name;
        }
        return null;
    }
}

export interface EnrichmentStats {
    affiliationsAdded: number;
    countriesResolved: number;
    lookupFailures: number;
}

/**
 * Backfills affiliations (through the lookup, for papers with a DOI and
 * none recorded) and then `country`. Returns new paper objects.
 */
export class PaperEnricher {
    constructor(
        private readonly resolver: CountryResolver,
        private readonly lookup: AffiliationLookup | null
    ) {}

    async enrich(papers: readonly Paper[], signal?: AbortSignal): Promise<{ papers: Paper[]; stats: EnrichmentStats }> {
        const stats: EnrichmentStats = { affiliationsAdded: 0, countriesResolved: 0, lookupFailures: 0 };
        const enriched: Paper[] = [];

        for (const paper of papers) {
            signal?.throwIfAborted();
            let affiliations = paper.affiliations;

            if (affiliations.length === 0 && paper.doi && this.lookup) {
                try {
                    affiliations = await this.lookup.affiliationsForDoi(paper.doi);
                    if (affiliations.length > 0) stats.affiliationsAdded += 1;
                } catch (error) {
                    stats.lookupFailures += 1;
                    logger.warn({ paperId: paper.id, doi: paper.doi, error }, 'Affiliation lookup failed');
                }
            }

            const country = paper.country ?? this.resolver.resolvePaper(affiliations);
            if (country && !paper.country) stats.countriesResolved += 1;

            enriched.push({ ...paper, affiliations: [...affiliations], country });
        }

        logger.info({ papers: papers.length, ...stats }, 'Enrichment complete');
        return { papers: enriched, stats };
    }
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
