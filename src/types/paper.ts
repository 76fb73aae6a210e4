/**
 * Paper interface, the bibliographic record every phase works on.
 * Normalized from any source database into this common shape.
 */
export interface Paper {
    /** Stable identifier: `doi:<doi>` when a DOI exists, else `<database>:<source id>` */
    id: string;

    /** Paper title (may be empty for malformed connector records) */
    title: string;

    /** Abstract text, null when the source has none */
    abstract: string | null;

    /** Author display names in publication order */
    authors: string[];

    /** Publication year */
    year: number | null;

    /** Digital Object Identifier (without https://doi.org/ prefix) */
    doi: string | null;

    /** Journal or venue name */
    journal: string | null;

    /** Database the record was retrieved from */
    database: string;

    /** Landing page URL */
    url: string | null;

    keywords: string[];

    /** Free-text institution names, backfilled during enrichment */
    affiliations: string[];

    /** Country of the first affiliation that resolves to one */
    country: string | null;
}

/**
 * Build the stable paper id from its DOI or its source record.
 */
export function makePaperId(database: string, sourceId: string, doi: string | null): string {
    return doi ? `doi:${doi.toLowerCase()}` : `${database}:${sourceId}`;
}
