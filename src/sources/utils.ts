/**
 * Shared utilities for database connectors.
 */

/**
 * Reconstruct abstract text from OpenAlex inverted index format.
 *
 * OpenAlex stores abstracts as inverted indexes: { "word": [position1, position2], ... }
 */
export function invertedIndexToText(
    invertedIndex: Record<string, number[]> | null | undefined
): string | null {
    if (!invertedIndex) return null;

    const words: Array<[number, string]> = [];
    for (const [word, positions] of Object.entries(invertedIndex)) {
        for (const pos of positions) {
            if (pos >= 0) words.push([pos, word]);
        }
    }

    if (words.length === 0) return null;

    words.sort((a, b) => a[0] - b[0]);
    return words.map(([, word]) => word).join(' ');
}

/**
 * Strip DOI URL and scheme prefixes to get the bare identifier.
 * "https://doi.org/10.1234/Test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    const bare = doi
        .trim()
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .replace(/^doi:\s*/i, '')
        .trim()
        .toLowerCase();
    return bare || null;
}
