/**
 * Text normalization and fuzzy matching shared by screening and deduplication.
 * Ratios are on a 0.0 to 1.0 scale.
 */

/**
 * Clean and normalize a paper title for comparison.
 */
export function normalizeTitle(title: string): string {
    return title
        .toLowerCase()
        .replace(/[^\w\s]/g, ' ')  // Remove punctuation
        .replace(/\s+/g, ' ')      // Collapse whitespace
        .trim();
}

/**
 * Lower-cased word tokens (letters, digits, underscore).
 */
export function extractWords(text: string): string[] {
    return text.toLowerCase().match(/\b\w+\b/g) ?? [];
}

/**
 * Length of the longest common subsequence of two strings.
 */
function lcsLength(a: string, b: string): number {
    if (a.length === 0 || b.length === 0) return 0;

    let previous = new Array<number>(b.length + 1).fill(0);
    let current = new Array<number>(b.length + 1).fill(0);

    for (let i = 1; i <= a.length; i++) {
        for (let j = 1; j <= b.length; j++) {
            if (a[i - 1] === b[j - 1]) {
                current[j] = (previous[j - 1] ?? 0) + 1;
            } else {
                current[j] = Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
            }
        }
        [previous, current] = [current, previous];
        current.fill(0);
    }

    return previous[b.length] ?? 0;
}

/**
 * Insertion/deletion similarity: 2·LCS / (|a| + |b|).
 * Two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
    const total = a.length + b.length;
    if (total === 0) return 1.0;
    if (a === b) return 1.0;
    return (2 * lcsLength(a, b)) / total;
}

/**
 * Ratio after sorting the word tokens of both sides, so word order is ignored.
 */
export function tokenSortRatio(a: string, b: string): number {
    const sortTokens = (text: string): string => extractWords(text).sort().join(' ');
    return similarityRatio(sortTokens(a), sortTokens(b));
}

/**
 * Title similarity on normalized titles.
 */
export function titleSimilarity(a: string, b: string): number {
    return similarityRatio(normalizeTitle(a), normalizeTitle(b));
}

/**
 * Filesystem- and id-safe slug: "LLM Chatbots in Health!" → "llm-chatbots-in-health".
 */
export function slugify(text: string, maxLength = 50): string {
    return text
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '')
        .slice(0, maxLength)
        .replace(/-+$/, '');
}

/**
 * Normalize a topic string for matching across runs.
 */
export function normalizeTopic(topic: string): string {
    return topic.trim().toLowerCase().replace(/\s+/g, ' ');
}
