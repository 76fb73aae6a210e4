/**
 * Tolerant extraction of `MARKER: value` lines from free-text responses.
 * A value runs until the next known marker or the end of the text.
 * Markdown emphasis around marker names (`**DECISION:**`) is accepted.
 */
export function extractMarkers(text: string, markers: readonly string[]): Map<string, string> {
    const found = new Map<string, string>();
    const alternatives = markers.map(escapeRegExp).join('|');
    const pattern = new RegExp(`(?:^|\\n)[\\s*_#-]*(${alternatives})[\\s*_]*:[\\s*_]*`, 'gi');

    const hits: Array<{ marker: string; start: number; end: number }> = [];
    for (const match of text.matchAll(pattern)) {
        const name = match[1];
        if (name === undefined || match.index === undefined) continue;
        hits.push({ marker: name.toUpperCase(), start: match.index, end: match.index + match[0].length });
    }

    hits.forEach((hit, i) => {
        const next = hits[i + 1];
        const value = text.slice(hit.end, next ? next.start : text.length).trim();
        if (!found.has(hit.marker) && value !== '') found.set(hit.marker, value);
    });

    return found;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
