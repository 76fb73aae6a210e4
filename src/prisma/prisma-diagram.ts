import type { PrismaCounts } from '../types/index.js';

const n = (value: number | undefined): string => (value === undefined ? 'n = not reported' : `n = ${value}`);

/**
 * PRISMA 2020 flow diagram as a Mermaid flowchart inside Markdown.
 */
export function renderPrismaDiagram(counts: PrismaCounts, topic: string): string {
    const breakdown = Object.entries(counts.database_breakdown)
        .map(([database, count]) => `${database}: ${count}`)
        .join('<br/>');
    const identified = `Records identified from databases (${n(counts.found)})${breakdown ? `<br/>${breakdown}` : ''}`;

    const lines = [
        `# PRISMA Flow Diagram: ${topic}`,
        '',
        '```mermaid',
        'flowchart TD',
        `    A["${identified}"] --> B["Records after duplicates removed (${n(counts.no_dupes)})"]`,
        `    B --> C["Records screened (${n(counts.screened)})"]`,
        `    C --> D["Records excluded (${n(counts.screen_exclusions)})"]`,
        `    C --> E["Reports sought for retrieval (${n(counts.full_text_sought)})"]`,
        `    E --> F["Reports not retrieved, assessed on title/abstract (${n(counts.full_text_not_retrieved)})"]`,
        `    E --> G["Reports assessed for eligibility (${n(counts.full_text_assessed)})"]`,
        `    G --> H["Reports excluded (${n(counts.full_text_exclusions)})"]`,
        `    G --> I["Studies included in review (${n(counts.qualitative)})"]`,
    ];
    if (counts.quantitative !== undefined) {
        lines.push(`    I --> J["Studies included in quantitative synthesis (${n(counts.quantitative)})"]`);
    }
    lines.push('```', '');
    return lines.join('\n');
}
