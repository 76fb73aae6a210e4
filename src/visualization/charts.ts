import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Paper, QualityAssessment } from '../types/index.js';

export interface Distribution {
    name: string;
    title: string;
    label: string;
    rows: Array<[string, number]>;
}

/**
 * Count papers per key. Papers without a value go under `Unknown`.
 * Rows are sorted by count (descending), then key.
 */
export function countBy(papers: readonly Paper[], key: (paper: Paper) => string | null): Array<[string, number]> {
    const counts = new Map<string, number>();
    for (const paper of papers) {
        const value = key(paper) ?? 'Unknown';
        counts.set(value, (counts.get(value) ?? 0) + 1);
    }
    return [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

/**
 * Distributions shown in the report: publication year (chronological),
 * country, source database and, when available, quality rating.
 */
export function buildDistributions(
    papers: readonly Paper[],
    assessments: readonly QualityAssessment[] = []
): Distribution[] {
    const years = countBy(papers, (paper) => (paper.year === null ? null : String(paper.year))).sort((a, b) =>
        a[0].localeCompare(b[0])
    );

    const distributions: Distribution[] = [
        { name: 'year_distribution', title: 'Publications by year', label: 'Year', rows: years },
        { name: 'country_distribution', title: 'Publications by country', label: 'Country', rows: countBy(papers, (p) => p.country) },
        { name: 'database_distribution', title: 'Publications by database', label: 'Database', rows: countBy(papers, (p) => p.database) },
    ];

    if (assessments.length > 0) {
        const ratings = new Map<string, number>();
        for (const assessment of assessments) {
            ratings.set(assessment.rating, (ratings.get(assessment.rating) ?? 0) + 1);
        }
        distributions.push({
            name: 'quality_distribution',
            title: 'Studies by quality rating',
            label: 'Rating',
            rows: [...ratings.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0])),
        });
    }

    return distributions;
}

/**
 * Markdown table with a proportional bar column.
 */
export function renderMarkdownTable(distribution: Distribution): string {
    const max = Math.max(1, ...distribution.rows.map(([, count]) => count));
    const lines = [
        `## ${distribution.title}`,
        '',
        `| ${distribution.label} | Count | |`,
        '| --- | ---: | --- |',
        ...distribution.rows.map(
            ([key, count]) => `| ${key} | ${count} | ${'█'.repeat(Math.max(1, Math.round((count / max) * 20)))} |`
        ),
        '',
    ];
    return lines.join('\n');
}

export function renderCsv(distribution: Distribution): string {
    const escape = (value: string): string => (/[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value);
    return [
        `${distribution.label.toLowerCase()},count`,
        ...distribution.rows.map(([key, count]) => `${escape(key)},${count}`),
        '',
    ].join('\n');
}

/**
 * Write every distribution as `.md` and `.csv` under `directory`.
 * Returns the written paths.
 */
export function writeDistributions(distributions: readonly Distribution[], directory: string): string[] {
    mkdirSync(directory, { recursive: true });
    const written: string[] = [];
    for (const distribution of distributions) {
        const markdownPath = join(directory, `${distribution.name}.md`);
        const csvPath = join(directory, `${distribution.name}.csv`);
        writeFileSync(markdownPath, renderMarkdownTable(distribution), 'utf-8');
        writeFileSync(csvPath, renderCsv(distribution), 'utf-8');
        written.push(markdownPath, csvPath);
    }
    return written;
}
