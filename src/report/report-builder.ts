import { mkdirSync, writeFileSync } from 'node:fs';
import { basename, dirname, relative } from 'node:path';
import type { Paper, PrismaCounts, WritingSection } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const CITATION_PATTERN = /\[@([^\]\s]+)\]/g;

export interface ReportInputs {
    topic: string;
    workflowId: string;
    sections: Record<WritingSection, string>;
    /** Papers that may be cited, keyed by id */
    papers: readonly Paper[];
    counts: PrismaCounts;
    /** Absolute path of the PRISMA diagram, or null when generation failed */
    prismaDiagramPath: string | null;
    /** Visualization artifact paths, or null when generation failed */
    visualizations: readonly string[] | null;
    cost: { totalCostUsd: number; calls: number } | null;
    generatedAt: Date;
}

/**
 * Numbers `[@key]` citations in order of first appearance across calls.
 * Unknown keys are left as written.
 */
export class CitationNumbering {
    private readonly numbers = new Map<string, number>();
    private readonly cited: Paper[] = [];
    private readonly unknown = new Set<string>();

    constructor(private readonly papers: ReadonlyMap<string, Paper>) {}

    substitute(text: string): string {
        return text.replace(CITATION_PATTERN, (match, key: string) => {
            const paper = this.papers.get(key);
            if (!paper) {
                this.unknown.add(key);
                return match;
            }
            let number = this.numbers.get(key);
            if (number === undefined) {
                number = this.cited.length + 1;
                this.numbers.set(key, number);
                this.cited.push(paper);
            }
            return `[${number}]`;
        });
    }

    getCited(): readonly Paper[] {
        return this.cited;
    }

    getUnknown(): string[] {
        return [...this.unknown];
    }
}

/**
 * `n. Authors (year). Title. Journal. https://doi.org/doi`
 * More than three authors are shortened to the first three and "et al.".
 */
export function formatReference(index: number, paper: Paper): string {
    const authors =
        paper.authors.length === 0
            ? 'Unknown'
            : paper.authors.length > 3
              ? `${paper.authors.slice(0, 3).join(', ')}, et al.`
              : paper.authors.join(', ');
    const title = paper.title.trim().replace(/\.+$/, '');

    const parts = [`${index}. ${authors} (${paper.year ?? 'n.d.'}).`, `${title}.`];
    if (paper.journal) parts.push(`${paper.journal}.`);
    if (paper.doi) {
        parts.push(`https://doi.org/${paper.doi}`);
    } else if (paper.url) {
        parts.push(paper.url);
    }
    return parts.join(' ');
}

/**
 * Assemble the final report in fixed section order.
 */
export function buildReport(inputs: ReportInputs, reportPath: string): string {
    const numbering = new CitationNumbering(new Map(inputs.papers.map((paper) => [paper.id, paper])));
    const reportDir = dirname(reportPath);
    const link = (path: string): string => relative(reportDir, path).split('\\').join('/');

    const prismaBody = inputs.prismaDiagramPath
        ? `See the [PRISMA flow diagram](${link(inputs.prismaDiagramPath)}).`
        : '_PRISMA diagram unavailable._';

    const markdownArtifacts = (inputs.visualizations ?? []).filter((path) => path.endsWith('.md'));
    const visualizationBody =
        markdownArtifacts.length > 0
            ? markdownArtifacts.map((path) => `- [${basename(path, '.md')}](${link(path)})`).join('\n')
            : '_Visualizations unavailable._';

    // Numbering follows reading order, so sections are substituted top to bottom.
    const body: Array<[string, string]> = [
        ['Abstract', numbering.substitute(inputs.sections.abstract)],
        ['Introduction', numbering.substitute(inputs.sections.introduction)],
        ['Methods', numbering.substitute(inputs.sections.methods)],
        ['PRISMA Flow Diagram', prismaBody],
        ['Results', numbering.substitute(inputs.sections.results)],
        ['Visualizations', visualizationBody],
        ['Discussion', numbering.substitute(inputs.sections.discussion)],
    ];

    const cited = numbering.getCited();
    const references =
        cited.length > 0 ? cited.map((paper, i) => formatReference(i + 1, paper)).join('\n') : '_No references cited._';

    const unknown = numbering.getUnknown();
    if (unknown.length > 0) {
        logger.warn({ keys: unknown }, 'Unknown citation keys left unresolved');
    }

    const sections: Array<[string, string]> = [
        ...body,
        ['References', references],
        ['Summary', summaryBlock(inputs)],
    ];

    return [
        `# Systematic Review: ${inputs.topic}`,
        '',
        `_Workflow ${inputs.workflowId}, generated ${inputs.generatedAt.toISOString()}_`,
        '',
        ...sections.flatMap(([heading, content]) => [`## ${heading}`, '', content.trim(), '']),
    ].join('\n');
}

/**
 * Build and write the report. Returns its path.
 */
export function writeReport(inputs: ReportInputs, reportPath: string): string {
    mkdirSync(dirname(reportPath), { recursive: true });
    writeFileSync(reportPath, buildReport(inputs, reportPath), 'utf-8');
    logger.info({ path: reportPath }, 'Report written');
    return reportPath;
}

function summaryBlock(inputs: ReportInputs): string {
    const count = (value: number | undefined): string => (value === undefined ? 'not reported' : String(value));
    const lines = [
        `- Records identified: ${count(inputs.counts.found)}`,
        `- Records after duplicates removed: ${count(inputs.counts.no_dupes)}`,
        `- Records screened: ${count(inputs.counts.screened)}`,
        `- Full-text reports assessed: ${count(inputs.counts.full_text_assessed)}`,
        `- Studies included: ${count(inputs.counts.qualitative)}`,
    ];
    if (inputs.cost) {
        lines.push(`- LLM cost: $${inputs.cost.totalCostUsd.toFixed(4)} over ${inputs.cost.calls} calls`);
    }
    return lines.join('\n');
}
