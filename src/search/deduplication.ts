import type { Paper } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { stripDoiPrefix } from '../sources/utils.js';
import { titleSimilarity } from '../utils/text.js';

const logger = getLogger();

export const DEFAULT_TITLE_THRESHOLD = 0.85;

/**
 * Preferred source when every other signal ties. Higher wins.
 */
const DATABASE_PRIORITY: Record<string, number> = {
    pubmed: 6,
    semantic_scholar: 5,
    crossref: 4,
    openalex: 4,
    arxiv: 3,
};

export interface DeduplicationResult {
    unique: Paper[];
    duplicatesRemoved: number;
    /** Input indices of each duplicate group (groups of 2 or more) */
    groups: number[][];
}

/**
 * Remove duplicate records: exact DOI match first, then fuzzy title match.
 * The title pass never joins a record to a group holding a different DOI.
 * The best record of each group is kept, at the position of the group's
 * first member.
 */
export function deduplicatePapers(
    papers: readonly Paper[],
    titleThreshold: number = DEFAULT_TITLE_THRESHOLD
): DeduplicationResult {
    const groupOf = new Array<number>(papers.length).fill(-1);
    const groups: number[][] = [];

    // DOI pass
    const byDoi = new Map<string, number>();
    papers.forEach((paper, index) => {
        const doi = stripDoiPrefix(paper.doi);
        if (!doi) return;
        const existing = byDoi.get(doi);
        if (existing === undefined) {
            byDoi.set(doi, index);
            return;
        }
        const groupIndex = groupOf[existing] ?? -1;
        if (groupIndex === -1) {
            groupOf[existing] = groups.length;
            groupOf[index] = groups.length;
            groups.push([existing, index]);
        } else {
            groupOf[index] = groupIndex;
            groups[groupIndex]?.push(index);
        }
    });

    // Title pass over records still on their own
    for (let i = 0; i < papers.length; i++) {
        const first = papers[i];
        if (!first?.title.trim()) continue;
        for (let j = i + 1; j < papers.length; j++) {
            const second = papers[j];
            if (!second?.title.trim() || groupOf[j] !== -1) continue;
            if (titleSimilarity(first.title, second.title) < titleThreshold) continue;

            let groupIndex = groupOf[i] ?? -1;
            const members = groupIndex === -1 ? [i] : (groups[groupIndex] ?? [i]);
            if (members.some((member) => doisDiffer(papers[member], second))) continue;

            if (groupIndex === -1) {
                groupIndex = groups.length;
                groupOf[i] = groupIndex;
                groups.push([i]);
            }
            groupOf[j] = groupIndex;
            groups[groupIndex]?.push(j);
        }
    }

    const keep = new Map<number, Paper>();
    papers.forEach((paper, index) => {
        if (groupOf[index] === -1) keep.set(index, paper);
    });
    for (const group of groups) {
        const best = selectBestRecord(group.map((index) => papers[index]).filter((p): p is Paper => p !== undefined));
        const position = Math.min(...group);
        if (best) keep.set(position, best);
    }

    const unique = [...keep.entries()].sort(([a], [b]) => a - b).map(([, paper]) => paper);
    const duplicatesRemoved = papers.length - unique.length;

    logger.info({ input: papers.length, unique: unique.length, duplicatesRemoved }, 'Deduplication complete');
    return { unique, duplicatesRemoved, groups };
}

/**
 * Two records carrying different DOIs are different works, however close their titles.
 */
function doisDiffer(a: Paper | undefined, b: Paper): boolean {
    const first = stripDoiPrefix(a?.doi);
    const second = stripDoiPrefix(b.doi);
    return Boolean(first && second && first !== second);
}

/**
 * Rank: DOI present, abstract length, author count, year, database priority.
 */
export function selectBestRecord(candidates: readonly Paper[]): Paper | undefined {
    const score = (paper: Paper): number[] => [
        paper.doi ? 1 : 0,
        paper.abstract?.length ?? 0,
        paper.authors.length,
        paper.year ?? 0,
        DATABASE_PRIORITY[paper.database.toLowerCase()] ?? 0,
    ];

    let best: Paper | undefined;
    let bestScore: number[] = [];
    for (const candidate of candidates) {
        const candidateScore = score(candidate);
        if (!best || compareScores(candidateScore, bestScore) > 0) {
            best = candidate;
            bestScore = candidateScore;
        }
    }
    return best;
}

function compareScores(a: readonly number[], b: readonly number[]): number {
    for (let i = 0; i < a.length; i++) {
        const diff = (a[i] ?? 0) - (b[i] ?? 0);
        if (diff !== 0) return diff;
    }
    return 0;
}
