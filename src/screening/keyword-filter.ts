import type { KeywordFilterConfig } from '../types/index.js';
import { InclusionDecision } from '../types/index.js';
import { extractWords, similarityRatio, tokenSortRatio } from '../utils/text.js';

const MIN_WORD_LENGTH = 3;

/**
 * A concept group: any one matching term satisfies the group.
 */
export interface ConceptGroup {
    label: string;
    words: string[];
    phrases: string[];
}

export type KeywordVerdict =
    | { kind: 'include'; decision: InclusionDecision.INCLUDE; confidence: number; reasoning: string; matchedGroups: string[] }
    | { kind: 'exclude'; decision: InclusionDecision.EXCLUDE; confidence: number; reasoning: string; matchedPhrases: string[] }
    | { kind: 'needs_llm'; decision: InclusionDecision.UNCERTAIN; confidence: number; reasoning: string; matchedGroups: string[] };

/**
 * Fuzzy keyword pre-filter run before any LLM screening call.
 *
 * Exclusion phrases are checked first; any hit at or above
 * `exclusionThreshold` auto-excludes. Otherwise the paper is auto-included
 * when it covers at least `max(minGroups, floor(groups · groupRatio))` concept
 * groups, and sent to the LLM in every other case.
 */
export class KeywordFilter {
    private readonly groups: ConceptGroup[];
    private readonly exclusionPhrases: string[];

    constructor(
        private readonly config: KeywordFilterConfig,
        inclusionCriteria: readonly string[]
    ) {
        this.groups = buildConceptGroups(config.searchTerms, inclusionCriteria);
        this.exclusionPhrases = config.exclusionPhrases.map((phrase) => phrase.toLowerCase().trim()).filter(Boolean);
    }

    getGroups(): readonly ConceptGroup[] {
        return this.groups;
    }

    evaluate(title: string, abstract: string): KeywordVerdict {
        const text = `${title} ${abstract}`.toLowerCase();
        const textWords = extractWords(text).filter((word) => word.length >= MIN_WORD_LENGTH);

        const matchedPhrases = this.exclusionPhrases.filter(
            (phrase) => matchScore(phrase, text, textWords) >= this.config.exclusionThreshold
        );
        if (matchedPhrases.length > 0) {
            return {
                kind: 'exclude',
                decision: InclusionDecision.EXCLUDE,
                confidence: Math.min(0.9, 0.75 + 0.05 * matchedPhrases.length),
                reasoning: `Keyword filter: matched exclusion terms (${matchedPhrases.join(', ')})`,
                matchedPhrases,
            };
        }

        if (this.groups.length === 0) {
            return {
                kind: 'needs_llm',
                decision: InclusionDecision.UNCERTAIN,
                confidence: 0.4,
                reasoning: 'Keyword filter: no concept groups configured',
                matchedGroups: [],
            };
        }

        const matchedGroups = this.groups
            .filter((group) =>
                [...group.words, ...group.phrases].some(
                    (term) => matchScore(term, text, textWords) >= this.config.inclusionThreshold
                )
            )
            .map((group) => group.label);

        const total = this.groups.length;
        // Strictly more than groupRatio of the groups, at least minGroups, at most every group
        const required = Math.min(
            total,
            Math.max(this.config.minGroups, Math.floor(total * this.config.groupRatio) + 1)
        );
        const ratio = matchedGroups.length / total;

        if (matchedGroups.length >= required) {
            return {
                kind: 'include',
                decision: InclusionDecision.INCLUDE,
                confidence: Math.min(0.75, 0.65 + ratio * 0.1),
                reasoning: `Keyword filter: matched ${matchedGroups.length}/${total} concept groups`,
                matchedGroups,
            };
        }

        return {
            kind: 'needs_llm',
            decision: InclusionDecision.UNCERTAIN,
            confidence: matchedGroups.length > 0 ? 0.5 : 0.4,
            reasoning: `Keyword filter: matched ${matchedGroups.length}/${total} concept groups (need ${required})`,
            matchedGroups,
        };
    }
}

/**
 * One group per `searchTerms` entry (its words and multi-word phrases),
 * plus one group per inclusion criterion (its words).
 */
export function buildConceptGroups(
    searchTerms: Readonly<Record<string, readonly string[]>>,
    inclusionCriteria: readonly string[]
): ConceptGroup[] {
    const groups: ConceptGroup[] = [];

    for (const [label, terms] of Object.entries(searchTerms)) {
        const words = new Set<string>();
        const phrases = new Set<string>();
        for (const term of terms) {
            const normalized = term.toLowerCase().trim();
            if (/\s/.test(normalized)) phrases.add(normalized);
            for (const word of extractWords(normalized)) {
                if (word.length >= MIN_WORD_LENGTH) words.add(word);
            }
        }
        if (words.size > 0 || phrases.size > 0) {
            groups.push({ label, words: [...words], phrases: [...phrases] });
        }
    }

    inclusionCriteria.forEach((criterion, index) => {
        const words = [...new Set(extractWords(criterion).filter((word) => word.length >= MIN_WORD_LENGTH))];
        if (words.length > 0) {
            groups.push({ label: `criterion_${index + 1}`, words, phrases: [] });
        }
    });

    return groups;
}

/**
 * Best match score of a term against the text. Containment scores 1.0.
 * Single words compare against each text word; phrases use token-sort ratio.
 */
export function matchScore(term: string, text: string, textWords: readonly string[]): number {
    if (term === '') return 0;
    if (text.includes(term)) return 1.0;

    if (/\s/.test(term)) {
        return tokenSortRatio(term, text);
    }

    let best = 0;
    for (const word of textWords) {
        best = Math.max(best, similarityRatio(term, word));
        if (best === 1) break;
    }
    return best;
}
