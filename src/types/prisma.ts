/**
 * PRISMA funnel counters, in funnel order.
 */
export const PRISMA_COUNT_KEYS = [
    'found',
    'found_other',
    'no_dupes',
    'screened',
    'screen_exclusions',
    'full_text_sought',
    'full_text_not_retrieved',
    'full_text_assessed',
    'full_text_exclusions',
    'qualitative',
    'quantitative',
] as const;

export type PrismaCountKey = (typeof PRISMA_COUNT_KEYS)[number];

/**
 * Serialized PRISMA counts. Unset counters are absent.
 */
export type PrismaCounts = Partial<Record<PrismaCountKey, number>> & {
    database_breakdown: Record<string, number>;
};
