import { PRISMA_COUNT_KEYS, type PrismaCountKey, type PrismaCounts } from '../types/index.js';
import { PrismaCountError } from '../utils/errors.js';

/**
 * PRISMA funnel counts for one workflow. A count may be set again, but
 * never lowered: a decrease means a phase lost records.
 */
export class PrismaCounter {
    private readonly counts = new Map<PrismaCountKey, number>();
    private breakdown: Record<string, number> = {};

    static fromJSON(snapshot: PrismaCounts): PrismaCounter {
        const counter = new PrismaCounter();
        for (const key of PRISMA_COUNT_KEYS) {
            const value = snapshot[key];
            if (value !== undefined) counter.counts.set(key, value);
        }
        counter.breakdown = { ...snapshot.database_breakdown };
        return counter;
    }

    set(key: PrismaCountKey, value: number): void {
        if (!Number.isInteger(value) || value < 0) {
            throw new RangeError(`PRISMA count "${key}" must be a non-negative integer, got ${value}`);
        }
        const previous = this.counts.get(key);
        if (previous !== undefined && value < previous) {
            throw new PrismaCountError(key, previous, value);
        }
        this.counts.set(key, value);
    }

    get(key: PrismaCountKey): number | undefined {
        return this.counts.get(key);
    }

    setDatabaseBreakdown(breakdown: Readonly<Record<string, number>>): void {
        this.breakdown = { ...breakdown };
    }

    getDatabaseBreakdown(): Readonly<Record<string, number>> {
        return this.breakdown;
    }

    /**
     * Funnel consistency problems, e.g. more records screened than remained
     * after deduplication. Empty when consistent.
     */
    validateFunnel(): string[] {
        const problems: string[] = [];
        const check = (label: string, value: number | undefined, limit: number | undefined): void => {
            if (value !== undefined && limit !== undefined && value > limit) {
                problems.push(`${label}: ${value} exceeds ${limit}`);
            }
        };
        const minus = (a: number | undefined, b: number | undefined): number | undefined =>
            a === undefined ? undefined : a - (b ?? 0);
        const c = (key: PrismaCountKey): number | undefined => this.counts.get(key);

        const identified = c('found') === undefined ? undefined : (c('found') ?? 0) + (c('found_other') ?? 0);
        check('no_dupes', c('no_dupes'), identified);
        check('screened', c('screened'), c('no_dupes'));
        check('screen_exclusions', c('screen_exclusions'), c('screened'));
        check('full_text_sought', c('full_text_sought'), minus(c('screened'), c('screen_exclusions')));
        check('full_text_not_retrieved', c('full_text_not_retrieved'), c('full_text_sought'));
        // Reports not retrieved are still assessed, on their title/abstract decision
        check('full_text_assessed', c('full_text_assessed'), c('full_text_sought'));
        check('full_text_exclusions', c('full_text_exclusions'), c('full_text_assessed'));
        check('qualitative', c('qualitative'), minus(c('full_text_assessed'), c('full_text_exclusions')));
        check('quantitative', c('quantitative'), c('qualitative'));
        return problems;
    }

    toJSON(): PrismaCounts {
        const snapshot: PrismaCounts = { database_breakdown: { ...this.breakdown } };
        for (const key of PRISMA_COUNT_KEYS) {
            const value = this.counts.get(key);
            if (value !== undefined) snapshot[key] = value;
        }
        return snapshot;
    }
}
