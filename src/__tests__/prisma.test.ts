import { describe, it, expect } from 'vitest';
import { PrismaCounter } from '../prisma/prisma-counter.js';
import { renderPrismaDiagram } from '../prisma/prisma-diagram.js';
import { PrismaCountError } from '../utils/errors.js';

describe('PrismaCounter', () => {
    it('should allow a count to be set again at the same or a higher value', () => {
        const counter = new PrismaCounter();
        counter.set('found', 10);
        counter.set('found', 10);
        counter.set('found', 12);
        expect(counter.get('found')).toBe(12);
    });

    it('should refuse to lower a count', () => {
        const counter = new PrismaCounter();
        counter.set('screened', 8);

        expect(() => counter.set('screened', 7)).toThrow(PrismaCountError);
        expect(() => counter.set('screened', 7)).toThrow('PRISMA count "screened" cannot decrease from 8 to 7');
        expect(counter.get('screened')).toBe(8);
    });

    it('should reject negative and fractional counts', () => {
        const counter = new PrismaCounter();
        expect(() => counter.set('found', -1)).toThrow(RangeError);
        expect(() => counter.set('found', 1.5)).toThrow(RangeError);
    });

    it('should serialize only the counts that were set', () => {
        const counter = new PrismaCounter();
        counter.set('found', 5);
        counter.set('no_dupes', 4);
        counter.setDatabaseBreakdown({ openalex: 3, semantic_scholar: 2 });

        const snapshot = counter.toJSON();
        expect(snapshot).toEqual({ found: 5, no_dupes: 4, database_breakdown: { openalex: 3, semantic_scholar: 2 } });
        expect(PrismaCounter.fromJSON(snapshot).toJSON()).toEqual(snapshot);
    });

    it('should keep restored counts monotonic', () => {
        const counter = PrismaCounter.fromJSON({ found: 5, database_breakdown: {} });
        expect(() => counter.set('found', 4)).toThrow(PrismaCountError);
    });

    it('should report a funnel where a stage exceeds the one before it', () => {
        const counter = new PrismaCounter();
        counter.set('found', 10);
        counter.set('no_dupes', 9);
        counter.set('screened', 9);
        counter.set('screen_exclusions', 4);
        counter.set('full_text_sought', 6);

        expect(counter.validateFunnel()).toEqual(['full_text_sought: 6 exceeds 5']);
    });

    it('should count reports without a full text as assessed', () => {
        const counter = new PrismaCounter();
        counter.set('full_text_sought', 2);
        counter.set('full_text_not_retrieved', 2);
        counter.set('full_text_assessed', 2);
        counter.set('full_text_exclusions', 0);
        counter.set('qualitative', 2);

        expect(counter.validateFunnel()).toEqual([]);
    });

    it('should report more assessed reports than were sought', () => {
        const counter = new PrismaCounter();
        counter.set('full_text_sought', 3);
        counter.set('full_text_assessed', 4);

        expect(counter.validateFunnel()).toEqual(['full_text_assessed: 4 exceeds 3']);
    });

    it('should report more included studies than were assessed', () => {
        const counter = new PrismaCounter();
        counter.set('full_text_sought', 3);
        counter.set('full_text_not_retrieved', 3);
        counter.set('full_text_assessed', 0);
        counter.set('qualitative', 1);

        expect(counter.validateFunnel()).toEqual(['qualitative: 1 exceeds 0']);
    });

    it('should accept a consistent funnel', () => {
        const counter = new PrismaCounter();
        for (const [key, value] of [
            ['found', 10],
            ['no_dupes', 9],
            ['screened', 9],
            ['screen_exclusions', 4],
            ['full_text_sought', 5],
            ['full_text_not_retrieved', 1],
            ['full_text_assessed', 4],
            ['full_text_exclusions', 1],
            ['qualitative', 3],
        ] as const) {
            counter.set(key, value);
        }
        expect(counter.validateFunnel()).toEqual([]);
    });
});

describe('renderPrismaDiagram', () => {
    it('should render every stage with its count', () => {
        const diagram = renderPrismaDiagram(
            {
                found: 12,
                no_dupes: 10,
                screened: 10,
                screen_exclusions: 6,
                full_text_sought: 4,
                full_text_not_retrieved: 1,
                full_text_assessed: 3,
                full_text_exclusions: 1,
                qualitative: 3,
                database_breakdown: { openalex: 7, semantic_scholar: 5 },
            },
            'Chatbots'
        );

        const lines = diagram.split('\n');
        expect(lines[0]).toBe('# PRISMA Flow Diagram: Chatbots');
        expect(lines).toContain(
            '    A["Records identified from databases (n = 12)<br/>openalex: 7<br/>semantic_scholar: 5"] --> B["Records after duplicates removed (n = 10)"]'
        );
        expect(lines).toContain('    E --> F["Reports not retrieved, assessed on title/abstract (n = 1)"]');
        expect(lines).toContain('    G --> I["Studies included in review (n = 3)"]');
        expect(diagram).not.toContain('quantitative synthesis');
    });

    it('should mark missing counts as not reported', () => {
        const diagram = renderPrismaDiagram({ found: 2, quantitative: 1, database_breakdown: {} }, 'Topic');

        expect(diagram).toContain('    A["Records identified from databases (n = 2)"]');
        expect(diagram).toContain('    B --> C["Records screened (n = not reported)"]');
        expect(diagram).toContain('    I --> J["Studies included in quantitative synthesis (n = 1)"]');
    });
});
