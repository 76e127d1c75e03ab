import { ConfigError } from '../../errors';
import type { LabTestDefinition } from '../../types/glossary';
import type { HealthStatus } from '../../types/patient';
import { createRandomSource } from '../../utils/random';
import { LabValueGenerator, countDecimals, roundTo } from '../labValueGenerator';

const sgot: LabTestDefinition = {
    testGroupName: 'LIVER PROFILE',
    testAttributeName: 'SGOT (AST)',
    unit: 'U/L',
    minRange: 5,
    maxRange: 40,
};

const ranges: Array<[number, number]> = [
    [5, 40],
    [0.3, 1.2],
    [0, 20],
    [0.01, 0.04],
    [-2, 2],
    [264, 916],
];

describe('LabValueGenerator', () => {
    describe('countDecimals', () => {
        it('counts digits after the decimal point', () => {
            expect(countDecimals(40)).toBe(0);
            expect(countDecimals(1.2)).toBe(1);
            expect(countDecimals(0.04)).toBe(2);
            expect(countDecimals(1e-7)).toBe(7);
            expect(countDecimals(2.5e-7)).toBe(8);
        });
    });

    it('rounds to the requested precision', () => {
        expect(roundTo(12.345, 1)).toBe(12.3);
        expect(roundTo(7, 2)).toBe(7);
    });

    it('yields a High SGOT value above 40 U/L for a high patient', () => {
        const generator = new LabValueGenerator(createRandomSource(123));
        const [result] = generator.generate([sgot], 'high');

        expect(result.value).toBeGreaterThan(40);
        expect(result).toMatchObject({
            testGroupName: 'LIVER PROFILE',
            testAttributeName: 'SGOT (AST)',
            unit: 'U/L',
            minRange: 5,
            maxRange: 40,
            status: 'High',
        });
    });

    it.each(ranges)('keeps every status on the right side of [%p, %p]', (min, max) => {
        const generator = new LabValueGenerator(createRandomSource(min * 1000 + max));
        const test: LabTestDefinition = {
            testGroupName: 'G',
            testAttributeName: 'A',
            unit: 'u',
            minRange: min,
            maxRange: max,
        };

        for (let i = 0; i < 300; i++) {
            const normal = generator.generateResult(test, 'normal');
            expect(normal.status).toBe('Normal');
            expect(normal.value).toBeGreaterThanOrEqual(min);
            expect(normal.value).toBeLessThanOrEqual(max);

            const low = generator.generateResult(test, 'low');
            expect(low.status).toBe('Low');
            expect(low.value).toBeLessThan(min);
            if (min > 0) expect(low.value).toBeGreaterThanOrEqual(0);

            const high = generator.generateResult(test, 'high');
            expect(high.status).toBe('High');
            expect(high.value).toBeGreaterThan(max);
            expect(high.value).toBeLessThanOrEqual(max + 3 * (max - min) + 1e-9);
        }
    });

    it('steps just past the bound when the draw would round onto it', () => {
        // A constant zero source gives a zero offset, so the minimum step applies
        const generator = new LabValueGenerator(createRandomSource(() => 0));
        expect(generator.generateValue(5, 40, 'low')).toBe(4.9);
        expect(generator.generateValue(5, 40, 'high')).toBe(40.1);
        expect(generator.generateValue(0.01, 0.04, 'low')).toBe(0);
        expect(generator.generateValue(5, 40, 'normal')).toBe(22.5);
    });

    it.each<[string, Partial<LabTestDefinition>]>([
        ['missing range', { minRange: null, maxRange: 10 }],
        ['min equal to max', { minRange: 10, maxRange: 10 }],
        ['min above max', { minRange: 12, maxRange: 10 }],
    ])('throws ConfigError for %s', (_label, overrides) => {
        const generator = new LabValueGenerator(createRandomSource(1));
        expect(() => generator.generate([{ ...sgot, ...overrides }], 'normal')).toThrow(ConfigError);
    });

    it('produces identical values for the same seed', () => {
        const statuses: HealthStatus[] = ['normal', 'low', 'high'];
        const a = new LabValueGenerator(createRandomSource(55));
        const b = new LabValueGenerator(createRandomSource(55));
        expect(statuses.map((status) => a.generate([sgot], status))).toEqual(
            statuses.map((status) => b.generate([sgot], status)),
        );
    });

    it('rounds the floor of a range that starts at or below zero', () => {
        // u just under 1 gives a draw about 6.4 standard deviations out
        const generator = new LabValueGenerator(createRandomSource(() => 0.999999999));

        expect(generator.generateValue(-0.1, 0.2, 'low')).toBe(-0.4);
    });
});
