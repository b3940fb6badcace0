import { describe, it, expect } from 'vitest';
import { analyzeAllPairs, analyzePair } from '../src/analysis/discrepancy.js';
import { FeeTable } from '../src/analysis/fees.js';
import type { NormalizedSeries } from '../src/types/discrepancy.js';
import { series } from './helpers/fakes.js';

const fees = FeeTable.fromEntries([]);
const A = series('AAA', [[0, 100, 2], [15, 102, 3]]);
const B = series('BBB', [[0, 101], [15, 95]]);

describe('analyzePair', () => {
    it('measures raw and fee-adjusted gaps on shared timestamps', () => {
        const records = analyzePair(A, B, fees);
        expect(records).toHaveLength(2);
        const [first, second] = records;
        expect(first).toMatchObject({ timestamp: 0, pairA: 'AAA', pairB: 'BBB', priceA: 100, priceB: 101, rawDiscrepancy: 1, feeA: 0.0026, feeB: 0.0026, volumeA: 2 });
        expect(first?.adjustedDiscrepancy).toBeCloseTo(0.9948, 10);
        expect(second?.rawDiscrepancy).toBe(7);
        expect(second?.adjustedDiscrepancy).toBeCloseTo(6.9948, 10);
        expect(second?.volumeA).toBe(3);
    });

    it('drops timestamps present in only one series', () => {
        const partial = series('BBB', [[0, 101], [30, 90]]);
        expect(analyzePair(A, partial, fees).map((r) => r.timestamp)).toEqual([0]);
    });

    it('uses per-pair fees and the default for unlisted pairs', () => {
        const table = FeeTable.fromEntries([{ pair: 'AAA', takerFee: 0.001, makerFee: 0.0005 }], 0.002);
        const [first] = analyzePair(A, B, table, 'maker');
        expect(first?.feeA).toBe(0.0005);
        expect(first?.feeB).toBe(0.002);
        expect(first?.adjustedDiscrepancy).toBeCloseTo(0.9975, 10);
    });

    it('refuses to compare a pair with itself', () => {
        expect(() => analyzePair(A, A, fees)).toThrow('cannot compare AAA with itself');
    });
});

describe('analyzeAllPairs', () => {
    const all = new Map<string, NormalizedSeries>([['AAA', A], ['BBB', B]]);

    it('orients combinations canonically whatever the list order', () => {
        const forward = analyzeAllPairs(['AAA', 'BBB'], all, fees);
        const reversed = analyzeAllPairs(['BBB', 'AAA', 'AAA'], all, fees);
        expect(reversed).toHaveLength(1);
        expect(reversed[0]?.key).toBe('AAA|BBB');
        expect(reversed[0]?.pairA).toBe('AAA');
        expect(reversed).toEqual(forward);
    });

    it('skips combinations without a series on both legs', () => {
        const result = analyzeAllPairs(['AAA', 'BBB', 'CCC'], all, fees);
        expect(result.map((a) => a.key)).toEqual(['AAA|BBB']);
    });
});
