import { describe, it, expect } from 'vitest';
import {
    discrepancyWeight,
    riskMetrics,
    scoreBacktest,
    summarizeCombinations,
    sweepThresholds,
    topOpportunities,
    WEIGHT_CLAMP_MAX
} from '../src/analysis/backtest.js';
import { record } from './helpers/fakes.js';

// mean 1, population std 0.5; only the 3 clears thresholds between 1.5 and 2.95
const sweepSet = [record(0, 3), record(15, -1), ...Array.from({ length: 30 }, (_, i) => record(30 + i * 15, 1))];

describe('discrepancyWeight', () => {
    it('conviction grows with distance, proximity decays', () => {
        expect(discrepancyWeight(0, 1, 'conviction')).toBe(0);
        expect(discrepancyWeight(0, 1, 'proximity')).toBe(1);
        expect(discrepancyWeight(1, 1, 'conviction')).toBeCloseTo(1 - Math.exp(-1), 12);
        expect(discrepancyWeight(1, 1, 'proximity')).toBeCloseTo(Math.exp(-1), 12);
        const weights = [0, 0.5, 1, 5, 20].map((d) => discrepancyWeight(d, 1));
        for (let i = 1; i < weights.length; i++) expect(weights[i]).toBeGreaterThanOrEqual(weights[i - 1] ?? 0);
    });

    it('clamps the scaled distance', () => {
        expect(discrepancyWeight(50, 1, 'proximity')).toBeCloseTo(Math.exp(-WEIGHT_CLAMP_MAX), 15);
    });

    it('treats zero std-dev as the clamp ceiling unless the distance is zero', () => {
        expect(discrepancyWeight(0.3, 0, 'conviction')).toBeCloseTo(1 - Math.exp(-10), 15);
        expect(discrepancyWeight(0, 0, 'proximity')).toBe(1);
    });
});

describe('riskMetrics', () => {
    it('uses sample std-dev', () => {
        expect(riskMetrics([1, 2, 3])).toEqual({ sharpeRatio: 2, sortinoRatio: 0 });
        const mixed = riskMetrics([-2, -1, 6]);
        expect(mixed.sharpeRatio).toBeCloseTo(1 / Math.sqrt(19), 12);
        expect(mixed.sortinoRatio).toBeCloseTo(Math.SQRT2, 12);
    });

    it('is zero for degenerate inputs', () => {
        expect(riskMetrics([])).toEqual({ sharpeRatio: 0, sortinoRatio: 0 });
        expect(riskMetrics([5])).toEqual({ sharpeRatio: 0, sortinoRatio: 0 });
    });
});

describe('scoreBacktest', () => {
    const records = [record(30, 2, { volumeA: 2 }), record(0, 1), record(15, 0.1, { volumeA: 5 })];

    it('scores candidates strictly above the threshold in timestamp order', () => {
        const result = scoreBacktest(records, 0.5, { stdDev: 1 });
        expect(result.candidates.map((c) => c.timestamp)).toEqual([0, 30]);
        expect(result.candidates.map((c) => c.profit)).toEqual([1, 4]);
        expect(result.candidates.map((c) => c.cumulativeProfit)).toEqual([1, 5]);
        expect(result.candidates[0]?.weight).toBeCloseTo(1 - Math.exp(-0.5), 12);
        expect(result.candidates[1]?.weight).toBeCloseTo(1 - Math.exp(-1.5), 12);
        expect(result.totalProfit).toBe(5);
        expect(result.tradeCount).toBe(2);
        expect(result.threshold).toBe(0.5);
        expect(result.sharpeRatio).toBeCloseTo(2.5 / Math.sqrt(4.5), 12);
        expect(result.sortinoRatio).toBe(0);
    });

    it('does not mutate its input', () => {
        const before = JSON.stringify(records);
        scoreBacktest(records, 0.5);
        expect(JSON.stringify(records)).toBe(before);
    });

    it('returns zero counts when nothing clears the threshold', () => {
        const result = scoreBacktest(records, 10);
        expect(result).toEqual({ threshold: 10, totalProfit: 0, weightedProfit: 0, tradeCount: 0, sharpeRatio: 0, sortinoRatio: 0, candidates: [] });
    });
});

describe('sweepThresholds', () => {
    it('favours the threshold just below the candidate under proximity weighting', () => {
        const result = sweepThresholds(sweepSet, { weighting: 'proximity' });
        expect(result.mean).toBe(1);
        expect(result.stdDev).toBe(0.5);
        expect(result.points).toHaveLength(41);
        expect(result.best.multiplier).toBe(3.9);
        expect(result.best.tradeCount).toBe(1);
        expect(result.best.weightedProfit).toBeCloseTo(3 * Math.exp(-0.1), 9);
    });

    it('picks the smallest multiplier under conviction weighting', () => {
        const result = sweepThresholds(sweepSet);
        expect(result.best.multiplier).toBe(1);
        expect(result.best.threshold).toBe(1.5);
        expect(result.best.weightedProfit).toBeCloseTo(3 * (1 - Math.exp(-3)), 12);
    });

    it('keeps the first multiplier when every point ties', () => {
        const result = sweepThresholds([record(0, 0.5), record(15, 1.5)]);
        expect(result.best.multiplier).toBe(1);
        expect(result.best.tradeCount).toBe(0);
        expect(result.best.weightedProfit).toBe(0);
    });
});

describe('summaries', () => {
    it('topOpportunities ranks by adjusted discrepancy', () => {
        const ranked = topOpportunities([record(0, 1), record(15, 5), record(30, 3), record(45, 0.2)], 0.5, 2);
        expect(ranked.map((r) => r.adjustedDiscrepancy)).toEqual([5, 3]);
    });

    it('summarizeCombinations sorts by mean descending', () => {
        const summary = summarizeCombinations([
            record(0, 1),
            record(15, 3),
            record(0, 5, { pairB: 'CCC' })
        ]);
        expect(summary.map((s) => s.key)).toEqual(['AAA|CCC', 'AAA|BBB']);
        expect(summary[0]).toEqual({ key: 'AAA|CCC', pairA: 'AAA', pairB: 'CCC', count: 1, mean: 5, std: 0 });
        expect(summary[1]?.mean).toBe(2);
        expect(summary[1]?.std).toBeCloseTo(Math.SQRT2, 12);
    });
});
