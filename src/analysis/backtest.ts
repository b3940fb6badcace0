/**
 * BACKTEST SCORER
 *
 * Scores hypothetical trades on the discrepancy records that clear a
 * resolved threshold:
 * - profit = adjustedDiscrepancy * volumeA (fees already netted)
 * - weight from the candidate's distance d above the threshold, in units
 *   of the distribution's std-dev σ, clamped to [0, 10]:
 *     conviction  1 - exp(-d/σ)  grows with distance (default)
 *     proximity   exp(-d/σ)      favours candidates near the threshold
 * - cumulative profit in ascending timestamp order
 * - Sharpe and Sortino ratios over candidate profits
 *
 * Threshold sweeps evaluate mean + k·σ over a range of k and keep the k
 * with the highest weighted profit, the smallest k on ties.
 */

import { createCanonicalPairKey } from '../lib/pairUtils.js';
import { clamp, mean, populationStd, range, sampleStd, sum } from '../lib/stats.js';
import type { BacktestResult, DiscrepancyRecord, TradeCandidate } from '../types/discrepancy.js';

export type WeightingMode = 'conviction' | 'proximity';

export const WEIGHT_CLAMP_MAX = 10;

export type ScoreOptions = {
    weighting?: WeightingMode;
    stdDev?: number; // σ for weighting; defaults to the population std-dev of `records`
};

export type RiskMetrics = {
    sharpeRatio: number;
    sortinoRatio: number;
};

export type SweepOptions = {
    start?: number;
    end?: number;
    step?: number;
    weighting?: WeightingMode;
};

export type SweepPoint = {
    multiplier: number;
    threshold: number;
    totalProfit: number;
    weightedProfit: number;
    tradeCount: number;
};

export type SweepResult = {
    mean: number;
    stdDev: number;
    best: SweepPoint;
    points: SweepPoint[];
};

export type CombinationSummary = {
    key: string;
    pairA: string;
    pairB: string;
    count: number;
    mean: number;
    std: number;
};

export function discrepancyWeight(distance: number, stdDev: number, mode: WeightingMode = 'conviction'): number {
    const ratio = stdDev > 0 ? Math.abs(distance) / stdDev : (distance === 0 ? 0 : WEIGHT_CLAMP_MAX);
    const scaled = clamp(ratio, 0, WEIGHT_CLAMP_MAX);
    return mode === 'proximity' ? Math.exp(-scaled) : 1 - Math.exp(-scaled);
}

export function riskMetrics(profits: readonly number[]): RiskMetrics {
    const avg = mean(profits);
    const std = sampleStd(profits);
    const downside = sampleStd(profits.filter((p) => p < 0));
    return {
        sharpeRatio: std > 0 ? avg / std : 0,
        sortinoRatio: downside > 0 ? avg / downside : 0
    };
}

function byTimestamp(records: readonly DiscrepancyRecord[]): DiscrepancyRecord[] {
    // Array.prototype.sort is stable, so same-timestamp rows keep their input order
    return [...records].sort((a, b) => a.timestamp - b.timestamp);
}

export function scoreBacktest(records: readonly DiscrepancyRecord[], threshold: number, options: ScoreOptions = {}): BacktestResult {
    const weighting = options.weighting ?? 'conviction';
    const sigma = options.stdDev ?? populationStd(records.map((r) => r.adjustedDiscrepancy));

    let running = 0;
    const candidates: TradeCandidate[] = byTimestamp(records.filter((r) => r.adjustedDiscrepancy > threshold)).map((r) => {
        const profit = r.adjustedDiscrepancy * r.volumeA;
        const weight = discrepancyWeight(r.adjustedDiscrepancy - threshold, sigma, weighting);
        running += profit;
        return { ...r, profit, weight, weightedProfit: profit * weight, cumulativeProfit: running };
    });

    const profits = candidates.map((c) => c.profit);
    return {
        threshold,
        totalProfit: sum(profits),
        weightedProfit: sum(candidates.map((c) => c.weightedProfit)),
        tradeCount: candidates.length,
        ...riskMetrics(profits),
        candidates
    };
}

export function sweepThresholds(records: readonly DiscrepancyRecord[], options: SweepOptions = {}): SweepResult {
    const { start = 1, end = 5, step = 0.1, weighting = 'conviction' } = options;
    const values = records.map((r) => r.adjustedDiscrepancy);
    const m = mean(values);
    const sigma = populationStd(values);

    const points = range(start, end, step).map((multiplier): SweepPoint => {
        const threshold = m + multiplier * sigma;
        const result = scoreBacktest(records, threshold, { weighting, stdDev: sigma });
        return {
            multiplier,
            threshold,
            totalProfit: result.totalProfit,
            weightedProfit: result.weightedProfit,
            tradeCount: result.tradeCount
        };
    });

    let best = points[0] ?? { multiplier: start, threshold: m + start * sigma, totalProfit: 0, weightedProfit: 0, tradeCount: 0 };
    for (const p of points) {
        if (p.weightedProfit > best.weightedProfit) best = p;
    }
    return { mean: m, stdDev: sigma, best, points };
}

export function topOpportunities(records: readonly DiscrepancyRecord[], threshold: number, n = 10): DiscrepancyRecord[] {
    return records
        .filter((r) => r.adjustedDiscrepancy > threshold)
        .sort((a, b) => b.adjustedDiscrepancy - a.adjustedDiscrepancy)
        .slice(0, n);
}

export function summarizeCombinations(records: readonly DiscrepancyRecord[]): CombinationSummary[] {
    const groups = new Map<string, { pairA: string; pairB: string; values: number[] }>();
    for (const r of records) {
        const key = createCanonicalPairKey(r.pairA, r.pairB);
        const group = groups.get(key) ?? { pairA: r.pairA, pairB: r.pairB, values: [] };
        group.values.push(r.adjustedDiscrepancy);
        groups.set(key, group);
    }
    return [...groups.entries()]
        .map(([key, g]) => ({ key, pairA: g.pairA, pairB: g.pairB, count: g.values.length, mean: mean(g.values), std: sampleStd(g.values) }))
        .sort((a, b) => b.mean - a.mean);
}
