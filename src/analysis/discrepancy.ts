/**
 * PAIRWISE DISCREPANCY ANALYZER
 *
 * Inner-joins two normalized series on timestamp and measures the price
 * gap at every shared candle, gross and net of both legs' fees:
 *
 *   rawDiscrepancy      = |closeA - closeB|
 *   adjustedDiscrepancy = rawDiscrepancy - (feeA + feeB)
 *
 * Timestamps present in only one series are dropped; a discrepancy needs a
 * simultaneous price on both legs. Combinations are unordered and oriented
 * canonically, so {A, B} is analyzed once and yields the same records
 * whichever order the pairs were listed in.
 */

import createDebug from 'debug';
import { createCanonicalPairKey, orientPair, pairCombinations } from '../lib/pairUtils.js';
import type { DiscrepancyRecord, FeeSide, NormalizedSeries, PairAnalysis } from '../types/discrepancy.js';
import type { FeeTable } from './fees.js';

const log = createDebug('engine:analyzer');

export function analyzePair(
    seriesA: NormalizedSeries,
    seriesB: NormalizedSeries,
    fees: FeeTable,
    side: FeeSide = 'taker'
): DiscrepancyRecord[] {
    if (seriesA.pair === seriesB.pair) {
        throw new Error(`cannot compare ${seriesA.pair} with itself`);
    }
    const feeA = fees.feeFor(seriesA.pair, side);
    const feeB = fees.feeFor(seriesB.pair, side);
    const byTimestamp = new Map(seriesB.candles.map((c) => [c.timestamp, c]));

    const records: DiscrepancyRecord[] = [];
    for (const a of seriesA.candles) {
        const b = byTimestamp.get(a.timestamp);
        if (!b) continue;
        const rawDiscrepancy = Math.abs(a.close - b.close);
        records.push({
            timestamp: a.timestamp,
            pairA: seriesA.pair,
            pairB: seriesB.pair,
            priceA: a.close,
            priceB: b.close,
            rawDiscrepancy,
            feeA,
            feeB,
            adjustedDiscrepancy: rawDiscrepancy - (feeA + feeB),
            volumeA: a.volume
        });
    }
    return records;
}

/**
 * Analyzes every unordered combination of `pairs` that has a normalized
 * series on both legs. Results follow combination order; records within a
 * combination ascend by timestamp.
 */
export function analyzeAllPairs(
    pairs: readonly string[],
    series: ReadonlyMap<string, NormalizedSeries>,
    fees: FeeTable,
    side: FeeSide = 'taker'
): PairAnalysis[] {
    const out: PairAnalysis[] = [];
    let skipped = 0;
    for (const [x, y] of pairCombinations(pairs)) {
        const [pairA, pairB] = orientPair(x, y);
        const a = series.get(pairA);
        const b = series.get(pairB);
        if (!a || !b) {
            skipped++;
            continue;
        }
        const records = analyzePair(a, b, fees, side);
        log('%s vs %s: %d aligned rows', pairA, pairB, records.length);
        out.push({ key: createCanonicalPairKey(pairA, pairB), pairA, pairB, records });
    }
    if (skipped) log('skipped %d combinations without data on both legs', skipped);
    return out;
}
