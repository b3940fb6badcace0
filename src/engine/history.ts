/**
 * HISTORY ANALYSIS
 *
 * Calibrates over everything the historical store holds: sweeps stdDev
 * multipliers for the best weighted profit, backtests at that multiplier
 * and reports the outlier bands around the distribution.
 */

import path from 'path';
import type { EngineConfig } from '../config/index.js';
import { scoreBacktest, summarizeCombinations, sweepThresholds, topOpportunities, type CombinationSummary, type SweepResult } from '../analysis/backtest.js';
import { findOutliers, iqrBounds, percentileBounds, stdDevBounds, type Bounds } from '../analysis/threshold.js';
import { writeOutliersCsv, writeSweepCsv, writeTradeCandidatesCsv } from '../persistence/csvExport.js';
import type { BacktestResult, DiscrepancyRecord } from '../types/discrepancy.js';

export type HistoryAnalysis = {
    recordCount: number;
    mean: number;
    stdDev: number;
    sweep: SweepResult;
    backtest: BacktestResult;
    percentileBounds: { p1: Bounds; p5: Bounds };
    outlierBounds: Bounds;
    outliers: DiscrepancyRecord[];
    topOpportunities: DiscrepancyRecord[];
    combinations: CombinationSummary[];
};

export function analyzeHistory(
    records: readonly DiscrepancyRecord[],
    config: Pick<EngineConfig, 'sweep' | 'weighting' | 'outliers'>,
    topN = 10
): HistoryAnalysis {
    const values = records.map((r) => r.adjustedDiscrepancy);
    const sweep = sweepThresholds(records, { ...config.sweep, weighting: config.weighting });
    const backtest = scoreBacktest(records, sweep.best.threshold, { weighting: config.weighting, stdDev: sweep.stdDev });
    const outlierBounds = config.outliers.method === 'iqr'
        ? iqrBounds(values, config.outliers.multiplier)
        : stdDevBounds(values, config.outliers.multiplier);

    return {
        recordCount: records.length,
        mean: sweep.mean,
        stdDev: sweep.stdDev,
        sweep,
        backtest,
        percentileBounds: { p1: percentileBounds(values, 1), p5: percentileBounds(values, 5) },
        outlierBounds,
        outliers: findOutliers(records, outlierBounds),
        topOpportunities: topOpportunities(records, sweep.best.threshold, topN),
        combinations: summarizeCombinations(records)
    };
}

export async function writeHistoryArtifacts(analysis: HistoryAnalysis, outputDir: string): Promise<string[]> {
    return [
        await writeTradeCandidatesCsv(path.join(outputDir, 'backtest_candidates.csv'), analysis.backtest.candidates),
        await writeOutliersCsv(path.join(outputDir, 'outliers.csv'), analysis.outliers),
        await writeSweepCsv(path.join(outputDir, 'threshold_sweep.csv'), analysis.sweep.points)
    ];
}
