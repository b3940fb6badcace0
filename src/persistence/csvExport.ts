/**
 * Flat CSV artifacts for external consumption. Record tables lead with an
 * ISO-8601 `time` column followed by the epoch-seconds `timestamp`.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { isoFromSeconds } from '../lib/format.js';
import type { SweepPoint } from '../analysis/backtest.js';
import type { DiscrepancyRecord, TradeCandidate } from '../types/discrepancy.js';

export const DISCREPANCY_COLUMNS = [
    'time', 'timestamp', 'pairA', 'pairB', 'priceA', 'priceB',
    'rawDiscrepancy', 'feeA', 'feeB', 'adjustedDiscrepancy', 'volumeA'
] as const;

export const SWEEP_COLUMNS = ['multiplier', 'threshold', 'totalProfit', 'weightedProfit', 'tradeCount'] as const;

export const CANDIDATE_COLUMNS = [...DISCREPANCY_COLUMNS, 'profit', 'weight', 'weightedProfit', 'cumulativeProfit'] as const;

function recordRow(r: DiscrepancyRecord): Array<string | number> {
    return [
        isoFromSeconds(r.timestamp), r.timestamp, r.pairA, r.pairB, r.priceA, r.priceB,
        r.rawDiscrepancy, r.feeA, r.feeB, r.adjustedDiscrepancy, r.volumeA
    ];
}

async function writeTable(filePath: string, columns: readonly string[], rows: Array<Array<string | number>>): Promise<string> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, stringify(rows, { header: true, columns: [...columns] }));
    return filePath;
}

export function writeDiscrepancyCsv(filePath: string, records: readonly DiscrepancyRecord[]): Promise<string> {
    return writeTable(filePath, DISCREPANCY_COLUMNS, records.map(recordRow));
}

export function writeTradeCandidatesCsv(filePath: string, candidates: readonly TradeCandidate[]): Promise<string> {
    return writeTable(
        filePath,
        CANDIDATE_COLUMNS,
        candidates.map((c) => [...recordRow(c), c.profit, c.weight, c.weightedProfit, c.cumulativeProfit])
    );
}

export function writeOutliersCsv(filePath: string, outliers: readonly DiscrepancyRecord[]): Promise<string> {
    return writeTable(filePath, DISCREPANCY_COLUMNS, outliers.map(recordRow));
}

export function writeSweepCsv(filePath: string, points: readonly SweepPoint[]): Promise<string> {
    return writeTable(
        filePath,
        SWEEP_COLUMNS,
        points.map((p) => [p.multiplier, p.threshold, p.totalProfit, p.weightedProfit, p.tradeCount])
    );
}
