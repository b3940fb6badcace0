/**
 * SCAN PIPELINE
 *
 * One end-to-end pass over the exchange:
 * catalog -> fetch -> normalize -> analyze -> calibrate -> score -> store.
 *
 * The entry threshold is resolved per combination over that combination's
 * own adjusted discrepancies (the configured threshold, or stdDev(2) when none
 * is set). Every analyzed record is offered to the historical store, not
 * only the candidates. A run with zero candidates is a normal outcome.
 */

import path from 'path';
import createDebug from 'debug';
import type { EngineConfig } from '../config/index.js';
import { PublicClient } from '../http/publicClient.js';
import { CachingOhlcSource, FileCandleCache } from '../market/cache.js';
import { BatchedMarketFetcher } from '../market/fetcher.js';
import { normalizeAll } from '../market/normalizer.js';
import type { OhlcSource } from '../market/source.js';
import { analyzeAllPairs } from '../analysis/discrepancy.js';
import type { FeeTable } from '../analysis/fees.js';
import { DEFAULT_THRESHOLD_SPEC, resolveEntryThreshold } from '../analysis/threshold.js';
import { scoreBacktest } from '../analysis/backtest.js';
import type { HistoricalStore } from '../persistence/historicalStore.js';
import { writeDiscrepancyCsv, writeTradeCandidatesCsv } from '../persistence/csvExport.js';
import type { BacktestResult } from '../types/discrepancy.js';

const log = createDebug('engine:scan');

export type ScanDeps = {
    fees: FeeTable;
    store: HistoricalStore;
    source?: OhlcSource;
    clock?: () => number;
    pairLimit?: number; // overrides config.pairLimit
    writeArtifacts?: boolean; // default true
};

export type CombinationScore = {
    key: string;
    pairA: string;
    pairB: string;
    records: number;
    result: BacktestResult;
};

export type ScanReport = {
    startedAt: number;
    durationMs: number;
    noPairsFound: boolean;
    pairsRequested: number;
    pairsFetched: number;
    seriesRejected: number;
    combinations: number;
    recordsAnalyzed: number;
    recordsAppended: number;
    candidates: number;
    totals: { totalProfit: number; weightedProfit: number };
    scores: CombinationScore[];
    artifacts: string[];
};

export function defaultSource(config: EngineConfig, clock: () => number = Date.now): OhlcSource {
    const client = new PublicClient(config.baseUrl, config.basePath);
    if (config.cache.ttlMs <= 0) return client;
    return new CachingOhlcSource(client, new FileCandleCache(config.cache.dir, clock), config.cache.ttlMs, clock);
}

function emptyReport(startedAt: number, clock: () => number): ScanReport {
    return {
        startedAt,
        durationMs: clock() - startedAt,
        noPairsFound: true,
        pairsRequested: 0,
        pairsFetched: 0,
        seriesRejected: 0,
        combinations: 0,
        recordsAnalyzed: 0,
        recordsAppended: 0,
        candidates: 0,
        totals: { totalProfit: 0, weightedProfit: 0 },
        scores: [],
        artifacts: []
    };
}

export async function runDiscrepancyScan(config: EngineConfig, deps: ScanDeps): Promise<ScanReport> {
    const clock = deps.clock ?? Date.now;
    const startedAt = clock();
    const source = deps.source ?? defaultSource(config, clock);
    const fetcher = new BatchedMarketFetcher(source, {
        batchSize: config.batchSize,
        timeoutMs: config.fetchTimeoutMs,
        retry: config.retry
    });

    const catalog = await fetcher.fetchPairCatalog();
    if (catalog.length === 0) {
        log('no pairs found');
        return emptyReport(startedAt, clock);
    }
    const limit = deps.pairLimit ?? config.pairLimit;
    const pairs = limit ? catalog.slice(0, limit) : catalog;

    const { payloads, failures } = await fetcher.fetchAll(pairs, config.interval);
    const { series, rejected } = normalizeAll(payloads, config.interval);
    log('fetched %d/%d pairs (%d failed), %d usable series', payloads.size, pairs.length, failures.length, series.size);

    const analyses = analyzeAllPairs(pairs, series, deps.fees, config.feeSide);
    const spec = config.thresholdSpec ?? DEFAULT_THRESHOLD_SPEC;
    const scores: CombinationScore[] = analyses.map((a) => {
        const threshold = resolveEntryThreshold(a.records.map((r) => r.adjustedDiscrepancy), spec);
        return {
            key: a.key,
            pairA: a.pairA,
            pairB: a.pairB,
            records: a.records.length,
            result: scoreBacktest(a.records, threshold, { weighting: config.weighting })
        };
    });

    const allRecords = analyses.flatMap((a) => a.records);
    const recordsAppended = await deps.store.appendIfNew(allRecords);

    const artifacts: string[] = [];
    if (deps.writeArtifacts ?? true) {
        artifacts.push(await writeDiscrepancyCsv(path.join(config.outputDir, 'discrepancies.csv'), allRecords));
        artifacts.push(await writeTradeCandidatesCsv(
            path.join(config.outputDir, 'trade_candidates.csv'),
            scores.flatMap((s) => s.result.candidates)
        ));
    }

    const report: ScanReport = {
        startedAt,
        durationMs: clock() - startedAt,
        noPairsFound: false,
        pairsRequested: pairs.length,
        pairsFetched: payloads.size,
        seriesRejected: rejected.length,
        combinations: analyses.length,
        recordsAnalyzed: allRecords.length,
        recordsAppended,
        candidates: scores.reduce((n, s) => n + s.result.tradeCount, 0),
        totals: {
            totalProfit: scores.reduce((acc, s) => acc + s.result.totalProfit, 0),
            weightedProfit: scores.reduce((acc, s) => acc + s.result.weightedProfit, 0)
        },
        scores,
        artifacts
    };
    log('scan done: %d combinations, %d candidates, %d new records', report.combinations, report.candidates, report.recordsAppended);
    return report;
}
