#!/usr/bin/env node
import 'dotenv/config';
import { z } from 'zod';
import { loadConfig } from '../config/index.js';
import { FeeTable } from '../analysis/fees.js';
import { describeSpec } from '../analysis/threshold.js';
import { runDiscrepancyScan } from '../engine/scan.js';
import { openHistoricalStore } from '../persistence/openStore.js';
import { ConfigError } from '../lib/errors.js';
import { fixed, formatDurationMs, intervalLabel } from '../lib/format.js';
import { reportFailure } from './shared.js';

const PairCountArg = z.coerce.number().int().positive().optional();

async function main() {
    const config = loadConfig();
    const arg = PairCountArg.safeParse(process.argv[2]);
    if (!arg.success) throw new ConfigError(`pair count must be a positive integer, got ${process.argv[2]}`);

    const fees = await FeeTable.load(config.feesPath, config.defaultFee);
    const store = await openHistoricalStore(config);
    try {
        console.log(`[scan] interval ${intervalLabel(config.interval)}, batch ${config.batchSize}, threshold ${describeSpec(config.thresholdSpec)}, ${fees.size} fee entries`);
        const report = await runDiscrepancyScan(config, { fees, store, pairLimit: arg.data });
        if (report.noPairsFound) {
            console.log('[scan] no pairs found');
            return;
        }
        console.log(`[scan] pairs: ${report.pairsFetched}/${report.pairsRequested} fetched, ${report.seriesRejected} rejected for insufficient data`);
        console.log(`[scan] combinations: ${report.combinations}, records: ${report.recordsAnalyzed} (${report.recordsAppended} new)`);
        console.log(`[scan] candidates: ${report.candidates}, profit ${fixed(report.totals.totalProfit)}, weighted ${fixed(report.totals.weightedProfit)}`);
        const top = [...report.scores].sort((a, b) => b.result.weightedProfit - a.result.weightedProfit).slice(0, 5);
        for (const s of top) {
            if (s.result.tradeCount === 0) break;
            console.log(`  ${s.pairA} / ${s.pairB}: ${s.result.tradeCount} trades above ${fixed(s.result.threshold)}, weighted ${fixed(s.result.weightedProfit)}, sharpe ${fixed(s.result.sharpeRatio, 2)}`);
        }
        for (const file of report.artifacts) console.log(`[scan] wrote ${file}`);
        console.log(`[scan] done in ${formatDurationMs(report.durationMs)}`);
    } finally {
        store.close?.();
    }
}

main().catch((err) => reportFailure('scan', err));
