#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from '../config/index.js';
import { analyzeHistory, writeHistoryArtifacts } from '../engine/history.js';
import { openHistoricalStore } from '../persistence/openStore.js';
import { fixed, isoFromSeconds } from '../lib/format.js';
import { reportFailure } from './shared.js';

async function main() {
    const config = loadConfig();
    const store = await openHistoricalStore(config);
    try {
        const records = await store.load();
        if (records.length === 0) {
            console.log('[history] store is empty; run a scan first');
            return;
        }
        const analysis = analyzeHistory(records, config);
        const { best } = analysis.sweep;
        console.log(`[history] ${analysis.recordCount} records, mean ${fixed(analysis.mean)}, std ${fixed(analysis.stdDev)}`);
        console.log(`[history] best multiplier ${best.multiplier.toFixed(1)} -> threshold ${fixed(best.threshold)}, ${best.tradeCount} trades, weighted ${fixed(best.weightedProfit)}`);
        console.log(`[history] backtest: profit ${fixed(analysis.backtest.totalProfit)}, sharpe ${fixed(analysis.backtest.sharpeRatio, 2)}, sortino ${fixed(analysis.backtest.sortinoRatio, 2)}`);
        console.log(`[history] 1% bounds [${fixed(analysis.percentileBounds.p1.lower)}, ${fixed(analysis.percentileBounds.p1.upper)}], 5% bounds [${fixed(analysis.percentileBounds.p5.lower)}, ${fixed(analysis.percentileBounds.p5.upper)}]`);
        console.log(`[history] ${config.outliers.method}(${config.outliers.multiplier}) outliers: ${analysis.outliers.length} outside [${fixed(analysis.outlierBounds.lower)}, ${fixed(analysis.outlierBounds.upper)}]`);
        for (const r of analysis.topOpportunities) {
            console.log(`  ${isoFromSeconds(r.timestamp)} ${r.pairA} / ${r.pairB}: ${fixed(r.adjustedDiscrepancy)}`);
        }
        for (const file of await writeHistoryArtifacts(analysis, config.outputDir)) console.log(`[history] wrote ${file}`);
    } finally {
        store.close?.();
    }
}

main().catch((err) => reportFailure('history', err));
