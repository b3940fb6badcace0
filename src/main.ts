/**
 * MAIN APPLICATION ENTRY POINT
 *
 * Long-running mode: loads configuration and the fee table once, opens the
 * historical store, runs a discrepancy scan every LOOP_INTERVAL_MS and
 * serves the stored history over HTTP.
 */

import 'dotenv/config';
import { loadConfig } from './config/index.js';
import { FeeTable } from './analysis/fees.js';
import { runDiscrepancyScan } from './engine/scan.js';
import { openHistoricalStore } from './persistence/openStore.js';
import { SchedulerLoop } from './scheduler/loop.js';
import { createHttpApp, startHttpServer } from './server.js';
import { fixed } from './lib/format.js';
import { reportFailure } from './cli/shared.js';

async function start() {
    const cfg = loadConfig();
    const fees = await FeeTable.load(cfg.feesPath, cfg.defaultFee);
    const store = await openHistoricalStore(cfg);

    const loop = new SchedulerLoop(cfg.loopIntervalMs, async () => {
        const report = await runDiscrepancyScan(cfg, { fees, store });
        if (report.noPairsFound) {
            console.log('[loop] no pairs found');
            return;
        }
        console.log(`[loop] ${report.combinations} combinations, ${report.candidates} candidates, ${report.recordsAppended} new records, weighted ${fixed(report.totals.weightedProfit)}`);
    });
    loop.start();
    console.log('App started. Loop:', cfg.loopIntervalMs, 'ms');

    const server = startHttpServer(createHttpApp(store, cfg), cfg.port);

    const shutdown = async () => {
        await loop.stop();
        server.close(() => store.close?.());
    };
    const onSignal = () => {
        shutdown().catch((err) => reportFailure('main', err));
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
}

start().catch((err) => reportFailure('main', err));
