import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import { z } from 'zod';
import type { EngineConfig } from './config/index.js';
import { scoreBacktest } from './analysis/backtest.js';
import { DEFAULT_THRESHOLD_SPEC, parseThresholdSpec, resolveEntryThreshold, type ThresholdSpec } from './analysis/threshold.js';
import type { HistoricalStore } from './persistence/historicalStore.js';
import { ConfigError, describeError } from './lib/errors.js';

const DiscrepancyQuerySchema = z.object({
    pair: z.string().min(1).optional(),
    limit: z.coerce.number().int().min(1).max(1000).default(200)
});

const BacktestQuerySchema = z.object({
    method: z.string().optional(),
    parameter: z.coerce.number().optional()
});

export function createHttpApp(store: HistoricalStore, config: Pick<EngineConfig, 'thresholdSpec' | 'weighting' | 'allowedOrigin'>) {
    const app = express();

    app.use((req: Request, res: Response, next: NextFunction) => {
        res.header('Access-Control-Allow-Origin', config.allowedOrigin);
        res.header('Access-Control-Allow-Methods', 'GET,OPTIONS');
        res.header('Access-Control-Allow-Headers', 'Content-Type');
        if (req.method === 'OPTIONS') return res.sendStatus(204);
        next();
    });

    app.get('/healthz', (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            pid: process.pid,
            uptimeSeconds: Math.floor(process.uptime()),
            timestamp: new Date().toISOString(),
        });
    });

    // ---------- /api/discrepancies ----------
    app.get('/api/discrepancies', async (req: Request, res: Response) => {
        const query = DiscrepancyQuerySchema.safeParse(req.query);
        if (!query.success) return res.status(400).json({ error: 'invalid query', issues: query.error.issues.map((i) => i.message) });
        const { pair, limit } = query.data;
        try {
            const records = (await store.load())
                .filter((r) => !pair || r.pairA === pair || r.pairB === pair)
                .sort((a, b) => b.timestamp - a.timestamp)
                .slice(0, limit);
            res.json({ count: records.length, records });
        } catch {
            res.status(500).json({ error: 'Failed to read discrepancy history' });
        }
    });

    // ---------- /api/backtest ----------
    app.get('/api/backtest', async (req: Request, res: Response) => {
        const query = BacktestQuerySchema.safeParse(req.query);
        if (!query.success) return res.status(400).json({ error: 'invalid query', issues: query.error.issues.map((i) => i.message) });
        let spec: ThresholdSpec;
        try {
            spec = query.data.method
                ? parseThresholdSpec({ method: query.data.method, parameter: query.data.parameter })
                : config.thresholdSpec ?? DEFAULT_THRESHOLD_SPEC;
        } catch (e) {
            const issues = e instanceof ConfigError ? e.issues : [describeError(e)];
            return res.status(400).json({ error: 'invalid threshold spec', issues });
        }
        try {
            const records = await store.load();
            const threshold = resolveEntryThreshold(records.map((r) => r.adjustedDiscrepancy), spec);
            const result = scoreBacktest(records, threshold, { weighting: config.weighting });
            res.json({ spec, recordCount: records.length, ...result });
        } catch {
            res.status(500).json({ error: 'Failed to run backtest' });
        }
    });

    return app;
}

export function startHttpServer(app: ReturnType<typeof createHttpApp>, port: number): Server {
    return app.listen(port, () => {
        // eslint-disable-next-line no-console
        console.log(`HTTP server listening on ${port}`);
    });
}
