import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import { createHttpApp } from '../src/server.js';
import { MemoryStore, record } from './helpers/fakes.js';

const store = new MemoryStore([
    record(0, 1),
    record(900, 2),
    record(0, 5, { pairB: 'CCC' }),
    record(900, 6, { pairB: 'CCC' })
]);

let server: Server;
let baseUrl: string;

beforeAll(async () => {
    const app = createHttpApp(store, { thresholdSpec: undefined, weighting: 'conviction', allowedOrigin: 'http://localhost:5173' });
    server = await new Promise<Server>((resolve) => {
        const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
});

async function getJson(pathAndQuery: string): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${pathAndQuery}`);
    return { status: res.status, body: await res.json() };
}

describe('HTTP view', () => {
    it('answers health checks', async () => {
        const { status, body } = await getJson('/healthz');
        expect(status).toBe(200);
        expect(body).toMatchObject({ status: 'ok' });
    });

    it('sends the configured CORS origin', async () => {
        const res = await fetch(`${baseUrl}/healthz`);
        expect(res.headers.get('access-control-allow-origin')).toBe('http://localhost:5173');
        await res.arrayBuffer();
    });

    it('lists stored discrepancies newest first, filtered by pair', async () => {
        const { status, body } = await getJson('/api/discrepancies?pair=CCC&limit=1');
        expect(status).toBe(200);
        expect(body).toMatchObject({ count: 1, records: [{ timestamp: 900, pairA: 'AAA', pairB: 'CCC', adjustedDiscrepancy: 6 }] });
    });

    it('rejects an out-of-range limit', async () => {
        expect((await getJson('/api/discrepancies?limit=0')).status).toBe(400);
    });

    it('backtests stored records at a requested threshold', async () => {
        const { status, body } = await getJson('/api/backtest?method=fixed&parameter=4');
        expect(status).toBe(200);
        expect(body).toMatchObject({ spec: { method: 'fixed', parameter: 4 }, recordCount: 4, threshold: 4, tradeCount: 2, totalProfit: 11 });
    });

    it('defaults to stdDev(2)', async () => {
        const { body } = await getJson('/api/backtest');
        expect(body).toMatchObject({ spec: { method: 'stdDev', parameter: 2 }, tradeCount: 0 });
    });

    it('rejects invalid threshold specs', async () => {
        const bad = await getJson('/api/backtest?method=percentile&parameter=150');
        expect(bad.status).toBe(400);
        expect(bad.body).toMatchObject({ error: 'invalid threshold spec' });
        expect((await getJson('/api/backtest?method=median&parameter=1')).status).toBe(400);
    });
});
