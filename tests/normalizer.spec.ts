import { describe, it, expect } from 'vitest';
import { normalizeAll, normalizeCandles } from '../src/market/normalizer.js';
import type { OhlcRow } from '../src/types/krakenPublic.js';
import { row } from './helpers/fakes.js';

describe('normalizeCandles', () => {
    it('sorts, floors timestamps and keeps the last row per timestamp', () => {
        const rows: OhlcRow[] = [row(30, 3), row(0, 1), row(30, 4), row(15.7, 2)];
        const result = normalizeCandles('XXBTZUSD', 15, rows);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.series.pair).toBe('XXBTZUSD');
        expect(result.series.interval).toBe(15);
        expect(result.series.candles.map((c) => c.timestamp)).toEqual([0, 15, 30]);
        expect(result.series.candles.map((c) => c.close)).toEqual([1, 2, 4]);
    });

    it('coerces string fields to numbers', () => {
        const result = normalizeCandles('P', 15, [['60', '1.5', '2', '1', '1.75', '1.6', '12.5', 7], row(120, 2)]);
        if (!result.ok) throw new Error('expected a series');
        expect(result.series.candles[0]).toEqual({
            timestamp: 60, open: 1.5, high: 2, low: 1, close: 1.75, vwap: 1.6, volume: 12.5, tradeCount: 7
        });
    });

    it('freezes the output and leaves the input untouched', () => {
        const rows: OhlcRow[] = [row(30, 3), row(0, 1)];
        const before = JSON.stringify(rows);
        const result = normalizeCandles('P', 15, rows);
        if (!result.ok) throw new Error('expected a series');
        expect(Object.isFrozen(result.series)).toBe(true);
        expect(Object.isFrozen(result.series.candles)).toBe(true);
        expect(Object.isFrozen(result.series.candles[0])).toBe(true);
        expect(JSON.stringify(rows)).toBe(before);
    });

    it('rejects series with fewer than two usable rows', () => {
        const rows: OhlcRow[] = [row(0, 1), [15, '1', '1', '1', 'abc', '1', '1', 1]];
        expect(normalizeCandles('P', 15, rows)).toEqual({ ok: false, reason: 'insufficient_data', pair: 'P', rowCount: 1 });
        expect(normalizeCandles('P', 15, [])).toEqual({ ok: false, reason: 'insufficient_data', pair: 'P', rowCount: 0 });
    });

    it('drops rows with a non-numeric volume or price field', () => {
        const badVolume: OhlcRow[] = [
            [0, '100', '100', '100', '100', '100', 'abc', 1],
            [15, '102', '102', '102', '102', '102', 'abc', 1]
        ];
        expect(normalizeCandles('AAA', 15, badVolume)).toEqual({ ok: false, reason: 'insufficient_data', pair: 'AAA', rowCount: 0 });

        const mixed: OhlcRow[] = [row(0, 1), [15, '2', '2', '2', '2', 'n/a', '1', 1], row(30, 3)];
        const result = normalizeCandles('AAA', 15, mixed);
        if (!result.ok) throw new Error('expected a series');
        expect(result.series.candles.map((c) => c.timestamp)).toEqual([0, 30]);
    });
});

describe('normalizeAll', () => {
    it('splits usable series from rejections', () => {
        const payloads = new Map([
            ['A', { rows: [row(0, 1), row(15, 2)] }],
            ['B', { rows: [row(0, 1)] }]
        ]);
        const { series, rejected } = normalizeAll(payloads, 15);
        expect([...series.keys()]).toEqual(['A']);
        expect(rejected.map((r) => r.pair)).toEqual(['B']);
    });
});
