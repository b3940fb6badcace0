/**
 * CANDLE NORMALIZER
 *
 * Turns raw candle rows into an immutable, time-indexed series: integer
 * second timestamps, finite numeric fields, strictly ascending and unique by
 * timestamp, tagged with the owning pair. A payload with fewer than two
 * usable rows is rejected as insufficient data, which is a skip signal for
 * the caller and not an error.
 */

import createDebug from 'debug';
import type { Candle, NormalizedSeries } from '../types/discrepancy.js';
import type { OhlcRow, RawOhlcPayload } from '../types/krakenPublic.js';

const log = createDebug('engine:normalizer');

export const MIN_SERIES_LENGTH = 2;

export type Rejection = {
    ok: false;
    reason: 'insufficient_data';
    pair: string;
    rowCount: number;
};

export type NormalizeResult = { ok: true; series: NormalizedSeries } | Rejection;

function toNumber(value: string | number): number {
    return typeof value === 'number' ? value : Number(value);
}

// every field must be finite; a row with any unreadable number is dropped
function toCandle(row: OhlcRow): Candle | undefined {
    const [time, open, high, low, close, vwap, volume, count] = row;
    const candle: Candle = {
        timestamp: Math.floor(toNumber(time)),
        open: toNumber(open),
        high: toNumber(high),
        low: toNumber(low),
        close: toNumber(close),
        vwap: toNumber(vwap),
        volume: toNumber(volume),
        tradeCount: Math.trunc(toNumber(count))
    };
    return Object.values(candle).every(Number.isFinite) ? candle : undefined;
}

export function normalizeCandles(pair: string, interval: number, rows: readonly OhlcRow[]): NormalizeResult {
    const byTimestamp = new Map<number, Candle>();
    for (const row of rows) {
        const candle = toCandle(row);
        if (candle) byTimestamp.set(candle.timestamp, Object.freeze(candle));
    }
    if (byTimestamp.size < MIN_SERIES_LENGTH) {
        log('insufficient data for %s: %d usable of %d rows', pair, byTimestamp.size, rows.length);
        return { ok: false, reason: 'insufficient_data', pair, rowCount: byTimestamp.size };
    }
    const candles = Object.freeze([...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp));
    return { ok: true, series: Object.freeze({ pair, interval, candles }) };
}

export function normalizeAll(
    payloads: ReadonlyMap<string, RawOhlcPayload>,
    interval: number
): { series: Map<string, NormalizedSeries>; rejected: Rejection[] } {
    const series = new Map<string, NormalizedSeries>();
    const rejected: Rejection[] = [];
    for (const [pair, payload] of payloads) {
        const result = normalizeCandles(pair, interval, payload.rows);
        if (result.ok) series.set(pair, result.series);
        else rejected.push(result);
    }
    return { series, rejected };
}
