/**
 * PUBLIC HTTP CLIENT
 *
 * Handles public REST communication with the exchange for market data:
 * - Tradable pair catalog (AssetPairs)
 * - Candle rows per pair and interval (OHLC), optionally from a cursor
 * - Per-pair fee schedules for the fee table download
 *
 * Every response is the exchange envelope `{ error: [], result: {...} }`.
 * A non-2xx status, a non-empty error list, a missing result or a payload
 * that fails its Zod schema raises FetchError.
 */

import { z } from 'zod';
import { FetchError } from '../lib/errors.js';
import type { OhlcRequest, OhlcSource } from '../market/source.js';
import {
    AssetPairsResultSchema,
    OhlcResultSchema,
    OhlcRowSchema,
    PublicEnvelopeSchema,
    type AssetPairFee,
    type RawOhlcPayload
} from '../types/krakenPublic.js';

export class PublicClient implements OhlcSource {
    constructor(private baseUrl: string, private basePath = '/0/public') { }

    private url(path: string): URL {
        return new URL(`${this.baseUrl}${this.basePath}${path}`);
    }

    private async getResult(path: string, params: Record<string, string> = {}, signal?: AbortSignal, pair?: string): Promise<unknown> {
        const url = this.url(path);
        for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
        const res = await fetch(url, { signal });
        if (!res.ok) throw new FetchError(`${path} ${res.status}`, pair, res.status);
        const json: unknown = await res.json();
        const envelope = PublicEnvelopeSchema.safeParse(json);
        if (!envelope.success) throw new FetchError(`${path} malformed response: ${envelope.error.message}`, pair);
        if (envelope.data.error.length > 0) throw new FetchError(`${path} ${envelope.data.error.join(', ')}`, pair);
        if (envelope.data.result === undefined) throw new FetchError(`${path} response has no result`, pair);
        return envelope.data.result;
    }

    private async getAssetPairsResult() {
        const parsed = AssetPairsResultSchema.safeParse(await this.getResult('/AssetPairs'));
        if (!parsed.success) throw new FetchError(`/AssetPairs malformed result: ${parsed.error.message}`);
        return parsed.data;
    }

    async getAssetPairs(): Promise<string[]> {
        const result = await this.getAssetPairsResult();
        return Object.keys(result);
    }

    async getAssetPairFees(): Promise<AssetPairFee[]> {
        const result = await this.getAssetPairsResult();
        return Object.entries(result).map(([pair, info]) => ({
            pair,
            altName: info.altname ?? '',
            base: info.base ?? '',
            quote: info.quote ?? '',
            // first tier is the zero-volume schedule
            takerFeePct: info.fees?.[0]?.[1] ?? 0,
            makerFeePct: info.fees_maker?.[0]?.[1] ?? 0
        }));
    }

    async getOhlc(pair: string, interval: number, request: OhlcRequest = {}): Promise<RawOhlcPayload> {
        const params: Record<string, string> = { pair, interval: String(interval) };
        if (request.since !== undefined) params.since = String(request.since);
        const parsed = OhlcResultSchema.safeParse(await this.getResult('/OHLC', params, request.signal, pair));
        if (!parsed.success) throw new FetchError(`/OHLC malformed result for ${pair}`, pair);
        const result = parsed.data;
        const key = pair in result ? pair : Object.keys(result).find((k) => k !== 'last' && Array.isArray(result[k]));
        if (key === undefined) throw new FetchError(`/OHLC result has no series for ${pair}`, pair);
        const rows = z.array(OhlcRowSchema).safeParse(result[key]);
        if (!rows.success) throw new FetchError(`/OHLC malformed rows for ${pair}: ${rows.error.message}`, pair);
        const last = typeof result.last === 'number' ? result.last : undefined;
        return { rows: rows.data, last };
    }
}
