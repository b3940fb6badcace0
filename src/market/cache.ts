/**
 * CANDLE CACHE
 *
 * Explicit get/put cache for candle payloads with a TTL expiry check,
 * kept out of the fetcher: CachingOhlcSource wraps any OhlcSource and the
 * fetcher only ever sees the OhlcSource interface.
 *
 * Entries are keyed by `${pair}_${interval}`. Only requests without a
 * `since` cursor are served from or written to the cache.
 */

import { promises as fs } from 'fs';
import path from 'path';
import createDebug from 'debug';
import { z } from 'zod';
import { isNotFound } from '../lib/errors.js';
import { OhlcRowSchema, type RawOhlcPayload } from '../types/krakenPublic.js';
import type { OhlcRequest, OhlcSource } from './source.js';

const log = createDebug('engine:cache');

export const DEFAULT_CACHE_TTL_MS = 15 * 60 * 1000;

export type CacheEntry<T> = {
    lastFetched: string; // ISO timestamp
    data: T;
};

export interface CandleCache {
    get(key: string): Promise<CacheEntry<RawOhlcPayload> | undefined>;
    put(key: string, data: RawOhlcPayload): Promise<void>;
}

export function isExpired(entry: CacheEntry<unknown>, ttlMs: number, now: number = Date.now()): boolean {
    const fetchedAt = Date.parse(entry.lastFetched);
    if (!Number.isFinite(fetchedAt)) return true;
    return now - fetchedAt >= ttlMs;
}

export function cacheKey(pair: string, interval: number): string {
    return `${pair}_${interval}`;
}

const CacheFileSchema = z.object({
    lastFetched: z.string(),
    data: z.object({
        rows: z.array(OhlcRowSchema),
        last: z.number().optional()
    })
});

export class MemoryCandleCache implements CandleCache {
    private entries = new Map<string, CacheEntry<RawOhlcPayload>>();

    constructor(private clock: () => number = Date.now) { }

    async get(key: string): Promise<CacheEntry<RawOhlcPayload> | undefined> {
        return this.entries.get(key);
    }

    async put(key: string, data: RawOhlcPayload): Promise<void> {
        this.entries.set(key, { lastFetched: new Date(this.clock()).toISOString(), data });
    }
}

export class FileCandleCache implements CandleCache {
    constructor(private dir: string, private clock: () => number = Date.now) { }

    private filePath(key: string): string {
        return path.join(this.dir, `${key.replace(/[^A-Za-z0-9_.-]/g, '_')}.json`);
    }

    async get(key: string): Promise<CacheEntry<RawOhlcPayload> | undefined> {
        let text: string;
        try {
            text = await fs.readFile(this.filePath(key), 'utf8');
        } catch (e) {
            if (isNotFound(e)) return undefined;
            throw e;
        }
        const parsed = CacheFileSchema.safeParse(safeJson(text));
        if (!parsed.success) {
            log('discarding unreadable cache entry %s', key);
            return undefined;
        }
        return parsed.data;
    }

    async put(key: string, data: RawOhlcPayload): Promise<void> {
        await fs.mkdir(this.dir, { recursive: true });
        const entry: CacheEntry<RawOhlcPayload> = { lastFetched: new Date(this.clock()).toISOString(), data };
        await fs.writeFile(this.filePath(key), JSON.stringify(entry));
    }
}

function safeJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

export class CachingOhlcSource implements OhlcSource {
    constructor(
        private inner: OhlcSource,
        private cache: CandleCache,
        private ttlMs: number = DEFAULT_CACHE_TTL_MS,
        private clock: () => number = Date.now
    ) { }

    getAssetPairs(): Promise<string[]> {
        return this.inner.getAssetPairs();
    }

    async getOhlc(pair: string, interval: number, request: OhlcRequest = {}): Promise<RawOhlcPayload> {
        if (request.since !== undefined) return this.inner.getOhlc(pair, interval, request);
        const key = cacheKey(pair, interval);
        const hit = await this.cache.get(key);
        if (hit && !isExpired(hit, this.ttlMs, this.clock())) {
            log('cache hit %s', key);
            return hit.data;
        }
        const data = await this.inner.getOhlc(pair, interval, request);
        await this.cache.put(key, data);
        return data;
    }
}
