/**
 * BATCHED MARKET FETCHER
 *
 * Acquires candle payloads for many pairs against the exchange's public
 * endpoints. Pairs are split into consecutive batches of `batchSize`;
 * batches run concurrently while the pairs inside one batch are requested
 * one after another.
 *
 * Failure policy:
 * - A failed pair (transport error, timeout, malformed payload, missing
 *   result) is logged and left out of the result map. It never aborts its
 *   batch or the run.
 * - A failed catalog request yields an empty pair list.
 */

import createDebug from 'debug';
import { ConfigError, describeError, FetchError } from '../lib/errors.js';
import { NO_RETRY, retry, type RetryOptions } from '../lib/retry.js';
import type { RawOhlcPayload } from '../types/krakenPublic.js';
import type { OhlcSource } from './source.js';

const log = createDebug('engine:fetcher');

export type FetcherOptions = {
    batchSize: number;
    timeoutMs?: number; // 0 or undefined disables the per-request timeout
    retry?: Pick<RetryOptions, 'attempts' | 'baseDelayMs'>;
};

export type FetchFailure = {
    pair: string;
    error: string;
};

export type FetchOutcome = {
    payloads: Map<string, RawOhlcPayload>;
    failures: FetchFailure[];
};

export function partition<T>(items: readonly T[], size: number): T[][] {
    if (!Number.isInteger(size) || size <= 0) {
        throw new ConfigError(`batch size must be a positive integer, got ${size}`);
    }
    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += size) batches.push(items.slice(i, i + size));
    return batches;
}

export class BatchedMarketFetcher {
    private readonly retryOptions: RetryOptions;

    constructor(private source: OhlcSource, private options: FetcherOptions) {
        if (!Number.isInteger(options.batchSize) || options.batchSize <= 0) {
            throw new ConfigError(`batch size must be a positive integer, got ${options.batchSize}`);
        }
        this.retryOptions = {
            ...NO_RETRY,
            ...options.retry,
            onRetry: (error, attempt, delayMs) => log('retry %d in %dms: %s', attempt, delayMs, describeError(error))
        };
    }

    async fetchPairCatalog(): Promise<string[]> {
        try {
            return await this.source.getAssetPairs();
        } catch (e) {
            log('pair catalog fetch failed: %s', describeError(e));
            return [];
        }
    }

    async fetchAll(pairs: readonly string[], interval: number, opts: { since?: number } = {}): Promise<FetchOutcome> {
        const batches = partition(pairs, this.options.batchSize);
        log('fetching %d pairs in %d batches of <=%d', pairs.length, batches.length, this.options.batchSize);
        const results = await Promise.all(batches.map((batch, idx) => this.fetchBatch(batch, interval, opts.since, idx)));

        // result order follows the input list, not completion order
        const byPair = new Map<string, RawOhlcPayload>();
        const failures: FetchFailure[] = [];
        for (const batch of results) {
            for (const [pair, payload] of batch.payloads) byPair.set(pair, payload);
            failures.push(...batch.failures);
        }
        const payloads = new Map<string, RawOhlcPayload>();
        for (const pair of pairs) {
            const payload = byPair.get(pair);
            if (payload) payloads.set(pair, payload);
        }
        return { payloads, failures };
    }

    private async fetchBatch(batch: readonly string[], interval: number, since: number | undefined, idx: number): Promise<FetchOutcome> {
        const payloads = new Map<string, RawOhlcPayload>();
        const failures: FetchFailure[] = [];
        for (const pair of batch) {
            try {
                const payload = await retry(() => this.fetchOne(pair, interval, since), this.retryOptions);
                payloads.set(pair, payload);
            } catch (e) {
                const error = describeError(e);
                log('batch %d: excluding %s (%s)', idx, pair, error);
                failures.push({ pair, error });
            }
        }
        log('batch %d done: %d ok, %d failed', idx, payloads.size, failures.length);
        return { payloads, failures };
    }

    private async fetchOne(pair: string, interval: number, since: number | undefined): Promise<RawOhlcPayload> {
        const timeoutMs = this.options.timeoutMs ?? 0;
        if (timeoutMs <= 0) return this.source.getOhlc(pair, interval, { since });

        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(new FetchError(`timed out after ${timeoutMs}ms`, pair));
            }, timeoutMs);
        });
        try {
            return await Promise.race([
                this.source.getOhlc(pair, interval, { since, signal: controller.signal }),
                timeout
            ]);
        } finally {
            clearTimeout(timer);
        }
    }
}
