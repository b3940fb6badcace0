import type { RawOhlcPayload } from '../types/krakenPublic.js';

export type OhlcRequest = {
    since?: number;
    signal?: AbortSignal;
};

/**
 * Read-only market data the engine consumes: the pair catalog and candle
 * rows per pair and interval. PublicClient talks to the exchange; caches and
 * test fakes implement the same shape.
 */
export interface OhlcSource {
    getAssetPairs(): Promise<string[]>;
    getOhlc(pair: string, interval: number, request?: OhlcRequest): Promise<RawOhlcPayload>;
}
