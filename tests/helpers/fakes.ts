import type { OhlcRequest, OhlcSource } from '../../src/market/source.js';
import type { HistoricalStore } from '../../src/persistence/historicalStore.js';
import { filterNew, recordKey } from '../../src/persistence/historicalStore.js';
import type { DiscrepancyRecord, NormalizedSeries } from '../../src/types/discrepancy.js';
import type { OhlcRow, RawOhlcPayload } from '../../src/types/krakenPublic.js';

export function row(time: number, close: number, volume = 1): OhlcRow {
    const c = String(close);
    return [time, c, c, c, c, c, String(volume), 1];
}

export function series(pair: string, points: Array<[number, number, number?]>): NormalizedSeries {
    return {
        pair,
        interval: 15,
        candles: points.map(([timestamp, close, volume = 1]) => ({
            timestamp, open: close, high: close, low: close, close, vwap: close, volume, tradeCount: 1
        }))
    };
}

export function record(timestamp: number, adjustedDiscrepancy: number, overrides: Partial<DiscrepancyRecord> = {}): DiscrepancyRecord {
    return {
        timestamp,
        pairA: 'AAA',
        pairB: 'BBB',
        priceA: 100,
        priceB: 100 + adjustedDiscrepancy,
        rawDiscrepancy: adjustedDiscrepancy,
        feeA: 0,
        feeB: 0,
        adjustedDiscrepancy,
        volumeA: 1,
        ...overrides
    };
}

export type FakeSourceOptions = {
    catalog?: string[];
    failCatalog?: boolean;
    fail?: string[];
    failTimes?: Record<string, number>; // fail the first N requests for a pair
    hang?: string[]; // never settle unless aborted
    delayMs?: number;
};

export class FakeSource implements OhlcSource {
    calls: Array<{ pair: string; since?: number }> = [];
    inFlight = 0;
    maxInFlight = 0;

    constructor(private data: Record<string, OhlcRow[]>, private options: FakeSourceOptions = {}) { }

    async getAssetPairs(): Promise<string[]> {
        if (this.options.failCatalog) throw new Error('catalog down');
        return this.options.catalog ?? Object.keys(this.data);
    }

    async getOhlc(pair: string, _interval: number, request: OhlcRequest = {}): Promise<RawOhlcPayload> {
        this.calls.push({ pair, since: request.since });
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            if (this.options.hang?.includes(pair)) {
                await new Promise<never>((_, reject) => {
                    request.signal?.addEventListener('abort', () => reject(new Error('aborted')));
                });
            }
            if (this.options.delayMs) await new Promise((resolve) => setTimeout(resolve, this.options.delayMs));
            if (this.options.fail?.includes(pair)) throw new Error(`boom ${pair}`);
            const remaining = this.options.failTimes?.[pair] ?? 0;
            if (remaining > 0 && this.options.failTimes) {
                this.options.failTimes[pair] = remaining - 1;
                throw new Error(`flaky ${pair}`);
            }
            const rows = this.data[pair];
            if (!rows) throw new Error(`unknown pair ${pair}`);
            const lastRow = rows[rows.length - 1];
            return { rows, last: lastRow ? Number(lastRow[0]) : undefined };
        } finally {
            this.inFlight--;
        }
    }
}

export class MemoryStore implements HistoricalStore {
    records: DiscrepancyRecord[] = [];

    constructor(initial: DiscrepancyRecord[] = []) {
        this.records = [...initial];
    }

    async load(): Promise<DiscrepancyRecord[]> {
        return [...this.records];
    }

    async appendIfNew(records: readonly DiscrepancyRecord[]): Promise<number> {
        const fresh = filterNew(records, new Set(this.records.map(recordKey)));
        this.records.push(...fresh);
        return fresh.length;
    }
}
