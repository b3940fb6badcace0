/**
 * HISTORICAL STORE CONTRACT
 *
 * Durable, append-only set of discrepancy records. Appends are idempotent:
 * a record whose (timestamp, pair combination) is already stored, or
 * repeated within the same batch, is skipped. Stored rows are never
 * updated or deleted. Records carrying a non-finite number are never
 * stored.
 */

import { z } from 'zod';
import { createCanonicalPairKey } from '../lib/pairUtils.js';
import type { DiscrepancyRecord } from '../types/discrepancy.js';

export interface HistoricalStore {
    load(): Promise<DiscrepancyRecord[]>;
    /** Resolves to the number of records actually written. */
    appendIfNew(records: readonly DiscrepancyRecord[]): Promise<number>;
    close?(): void;
}

export const DiscrepancyRecordSchema = z.object({
    timestamp: z.number().int(),
    pairA: z.string(),
    pairB: z.string(),
    priceA: z.number().finite(),
    priceB: z.number().finite(),
    rawDiscrepancy: z.number().finite(),
    feeA: z.number().finite(),
    feeB: z.number().finite(),
    adjustedDiscrepancy: z.number().finite(),
    volumeA: z.number().finite()
});

export function recordKey(record: Pick<DiscrepancyRecord, 'timestamp' | 'pairA' | 'pairB'>): string {
    return `${createCanonicalPairKey(record.pairA, record.pairB)}@${record.timestamp}`;
}

/**
 * Records not yet in `existing`, first occurrence per key. Records with a
 * non-finite number cannot round-trip through either backend and are
 * dropped.
 */
export function filterNew(records: readonly DiscrepancyRecord[], existing: ReadonlySet<string>): DiscrepancyRecord[] {
    const seen = new Set(existing);
    const fresh: DiscrepancyRecord[] = [];
    for (const r of records) {
        if (!DiscrepancyRecordSchema.safeParse(r).success) continue;
        const key = recordKey(r);
        if (seen.has(key)) continue;
        seen.add(key);
        fresh.push(r);
    }
    return fresh;
}
