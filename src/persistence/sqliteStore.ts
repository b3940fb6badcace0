import type Database from 'better-sqlite3';
import createDebug from 'debug';
import { z } from 'zod';
import { createCanonicalPairKey } from '../lib/pairUtils.js';
import type { DiscrepancyRecord } from '../types/discrepancy.js';
import { filterNew, type HistoricalStore } from './historicalStore.js';

const log = createDebug('engine:store');

const RowSchema = z.object({
    ts: z.number(),
    pair_a: z.string(),
    pair_b: z.string(),
    price_a: z.number(),
    price_b: z.number(),
    raw_discrepancy: z.number(),
    fee_a: z.number(),
    fee_b: z.number(),
    adjusted_discrepancy: z.number(),
    volume_a: z.number()
});

function fromRow(row: z.infer<typeof RowSchema>): DiscrepancyRecord {
    return {
        timestamp: row.ts,
        pairA: row.pair_a,
        pairB: row.pair_b,
        priceA: row.price_a,
        priceB: row.price_b,
        rawDiscrepancy: row.raw_discrepancy,
        feeA: row.fee_a,
        feeB: row.fee_b,
        adjustedDiscrepancy: row.adjusted_discrepancy,
        volumeA: row.volume_a
    };
}

export class SqliteHistoricalStore implements HistoricalStore {
    constructor(private db: Database.Database) { }

    async load(): Promise<DiscrepancyRecord[]> {
        const rows = this.db.prepare(`
SELECT ts, pair_a, pair_b, price_a, price_b, raw_discrepancy, fee_a, fee_b, adjusted_discrepancy, volume_a
FROM discrepancy_records ORDER BY id
`).all();
        return z.array(RowSchema).parse(rows).map(fromRow);
    }

    async appendIfNew(records: readonly DiscrepancyRecord[]): Promise<number> {
        const stmt = this.db.prepare(`
INSERT OR IGNORE INTO discrepancy_records
  (ts, pair_key, pair_a, pair_b, price_a, price_b, raw_discrepancy, fee_a, fee_b, adjusted_discrepancy, volume_a, inserted_at)
VALUES
  (@ts, @pair_key, @pair_a, @pair_b, @price_a, @price_b, @raw_discrepancy, @fee_a, @fee_b, @adjusted_discrepancy, @volume_a, @inserted_at)
`);
        const insertedAt = Date.now();
        const insertMany = this.db.transaction((batch: readonly DiscrepancyRecord[]) => {
            let changes = 0;
            for (const r of batch) {
                changes += stmt.run({
                    ts: r.timestamp,
                    pair_key: createCanonicalPairKey(r.pairA, r.pairB),
                    pair_a: r.pairA,
                    pair_b: r.pairB,
                    price_a: r.priceA,
                    price_b: r.priceB,
                    raw_discrepancy: r.rawDiscrepancy,
                    fee_a: r.feeA,
                    fee_b: r.feeB,
                    adjusted_discrepancy: r.adjustedDiscrepancy,
                    volume_a: r.volumeA,
                    inserted_at: insertedAt
                }).changes;
            }
            return changes;
        });
        const appended = insertMany(filterNew(records, new Set()));
        log('appended %d of %d records', appended, records.length);
        return appended;
    }

    close(): void {
        this.db.close();
    }
}
