/**
 * FEE TABLE
 *
 * Pair -> taker/maker fee fractions, loaded once from a flat CSV
 * (`Pair`, `TakerFee%`, `MakerFee%`; other columns ignored) and read-only
 * afterwards. Percentages are divided by 100 on load. Pairs without an
 * entry fall back to the configured default fee.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { ConfigError, describeError } from '../lib/errors.js';
import type { FeeEntry, FeeSide } from '../types/discrepancy.js';
import type { AssetPairFee } from '../types/krakenPublic.js';

export const DEFAULT_FEE = 0.0026;

export const FEE_CSV_COLUMNS = ['Pair', 'AltName', 'BaseCurrency', 'QuoteCurrency', 'TakerFee%', 'MakerFee%'] as const;

const FeeFractionSchema = z.number().finite().min(0).lt(1);

const FeePctSchema = z.string().min(1, 'fee is blank').pipe(z.coerce.number());

const FeeRowSchema = z.object({
    Pair: z.string().min(1),
    'TakerFee%': FeePctSchema,
    'MakerFee%': FeePctSchema
});

export class FeeTable {
    private constructor(private entries: ReadonlyMap<string, FeeEntry>, readonly defaultFee: number) { }

    static fromEntries(entries: Iterable<FeeEntry>, defaultFee: number = DEFAULT_FEE): FeeTable {
        if (!FeeFractionSchema.safeParse(defaultFee).success) {
            throw new ConfigError(`default fee must be a fraction in [0, 1), got ${defaultFee}`);
        }
        const map = new Map<string, FeeEntry>();
        for (const e of entries) {
            if (!FeeFractionSchema.safeParse(e.takerFee).success || !FeeFractionSchema.safeParse(e.makerFee).success) {
                throw new ConfigError(`fee for ${e.pair} must be a fraction in [0, 1)`);
            }
            map.set(e.pair, Object.freeze({ ...e }));
        }
        return new FeeTable(map, defaultFee);
    }

    static parseCsv(text: string, defaultFee: number = DEFAULT_FEE, source = 'fee table'): FeeTable {
        let records: unknown;
        try {
            records = parse(text, { columns: true, skip_empty_lines: true, trim: true });
        } catch (e) {
            throw new ConfigError(`${source} is not valid CSV`, [describeError(e)]);
        }
        const rows = z.array(FeeRowSchema).safeParse(records);
        if (!rows.success) {
            const issues = rows.error.issues.slice(0, 5).map((i) => `row ${String(i.path[0] ?? '?')}: ${i.path.slice(1).join('.')} ${i.message}`);
            throw new ConfigError(`${source} must have Pair, TakerFee% and MakerFee% columns`, issues);
        }
        return FeeTable.fromEntries(
            rows.data.map((r) => ({ pair: r.Pair, takerFee: r['TakerFee%'] / 100, makerFee: r['MakerFee%'] / 100 })),
            defaultFee
        );
    }

    static async load(filePath: string, defaultFee: number = DEFAULT_FEE): Promise<FeeTable> {
        let text: string;
        try {
            text = await fs.readFile(filePath, 'utf8');
        } catch (e) {
            throw new ConfigError(`cannot read fee table ${filePath}`, [describeError(e)]);
        }
        return FeeTable.parseCsv(text, defaultFee, filePath);
    }

    feeFor(pair: string, side: FeeSide = 'taker'): number {
        const entry = this.entries.get(pair);
        if (!entry) return this.defaultFee;
        return side === 'taker' ? entry.takerFee : entry.makerFee;
    }

    has(pair: string): boolean {
        return this.entries.has(pair);
    }

    get size(): number {
        return this.entries.size;
    }
}

export async function writeFeeCsv(filePath: string, fees: readonly AssetPairFee[]): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const csv = stringify(
        fees.map((f) => [f.pair, f.altName, f.base, f.quote, f.takerFeePct, f.makerFeePct]),
        { header: true, columns: [...FEE_CSV_COLUMNS] }
    );
    await fs.writeFile(filePath, csv);
}
