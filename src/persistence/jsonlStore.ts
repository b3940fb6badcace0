/**
 * JSONL HISTORICAL STORE
 *
 * Append-only JSON Lines file of discrepancy records, one
 * `{ ts, type: 'discrepancy', data }` line per record. Lines that do not
 * parse are skipped on read.
 */

import { promises as fs } from 'fs';
import path from 'path';
import createDebug from 'debug';
import { z } from 'zod';
import { isNotFound } from '../lib/errors.js';
import type { DiscrepancyRecord } from '../types/discrepancy.js';
import { DiscrepancyRecordSchema, filterNew, recordKey, type HistoricalStore } from './historicalStore.js';

const log = createDebug('engine:store');

const LineSchema = z.object({
    ts: z.number(),
    type: z.literal('discrepancy'),
    data: DiscrepancyRecordSchema
});

export class JsonlHistoricalStore implements HistoricalStore {
    constructor(private filePath: string) { }

    async load(): Promise<DiscrepancyRecord[]> {
        return this.parse(await readContent(this.filePath));
    }

    async appendIfNew(records: readonly DiscrepancyRecord[]): Promise<number> {
        const content = await readContent(this.filePath);
        const existing = new Set(this.parse(content).map(recordKey));
        const fresh = filterNew(records, existing);
        if (fresh.length === 0) return 0;
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        const ts = Date.now();
        // never continue a truncated last line
        const prefix = content !== '' && !content.endsWith('\n') ? '\n' : '';
        const text = prefix + fresh.map((data) => JSON.stringify({ ts, type: 'discrepancy', data })).join('\n') + '\n';
        await fs.appendFile(this.filePath, text, { encoding: 'utf8' });
        log('appended %d of %d records', fresh.length, records.length);
        return fresh.length;
    }

    private parse(content: string): DiscrepancyRecord[] {
        const records: DiscrepancyRecord[] = [];
        let skipped = 0;
        for (const line of content.split('\n')) {
            if (line.trim() === '') continue;
            const parsed = LineSchema.safeParse(parseJson(line));
            if (parsed.success) records.push(parsed.data.data);
            else skipped++;
        }
        if (skipped) log('skipped %d unreadable lines in %s', skipped, this.filePath);
        return records;
    }
}

async function readContent(filePath: string): Promise<string> {
    try {
        return await fs.readFile(filePath, 'utf8');
    } catch (e) {
        if (isNotFound(e)) return '';
        throw e;
    }
}

function parseJson(line: string): unknown {
    try {
        return JSON.parse(line);
    } catch {
        return undefined;
    }
}
