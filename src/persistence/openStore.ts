import { openDb } from '../db/sqlite.js';
import type { EngineConfig } from '../config/index.js';
import type { HistoricalStore } from './historicalStore.js';
import { JsonlHistoricalStore } from './jsonlStore.js';
import { SqliteHistoricalStore } from './sqliteStore.js';

export async function openHistoricalStore(config: Pick<EngineConfig, 'storeBackend' | 'dbPath' | 'ledgerPath'>): Promise<HistoricalStore> {
    if (config.storeBackend === 'jsonl') return new JsonlHistoricalStore(config.ledgerPath);
    return new SqliteHistoricalStore(await openDb(config.dbPath));
}
