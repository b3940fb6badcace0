import Database from 'better-sqlite3';
import fs from 'node:fs/promises';
import path from 'node:path';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS discrepancy_records (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  ts INTEGER NOT NULL,
  pair_key TEXT NOT NULL,
  pair_a TEXT NOT NULL,
  pair_b TEXT NOT NULL,
  price_a REAL NOT NULL,
  price_b REAL NOT NULL,
  raw_discrepancy REAL NOT NULL,
  fee_a REAL NOT NULL,
  fee_b REAL NOT NULL,
  adjusted_discrepancy REAL NOT NULL,
  volume_a REAL NOT NULL,
  inserted_at INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS idx_discrepancy_unique ON discrepancy_records(pair_key, ts);
CREATE INDEX IF NOT EXISTS idx_discrepancy_ts ON discrepancy_records(ts);
`;

function ensureSchema(db: Database.Database, inMemory: boolean): void {
    if (!inMemory) db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    db.pragma('busy_timeout = 5000');
    db.exec(SCHEMA);
}

export async function openDb(dbPath: string): Promise<Database.Database> {
    const inMemory = dbPath === ':memory:';
    if (!inMemory) await fs.mkdir(path.dirname(dbPath), { recursive: true });
    const db = new Database(dbPath);
    ensureSchema(db, inMemory);
    return db;
}
