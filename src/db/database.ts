/**
 * SQLite ledger store (better-sqlite3).
 * One `records` table holds every collection; JSON payloads, insertion order by seq.
 */
import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { LedgerBackingStore } from './backingStore.js';

export const IN_MEMORY = ':memory:';

export class SqliteBackingStore implements LedgerBackingStore {
  private readonly db: Database.Database;
  private readonly insertStmt: Database.Statement<[string, string | null, string]>;
  private readonly upsertStmt: Database.Statement<[string, string, string]>;
  private readonly getStmt: Database.Statement<[string, string], { data: string }>;
  private readonly scanStmt: Database.Statement<[string], { data: string }>;

  constructor(filename: string = IN_MEMORY) {
    if (filename !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(filename), { recursive: true });
    }
    this.db = new Database(filename);

    // Enable WAL mode for better performance
    if (filename !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS records (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        collection TEXT NOT NULL,
        key TEXT,
        data TEXT NOT NULL,
        updated_at TEXT DEFAULT (datetime('now')),
        UNIQUE(collection, key)
      )
    `);
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_records_collection ON records(collection, seq)
    `);

    this.insertStmt = this.db.prepare<[string, string | null, string]>(
      'INSERT INTO records (collection, key, data) VALUES (?, ?, ?)',
    );
    // ON CONFLICT keeps the original seq, so scans keep first-insertion order
    this.upsertStmt = this.db.prepare<[string, string, string]>(`
      INSERT INTO records (collection, key, data) VALUES (?, ?, ?)
      ON CONFLICT(collection, key) DO UPDATE SET
        data = excluded.data,
        updated_at = datetime('now')
    `);
    this.getStmt = this.db.prepare<[string, string], { data: string }>(
      'SELECT data FROM records WHERE collection = ? AND key = ?',
    );
    this.scanStmt = this.db.prepare<[string], { data: string }>(
      'SELECT data FROM records WHERE collection = ? ORDER BY seq ASC',
    );
  }

  append(collection: string, record: unknown): void {
    this.insertStmt.run(collection, null, JSON.stringify(record));
  }

  upsert(collection: string, key: string, record: unknown): void {
    this.upsertStmt.run(collection, key, JSON.stringify(record));
  }

  get(collection: string, key: string): unknown {
    const row = this.getStmt.get(collection, key);
    return row ? parseJson(row.data) : undefined;
  }

  scan(collection: string): unknown[] {
    return this.scanStmt.all(collection).map((row) => parseJson(row.data));
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  flush(): void {
    if (this.db.memory) return;
    this.db.pragma('wal_checkpoint(TRUNCATE)');
  }

  close(): void {
    this.db.close();
  }
}

function parseJson(data: string): unknown {
  return JSON.parse(data);
}
