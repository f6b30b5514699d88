/**
 * Contract the ledger needs from persistence: named collections of JSON
 * records, append-only or upserted by key, scanned in insertion order.
 * Records come back as unknown; callers validate what they read.
 */
export interface LedgerBackingStore {
  append(collection: string, record: unknown): void;
  /** Replaces the record under key; an existing key keeps its scan position */
  upsert(collection: string, key: string, record: unknown): void;
  get(collection: string, key: string): unknown;
  scan(collection: string): unknown[];
  /** Runs fn atomically: every write inside commits together or not at all */
  transaction<T>(fn: () => T): T;
  /** Make committed writes durable */
  flush(): void;
  close(): void;
}

export const COLLECTIONS = {
  expenses: 'expenses',
  budgets: 'budgets',
  settings: 'settings',
  sessions: 'sessions',
} as const;
