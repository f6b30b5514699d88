import { z } from 'zod';
import { COLLECTIONS, type LedgerBackingStore } from '../db/backingStore.js';
import { CATEGORIES } from '../domain/types.js';
import { CONTEXT_LIMIT, RESPONSE_TAGS, type ContextEntry, type Session, type SessionStore } from './types.js';

export function createSession(userId: string, state: Session['state']): Session {
  return { userId, state, balance: null, context: [] };
}

/** Append to the conversation context, keeping only the newest CONTEXT_LIMIT entries */
export function appendContext(session: Session, entry: ContextEntry): Session {
  const context = [...session.context, entry].slice(-CONTEXT_LIMIT);
  return { ...session, context };
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();

  get(userId: string): Session | undefined {
    return this.sessions.get(userId);
  }

  put(userId: string, session: Session): void {
    this.sessions.set(userId, session);
  }
}

const userStateSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('NEW') }),
  z.object({ kind: z.literal('AWAITING_BALANCE') }),
  z.object({ kind: z.literal('AWAITING_BUDGETS'), skipped: z.array(z.enum(CATEGORIES)) }),
  z.object({ kind: z.literal('ACTIVE') }),
]);

const sessionSchema = z.object({
  userId: z.string(),
  state: userStateSchema,
  balance: z.number().nullable(),
  context: z.array(
    z.object({
      message: z.string(),
      responseTag: z.enum(RESPONSE_TAGS),
      timestamp: z.string(),
    }),
  ),
});

/**
 * Sessions kept in the ledger's backing store, so onboarding progress and
 * context survive a restart. Unreadable rows are treated as missing.
 */
export class LedgerSessionStore implements SessionStore {
  constructor(private readonly store: LedgerBackingStore) {}

  get(userId: string): Session | undefined {
    const row = this.store.get(COLLECTIONS.sessions, userId);
    if (row === undefined) return undefined;
    const parsed = sessionSchema.safeParse(row);
    if (!parsed.success) {
      console.warn(`[Session] Discarding unreadable session for ${userId}:`, parsed.error.message);
      return undefined;
    }
    return parsed.data;
  }

  put(userId: string, session: Session): void {
    this.store.upsert(COLLECTIONS.sessions, userId, session);
  }
}
