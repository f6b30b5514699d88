import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SqliteBackingStore } from '../db/database.js';
import { Ledger } from '../db/ledger.js';
import { FinanceAssistant } from '../session/assistant.js';
import * as replies from '../session/replies.js';
import { InMemorySessionStore, LedgerSessionStore } from '../session/sessionStore.js';
import type { Session } from '../session/types.js';

const NOW = new Date(2025, 2, 15, 12, 0, 0);

/** Session store whose writes can be made to fail */
class UnreliableSessionStore extends InMemorySessionStore {
  failPuts = false;

  override put(userId: string, session: Session): void {
    if (this.failPuts) throw new Error('session store offline');
    super.put(userId, session);
  }
}

function setup() {
  const store = new SqliteBackingStore();
  const ledger = new Ledger(store, { now: () => NOW });
  const assistant = new FinanceAssistant({ ledger, now: () => NOW });
  return { store, ledger, assistant };
}

/** A ledger that already has this user's balance and two budgets */
function setupActive() {
  const env = setup();
  env.ledger.setUserBalance('u1', 1500);
  env.ledger.setBudget('Food & Dining', 300);
  env.ledger.setBudget('Transportation', 100);
  return env;
}

beforeEach(() => {
  vi.restoreAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('FinanceAssistant onboarding', () => {
  it('walks a new user through to ACTIVE', async () => {
    const { ledger, assistant } = setup();

    await assistant.handle('hi', 'u1');
    expect(assistant.getUserState('u1')).toBe('AWAITING_BALANCE');

    await assistant.handle('1500', 'u1');
    expect(ledger.getUserBalance('u1')).toBe(1500);
    expect(assistant.getUserState('u1')).toBe('AWAITING_BUDGETS');

    await assistant.handle('400', 'u1');
    await assistant.handle('150', 'u1');
    expect(assistant.getUserState('u1')).toBe('AWAITING_BUDGETS');

    await assistant.handle('done', 'u1');
    expect(assistant.getUserState('u1')).toBe('ACTIVE');
    expect(ledger.getSetupStatus('u1').setupComplete).toBe(true);
    expect(assistant.getSession('u1')?.balance).toBe(1500);
  });

  it('does not finish on done with no budgets', async () => {
    const { assistant } = setup();
    await assistant.handle('hi', 'u1');
    await assistant.handle('1500', 'u1');

    const reply = await assistant.handle('done', 'u1');
    expect(reply).toBe(replies.budgetMinimum(0, 'Food & Dining'));
    expect(assistant.getUserState('u1')).toBe('AWAITING_BUDGETS');
  });

  it('does not finish on done with one budget', async () => {
    const { assistant } = setup();
    await assistant.handle('hi', 'u1');
    await assistant.handle('1500', 'u1');
    await assistant.handle('400', 'u1');

    const reply = await assistant.handle('done', 'u1');
    expect(reply).toBe(replies.budgetMinimum(1, 'Transportation'));
    expect(assistant.getUserState('u1')).toBe('AWAITING_BUDGETS');
  });

  it('treats a balance that rounds to zero as zero', async () => {
    const { ledger, assistant } = setup();
    await assistant.handle('hi', 'u1');

    expect(await assistant.handle('0.001', 'u1')).toBe(replies.BALANCE_ZERO);
    expect(assistant.getUserState('u1')).toBe('AWAITING_BALANCE');
    expect(ledger.getUserBalance('u1')).toBeNull();
  });

  it('starts users the ledger already knows as ACTIVE', async () => {
    const { assistant } = setupActive();
    const reply = await assistant.handle('Spent $25 on lunch', 'u1');
    expect(assistant.getUserState('u1')).toBe('ACTIVE');
    expect(reply.startsWith('✅ Expense logged!')).toBe(true);
  });
});

describe('FinanceAssistant loop guard', () => {
  it('gets concrete on the third greeting in a row', async () => {
    const { assistant } = setupActive();
    expect(await assistant.handle('hi', 'u1')).toBe(replies.GREETING);
    expect(await assistant.handle('hello', 'u1')).toBe(replies.GREETING);
    expect(await assistant.handle('hey', 'u1')).toBe(replies.concrete(replies.ACTIVE_HINT));
    expect(await assistant.handle('hi', 'u1')).toBe(replies.concrete(replies.ACTIVE_HINT));
  });

  it('resets once the user does something', async () => {
    const { assistant } = setupActive();
    await assistant.handle('hi', 'u1');
    await assistant.handle('hi', 'u1');
    await assistant.handle('Spent $5 on coffee', 'u1');
    expect(await assistant.handle('hi', 'u1')).toBe(replies.GREETING);
  });

  it('applies during onboarding too', async () => {
    const { assistant } = setup();
    expect(await assistant.handle('hi', 'u1')).toBe(replies.WELCOME);
    expect(await assistant.handle('hello', 'u1')).toBe(replies.BALANCE_PROMPT);
    expect(await assistant.handle('hey', 'u1')).toBe(
      replies.concrete('Send your current account balance as a number, like 1500.'),
    );
    expect(assistant.getUserState('u1')).toBe('AWAITING_BALANCE');
  });
});

describe('FinanceAssistant sessions', () => {
  it('keeps the last ten context entries', async () => {
    const { assistant } = setupActive();
    for (let i = 1; i <= 12; i++) {
      await assistant.handle(`Spent $${i} on coffee`, 'u1');
    }
    const context = assistant.getSession('u1')?.context ?? [];
    expect(context).toHaveLength(10);
    expect(context[0]?.message).toBe('Spent $3 on coffee');
    expect(context[9]?.message).toBe('Spent $12 on coffee');
    expect(context[9]?.responseTag).toBe('expense_logged');
  });

  it('handles concurrent messages one at a time', async () => {
    const { ledger, assistant } = setupActive();
    ledger.setUserBalance('u2', 800);
    await Promise.all([
      assistant.handle('Spent $10 on lunch', 'u1'),
      assistant.handle('Spent $20 on dinner', 'u2'),
      assistant.handle('Spent $30 on groceries', 'u1'),
    ]);
    expect(ledger.getBudget('Food & Dining')?.currentSpent).toBe(60);
    expect(ledger.getExpenses().map((e) => e.amount)).toEqual([10, 20, 30]);
  });

  it('answers unexpected failures with retry guidance', async () => {
    const { ledger, assistant } = setup();
    vi.spyOn(ledger, 'getSetupStatus').mockImplementation(() => {
      throw new Error('boom');
    });
    await expect(assistant.handle('hi', 'u1')).resolves.toBe(replies.SOMETHING_WENT_WRONG);
    expect(assistant.getUserState('u1')).toBeNull();
  });

  it('still confirms a logged expense when the session cannot be saved', async () => {
    const { ledger } = setupActive();
    const sessions = new UnreliableSessionStore();
    const assistant = new FinanceAssistant({ ledger, sessions, now: () => NOW });
    await assistant.handle('hi', 'u1');
    sessions.failPuts = true;

    const reply = await assistant.handle('Spent $25 on lunch', 'u1');

    expect(reply.startsWith('✅ Expense logged!')).toBe(true);
    expect(ledger.getExpenses()).toHaveLength(1);
    expect(assistant.getSession('u1')?.context.map((e) => e.responseTag)).toEqual(['greeting']);
  });

  it('persists sessions in the ledger store', async () => {
    const { store, ledger } = setup();
    const sessions = new LedgerSessionStore(store);
    const first = new FinanceAssistant({ ledger, sessions, now: () => NOW });
    await first.handle('hi', 'u1');
    await first.handle('1500', 'u1');

    const second = new FinanceAssistant({ ledger, sessions, now: () => NOW });
    expect(second.getUserState('u1')).toBe('AWAITING_BUDGETS');
    expect(second.getSession('u1')?.context.map((e) => e.responseTag)).toEqual(['welcome', 'balance_set']);
  });

  it('ignores a stored session it cannot read', () => {
    const { store } = setup();
    store.upsert('sessions', 'u1', { userId: 'u1', state: { kind: 'LOST' } });
    expect(new LedgerSessionStore(store).get('u1')).toBeUndefined();
  });
});
