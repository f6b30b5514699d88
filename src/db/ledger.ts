/**
 * Ledger: expense and budget records on top of a LedgerBackingStore.
 *
 * Every mutation is one store transaction (read the category's budget,
 * write the new rows), so two posts against the same category cannot
 * interleave and lose an update. Budget rows are re-derived on every read
 * and write; remaining/percentage/status are never trusted from storage.
 */
import { z } from 'zod';
import {
  budgetImpact,
  deriveBudgetRecord,
  isoDate,
  roundMoney,
  spendingSummary,
} from '../domain/computations.js';
import { PersistenceError, ValidationError } from '../domain/errors.js';
import {
  CATEGORIES,
  MIN_CONFIGURED_BUDGETS,
  isCategory,
  type BudgetRecord,
  type Category,
  type ExpenseRecord,
  type NewExpense,
  type SetupStatus,
  type SpendingSummary,
} from '../domain/types.js';
import { COLLECTIONS, type LedgerBackingStore } from './backingStore.js';

const expenseRecordSchema = z.object({
  id: z.string(),
  date: z.string(),
  amount: z.number(),
  category: z.enum(CATEGORIES),
  description: z.string(),
  paymentMethod: z.string(),
  notes: z.string(),
  budgetImpact: z.string(),
  createdAt: z.string(),
});

const storedBudgetSchema = z.object({
  category: z.enum(CATEGORIES),
  monthlyBudget: z.number(),
  currentSpent: z.number(),
});

const userSetupSchema = z.object({
  userId: z.string(),
  balance: z.number(),
  setupCompletedAt: z.string().nullable(),
  updatedAt: z.string(),
});

type UserSetup = z.infer<typeof userSetupSchema>;

export interface PostedExpense {
  expense: ExpenseRecord;
  budget: BudgetRecord;
}

export interface LedgerOptions {
  now?: () => Date;
  currency?: string;
}

// Helper function to generate cuid-like IDs
function generateId(): string {
  const timestamp = Date.now().toString(36);
  const randomPart = Math.random().toString(36).substring(2, 9);
  return `c${timestamp}${randomPart}`;
}

function requireCategory(category: string): Category {
  if (!isCategory(category)) {
    throw new ValidationError(`Unknown category: ${category}`);
  }
  return category;
}

/** Rounded to cents first, so a sub-cent amount counts as zero */
function requirePositive(value: number, label: string): number {
  const rounded = roundMoney(value);
  if (!Number.isFinite(rounded) || rounded <= 0) {
    throw new ValidationError(`${label} must be a positive amount, got ${value}`);
  }
  return rounded;
}

export class Ledger {
  private readonly now: () => Date;
  private readonly currency: string;

  constructor(
    private readonly store: LedgerBackingStore,
    options: LedgerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.currency = options.currency ?? 'USD';
  }

  // --- Expenses ---

  postExpense(input: NewExpense): PostedExpense {
    const amount = requirePositive(input.amount, 'Expense amount');
    const category = requireCategory(input.category);
    const now = this.now();

    return this.write('post expense', () => {
      const existing = this.getBudget(category);
      const expense: ExpenseRecord = {
        id: generateId(),
        date: input.date ?? isoDate(now),
        amount,
        category,
        description: input.description.trim(),
        paymentMethod: input.paymentMethod ?? 'Unknown',
        notes: input.notes ?? '',
        budgetImpact: budgetImpact(existing, amount, this.currency),
        createdAt: now.toISOString(),
      };
      this.store.append(COLLECTIONS.expenses, expense);

      // First spend in a category without a budget creates a NO_BUDGET row
      const budget = deriveBudgetRecord(
        category,
        existing?.monthlyBudget ?? 0,
        (existing?.currentSpent ?? 0) + amount,
      );
      this.store.upsert(COLLECTIONS.budgets, category, budget);
      return { expense, budget };
    });
  }

  getExpenses(): ExpenseRecord[] {
    return this.store.scan(COLLECTIONS.expenses).map((row) => expenseRecordSchema.parse(row));
  }

  getSpendingSummary(month: number, year: number): SpendingSummary {
    return spendingSummary(this.getExpenses(), month, year);
  }

  // --- Budgets ---

  setBudget(category: string, amount: number): BudgetRecord {
    const monthlyBudget = requirePositive(amount, 'Budget amount');
    const cat = requireCategory(category);

    return this.write('set budget', () => {
      const existing = this.getBudget(cat);
      const budget = deriveBudgetRecord(cat, monthlyBudget, existing?.currentSpent ?? 0);
      this.store.upsert(COLLECTIONS.budgets, cat, budget);
      return budget;
    });
  }

  getBudget(category: Category): BudgetRecord | null {
    const row = this.store.get(COLLECTIONS.budgets, category);
    if (row === undefined) return null;
    const { monthlyBudget, currentSpent } = storedBudgetSchema.parse(row);
    return deriveBudgetRecord(category, monthlyBudget, currentSpent);
  }

  /** All budget rows in the order their categories were first seen */
  getBudgetStatus(): BudgetRecord[] {
    return this.store.scan(COLLECTIONS.budgets).map((row) => {
      const { category, monthlyBudget, currentSpent } = storedBudgetSchema.parse(row);
      return deriveBudgetRecord(category, monthlyBudget, currentSpent);
    });
  }

  getConfiguredCategories(): Category[] {
    return this.getBudgetStatus()
      .filter((b) => b.monthlyBudget > 0)
      .map((b) => b.category);
  }

  // --- User setup ---

  setUserBalance(userId: string, balance: number): number {
    const value = requirePositive(balance, 'Balance');
    this.write('set balance', () => {
      const existing = this.getUserSetup(userId);
      const setup: UserSetup = {
        userId,
        balance: value,
        setupCompletedAt: existing?.setupCompletedAt ?? null,
        updatedAt: this.now().toISOString(),
      };
      this.store.upsert(COLLECTIONS.settings, userId, setup);
    });
    return value;
  }

  getUserBalance(userId: string): number | null {
    return this.getUserSetup(userId)?.balance ?? null;
  }

  /**
   * Setup state derived from ledger contents alone: a balance for this user
   * and at least two configured budgets.
   */
  getSetupStatus(userId: string): SetupStatus {
    const balance = this.getUserBalance(userId);
    const hasBalance = balance !== null && balance > 0;
    const configuredBudgets = this.getConfiguredCategories().length;
    return {
      hasBalance,
      configuredBudgets,
      setupComplete: hasBalance && configuredBudgets >= MIN_CONFIGURED_BUDGETS,
    };
  }

  /** Records when onboarding finished. Informational only; getSetupStatus() decides. */
  markSetupComplete(userId: string): void {
    this.write('mark setup complete', () => {
      const existing = this.getUserSetup(userId);
      if (!existing) return;
      const stamp = this.now().toISOString();
      this.store.upsert(COLLECTIONS.settings, userId, {
        ...existing,
        setupCompletedAt: stamp,
        updatedAt: stamp,
      });
    });
  }

  private getUserSetup(userId: string): UserSetup | null {
    const row = this.store.get(COLLECTIONS.settings, userId);
    return row === undefined ? null : userSetupSchema.parse(row);
  }

  /**
   * Run a mutation in one transaction; a failure there means nothing was
   * applied. The flush that follows runs on committed data, so its failure
   * is logged but does not undo the result.
   */
  private write<T>(operation: string, fn: () => T): T {
    let result: T;
    try {
      result = this.store.transaction(fn);
    } catch (error) {
      console.error(`[Ledger] Failed to ${operation}:`, error);
      throw new PersistenceError(`Failed to ${operation}`, { cause: error });
    }

    try {
      this.store.flush();
    } catch (error) {
      console.error(`[Ledger] Flush after ${operation} failed:`, error);
    }
    return result;
  }
}
