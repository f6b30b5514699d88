/**
 * Domain types for the budget ledger.
 * Pure data — no DB, no IO.
 */

export const CATEGORIES = [
  'Food & Dining',
  'Transportation',
  'Shopping',
  'Entertainment',
  'Bills & Utilities',
  'Healthcare',
  'Education',
  'Travel',
  'Savings & Investment',
  'Other',
] as const;

export type Category = (typeof CATEGORIES)[number];

export const DEFAULT_CATEGORY: Category = 'Other';

/** Categories walked through during onboarding, in this order */
export const PRIORITY_CATEGORIES: readonly Category[] = [
  'Food & Dining',
  'Transportation',
  'Shopping',
  'Bills & Utilities',
  'Entertainment',
];

/** Minimum number of budgets before onboarding may finish */
export const MIN_CONFIGURED_BUDGETS = 2;

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((c) => c === value);
}

/** Append-only ledger row */
export interface ExpenseRecord {
  id: string;
  date: string;                // YYYY-MM-DD
  amount: number;              // > 0
  category: Category;
  description: string;
  paymentMethod: string;       // 'Unknown' when not mentioned
  notes: string;
  budgetImpact: string;        // snapshot taken when the expense was posted
  createdAt: string;           // ISO timestamp
}

export type BudgetStatus = 'NO_BUDGET' | 'OK' | 'WARNING' | 'OVER_BUDGET';

/** One per category. remaining/percentage/status are derived, never set directly. */
export interface BudgetRecord {
  category: Category;
  monthlyBudget: number;       // 0 = no budget set
  currentSpent: number;
  remaining: number;           // can be negative (overspent)
  percentage: number | null;   // fraction of budget used; null without a budget
  status: BudgetStatus;
}

export interface NewExpense {
  amount: number;
  category: Category;
  description: string;
  paymentMethod?: string;
  notes?: string;
  date?: string;               // defaults to today
}

export interface SpendingSummary {
  month: number;               // 1–12
  year: number;
  totalSpent: number;
  transactionCount: number;
  averageTransaction: number;
  categoryBreakdown: Map<Category, number>;   // first-encountered order
  topCategory: Category | null;
  topCategoryAmount: number;
}

export interface SetupStatus {
  hasBalance: boolean;
  configuredBudgets: number;
  setupComplete: boolean;
}

export type AlertLevel = 'WARNING' | 'CRITICAL' | 'SEVERE';

export interface BudgetAlert {
  level: AlertLevel;
  message: string;
}

export const INTENTS = ['EXPENSE', 'BUDGET', 'BALANCE', 'INSIGHTS', 'HELP', 'GENERAL'] as const;

export type Intent = (typeof INTENTS)[number];

export function isIntent(value: string): value is Intent {
  return INTENTS.some((i) => i === value);
}
