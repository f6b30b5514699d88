/**
 * Pure budget computations.
 * No DB, no IO — only data in, data out.
 */
import type {
  BudgetRecord,
  BudgetStatus,
  Category,
  ExpenseRecord,
  SpendingSummary,
} from './types.js';

export const WARNING_RATIO = 0.8;
export const OVER_BUDGET_RATIO = 1.0;

/** Round to cents so repeated additions stay exact */
export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

export function formatMoney(amount: number, currency = 'USD'): string {
  return new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency,
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  }).format(amount);
}

/** 0.4567 → "45.7%" */
export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

export function budgetStatusFor(spent: number, monthlyBudget: number): BudgetStatus {
  if (monthlyBudget <= 0) return 'NO_BUDGET';
  const ratio = spent / monthlyBudget;
  if (ratio > OVER_BUDGET_RATIO) return 'OVER_BUDGET';
  if (ratio > WARNING_RATIO) return 'WARNING';
  return 'OK';
}

/**
 * The only way a BudgetRecord is built: remaining, percentage and status
 * always come from the same (monthlyBudget, currentSpent) pair.
 */
export function deriveBudgetRecord(
  category: Category,
  monthlyBudget: number,
  currentSpent: number,
): BudgetRecord {
  const budget = roundMoney(monthlyBudget);
  const spent = roundMoney(currentSpent);
  return {
    category,
    monthlyBudget: budget,
    currentSpent: spent,
    remaining: roundMoney(budget - spent),
    percentage: budget > 0 ? spent / budget : null,
    status: budgetStatusFor(spent, budget),
  };
}

/**
 * Impact line stored with an expense, computed from the percentage the
 * category will have once the expense is counted.
 */
export function budgetImpact(
  existing: BudgetRecord | null,
  amount: number,
  currency = 'USD',
): string {
  if (!existing) return 'ℹ️ New category - consider setting a budget';
  if (existing.monthlyBudget <= 0) return 'ℹ️ No budget set for this category';

  const newSpent = roundMoney(existing.currentSpent + amount);
  const ratio = newSpent / existing.monthlyBudget;
  if (ratio > OVER_BUDGET_RATIO) {
    const over = roundMoney(newSpent - existing.monthlyBudget);
    return `⚠️ Will exceed budget by ${formatMoney(over, currency)}`;
  }
  if (ratio > WARNING_RATIO) {
    return `⚠️ Will use ${formatPercent(ratio)} of budget`;
  }
  return `✅ Within budget (${formatPercent(ratio)} used)`;
}

/** Filter expenses to a calendar month (1–12) */
export function forMonth(expenses: ExpenseRecord[], month: number, year: number): ExpenseRecord[] {
  const prefix = monthKey(month, year);
  return expenses.filter((e) => e.date.startsWith(prefix));
}

export function spendingSummary(
  expenses: ExpenseRecord[],
  month: number,
  year: number,
): SpendingSummary {
  const monthExpenses = forMonth(expenses, month, year);

  const breakdown = new Map<Category, number>();
  let total = 0;
  for (const e of monthExpenses) {
    total = roundMoney(total + e.amount);
    breakdown.set(e.category, roundMoney((breakdown.get(e.category) ?? 0) + e.amount));
  }

  // Strict comparison keeps the first-encountered category on ties
  let topCategory: Category | null = null;
  let topCategoryAmount = 0;
  for (const [category, amount] of breakdown) {
    if (topCategory === null || amount > topCategoryAmount) {
      topCategory = category;
      topCategoryAmount = amount;
    }
  }

  const count = monthExpenses.length;
  return {
    month,
    year,
    totalSpent: total,
    transactionCount: count,
    averageTransaction: count > 0 ? roundMoney(total / count) : 0,
    categoryBreakdown: breakdown,
    topCategory,
    topCategoryAmount,
  };
}

/** Breakdown entries sorted by amount, largest first */
export function sortedBreakdown(summary: SpendingSummary): [Category, number][] {
  return Array.from(summary.categoryBreakdown.entries()).sort((a, b) => b[1] - a[1]);
}

/** YYYY-MM */
export function monthKey(month: number, year: number): string {
  return `${year}-${String(month).padStart(2, '0')}`;
}

/** Local calendar date as YYYY-MM-DD */
export function isoDate(now: Date): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  const d = String(now.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function currentMonth(now: Date = new Date()): { month: number; year: number } {
  return { month: now.getMonth() + 1, year: now.getFullYear() };
}

export function previousMonth(month: number, year: number): { month: number; year: number } {
  return month === 1 ? { month: 12, year: year - 1 } : { month: month - 1, year };
}

/** 1, 2025 → "January 2025" */
export function monthLabel(month: number, year: number): string {
  const d = new Date(Date.UTC(year, month - 1, 1));
  return d.toLocaleString('en-US', { month: 'long', year: 'numeric', timeZone: 'UTC' });
}
