import { describe, it, expect } from 'vitest';
import {
  budgetImpact,
  budgetStatusFor,
  deriveBudgetRecord,
  formatMoney,
  formatPercent,
  monthKey,
  monthLabel,
  previousMonth,
  roundMoney,
  sortedBreakdown,
  spendingSummary,
} from '../domain/computations.js';
import type { Category, ExpenseRecord } from '../domain/types.js';

function expense(date: string, amount: number, category: Category): ExpenseRecord {
  return {
    id: `${date}-${amount}`,
    date,
    amount,
    category,
    description: 'test',
    paymentMethod: 'Unknown',
    notes: '',
    budgetImpact: '',
    createdAt: `${date}T12:00:00.000Z`,
  };
}

describe('money helpers', () => {
  it('rounds sums to cents', () => {
    expect(roundMoney(0.1 + 0.2)).toBe(0.3);
    expect(roundMoney(10.005 + 0.004)).toBe(10.01);
  });

  it('formats currency and percentages', () => {
    expect(formatMoney(1500)).toBe('$1,500.00');
    expect(formatMoney(4.5)).toBe('$4.50');
    expect(formatPercent(0.4567)).toBe('45.7%');
  });
});

describe('budgetStatusFor', () => {
  it('uses strict thresholds at 80% and 100%', () => {
    expect(budgetStatusFor(0, 0)).toBe('NO_BUDGET');
    expect(budgetStatusFor(80, 100)).toBe('OK');
    expect(budgetStatusFor(80.01, 100)).toBe('WARNING');
    expect(budgetStatusFor(100, 100)).toBe('WARNING');
    expect(budgetStatusFor(100.01, 100)).toBe('OVER_BUDGET');
  });
});

describe('deriveBudgetRecord', () => {
  it('derives remaining, percentage and status together', () => {
    expect(deriveBudgetRecord('Shopping', 200, 150)).toEqual({
      category: 'Shopping',
      monthlyBudget: 200,
      currentSpent: 150,
      remaining: 50,
      percentage: 0.75,
      status: 'OK',
    });
  });

  it('has no percentage without a budget', () => {
    expect(deriveBudgetRecord('Shopping', 0, 30)).toEqual({
      category: 'Shopping',
      monthlyBudget: 0,
      currentSpent: 30,
      remaining: -30,
      percentage: null,
      status: 'NO_BUDGET',
    });
  });
});

describe('budgetImpact', () => {
  it('describes a category with no record yet', () => {
    expect(budgetImpact(null, 10)).toBe('ℹ️ New category - consider setting a budget');
  });

  it('describes a category without a budget', () => {
    expect(budgetImpact(deriveBudgetRecord('Travel', 0, 5), 10)).toBe('ℹ️ No budget set for this category');
  });

  it('uses the percentage after the expense is counted', () => {
    expect(budgetImpact(deriveBudgetRecord('Travel', 100, 90), 20)).toBe('⚠️ Will exceed budget by $10.00');
    expect(budgetImpact(deriveBudgetRecord('Travel', 100, 70), 15)).toBe('⚠️ Will use 85.0% of budget');
    expect(budgetImpact(deriveBudgetRecord('Travel', 100, 10), 15)).toBe('✅ Within budget (25.0% used)');
  });
});

describe('spendingSummary', () => {
  const expenses = [
    expense('2025-03-01', 10, 'Food & Dining'),
    expense('2025-03-02', 30, 'Transportation'),
    expense('2025-03-09', 20, 'Food & Dining'),
    expense('2025-04-01', 500, 'Travel'),
  ];

  it('aggregates one calendar month', () => {
    const summary = spendingSummary(expenses, 3, 2025);
    expect(summary.totalSpent).toBe(60);
    expect(summary.transactionCount).toBe(3);
    expect(summary.averageTransaction).toBe(20);
    expect(Array.from(summary.categoryBreakdown)).toEqual([
      ['Food & Dining', 30],
      ['Transportation', 30],
    ]);
  });

  it('gives a tie for top category to the first category seen', () => {
    const summary = spendingSummary(expenses, 3, 2025);
    expect(summary.topCategory).toBe('Food & Dining');
    expect(summary.topCategoryAmount).toBe(30);
  });

  it('returns zeros for an empty month', () => {
    const summary = spendingSummary(expenses, 5, 2025);
    expect(summary.totalSpent).toBe(0);
    expect(summary.averageTransaction).toBe(0);
    expect(summary.topCategory).toBeNull();
    expect(summary.topCategoryAmount).toBe(0);
  });

  it('sorts the breakdown largest first', () => {
    const summary = spendingSummary([...expenses, expense('2025-03-20', 5, 'Transportation')], 3, 2025);
    expect(sortedBreakdown(summary)).toEqual([
      ['Transportation', 35],
      ['Food & Dining', 30],
    ]);
  });
});

describe('month helpers', () => {
  it('steps back across a year boundary', () => {
    expect(previousMonth(1, 2025)).toEqual({ month: 12, year: 2024 });
    expect(previousMonth(7, 2025)).toEqual({ month: 6, year: 2025 });
  });

  it('formats keys and labels', () => {
    expect(monthKey(3, 2025)).toBe('2025-03');
    expect(monthLabel(1, 2025)).toBe('January 2025');
  });
});
