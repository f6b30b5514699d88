/**
 * Month-over-month spending insights and budget suggestions.
 * Pure: summaries and budget records in, text lines out.
 */
import { formatMoney, roundMoney } from './computations.js';
import type { BudgetRecord, SpendingSummary } from './types.js';

const MAX_SUGGESTIONS = 5;

function pct(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function analyzeMonthlyPatterns(
  current: SpendingSummary,
  previous: SpendingSummary | null,
  currency = 'USD',
): string[] {
  const money = (n: number) => formatMoney(n, currency);
  const insights: string[] = [];

  if (previous && previous.totalSpent > 0) {
    const diff = roundMoney(current.totalSpent - previous.totalSpent);
    const change = (diff / previous.totalSpent) * 100;
    if (change > 10) {
      insights.push(`📈 Spending increased by ${pct(change)} from last month (${money(diff)} more)`);
    } else if (change < -10) {
      insights.push(`📉 Spending decreased by ${pct(Math.abs(change))} from last month (${money(Math.abs(diff))} saved)`);
    } else {
      insights.push(`📊 Spending remained stable (only ${pct(Math.abs(change))} change from last month)`);
    }

    for (const [category, amount] of current.categoryBreakdown) {
      const before = previous.categoryBreakdown.get(category) ?? 0;
      if (before <= 0) continue;
      const catChange = ((amount - before) / before) * 100;
      if (catChange > 25) {
        insights.push(`⚠️ ${category} spending spiked by ${pct(catChange)} - worth reviewing`);
      } else if (catChange < -25) {
        insights.push(`✅ ${category} spending reduced by ${pct(Math.abs(catChange))}`);
      }
    }
  }

  if (current.transactionCount > 0) {
    if (current.averageTransaction > 100) {
      insights.push(`💳 High average transaction amount (${money(current.averageTransaction)}) - mostly larger purchases`);
    } else if (current.averageTransaction < 20) {
      insights.push(`🛒 Many small transactions (avg ${money(current.averageTransaction)}) - frequent small purchases`);
    }
    if (current.transactionCount > 60) {
      insights.push(`📱 High transaction frequency (${current.transactionCount} transactions) - consider consolidating purchases`);
    }
  }

  if (current.topCategory && current.totalSpent > 0) {
    const share = (current.topCategoryAmount / current.totalSpent) * 100;
    insights.push(`🏆 Top spending category: ${current.topCategory} (${money(current.topCategoryAmount)}, ${pct(share)} of total)`);
    if (share > 50) {
      insights.push(`⚠️ ${current.topCategory} dominates your spending (${pct(share)})`);
    }
  }

  return insights;
}

/**
 * Budget rebalancing hints: over-used and under-used budgets, large swings
 * against last month, and categories with spending but no budget.
 */
export function suggestBudgetAdjustments(
  current: SpendingSummary,
  previous: SpendingSummary | null,
  budgets: BudgetRecord[],
  currency = 'USD',
): string[] {
  const money = (n: number) => formatMoney(n, currency);
  const byCategory = new Map(budgets.map((b) => [b.category, b.monthlyBudget]));
  const suggestions: string[] = [];

  for (const [category, spent] of current.categoryBreakdown) {
    const budget = byCategory.get(category) ?? 0;

    if (budget > 0) {
      const usage = (spent / budget) * 100;
      if (usage > 120) {
        suggestions.push(`🔴 ${category}: Consider increasing budget from ${money(budget)} to ${money(roundMoney(spent * 1.1))}`);
      } else if (usage < 50 && spent > 0) {
        suggestions.push(`🟢 ${category}: Budget may be too high. Consider reducing from ${money(budget)} to ${money(roundMoney(spent * 2))}`);
      }
    } else if (spent > 0) {
      suggestions.push(`💡 ${category}: No budget set. Consider ${money(roundMoney(spent * 1.2))} based on current spending`);
    }

    const before = previous?.categoryBreakdown.get(category) ?? 0;
    if (before > 0) {
      const change = ((spent - before) / before) * 100;
      if (change > 50) {
        suggestions.push(`📈 ${category}: Spending increased by ${pct(change)} from last month`);
      } else if (change < -50) {
        suggestions.push(`📉 ${category}: Spending decreased by ${pct(Math.abs(change))} from last month`);
      }
    }
  }

  return suggestions.slice(0, MAX_SUGGESTIONS);
}
