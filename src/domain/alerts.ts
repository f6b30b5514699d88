import { formatMoney, formatPercent, roundMoney } from './computations.js';
import type { BudgetAlert } from './types.js';

export const ALERT_THRESHOLDS = {
  warning: 0.8,
  critical: 1.0,
  severe: 1.2,
} as const;

/**
 * Alert for a spend that is about to be posted. Runs before the ledger write,
 * so spentBefore does not yet include newAmount.
 */
export function evaluateAlert(
  category: string,
  spentBefore: number,
  newAmount: number,
  monthlyBudget: number,
  currency = 'USD',
): BudgetAlert | null {
  if (monthlyBudget <= 0) return null;

  const newTotal = roundMoney(spentBefore + newAmount);
  const ratio = newTotal / monthlyBudget;

  if (ratio >= ALERT_THRESHOLDS.severe) {
    const over = roundMoney(newTotal - monthlyBudget);
    return {
      level: 'SEVERE',
      message: `🚨 ${category} budget exceeded by ${formatMoney(over, currency)}!`,
    };
  }
  if (ratio >= ALERT_THRESHOLDS.critical) {
    return { level: 'CRITICAL', message: `🔴 ${category} budget limit reached!` };
  }
  if (ratio >= ALERT_THRESHOLDS.warning) {
    return {
      level: 'WARNING',
      message: `🟡 ${category} approaching limit, ${formatPercent(ratio)} used`,
    };
  }
  return null;
}
