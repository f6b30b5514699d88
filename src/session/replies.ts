/**
 * Every user-visible string. Replies may carry light markup (bold, bullets,
 * emoji); nothing here is ever parsed back.
 */
import { formatMoney, formatPercent, monthLabel, sortedBreakdown } from '../domain/computations.js';
import {
  MIN_CONFIGURED_BUDGETS,
  type BudgetAlert,
  type BudgetRecord,
  type BudgetStatus,
  type Category,
  type ExpenseRecord,
  type SpendingSummary,
} from '../domain/types.js';
import { MAX_BUDGET_AMOUNT } from '../api/amountParser.js';
import { getAllCategories } from '../api/categorizer.js';

const STATUS_ICON: Record<BudgetStatus, string> = {
  NO_BUDGET: '⚪',
  OK: '✅',
  WARNING: '🟡',
  OVER_BUDGET: '🔴',
};

// --- Onboarding ---

export const WELCOME =
  "👋 Welcome! I'm your personal finance assistant.\n\n" +
  "Let's get you set up. First, what's your current account balance? (for example 1500 or $2,300.50)";

export const BALANCE_PROMPT =
  "I couldn't find an amount there. What's your current balance? Just send a number, like 1500.";

export const BALANCE_NEGATIVE =
  "A negative balance can't be used as a starting point. Please send your current balance as a positive number, like 1500.";

export const BALANCE_ZERO = "Your balance needs to be more than zero. What's your current balance?";

export const BALANCE_NOT_SAVED = "I couldn't save your balance just now. Please send it again.";

export function budgetQuestion(category: Category): string {
  return `💰 How much do you want to spend on **${category}** each month? Send an amount, "skip" or "done".`;
}

export function balanceSet(balance: number, currency: string): string {
  return (
    `✅ Balance set to ${formatMoney(balance, currency)}.\n\n` +
    `Now let's set a few monthly budgets (at least ${MIN_CONFIGURED_BUDGETS}).`
  );
}

export function budgetSet(category: Category, amount: number, currency: string): string {
  return `✅ ${category} budget set to ${formatMoney(amount, currency)}/month.`;
}

export function budgetSkipped(category: Category): string {
  return `⏭️ Skipped ${category}.`;
}

export function budgetTip(category: Category): string {
  return (
    `💡 A good starting point is roughly what you spent on ${category} last month. ` +
    `Any amount up to ${formatMoney(MAX_BUDGET_AMOUNT)} works, and you can change it later.\n\n` +
    budgetQuestion(category)
  );
}

export function budgetUnclear(category: Category): string {
  return `I didn't catch an amount between ${formatMoney(0)} and ${formatMoney(MAX_BUDGET_AMOUNT)}.\n\n${budgetQuestion(category)}`;
}

export function budgetMinimum(configured: number, category: Category): string {
  return (
    `You need at least ${MIN_CONFIGURED_BUDGETS} budgets to finish setup (you have ${configured}).\n\n` +
    budgetQuestion(category)
  );
}

export function budgetsRestart(configured: number): string {
  return (
    `That's all the main categories, but only ${configured} budget${configured === 1 ? ' is' : 's are'} set. ` +
    `At least ${MIN_CONFIGURED_BUDGETS} are needed, so let's go around once more.`
  );
}

export function onboardingComplete(budgets: BudgetRecord[], currency: string): string {
  const lines = budgets
    .filter((b) => b.monthlyBudget > 0)
    .map((b) => `• ${b.category}: ${formatMoney(b.monthlyBudget, currency)}`);
  return (
    "🎉 You're all set!\n\n" +
    `**Your budgets**\n${lines.join('\n')}\n\n` +
    'Log a spend by telling me about it, like "Spent $25 on lunch". Type "help" any time.'
  );
}

/** Shown instead of a third idle reply in a row */
export function concrete(hint: string): string {
  return `🎯 Let's be concrete. ${hint}`;
}

export const ACTIVE_HINT =
  'Tell me a spend ("Spent $25 on lunch"), set a budget ("Set food budget to 400") or ask "How much have I spent this month?"';

// --- Active conversation ---

export const GREETING =
  '👋 Hi! Tell me about a spend, like "Spent $25 on lunch", or ask "How much have I spent this month?"';

export const THANKS = "You're welcome! 😊";

export const GENERAL_UNCLEAR = `I'm not sure what you mean. Type "help" to see what I can do.`;

export const EXPENSE_UNCLEAR =
  'I couldn\'t work out that expense. Try something like "Spent $25 on lunch" or "Gas $45".';

export const NOT_SAVED = "⚠️ I couldn't save that just now. Please try again in a moment.";

export const SOMETHING_WENT_WRONG = '😕 Something went wrong on my side. Please try again.';

export function expenseLogged(expense: ExpenseRecord, alert: BudgetAlert | null, currency: string): string {
  const lines = [
    '✅ Expense logged!',
    '',
    `💰 Amount: ${formatMoney(expense.amount, currency)}`,
    `📝 Description: ${expense.description}`,
    `📂 Category: ${expense.category}`,
    `💳 Payment: ${expense.paymentMethod}`,
    '',
    expense.budgetImpact,
  ];
  if (alert) lines.push('', alert.message);
  return lines.join('\n');
}

export function budgetUpdated(budget: BudgetRecord, currency: string): string {
  return (
    `✅ Budget set: ${budget.category} ${formatMoney(budget.monthlyBudget, currency)}/month\n` +
    `Spent so far: ${formatMoney(budget.currentSpent, currency)}, remaining ${formatMoney(budget.remaining, currency)}`
  );
}

export const BUDGET_INVALID =
  'I couldn\'t tell which category or amount you meant. Try "Set budget for Food & Dining $500".\n\n' +
  `Categories: ${getAllCategories().join(', ')}`;

export const BUDGET_HELP =
  '**Budgets**\n' +
  '• "Set budget for Food & Dining $500" or "Set food budget to 400"\n' +
  '• "Budget status" to see every category\n' +
  '• "Budget advice" for suggestions';

function budgetLine(b: BudgetRecord, currency: string): string {
  const icon = STATUS_ICON[b.status];
  if (b.percentage === null) {
    return `${icon} ${b.category}: ${formatMoney(b.currentSpent, currency)} spent, no budget`;
  }
  return (
    `${icon} ${b.category}: ${formatMoney(b.currentSpent, currency)} of ${formatMoney(b.monthlyBudget, currency)} ` +
    `(${formatPercent(b.percentage)})`
  );
}

export function budgetStatusReport(budgets: BudgetRecord[], currency: string): string {
  if (budgets.length === 0) {
    return 'No budgets set yet. Try "Set budget for Food & Dining $500".';
  }
  return `📊 **Budget status**\n\n${budgets.map((b) => budgetLine(b, currency)).join('\n')}`;
}

export function budgetSuggestions(suggestions: string[]): string {
  if (suggestions.length === 0) {
    return '👍 No budget changes to suggest right now.';
  }
  return `💡 **Budget suggestions**\n\n${suggestions.map((s) => `• ${s}`).join('\n')}`;
}

export function balanceSummary(
  summary: SpendingSummary,
  budgets: BudgetRecord[],
  balance: number | null,
  currency: string,
): string {
  const money = (n: number) => formatMoney(n, currency);
  const lines = [`💰 **${monthLabel(summary.month, summary.year)}**`, ''];
  lines.push(`Total spent: ${money(summary.totalSpent)} across ${summary.transactionCount} transaction${summary.transactionCount === 1 ? '' : 's'}`);
  if (balance !== null) {
    lines.push(`Starting balance: ${money(balance)}`);
  }
  if (summary.topCategory !== null) {
    lines.push(`Top category: ${summary.topCategory} (${money(summary.topCategoryAmount)})`);
  }

  const over = budgets.filter((b) => b.status === 'OVER_BUDGET');
  const warning = budgets.filter((b) => b.status === 'WARNING');
  if (over.length > 0) {
    lines.push('', '🔴 Over budget:', ...over.map((b) => `• ${b.category}: ${money(Math.abs(b.remaining))} over`));
  }
  if (warning.length > 0) {
    lines.push('', '🟡 Approaching limit:', ...warning.map((b) => `• ${b.category}: ${money(b.remaining)} left`));
  }
  return lines.join('\n');
}

export function monthlyReport(summary: SpendingSummary, insights: string[], currency: string): string {
  const money = (n: number) => formatMoney(n, currency);
  const lines = [`📈 **Report for ${monthLabel(summary.month, summary.year)}**`, ''];

  if (summary.transactionCount === 0) {
    lines.push('No expenses logged this month yet.');
    return lines.join('\n');
  }

  lines.push(
    `Total: ${money(summary.totalSpent)}`,
    `Transactions: ${summary.transactionCount}`,
    `Average: ${money(summary.averageTransaction)}`,
    '',
    '**By category**',
    ...sortedBreakdown(summary).map(([category, amount]) => `• ${category}: ${money(amount)}`),
  );
  if (insights.length > 0) {
    lines.push('', '**Insights**', ...insights.map((i) => `• ${i}`));
  }
  return lines.join('\n');
}

export const HELP =
  '🤖 **What I can do**\n\n' +
  '• Log expenses: "Spent $25 on lunch", "Paid $150 for groceries", "Gas $45"\n' +
  '• Budgets: "Set food budget to 400", "Budget status", "Budget advice"\n' +
  '• Summaries: "How much have I spent this month?"\n' +
  '• Reports: "Show me a report"';
