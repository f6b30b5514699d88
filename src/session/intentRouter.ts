/**
 * Intent router: keyword tiers first, then the semantic fallback, then
 * dispatch to the ledger or to the report/help collaborators.
 */
import {
  extractCommandAmount,
  extractPaymentMethod,
  hasNumber,
  parseExpense,
} from '../api/amountParser.js';
import { categorize, resolveCategory } from '../api/categorizer.js';
import type { TextCompletion } from '../api/completion.js';
import { semanticExpense, semanticIntent } from '../api/semantic.js';
import { evaluateAlert } from '../domain/alerts.js';
import { currentMonth, previousMonth } from '../domain/computations.js';
import { FinanceError, PersistenceError, ValidationError } from '../domain/errors.js';
import { analyzeMonthlyPatterns, suggestBudgetAdjustments } from '../domain/insights.js';
import type { Category, Intent } from '../domain/types.js';
import type { Ledger } from '../db/ledger.js';
import * as replies from './replies.js';
import type { StepResult } from './types.js';

// --- Classification ---

type KeywordTier = { intent: Exclude<Intent, 'GENERAL'>; phrases: readonly string[] };

const KEYWORD_TIERS: readonly KeywordTier[] = [
  {
    intent: 'EXPENSE',
    phrases: [
      'spent', 'paid', 'bought', 'purchased', 'cost', '$',
      'lunch', 'dinner', 'breakfast', 'coffee', 'groceries', 'gas', 'uber', 'taxi', 'movie', 'tickets',
    ],
  },
  { intent: 'BUDGET', phrases: ['budget', 'limit', 'allowance'] },
  { intent: 'BALANCE', phrases: ['balance', 'how much', 'total', 'summary', 'spent this month', 'left'] },
  {
    intent: 'INSIGHTS',
    phrases: ['report', 'insight', 'insights', 'analysis', 'analyze', 'trend', 'trends', 'pattern', 'patterns', 'recommend', 'advice'],
  },
  { intent: 'HELP', phrases: ['help', 'how do i', 'how to', 'commands', 'what can you do', '/start'] },
];

// Budget and summary wording outranks expense words ("Set budget for Food & Dining $500")
const EXPENSE_VETO: readonly string[] = ['budget', 'limit', 'allowance', 'how much', 'total', 'summary'];

const GREETING_ONLY = /^(?:hi|hello|hey|hiya|howdy|yo|good (?:morning|afternoon|evening))(?:\s+there)?[\s!.,]*$/i;
const THANKS_ONLY = /^(?:thanks|thank you|thx|ty|cheers)(?:\s+(?:a lot|so much))?[\s!.,]*$/i;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsPhrase(text: string, phrase: string): boolean {
  if (!/^\w/.test(phrase)) return text.includes(phrase);
  return new RegExp(`\\b${escapeRegExp(phrase)}\\b`).test(text);
}

function matchesAny(text: string, phrases: readonly string[]): boolean {
  return phrases.some((p) => containsPhrase(text, p));
}

/** Keyword tier only; null when no tier matches */
export function keywordIntent(message: string): Intent | null {
  const text = message.trim().toLowerCase();
  if (!text || GREETING_ONLY.test(text) || THANKS_ONLY.test(text)) return 'GENERAL';

  for (const tier of KEYWORD_TIERS) {
    if (!matchesAny(text, tier.phrases)) continue;
    if (tier.intent === 'EXPENSE' && (!hasNumber(text) || matchesAny(text, EXPENSE_VETO))) continue;
    return tier.intent;
  }
  return null;
}

/** Never rejects: fallback failures resolve to GENERAL */
export async function classify(message: string, completion: TextCompletion): Promise<Intent> {
  return keywordIntent(message) ?? semanticIntent(completion, message);
}

// --- Collaborators ---

export interface ReportCollaborator {
  monthlyReport(userId: string): Promise<string>;
}

export interface HelpCollaborator {
  helpText(userId: string): Promise<string>;
}

export const staticHelp: HelpCollaborator = {
  helpText: async () => replies.HELP,
};

/** Text report from this month's and last month's summaries */
export function ledgerReports(ledger: Ledger, now: () => Date, currency: string): ReportCollaborator {
  return {
    monthlyReport: async () => {
      const { month, year } = currentMonth(now());
      const prev = previousMonth(month, year);
      const current = ledger.getSpendingSummary(month, year);
      const previous = ledger.getSpendingSummary(prev.month, prev.year);
      const insights = analyzeMonthlyPatterns(
        current,
        previous.transactionCount > 0 ? previous : null,
        currency,
      );
      return replies.monthlyReport(current, insights, currency);
    },
  };
}

// --- Dispatch ---

export interface RouterContext {
  userId: string;
  ledger: Ledger;
  completion: TextCompletion;
  currency: string;
  now: () => Date;
  reports: ReportCollaborator;
  help: HelpCollaborator;
}

export async function dispatch(intent: Intent, message: string, ctx: RouterContext): Promise<StepResult> {
  switch (intent) {
    case 'EXPENSE':
      return handleExpense(message, ctx);
    case 'BUDGET':
      return handleBudget(message, ctx);
    case 'BALANCE':
      return handleBalance(ctx);
    case 'INSIGHTS':
      return handleInsights(ctx);
    case 'HELP':
      return { reply: await ctx.help.helpText(ctx.userId), tag: 'help' };
    case 'GENERAL':
      return handleGeneral(message);
  }
}

interface ExpenseDraft {
  amount: number;
  description: string;
  category: Category;
  paymentMethod: string;
}

async function draftExpense(message: string, completion: TextCompletion): Promise<ExpenseDraft | null> {
  const { text, paymentMethod } = extractPaymentMethod(message);
  const parsed = parseExpense(text);
  if (parsed) {
    return { ...parsed, category: categorize(parsed.description), paymentMethod };
  }

  const semantic = await semanticExpense(completion, message);
  if (!semantic) return null;
  return {
    amount: semantic.amount,
    description: semantic.description,
    category: semantic.category ?? categorize(semantic.description),
    paymentMethod: semantic.paymentMethod ?? paymentMethod,
  };
}

async function handleExpense(message: string, ctx: RouterContext): Promise<StepResult> {
  const draft = await draftExpense(message, ctx.completion);
  if (!draft) return { reply: replies.EXPENSE_UNCLEAR, tag: 'expense_unclear' };

  const existing = ctx.ledger.getBudget(draft.category);
  const alert = evaluateAlert(
    draft.category,
    existing?.currentSpent ?? 0,
    draft.amount,
    existing?.monthlyBudget ?? 0,
    ctx.currency,
  );

  try {
    const { expense } = ctx.ledger.postExpense(draft);
    console.log(`[Router] Logged ${expense.category} expense for ${ctx.userId}`);
    return { reply: replies.expenseLogged(expense, alert, ctx.currency), tag: 'expense_logged' };
  } catch (error) {
    if (error instanceof ValidationError) {
      return { reply: replies.EXPENSE_UNCLEAR, tag: 'expense_unclear' };
    }
    if (error instanceof PersistenceError) {
      return { reply: replies.NOT_SAVED, tag: 'error' };
    }
    throw error;
  }
}

const SET_BUDGET = /set\s+budget\s+for\s+(.+?)\s+(?:to\s+)?\$?\s?((?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{1,2})?)\s*$/i;
const STATUS_WORDS = /\b(?:status|overview|check|show)\b/i;
const SUGGEST_WORDS = /\b(?:suggest|suggestions|advice|optimize|improve)\b/i;

function parseBudgetCommand(message: string): { category: Category | null; amount: number | null } {
  const text = message.trim().replace(/[!.]+$/, '');
  const explicit = SET_BUDGET.exec(text);
  if (explicit && explicit[1] !== undefined && explicit[2] !== undefined) {
    return {
      category: resolveCategory(explicit[1]),
      amount: Number(explicit[2].replace(/,/g, '')),
    };
  }
  return { category: resolveCategory(text), amount: extractCommandAmount(text) };
}

function handleBudget(message: string, ctx: RouterContext): StepResult {
  if (!hasNumber(message)) {
    if (STATUS_WORDS.test(message)) {
      return { reply: replies.budgetStatusReport(ctx.ledger.getBudgetStatus(), ctx.currency), tag: 'budget' };
    }
    if (SUGGEST_WORDS.test(message)) {
      const { month, year } = currentMonth(ctx.now());
      const prev = previousMonth(month, year);
      const previous = ctx.ledger.getSpendingSummary(prev.month, prev.year);
      const suggestions = suggestBudgetAdjustments(
        ctx.ledger.getSpendingSummary(month, year),
        previous.transactionCount > 0 ? previous : null,
        ctx.ledger.getBudgetStatus(),
        ctx.currency,
      );
      return { reply: replies.budgetSuggestions(suggestions), tag: 'budget' };
    }
    return { reply: replies.BUDGET_HELP, tag: 'budget' };
  }

  const { category, amount } = parseBudgetCommand(message);
  if (category === null || amount === null) {
    return { reply: replies.BUDGET_INVALID, tag: 'budget' };
  }

  try {
    const budget = ctx.ledger.setBudget(category, amount);
    console.log(`[Router] Budget for ${category} set by ${ctx.userId}`);
    return { reply: replies.budgetUpdated(budget, ctx.currency), tag: 'budget' };
  } catch (error) {
    if (error instanceof ValidationError) {
      return { reply: replies.BUDGET_INVALID, tag: 'budget' };
    }
    if (error instanceof PersistenceError) {
      return { reply: replies.NOT_SAVED, tag: 'error' };
    }
    throw error;
  }
}

function handleBalance(ctx: RouterContext): StepResult {
  const { month, year } = currentMonth(ctx.now());
  const summary = ctx.ledger.getSpendingSummary(month, year);
  const reply = replies.balanceSummary(
    summary,
    ctx.ledger.getBudgetStatus(),
    ctx.ledger.getUserBalance(ctx.userId),
    ctx.currency,
  );
  return { reply, tag: 'balance' };
}

async function handleInsights(ctx: RouterContext): Promise<StepResult> {
  try {
    return { reply: await ctx.reports.monthlyReport(ctx.userId), tag: 'insights' };
  } catch (error) {
    if (error instanceof FinanceError) {
      console.error('[Router] Error building report:', error);
      return { reply: replies.SOMETHING_WENT_WRONG, tag: 'error' };
    }
    throw error;
  }
}

function handleGeneral(message: string): StepResult {
  const text = message.trim().toLowerCase();
  if (GREETING_ONLY.test(text)) return { reply: replies.GREETING, tag: 'greeting' };
  if (THANKS_ONLY.test(text)) return { reply: replies.THANKS, tag: 'thanks' };
  return { reply: replies.GENERAL_UNCLEAR, tag: 'general' };
}
