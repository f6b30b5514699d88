/**
 * Onboarding state machine: NEW → AWAITING_BALANCE → AWAITING_BUDGETS → ACTIVE.
 *
 * Every step returns the next state alongside the reply; callers never work
 * out a transition from what the reply says. Which budgets are configured is
 * always read from the ledger.
 */
import { extractBalanceAmount, extractBudgetAmount } from '../api/amountParser.js';
import type { TextCompletion } from '../api/completion.js';
import { semanticAmount } from '../api/semantic.js';
import { roundMoney } from '../domain/computations.js';
import { FinanceError, PersistenceError } from '../domain/errors.js';
import { MIN_CONFIGURED_BUDGETS, PRIORITY_CATEGORIES, type Category } from '../domain/types.js';
import type { Ledger } from '../db/ledger.js';
import * as replies from './replies.js';
import type { ResponseTag, StepResult, UserState } from './types.js';

export type OnboardingState = Exclude<UserState, { kind: 'ACTIVE' }>;

export interface OnboardingContext {
  userId: string;
  ledger: Ledger;
  completion: TextCompletion;
  currency: string;
}

export interface OnboardingStep extends StepResult {
  next: UserState;
}

export type BudgetReply =
  | { kind: 'skip' }
  | { kind: 'done' }
  | { kind: 'amount'; amount: number }
  | { kind: 'question' }
  | { kind: 'unclear' };

const SKIP_PATTERN = /\b(?:skip|pass|next|don'?t use|not needed)\b/;
const DONE_PATTERN = /\b(?:done|finished|complete|that'?s all)\b/;
const QUESTION_PATTERN = /\?|^(?:what|how|why|should)\b/;

/** Classify an answer to "how much for this category?" */
export function parseBudgetReply(message: string): BudgetReply {
  const text = message.trim().toLowerCase().replace(/’/g, "'");
  if (SKIP_PATTERN.test(text)) return { kind: 'skip' };
  if (DONE_PATTERN.test(text)) return { kind: 'done' };

  const amount = extractBudgetAmount(text);
  if (amount !== null) return { kind: 'amount', amount };

  if (QUESTION_PATTERN.test(text)) return { kind: 'question' };
  return { kind: 'unclear' };
}

/** First priority category that is neither configured nor skipped */
export function currentCategory(configured: readonly Category[], skipped: readonly Category[]): Category | null {
  return PRIORITY_CATEGORIES.find((c) => !configured.includes(c) && !skipped.includes(c)) ?? null;
}

export async function advanceOnboarding(
  state: OnboardingState,
  message: string,
  ctx: OnboardingContext,
): Promise<OnboardingStep> {
  switch (state.kind) {
    case 'NEW':
      return { reply: replies.WELCOME, tag: 'welcome', next: { kind: 'AWAITING_BALANCE' } };
    case 'AWAITING_BALANCE':
      return awaitingBalance(state, message, ctx);
    case 'AWAITING_BUDGETS':
      return awaitingBudgets(state, message, ctx);
  }
}

async function awaitingBalance(
  state: Extract<UserState, { kind: 'AWAITING_BALANCE' }>,
  message: string,
  ctx: OnboardingContext,
): Promise<OnboardingStep> {
  const amount = extractBalanceAmount(message) ?? (await semanticAmount(ctx.completion, message));

  if (amount === null) {
    return { reply: replies.BALANCE_PROMPT, tag: 'balance_prompt', next: state };
  }
  if (amount < 0) {
    return { reply: replies.BALANCE_NEGATIVE, tag: 'balance_invalid', next: state };
  }
  // Sub-cent balances round to zero
  if (roundMoney(amount) === 0) {
    return { reply: replies.BALANCE_ZERO, tag: 'balance_invalid', next: state };
  }

  let balance: number;
  try {
    balance = ctx.ledger.setUserBalance(ctx.userId, amount);
  } catch (error) {
    if (!(error instanceof FinanceError)) throw error;
    console.error('[Onboarding] Error saving balance:', error);
    return { reply: replies.BALANCE_NOT_SAVED, tag: 'error', next: state };
  }

  return advance(ctx, [], replies.balanceSet(balance, ctx.currency), 'balance_set');
}

async function awaitingBudgets(
  state: Extract<UserState, { kind: 'AWAITING_BUDGETS' }>,
  message: string,
  ctx: OnboardingContext,
): Promise<OnboardingStep> {
  const configured = ctx.ledger.getConfiguredCategories();
  const category = currentCategory(configured, state.skipped);
  if (category === null) {
    // Budgets changed underneath the session (e.g. set through another channel)
    return advance(ctx, state.skipped, null, 'budget_set');
  }

  const answer = parseBudgetReply(message);
  switch (answer.kind) {
    case 'amount': {
      try {
        ctx.ledger.setBudget(category, answer.amount);
      } catch (error) {
        if (!(error instanceof FinanceError)) throw error;
        console.error('[Onboarding] Error saving budget:', error);
        return {
          reply: `${replies.NOT_SAVED}\n\n${replies.budgetQuestion(category)}`,
          tag: 'error',
          next: state,
        };
      }
      return advance(ctx, state.skipped, replies.budgetSet(category, answer.amount, ctx.currency), 'budget_set');
    }
    case 'skip':
      return advance(ctx, [...state.skipped, category], replies.budgetSkipped(category), 'budget_skipped');
    case 'done':
      if (configured.length >= MIN_CONFIGURED_BUDGETS) {
        return complete(ctx, null);
      }
      return { reply: replies.budgetMinimum(configured.length, category), tag: 'budget_minimum', next: state };
    case 'question':
      return { reply: replies.budgetTip(category), tag: 'budget_question', next: state };
    case 'unclear':
      return { reply: replies.budgetUnclear(category), tag: 'budget_unclear', next: state };
  }
}

/**
 * Move to the next unconfigured priority category. With none left, finish
 * when enough budgets exist; otherwise clear the skips and go round again.
 */
function advance(
  ctx: OnboardingContext,
  skipped: Category[],
  lead: string | null,
  tag: ResponseTag,
): OnboardingStep {
  const configured = ctx.ledger.getConfiguredCategories();
  const parts = lead === null ? [] : [lead];

  const next = currentCategory(configured, skipped);
  if (next !== null) {
    parts.push(replies.budgetQuestion(next));
    return { reply: parts.join('\n\n'), tag, next: { kind: 'AWAITING_BUDGETS', skipped } };
  }

  if (configured.length >= MIN_CONFIGURED_BUDGETS) {
    return complete(ctx, lead);
  }

  // Fewer than MIN_CONFIGURED_BUDGETS configured means a priority category is still open
  const retry = currentCategory(configured, []) ?? PRIORITY_CATEGORIES[0];
  parts.push(replies.budgetsRestart(configured.length), replies.budgetQuestion(retry));
  return { reply: parts.join('\n\n'), tag: 'budget_minimum', next: { kind: 'AWAITING_BUDGETS', skipped: [] } };
}

function complete(ctx: OnboardingContext, lead: string | null): OnboardingStep {
  try {
    ctx.ledger.markSetupComplete(ctx.userId);
  } catch (error) {
    if (!(error instanceof PersistenceError)) throw error;
    // The timestamp is a cache; getSetupStatus() reads the ledger itself
    console.warn('[Onboarding] Setup completion time not recorded:', error);
  }
  const parts = lead === null ? [] : [lead];
  parts.push(replies.onboardingComplete(ctx.ledger.getBudgetStatus(), ctx.currency));
  return { reply: parts.join('\n\n'), tag: 'onboarding_complete', next: { kind: 'ACTIVE' } };
}

/** What the loop guard asks for while the user is in this state */
export function concreteHint(state: UserState, ledger: Ledger): string {
  switch (state.kind) {
    case 'NEW':
    case 'AWAITING_BALANCE':
      return 'Send your current account balance as a number, like 1500.';
    case 'AWAITING_BUDGETS': {
      const category = currentCategory(ledger.getConfiguredCategories(), state.skipped);
      return category === null
        ? 'Send "done" to finish setup.'
        : `Send a monthly amount for ${category}, like 300, or "skip".`;
    }
    case 'ACTIVE':
      return replies.ACTIVE_HINT;
  }
}
