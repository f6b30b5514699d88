/**
 * Amount and expense extraction from chat text.
 *
 * Expense extraction is an ordered strategy list: each strategy is a pure
 * function returning a ParsedExpense or null, and the first non-null result
 * wins. The order resolves ambiguous phrasings ("$X for Y" is tried before
 * "Y $X"), so do not reorder it.
 */

export interface ParsedExpense {
  amount: number;
  description: string;
}

export type ExpenseStrategy = (text: string) => ParsedExpense | null;

/**
 * $1,500.00, 1500 or 4.5; captures the number without the dollar sign.
 * Never starts inside a longer number ("12.345" does not yield 345).
 */
const AMOUNT = String.raw`(?<![\d.,])\$?\s?((?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{1,2})?)`;

export const MAX_BUDGET_AMOUNT = 10_000;

export function parseAmountToken(token: string): number {
  return Number(token.replace(/,/g, ''));
}

function cleanDescription(raw: string): string {
  return raw
    .trim()
    .replace(/^(?:(?:dollars?|bucks|usd)\b\s*)?(?:(?:on|for|at)\s+)?/i, '')
    .replace(/[\s!?.]+$/, '')
    .trim();
}

function build(amountToken: string | undefined, rawDescription: string | undefined): ParsedExpense | null {
  if (amountToken === undefined || rawDescription === undefined) return null;
  const amount = parseAmountToken(amountToken);
  const description = cleanDescription(rawDescription);
  if (!Number.isFinite(amount) || amount <= 0 || !description) return null;
  return { amount, description };
}

/** Strategy from a pattern whose groups are (amount, description) */
function amountFirst(pattern: RegExp): ExpenseStrategy {
  return (text) => {
    const m = pattern.exec(text);
    return m ? build(m[1], m[2]) : null;
  };
}

/** Strategy from a pattern whose groups are (description, amount) */
function descriptionFirst(pattern: RegExp): ExpenseStrategy {
  return (text) => {
    const m = pattern.exec(text);
    return m ? build(m[2], m[1]) : null;
  };
}

export const EXPENSE_STRATEGIES: readonly ExpenseStrategy[] = [
  // "Spent $25 on lunch"
  amountFirst(new RegExp(String.raw`spent\s+${AMOUNT}\s+(?:on|for)\s+(.+)`, 'i')),
  // "Paid $150 for groceries"
  amountFirst(new RegExp(String.raw`paid\s+${AMOUNT}\s+(?:for|on)\s+(.+)`, 'i')),
  // "$12 for a taxi"
  amountFirst(new RegExp(String.raw`${AMOUNT}\s+(?:for|on)\s+(.+)`, 'i')),
  // "Gas $45"
  descriptionFirst(new RegExp(String.raw`^(.+?)\s+${AMOUNT}$`, 'i')),
  // "$28 movie tickets"
  amountFirst(new RegExp(String.raw`${AMOUNT}\s+(.+)`, 'i')),
];

export function parseExpense(
  text: string,
  strategies: readonly ExpenseStrategy[] = EXPENSE_STRATEGIES,
): ParsedExpense | null {
  const trimmed = text.trim().replace(/[!?.]+$/, '');
  for (const strategy of strategies) {
    const parsed = strategy(trimmed);
    if (parsed) return parsed;
  }
  return null;
}

const PAYMENT_PATTERN =
  /\s+(?:(?:with|by|using|via)\s+(?:my\s+)?|on\s+my\s+)(cash|credit card|debit card|card|apple pay|google pay|paypal|venmo)\b/i;

/**
 * Peel a payment phrase ("with cash", "by credit card") off the message.
 * Returns the remaining text and the payment method, 'Unknown' if none.
 */
export function extractPaymentMethod(text: string): { text: string; paymentMethod: string } {
  const m = PAYMENT_PATTERN.exec(text);
  if (!m || m[1] === undefined) return { text, paymentMethod: 'Unknown' };
  const paymentMethod = m[1]
    .toLowerCase()
    .split(' ')
    .map((w) => (w === 'paypal' ? 'PayPal' : w.charAt(0).toUpperCase() + w.slice(1)))
    .join(' ');
  const rest = (text.slice(0, m.index) + text.slice(m.index + m[0].length)).trim();
  return { text: rest, paymentMethod };
}

// --- Single-amount cascades (balance, budget) ---

type AmountStrategy = (text: string) => number | null;

function signed(sign: string | undefined, value: number): number {
  return sign ? -value : value;
}

const BALANCE_STRATEGIES: readonly AmountStrategy[] = [
  // "2.5k"
  (text) => {
    const m = /(-)?\$?\s?(\d+(?:\.\d+)?)\s?k\b/i.exec(text);
    return m && m[2] !== undefined ? signed(m[1], Math.round(Number(m[2]) * 1000 * 100) / 100) : null;
  },
  // "$1,500.00"
  (text) => {
    const m = /(-)?\$\s?((?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{1,2})?)/.exec(text);
    return m && m[2] !== undefined ? signed(m[1], parseAmountToken(m[2])) : null;
  },
  // "1500" | "1,200.50"
  (text) => {
    const m = /(-)?((?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?)/.exec(text);
    return m && m[2] !== undefined ? signed(m[1], parseAmountToken(m[2])) : null;
  },
];

/**
 * First amount found in a balance message. May be zero or negative;
 * the caller decides what to accept.
 */
export function extractBalanceAmount(text: string): number | null {
  for (const strategy of BALANCE_STRATEGIES) {
    const value = strategy(text);
    if (value !== null && Number.isFinite(value)) return value;
  }
  return null;
}

/** Onboarding budget answer: the first amount, within (0, MAX_BUDGET_AMOUNT] */
export function extractBudgetAmount(text: string): number | null {
  const m = new RegExp(AMOUNT).exec(text);
  if (!m || m[1] === undefined) return null;
  const amount = parseAmountToken(m[1]);
  return amount > 0 && amount <= MAX_BUDGET_AMOUNT ? amount : null;
}

/**
 * Amount in a budget command: a $-prefixed amount if there is one,
 * otherwise the last number ("set food budget to 400").
 */
export function extractCommandAmount(text: string): number | null {
  const dollar = /\$\s?((?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{1,2})?)/.exec(text);
  if (dollar && dollar[1] !== undefined) return parseAmountToken(dollar[1]);

  const numbers = text.match(/(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{1,2})?/g);
  const last = numbers?.at(-1);
  return last === undefined ? null : parseAmountToken(last);
}

export function hasNumber(text: string): boolean {
  return /\d/.test(text);
}
