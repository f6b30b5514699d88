/**
 * Semantic fallback: prompts for the text-completion collaborator and
 * parsing of whatever comes back. Nothing here rejects: every
 * failure resolves to the "nothing found" value of the call.
 */
import { z } from 'zod';
import { ClassificationAmbiguous } from '../domain/errors.js';
import { CATEGORIES, INTENTS, isCategory, isIntent, type Category, type Intent } from '../domain/types.js';
import type { TextCompletion } from './completion.js';

export function intentPrompt(message: string): string {
  return `Classify the user's message for a personal finance assistant.

Labels: ${INTENTS.join(', ')}
- EXPENSE: logging a purchase or payment ("spent", "paid", "bought", an amount and a thing)
- BUDGET: setting or checking a category budget or limit
- BALANCE: totals, summaries, how much was spent or is left
- INSIGHTS: reports, trends, analysis, recommendations
- HELP: how to use the assistant, commands
- GENERAL: greetings, small talk, anything else

Examples:
"grabbed a burrito, 11 bucks" -> EXPENSE
"cap my shopping at 200 a month" -> BUDGET
"where am I at this month" -> BALANCE
"any trends in my spending?" -> INSIGHTS
"what can you do" -> HELP
"good morning!" -> GENERAL

Message: "${message}"

Answer with the label only.`;
}

/**
 * First intent label found in the reply. Throws ClassificationAmbiguous when
 * the reply names none of the six intents.
 */
export function parseIntentLabel(raw: string): Intent {
  const tokens: string[] = raw.toUpperCase().match(/[A-Z]+/g) ?? [];
  const label = tokens.find(isIntent);
  if (!label) throw new ClassificationAmbiguous(raw.trim());
  return label;
}

export async function semanticIntent(completion: TextCompletion, message: string): Promise<Intent> {
  try {
    return parseIntentLabel(await completion(intentPrompt(message)));
  } catch (error) {
    if (error instanceof ClassificationAmbiguous) {
      console.warn(`[Router] ${error.message}, using GENERAL`);
    } else {
      console.warn('[Router] Semantic classification failed, using GENERAL:', error);
    }
    return 'GENERAL';
  }
}

export function amountPrompt(message: string): string {
  return `Extract the account balance from this message.

Message: "${message}"

Return only the number (for example 1500.0), or NONE if there is no amount.
Examples:
"My balance is $1,500" -> 1500.0
"around two grand" -> 2000.0
"I'm broke" -> NONE`;
}

export function parseAmountReply(raw: string): number | null {
  const text = raw.trim();
  if (!text || /^none\b/i.test(text)) return null;
  const m = /-?\d+(?:,\d{3})*(?:\.\d+)?/.exec(text);
  if (!m) return null;
  const value = Number(m[0].replace(/,/g, ''));
  return Number.isFinite(value) ? value : null;
}

export async function semanticAmount(completion: TextCompletion, message: string): Promise<number | null> {
  try {
    return parseAmountReply(await completion(amountPrompt(message)));
  } catch (error) {
    console.warn('[Onboarding] Semantic amount extraction failed:', error);
    return null;
  }
}

export interface SemanticExpense {
  amount: number;
  description: string;
  category: Category | null;
  paymentMethod: string | null;
}

export function expensePrompt(message: string): string {
  return `Extract expense information from this message: "${message}"

Return a JSON object with these fields:
- amount: number (required)
- description: short description of the expense (required)
- category: one of ${JSON.stringify(CATEGORIES)}
- payment_method: if mentioned

If the message is not an expense, return null.

Example:
"Spent $25 on lunch at Joe's Diner" -> {"amount": 25, "description": "lunch at Joe's Diner", "category": "Food & Dining"}`;
}

const semanticExpenseSchema = z.object({
  amount: z.coerce.number().positive().finite(),
  description: z.string().trim().min(1),
  category: z.string().optional(),
  payment_method: z.string().optional(),
});

export function parseExpenseReply(raw: string): SemanticExpense | null {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  let json: unknown;
  try {
    json = JSON.parse(raw.slice(start, end + 1));
  } catch {
    return null;
  }

  const parsed = semanticExpenseSchema.safeParse(json);
  if (!parsed.success) return null;
  const { amount, description, category, payment_method } = parsed.data;
  return {
    amount,
    description,
    category: category !== undefined && isCategory(category) ? category : null,
    paymentMethod: payment_method?.trim() || null,
  };
}

export async function semanticExpense(
  completion: TextCompletion,
  message: string,
): Promise<SemanticExpense | null> {
  try {
    return parseExpenseReply(await completion(expensePrompt(message)));
  } catch (error) {
    console.warn('[Router] Semantic expense extraction failed:', error);
    return null;
  }
}
