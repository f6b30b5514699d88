import type { Category } from '../domain/types.js';

/** Onboarding and interaction states. ACTIVE is terminal. */
export type UserState =
  | { kind: 'NEW' }
  | { kind: 'AWAITING_BALANCE' }
  | { kind: 'AWAITING_BUDGETS'; skipped: Category[] }
  | { kind: 'ACTIVE' };

export type UserStateKind = UserState['kind'];

/** What kind of reply was sent; the loop guard looks at these, never at reply text */
export const RESPONSE_TAGS = [
  'welcome',
  'balance_prompt',
  'balance_invalid',
  'balance_set',
  'budget_set',
  'budget_skipped',
  'budget_question',
  'budget_unclear',
  'budget_minimum',
  'onboarding_complete',
  'expense_logged',
  'expense_unclear',
  'budget',
  'balance',
  'insights',
  'help',
  'greeting',
  'thanks',
  'general',
  'concrete',
  'error',
] as const;

export type ResponseTag = (typeof RESPONSE_TAGS)[number];

/** Replies that move nothing forward; three in a row trip the loop guard */
export const IDLE_TAGS: ReadonlySet<ResponseTag> = new Set<ResponseTag>([
  'welcome',
  'balance_prompt',
  'budget_unclear',
  'greeting',
  'general',
  'concrete',
]);

export interface ContextEntry {
  message: string;
  responseTag: ResponseTag;
  timestamp: string;           // ISO
}

export const CONTEXT_LIMIT = 10;

export interface Session {
  userId: string;
  state: UserState;
  balance: number | null;
  context: ContextEntry[];     // oldest first, at most CONTEXT_LIMIT
}

export interface SessionStore {
  get(userId: string): Session | undefined;
  put(userId: string, session: Session): void;
}

/** Result of one onboarding or routing step */
export interface StepResult {
  reply: string;
  tag: ResponseTag;
}
