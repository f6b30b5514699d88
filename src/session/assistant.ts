/**
 * Session manager: the single `handle(message, userId)` entry point.
 *
 * Messages are handled strictly one at a time through a promise chain, so a
 * message's state lookup, classification, ledger write and reply all finish
 * before the next message starts.
 */
import { disabledCompletion, type TextCompletion } from '../api/completion.js';
import type { Ledger } from '../db/ledger.js';
import {
  classify,
  dispatch,
  ledgerReports,
  staticHelp,
  type HelpCollaborator,
  type ReportCollaborator,
} from './intentRouter.js';
import { advanceOnboarding, concreteHint } from './onboarding.js';
import * as replies from './replies.js';
import { appendContext, createSession, InMemorySessionStore } from './sessionStore.js';
import {
  IDLE_TAGS,
  type Session,
  type SessionStore,
  type StepResult,
  type UserState,
  type UserStateKind,
} from './types.js';

export interface AssistantOptions {
  ledger: Ledger;
  sessions?: SessionStore;
  completion?: TextCompletion;
  currency?: string;
  now?: () => Date;
  reports?: ReportCollaborator;
  help?: HelpCollaborator;
}

/** Number of earlier idle replies that, with one more, trip the loop guard */
const IDLE_STREAK = 2;

export class FinanceAssistant {
  private readonly ledger: Ledger;
  private readonly sessions: SessionStore;
  private readonly completion: TextCompletion;
  private readonly currency: string;
  private readonly now: () => Date;
  private readonly reports: ReportCollaborator;
  private readonly help: HelpCollaborator;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: AssistantOptions) {
    this.ledger = options.ledger;
    this.sessions = options.sessions ?? new InMemorySessionStore();
    this.completion = options.completion ?? disabledCompletion;
    this.currency = options.currency ?? 'USD';
    this.now = options.now ?? (() => new Date());
    this.reports = options.reports ?? ledgerReports(this.ledger, this.now, this.currency);
    this.help = options.help ?? staticHelp;
  }

  /** Resolves with the reply text; never rejects */
  handle(message: string, userId: string): Promise<string> {
    const run = this.queue.then(() => this.process(message, userId));
    this.queue = run;
    return run;
  }

  getUserState(userId: string): UserStateKind | null {
    return this.sessions.get(userId)?.state.kind ?? null;
  }

  getSession(userId: string): Session | undefined {
    return this.sessions.get(userId);
  }

  private async process(message: string, userId: string): Promise<string> {
    try {
      const session = this.sessions.get(userId) ?? this.startSession(userId);
      const { step, next } = await this.step(session.state, message, userId);
      const guarded = this.loopGuard(session, step, next);

      if (next.kind !== session.state.kind) {
        console.log(`[Session] ${userId}: ${session.state.kind} -> ${next.kind}`);
      }

      const updated = appendContext(
        { ...session, state: next, balance: this.ledger.getUserBalance(userId) },
        { message, responseTag: guarded.tag, timestamp: this.now().toISOString() },
      );
      this.saveSession(userId, updated);
      return guarded.reply;
    } catch (error) {
      console.error('Error handling message:', error);
      return replies.SOMETHING_WENT_WRONG;
    }
  }

  /**
   * Runs after any ledger write for the message has committed, so a failure
   * here must not turn the reply into a retry prompt. The next message
   * rebuilds the session from the ledger if this one is lost.
   */
  private saveSession(userId: string, session: Session): void {
    try {
      this.sessions.put(userId, session);
    } catch (error) {
      console.error(`[Session] Error saving session for ${userId}:`, error);
    }
  }

  /** New sessions start from what the ledger says about this user */
  private startSession(userId: string): Session {
    const { setupComplete } = this.ledger.getSetupStatus(userId);
    const session = createSession(userId, setupComplete ? { kind: 'ACTIVE' } : { kind: 'NEW' });
    return { ...session, balance: this.ledger.getUserBalance(userId) };
  }

  private async step(
    state: UserState,
    message: string,
    userId: string,
  ): Promise<{ step: StepResult; next: UserState }> {
    if (state.kind !== 'ACTIVE') {
      const { next, ...step } = await advanceOnboarding(state, message, {
        userId,
        ledger: this.ledger,
        completion: this.completion,
        currency: this.currency,
      });
      return { step, next };
    }

    const intent = await classify(message, this.completion);
    const step = await dispatch(intent, message, {
      userId,
      ledger: this.ledger,
      completion: this.completion,
      currency: this.currency,
      now: this.now,
      reports: this.reports,
      help: this.help,
    });
    return { step, next: state };
  }

  /** A third idle reply in a row becomes a concrete instruction instead */
  private loopGuard(session: Session, step: StepResult, next: UserState): StepResult {
    if (!IDLE_TAGS.has(step.tag)) return step;
    const recent = session.context.slice(-IDLE_STREAK);
    if (recent.length < IDLE_STREAK || !recent.every((e) => IDLE_TAGS.has(e.responseTag))) {
      return step;
    }
    return { reply: replies.concrete(concreteHint(next, this.ledger)), tag: 'concrete' };
  }
}
