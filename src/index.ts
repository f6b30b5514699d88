export * from './domain/types.js';
export * from './domain/errors.js';
export * from './domain/computations.js';
export { evaluateAlert, ALERT_THRESHOLDS } from './domain/alerts.js';
export { analyzeMonthlyPatterns, suggestBudgetAdjustments } from './domain/insights.js';

export { categorize, resolveCategory, getAllCategories } from './api/categorizer.js';
export {
  EXPENSE_STRATEGIES,
  parseExpense,
  extractPaymentMethod,
  extractBalanceAmount,
  extractBudgetAmount,
  type ExpenseStrategy,
  type ParsedExpense,
} from './api/amountParser.js';
export {
  createChatCompletion,
  disabledCompletion,
  withTimeout,
  type CompletionConfig,
  type TextCompletion,
} from './api/completion.js';

export { COLLECTIONS, type LedgerBackingStore } from './db/backingStore.js';
export { SqliteBackingStore, IN_MEMORY } from './db/database.js';
export { Ledger, type LedgerOptions, type PostedExpense } from './db/ledger.js';

export * from './session/types.js';
export { InMemorySessionStore, LedgerSessionStore } from './session/sessionStore.js';
export { advanceOnboarding, type OnboardingContext, type OnboardingStep } from './session/onboarding.js';
export {
  classify,
  dispatch,
  ledgerReports,
  staticHelp,
  type HelpCollaborator,
  type ReportCollaborator,
  type RouterContext,
} from './session/intentRouter.js';
export { FinanceAssistant, type AssistantOptions } from './session/assistant.js';

export { loadConfig, loadConfigFromDotenv, type AppConfig } from './config.js';
