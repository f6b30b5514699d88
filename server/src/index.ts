import { loadConfigFromDotenv } from '../../src/config.js';
import { createChatCompletion, disabledCompletion, withTimeout } from '../../src/api/completion.js';
import { SqliteBackingStore } from '../../src/db/database.js';
import { Ledger } from '../../src/db/ledger.js';
import { FinanceAssistant } from '../../src/session/assistant.js';
import { LedgerSessionStore } from '../../src/session/sessionStore.js';
import { createApp } from './app.js';

const config = loadConfigFromDotenv();

const store = new SqliteBackingStore(config.ledgerDbPath);
const ledger = new Ledger(store, { currency: config.currency });

const completion = config.completion
  ? withTimeout(createChatCompletion(config.completion), config.completion.timeoutMs)
  : disabledCompletion;
if (!config.completion) {
  console.log('[Config] COMPLETION_API_KEY not set, semantic fallback disabled');
}

const assistant = new FinanceAssistant({
  ledger,
  sessions: new LedgerSessionStore(store),
  completion,
  currency: config.currency,
});

const app = createApp({ assistant, ledger, debug: config.debug });

const server = app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
});

function shutdown(): void {
  server.close(() => {
    store.close();
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

export default app;
