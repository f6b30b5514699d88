import express, { type Express } from 'express';
import cors from 'cors';
import { z } from 'zod';
import type { Ledger } from '../../src/db/ledger.js';
import type { FinanceAssistant } from '../../src/session/assistant.js';
import { currentMonth, monthKey } from '../../src/domain/computations.js';

export const chatRequestSchema = z.object({
  user_id: z.union([z.string().min(1), z.number().int()]).transform(String),
  chat_id: z.union([z.string(), z.number().int()]).transform(String).optional(),
  text: z.string(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

/** "2025-03" → { month: 3, year: 2025 }; null when malformed */
export function parseMonthParam(value: string): { month: number; year: number } | null {
  const m = /^(\d{4})-(0[1-9]|1[0-2])$/.exec(value);
  if (!m || m[1] === undefined || m[2] === undefined) return null;
  return { year: Number(m[1]), month: Number(m[2]) };
}

export interface AppDeps {
  assistant: FinanceAssistant;
  ledger: Ledger;
  now?: () => Date;
  debug?: boolean;
}

export function createApp({ assistant, ledger, now = () => new Date(), debug = false }: AppDeps): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  if (debug) {
    app.use((req, _res, next) => {
      console.log(`[HTTP] ${req.method} ${req.path}`);
      next();
    });
  }

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // POST /chat - One inbound chat message, answered with the reply text
  app.post('/chat', async (req, res) => {
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Expected { user_id, text }' });
      return;
    }

    try {
      const { user_id, text } = parsed.data;
      const reply = await assistant.handle(text, user_id);
      res.json({ reply, state: assistant.getUserState(user_id) });
    } catch (error) {
      console.error('Error handling chat message:', error);
      res.status(500).json({ error: 'Failed to handle message' });
    }
  });

  // GET /budgets - Budget status for every category with a record
  app.get('/budgets', (_req, res) => {
    try {
      res.json(ledger.getBudgetStatus());
    } catch (error) {
      console.error('Error fetching budgets:', error);
      res.status(500).json({ error: 'Failed to fetch budgets' });
    }
  });

  // GET /summary?month=YYYY-MM (defaults to the current month)
  app.get('/summary', (req, res) => {
    try {
      const { month, year } = currentMonth(now());
      const raw = typeof req.query.month === 'string' ? req.query.month : monthKey(month, year);
      const period = parseMonthParam(raw);
      if (!period) {
        res.status(400).json({ error: 'month query parameter must be YYYY-MM' });
        return;
      }

      const summary = ledger.getSpendingSummary(period.month, period.year);
      res.json({
        month: raw,
        total_spent: summary.totalSpent,
        transaction_count: summary.transactionCount,
        average_transaction: summary.averageTransaction,
        top_category: summary.topCategory,
        top_category_amount: summary.topCategoryAmount,
        category_totals: Array.from(summary.categoryBreakdown, ([category, spent]) => ({ category, spent })),
      });
    } catch (error) {
      console.error('Error computing summary:', error);
      res.status(500).json({ error: 'Failed to compute summary' });
    }
  });

  return app;
}
