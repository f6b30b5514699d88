import * as dotenv from 'dotenv';
import { z } from 'zod';
import type { CompletionConfig } from './api/completion.js';

const flag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

// Environment variable types and defaults
const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8787),
  LEDGER_DB_PATH: z.string().min(1).default('data/ledger.db'),
  DEFAULT_CURRENCY: z
    .string()
    .regex(/^[A-Z]{3}$/, 'must be an ISO 4217 code such as USD')
    .default('USD'),

  // Text completion (OpenAI-compatible). Without a key the semantic fallback is off.
  COMPLETION_API_KEY: z.string().default(''),
  COMPLETION_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  COMPLETION_MODEL: z.string().min(1).default('gpt-4o-mini'),
  COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),

  DEBUG: flag,
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  port: number;
  ledgerDbPath: string;
  currency: string;
  completion: CompletionConfig | null;
  debug: boolean;
}

/** Validate the environment; throws listing every bad variable */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    ledgerDbPath: e.LEDGER_DB_PATH,
    currency: e.DEFAULT_CURRENCY,
    completion: e.COMPLETION_API_KEY
      ? {
          apiKey: e.COMPLETION_API_KEY,
          baseUrl: e.COMPLETION_BASE_URL.replace(/\/+$/, ''),
          model: e.COMPLETION_MODEL,
          timeoutMs: e.COMPLETION_TIMEOUT_MS,
        }
      : null,
    debug: e.DEBUG,
  };
}

/** Read .env (if present) into process.env, then validate */
export function loadConfigFromDotenv(path?: string): AppConfig {
  dotenv.config(path ? { path } : undefined);
  return loadConfig(process.env);
}
