import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8787,
      ledgerDbPath: 'data/ledger.db',
      currency: 'USD',
      completion: null,
      debug: false,
    });
  });

  it('enables the completion client when a key is set', () => {
    const config = loadConfig({
      PORT: '3000',
      COMPLETION_API_KEY: 'test-key',
      COMPLETION_BASE_URL: 'https://llm.test/v1/',
      DEBUG: 'true',
    });
    expect(config.port).toBe(3000);
    expect(config.debug).toBe(true);
    expect(config.completion).toEqual({
      apiKey: 'test-key',
      baseUrl: 'https://llm.test/v1',
      model: 'gpt-4o-mini',
      timeoutMs: 8000,
    });
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/PORT/);
    expect(() => loadConfig({ DEFAULT_CURRENCY: 'usd' })).toThrow(/DEFAULT_CURRENCY/);
    expect(() => loadConfig({ DEBUG: 'maybe' })).toThrow(/DEBUG/);
  });
});
