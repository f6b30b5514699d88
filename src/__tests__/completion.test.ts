import { describe, it, expect, vi, afterEach } from 'vitest';
import { createChatCompletion, disabledCompletion, withTimeout } from '../api/completion.js';

const config = {
  apiKey: 'test-key',
  baseUrl: 'https://llm.test/v1/',
  model: 'test-model',
  timeoutMs: 1000,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

afterEach(() => {
  vi.useRealTimers();
});

describe('createChatCompletion', () => {
  it('posts the prompt and returns the first choice', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({ choices: [{ message: { content: 'EXPENSE' } }] }),
    );
    const completion = createChatCompletion(config, fetchImpl);

    await expect(completion('classify this')).resolves.toBe('EXPENSE');

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      temperature: 0,
      messages: [{ role: 'user', content: 'classify this' }],
    });
  });

  it('returns an empty string for null content', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({ choices: [{ message: { content: null } }] }),
    );
    await expect(createChatCompletion(config, fetchImpl)('x')).resolves.toBe('');
  });

  it('rejects on an error status', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('nope', { status: 500 }));
    await expect(createChatCompletion(config, fetchImpl)('x')).rejects.toThrow('Completion request failed: 500');
  });

  it('rejects on an unexpected body', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ choices: [] }));
    await expect(createChatCompletion(config, fetchImpl)('x')).rejects.toThrow();
  });
});

describe('disabledCompletion', () => {
  it('always rejects', async () => {
    await expect(disabledCompletion('x')).rejects.toThrow('Text completion is not configured');
  });
});

describe('withTimeout', () => {
  it('passes through a completion that finishes in time', async () => {
    const completion = withTimeout(async () => 'ok', 100);
    await expect(completion('x')).resolves.toBe('ok');
  });

  it('rejects a completion that never answers', async () => {
    vi.useFakeTimers();
    const completion = withTimeout(() => new Promise<string>(() => undefined), 100);

    const assertion = expect(completion('x')).rejects.toThrow('Completion timed out after 100ms');
    await vi.advanceTimersByTimeAsync(100);
    await assertion;
  });

  it('clears its timer when the completion throws before returning a promise', async () => {
    vi.useFakeTimers();
    const completion = withTimeout(() => {
      throw new Error('bad prompt');
    }, 100);

    await expect(completion('x')).rejects.toThrow('bad prompt');
    expect(vi.getTimerCount()).toBe(0);
  });
});
