/**
 * Text-completion collaborator.
 *
 * The core only ever awaits a single string for a prompt; it never assumes
 * the string is clean structured output (see semantic.ts for the parsing).
 */
import { z } from 'zod';

export type TextCompletion = (prompt: string) => Promise<string>;

export interface CompletionConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

const chatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

/**
 * Client for an OpenAI-compatible /chat/completions endpoint.
 */
export function createChatCompletion(
  config: CompletionConfig,
  fetchImpl: typeof fetch = fetch,
): TextCompletion {
  const url = `${config.baseUrl.replace(/\/+$/, '')}/chat/completions`;

  return async (prompt) => {
    const response = await fetchImpl(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${config.apiKey}`,
      },
      body: JSON.stringify({
        model: config.model,
        temperature: 0,
        messages: [{ role: 'user', content: prompt }],
      }),
      signal: AbortSignal.timeout(config.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Completion request failed: ${response.status}`);
    }
    const body = chatCompletionResponseSchema.parse(await response.json());
    return body.choices[0]?.message.content ?? '';
  };
}

/** Used when no API key is configured: every call rejects, callers fall back. */
export const disabledCompletion: TextCompletion = async () => {
  throw new Error('Text completion is not configured');
};

/**
 * Bound any completion by a deadline. The timer is cleared either way so a
 * finished request leaves nothing pending, including one that throws before
 * returning its promise.
 */
export function withTimeout(completion: TextCompletion, timeoutMs: number): TextCompletion {
  return (prompt) =>
    new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`Completion timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      Promise.resolve()
        .then(() => completion(prompt))
        .then(
          (text) => {
            clearTimeout(timer);
            resolve(text);
          },
          (error: unknown) => {
            clearTimeout(timer);
            reject(error);
          },
        );
    });
}
