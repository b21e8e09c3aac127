import Anthropic from '@anthropic-ai/sdk';

import type { LLMClient, ProviderOptions } from './client.js';
import { RateLimited, retryRateLimited } from './retry.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const MAX_TOKENS = 2048;

function isRateLimitError(err: unknown): boolean {
  if (err instanceof Anthropic.RateLimitError) return true;
  return err instanceof Error && err.message.includes('429');
}

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicClient(options: ProviderOptions): LLMClient {
  const model = options.model ?? DEFAULT_MODEL;
  // SDK retries off: rate limits go through retryRateLimited
  const client = new Anthropic({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });

  async function send(systemPrompt: string, userPrompt: string) {
    try {
      return await client.messages.create({
        model,
        max_tokens: MAX_TOKENS,
        system: systemPrompt,
        messages: [{ role: 'user', content: userPrompt }],
        temperature: 0,
      });
    } catch (err) {
      if (isRateLimitError(err)) throw new RateLimited('Anthropic');
      throw err;
    }
  }

  return {
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const response = await retryRateLimited(() => send(systemPrompt, userPrompt));

      const firstBlock = response.content[0];
      if (!firstBlock || firstBlock.type !== 'text') {
        throw new Error('Anthropic API returned no text content');
      }
      return firstBlock.text;
    },
  };
}
