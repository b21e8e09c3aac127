import { z } from 'zod';

import type { LLMClient, ProviderOptions } from './client.js';
import { RateLimited, retryRateLimited } from './retry.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .nonempty(),
});

function retryAfterMs(response: Response): number | undefined {
  const header = response.headers.get('retry-after');
  if (header === null) return undefined;
  const seconds = Number.parseFloat(header);
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

// ── Provider factory ─────────────────────────────────────────

/** Chat Completions over fetch, answering in JSON mode. */
export function createOpenAIClient(options: ProviderOptions): LLMClient {
  const model = options.model ?? DEFAULT_MODEL;

  async function post(systemPrompt: string, userPrompt: string): Promise<Response> {
    const response = await fetch(COMPLETIONS_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${options.apiKey}`,
      },
      body: JSON.stringify({
        model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        response_format: { type: 'json_object' },
        temperature: 0,
      }),
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (response.status === 429) {
      throw new RateLimited('OpenAI', retryAfterMs(response));
    }
    if (!response.ok) {
      const body = await response.text();
      throw new Error(`OpenAI API error (${String(response.status)}): ${body}`);
    }
    return response;
  }

  return {
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const response = await retryRateLimited(() => post(systemPrompt, userPrompt));
      const parsed = chatResponseSchema.parse(await response.json());
      return parsed.choices[0].message.content;
    },
  };
}
