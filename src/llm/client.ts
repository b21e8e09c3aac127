/**
 * LLM abstraction for the planner: the only code that calls model APIs.
 */

import { z } from 'zod';

import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';

// ── LLMClient interface ──────────────────────────────────────

export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface ProviderOptions {
  apiKey: string;
  model?: string | undefined;
  /** Per-request ceiling; the run builder's planner timeout. */
  timeoutMs: number;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export interface LLMOverrides {
  provider?: LLMProvider | undefined;
  model?: string | undefined;
}

/** Provider and model from env, with config-file or CLI values on top. */
export function loadLLMConfig(overrides: LLMOverrides = {}): LLMConfig {
  const provider = overrides.provider ?? process.env['LLM_PROVIDER'] ?? 'anthropic';

  const apiKey = provider === 'anthropic'
    ? process.env['ANTHROPIC_API_KEY']
    : process.env['OPENAI_API_KEY'];

  const model = provider === 'anthropic'
    ? process.env['WEBQA_MODEL']
    : process.env['LLM_MODEL'];

  return llmConfigSchema.parse({
    provider,
    apiKey,
    model: overrides.model ?? model,
  });
}

// ── Provider factory ─────────────────────────────────────────

const KEY_VARIABLES = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
} as const;

/** Resolve provider settings and build the planner's client. */
export function createLLMClient(overrides: LLMOverrides, timeoutMs: number): LLMClient {
  const config = loadLLMConfig(overrides);
  if (config.provider === 'mock') {
    return createMockClient();
  }

  if (config.apiKey === undefined) {
    throw new Error(
      `${KEY_VARIABLES[config.provider]} is required when using the ${config.provider} provider`,
    );
  }

  const options: ProviderOptions = { apiKey: config.apiKey, model: config.model, timeoutMs };
  return config.provider === 'anthropic'
    ? createAnthropicClient(options)
    : createOpenAIClient(options);
}
