import type { LLMClient } from './client.js';

const DEFAULT_RESPONSE = '{"done":true,"summary":"mock planner has nothing to do","unfulfilled":[]}';

/**
 * Mock LLM provider for testing.
 * Cycles through provided canned responses, falling back to a default.
 * Every call is recorded so tests can inspect the rendered prompts.
 */
export interface MockLLMClient extends LLMClient {
  readonly calls: ReadonlyArray<{ systemPrompt: string; userPrompt: string }>;
}

export function createMockClient(
  responses?: readonly string[],
): MockLLMClient {
  const calls: Array<{ systemPrompt: string; userPrompt: string }> = [];

  return {
    calls,
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const response = responses?.[calls.length] ?? DEFAULT_RESPONSE;
      calls.push({ systemPrompt, userPrompt });
      return response;
    },
  };
}
