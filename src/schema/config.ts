import { z } from 'zod';

import { llmProviderSchema } from '../llm/client.js';

// ── Test entry ──────────────────────────────────────────────

export const testEntrySchema = z.object({
  name: z.string().min(1),
  prompt: z.string().min(1),
  url: z.string().url().optional(),
});

export type TestEntry = z.infer<typeof testEntrySchema>;

// ── Auth block ──────────────────────────────────────────────

export const authConfigSchema = z.object({
  /** `name=value; other=value` pairs seeded after start-session. */
  cookie: z.string().optional(),
});

export type AuthConfig = z.infer<typeof authConfigSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  baseUrl: z.string().url(),
  maxSteps: z.number().int().positive().optional().default(40),
  headless: z.boolean().optional().default(false),
  /** Total run timeout, seconds. */
  timeout: z.number().positive().optional().default(300),
  /** Per-action driver timeout, milliseconds. */
  actionTimeout: z.number().int().positive().optional(),
  provider: llmProviderSchema.optional(),
  model: z.string().min(1).optional(),
  concurrency: z.number().int().positive().max(16).optional().default(1),
  reportPath: z.string().min(1).optional(),
  auth: authConfigSchema.optional(),
  tests: z.array(testEntrySchema).min(1),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
