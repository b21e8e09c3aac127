import { z } from 'zod';

import {
  failureCodeSchema,
  failureSchema,
  runStateSchema,
  runVerdictSchema,
  stepOutcomeSchema,
} from './transcript.js';
import { actionKindSchema } from './action.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Step output ─────────────────────────────────────────────

export const jsonOutputStepSchema = z.object({
  index: z.number().int().positive(),
  kind: actionKindSchema,
  description: z.string(),
  locator: z.string().nullable(),
  outcome: stepOutcomeSchema,
  attempts: z.number().int().min(1).max(2),
  diagnosticRead: z.boolean(),
  detail: z.string().nullable(),
  context: z.string(),
  failure: failureSchema.nullable(),
  durationMs: z.number().int().nonnegative(),
});

export type JsonOutputStep = z.infer<typeof jsonOutputStepSchema>;

// ── Feedback output ─────────────────────────────────────────

export const jsonOutputFeedbackSchema = z.object({
  afterStep: z.number().int().nonnegative(),
  code: failureCodeSchema,
  message: z.string(),
});

export type JsonOutputFeedback = z.infer<typeof jsonOutputFeedbackSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  verdict: runVerdictSchema,
  state: runStateSchema,
  failure: failureSchema.nullable(),
  explanation: z.string(),
  runId: z.string().min(1),
  request: z.string(),
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  steps: z.array(jsonOutputStepSchema),
  feedback: z.array(jsonOutputFeedbackSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
