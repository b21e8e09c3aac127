import { z } from 'zod';

import { actionKindSchema, locatorDescriptorSchema } from './action.js';

// ── Context ───────────────────────────────────────────────────

export const frameRefSchema = z.discriminatedUnion('by', [
  z.object({
    by: z.literal('id'),
    frameId: z.union([z.string().min(1), z.number().int().nonnegative()]),
  }),
  z.object({
    by: z.literal('locator'),
    descriptor: locatorDescriptorSchema,
  }),
]);

export type FrameRef = z.infer<typeof frameRefSchema>;

export const contextSnapshotSchema = z.object({
  windowHandle: z.string().nullable(),
  frames: z.array(frameRefSchema),
});

export type ContextSnapshot = z.infer<typeof contextSnapshotSchema>;

// ── Observation ───────────────────────────────────────────────

export const observationSchema = z.object({
  detail: z.string(),
  markup: z.string().optional(),
  value: z.boolean().optional(),
  url: z.string().optional(),
  windowHandle: z.string().optional(),
});

export type Observation = z.infer<typeof observationSchema>;

// ── Failure ───────────────────────────────────────────────────

export const failureCodeSchema = z.enum([
  'LifecycleViolation',
  'LocatorPolicyViolation',
  'ElementNotFound',
  'ActionTimeout',
  'DriverError',
  'AssertionFailed',
  'PlanIncomplete',
  'PlannerError',
  'RunCancelled',
]);

export type FailureCode = z.infer<typeof failureCodeSchema>;

export const failureSchema = z.object({
  code: failureCodeSchema,
  message: z.string(),
});

export type Failure = z.infer<typeof failureSchema>;

// ── Step ──────────────────────────────────────────────────────

export const stepOutcomeSchema = z.enum([
  'success',
  'failure',
  'retried-success',
  'retried-failure',
]);

export type StepOutcome = z.infer<typeof stepOutcomeSchema>;

export const attemptRecordSchema = z.object({
  attempt: z.number().int().positive(),
  ok: z.boolean(),
  failure: failureSchema.optional(),
  durationMs: z.number().int().nonnegative(),
});

export type AttemptRecord = z.infer<typeof attemptRecordSchema>;

export const diagnosticRecordSchema = z.object({
  ok: z.boolean(),
  markup: z.string().optional(),
  failure: failureSchema.optional(),
});

export type DiagnosticRecord = z.infer<typeof diagnosticRecordSchema>;

export const stepSchema = z.object({
  index: z.number().int().positive(),
  kind: actionKindSchema,
  description: z.string(),
  descriptor: locatorDescriptorSchema.nullable(),
  payload: z.record(z.unknown()).nullable(),
  outcome: stepOutcomeSchema,
  observation: observationSchema.nullable(),
  context: contextSnapshotSchema,
  attempts: z.array(attemptRecordSchema).min(1).max(2),
  diagnostic: diagnosticRecordSchema.nullable(),
  failure: failureSchema.nullable(),
  startedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
});

export type Step = z.infer<typeof stepSchema>;

export function isSuccessfulOutcome(outcome: StepOutcome): boolean {
  return outcome === 'success' || outcome === 'retried-success';
}

// ── Planner feedback ──────────────────────────────────────────
// Rejected proposals never become Steps; they are kept here and
// shown to the planner so it can revise.

export const planFeedbackSchema = z.object({
  afterStep: z.number().int().nonnegative(),
  code: failureCodeSchema,
  message: z.string(),
  proposal: z.string().optional(),
});

export type PlanFeedback = z.infer<typeof planFeedbackSchema>;

// ── Run ───────────────────────────────────────────────────────

export const runStateSchema = z.enum([
  'NotStarted',
  'Active',
  'AwaitingRetry',
  'Failed',
  'Completed',
]);

export type RunState = z.infer<typeof runStateSchema>;

export const runVerdictSchema = z.enum(['COMPLETED', 'FAILED', 'INCOMPLETE']);

export type RunVerdict = z.infer<typeof runVerdictSchema>;

export const runReportSchema = z.object({
  runId: z.string().min(1),
  request: z.string().min(1),
  state: runStateSchema,
  verdict: runVerdictSchema,
  failure: failureSchema.nullable(),
  explanation: z.string(),
  plannerSummary: z.string().nullable(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  steps: z.array(stepSchema),
  feedback: z.array(planFeedbackSchema),
  context: contextSnapshotSchema,
});

export type RunReport = z.infer<typeof runReportSchema>;

export function exitCodeForVerdict(verdict: RunVerdict): number {
  switch (verdict) {
    case 'COMPLETED':
      return 0;
    case 'FAILED':
      return 1;
    case 'INCOMPLETE':
      return 2;
  }
}
