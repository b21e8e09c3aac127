import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';

import type { Action, RunReport, Step } from '../schema/index.js';
import { actionSchema, isSuccessfulOutcome, planSchema } from '../schema/index.js';

// ── Recorded plan ────────────────────────────────────────────

export const recordedPlanSchema = z.object({
  request: z.string().min(1),
  actions: planSchema,
});

export type RecordedPlan = z.infer<typeof recordedPlanSchema>;

/**
 * Rebuild the replayable action list from a run's successful Steps.
 * Cookie steps are left out: their values never enter the transcript,
 * so replays seed cookies from config instead.
 */
export function recordPlan(run: RunReport): RecordedPlan {
  const actions = run.steps
    .filter((s) => isSuccessfulOutcome(s.outcome) && s.kind !== 'add-cookie')
    .map(stepToAction);
  return { request: run.request, actions };
}

function stepToAction(step: Step): Action {
  return actionSchema.parse({
    kind: step.kind,
    description: step.description,
    ...(step.descriptor !== null ? { descriptor: step.descriptor } : {}),
    ...(step.payload ?? {}),
  });
}

export function generatePlanYAML(run: RunReport): string {
  return stringifyYaml(recordPlan(run));
}

export function parsePlanYAML(raw: string): RecordedPlan {
  const parsed: unknown = parseYaml(raw);
  return recordedPlanSchema.parse(parsed);
}
