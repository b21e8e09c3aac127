import type { Action } from '../schema/action.js';
import type { PlanProposal, PlanningCollaborator, PlanningInput } from './planning.js';

export interface ScriptedPlannerOptions {
  summary?: string | undefined;
}

/**
 * Deterministic planner that replays a fixed list of actions.
 *
 * A proposal that comes back rejected (the feedback log grew) is offered
 * again rather than skipped, so a replay that no longer fits the page
 * ends as incomplete instead of silently dropping steps.
 */
export function createScriptedPlanner(
  actions: readonly Action[],
  options: ScriptedPlannerOptions = {},
): PlanningCollaborator {
  let cursor = 0;
  let seenFeedback = 0;

  return {
    async nextAction(input: PlanningInput): Promise<PlanProposal> {
      if (input.feedback.length > seenFeedback && cursor > 0) {
        cursor--;
      }
      seenFeedback = input.feedback.length;

      const action = actions[cursor];
      if (action === undefined) {
        return {
          done: true,
          summary: options.summary ?? `replayed ${String(actions.length)} actions`,
          unfulfilled: [],
        };
      }
      cursor++;
      return { done: false, action };
    },
  };
}
