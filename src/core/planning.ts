import { z } from 'zod';

import type { Action } from '../schema/action.js';
import { actionSchema, isLocatorAction } from '../schema/action.js';
import type {
  ContextSnapshot,
  PlanFeedback,
  RunState,
  Step,
} from '../schema/transcript.js';
import { describeLocator } from '../browser/selectors.js';

// ── Planner proposals ─────────────────────────────────────────

export const planProposalSchema = z.union([
  z.object({
    done: z.literal(false),
    action: actionSchema,
  }),
  z.object({
    done: z.literal(true),
    summary: z.string().min(1),
    unfulfilled: z.array(z.string()).default([]),
  }),
]);

export type PlanProposal = z.infer<typeof planProposalSchema>;

// ── Collaborator contract ─────────────────────────────────────

/** Everything a planner sees before proposing the next action. */
export interface PlanningInput {
  request: string;
  state: RunState;
  steps: readonly Step[];
  feedback: readonly PlanFeedback[];
  context: ContextSnapshot;
  /** Latest known markup of the active context, if any. */
  markup: string | undefined;
  remainingSteps: number;
}

export interface PlanningCollaborator {
  nextAction(input: PlanningInput): Promise<PlanProposal>;
}

// ── Description ───────────────────────────────────────────────

export function describeAction(action: Action): string {
  if (action.description !== undefined) return action.description;

  switch (action.kind) {
    case 'navigate':
      return `navigate to ${action.url}`;
    case 'switch-window':
      return action.windowHandle !== undefined
        ? `switch to window ${action.windowHandle}`
        : `switch to window #${String(action.index ?? 0)}`;
    case 'switch-frame-by-id':
      return `enter frame ${String(action.frameId)}`;
    case 'send-keys':
      return `type "${action.text}" into ${describeLocator(action.descriptor)}`;
    case 'add-cookie':
      return `add cookie ${action.cookie.name}`;
    case 'close-window':
      return action.windowHandle !== undefined ? `close window ${action.windowHandle}` : 'close window';
    case 'switch-frame-by-locator':
    case 'click':
    case 'double-click':
    case 'right-click':
    case 'scroll-to':
    case 'exists':
    case 'does-not-exist':
      return `${action.kind} ${describeLocator(action.descriptor)}`;
    case 'start-session':
    case 'stop-session':
    case 'switch-frame-to-original':
    case 'read-markup':
    case 'maximize-window':
    case 'read-url':
      return action.kind;
  }
}

/**
 * Input fields of an action other than its kind, descriptor and description.
 * A locator's target hint is kept so replays validate against it again.
 */
export function payloadOf(action: Action): Record<string, unknown> | null {
  const fields = inputFieldsOf(action);
  if (!isLocatorAction(action) || action.target === undefined) return fields;
  return { ...fields, target: action.target };
}

function inputFieldsOf(action: Action): Record<string, unknown> | null {
  switch (action.kind) {
    case 'navigate':
      return { url: action.url };
    case 'switch-window':
      return action.windowHandle !== undefined
        ? { windowHandle: action.windowHandle }
        : { index: action.index ?? 0 };
    case 'switch-frame-by-id':
      return { frameId: action.frameId };
    case 'send-keys':
      return { text: action.text };
    case 'add-cookie': {
      // cookie values stay out of transcripts
      const { value: _value, ...rest } = action.cookie;
      return { cookie: rest };
    }
    case 'close-window':
      return action.windowHandle !== undefined ? { windowHandle: action.windowHandle } : null;
    default:
      return null;
  }
}
