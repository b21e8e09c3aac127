import type { RunState, Step } from '../schema/transcript.js';
import { LifecycleViolation } from './errors.js';

// ── Public types ─────────────────────────────────────────────

/** The slice of a Run the guard needs to decide. */
export interface LifecycleView {
  readonly state: RunState;
  readonly steps: readonly Step[];
}

export type LifecycleDecision =
  | { ok: true }
  | { ok: false; error: LifecycleViolation };

// ── Guard ─────────────────────────────────────────────────────

/**
 * Enforces exactly one start-session at the beginning of a run and
 * exactly one stop-session at the end. Never touches the driver.
 */
export class SessionLifecycleGuard {
  private started = false;
  private stopped = false;

  canStart(run: LifecycleView): LifecycleDecision {
    if (this.stopped) {
      return deny('start-session after the session was already stopped');
    }
    if (this.started || run.steps.some((s) => s.kind === 'start-session')) {
      return deny('start-session may only occur once per run');
    }
    if (run.state !== 'NotStarted') {
      return deny(`start-session requires state NotStarted (was ${run.state})`);
    }
    return { ok: true };
  }

  canStop(run: LifecycleView): LifecycleDecision {
    if (this.stopped) {
      return deny('stop-session may only occur once per run');
    }
    if (run.state !== 'Active' && run.state !== 'Failed') {
      return deny(`stop-session requires state Active or Failed (was ${run.state})`);
    }
    return { ok: true };
  }

  /** Any action other than start-session needs a started, unstopped session. */
  canAct(run: LifecycleView): LifecycleDecision {
    if (this.stopped) {
      return deny('no action may follow stop-session');
    }
    if (run.state === 'NotStarted') {
      return deny('start-session must be the first action');
    }
    return { ok: true };
  }

  recordStart(): void {
    this.started = true;
  }

  recordStop(): void {
    this.stopped = true;
  }

  get hasStopped(): boolean {
    return this.stopped;
  }
}

function deny(message: string): LifecycleDecision {
  return { ok: false, error: new LifecycleViolation(message) };
}
