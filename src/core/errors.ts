import type { FailureCode, Failure } from '../schema/transcript.js';
import type { LocatorDescriptor } from '../schema/action.js';

// ── Base ──────────────────────────────────────────────────────

export abstract class WebqaError extends Error {
  abstract readonly code: FailureCode;

  toFailure(): Failure {
    return { code: this.code, message: this.message };
  }
}

// ── Lifecycle (fatal) ─────────────────────────────────────────

export class LifecycleViolation extends WebqaError {
  readonly code = 'LifecycleViolation';

  constructor(message: string) {
    super(message);
    this.name = 'LifecycleViolation';
  }
}

// ── Locator policy (recoverable, goes back to the planner) ───

export type LocatorRejectionReason =
  | 'LowerPriorityStrategy'
  | 'NoMatch'
  | 'AmbiguousMatch'
  | 'TargetMismatch'
  | 'ImpreciseTextMatch'
  | 'InvalidSelector';

export class LocatorPolicyViolation extends WebqaError {
  readonly code = 'LocatorPolicyViolation';
  readonly reason: LocatorRejectionReason;
  readonly descriptor: LocatorDescriptor;
  readonly suggestion: LocatorDescriptor | undefined;

  constructor(
    reason: LocatorRejectionReason,
    descriptor: LocatorDescriptor,
    message: string,
    suggestion?: LocatorDescriptor,
  ) {
    super(`${reason}: ${message}`);
    this.name = 'LocatorPolicyViolation';
    this.reason = reason;
    this.descriptor = descriptor;
    this.suggestion = suggestion;
  }
}

// ── Transient action failures (one retry) ────────────────────

export abstract class ActionFailure extends WebqaError {}

export class ElementNotFound extends ActionFailure {
  readonly code = 'ElementNotFound';

  constructor(message: string) {
    super(message);
    this.name = 'ElementNotFound';
  }
}

export class ActionTimeout extends ActionFailure {
  readonly code = 'ActionTimeout';
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = 'ActionTimeout';
    this.timeoutMs = timeoutMs;
  }
}

export class DriverError extends ActionFailure {
  readonly code = 'DriverError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DriverError';
  }
}

export class AssertionFailed extends ActionFailure {
  readonly code = 'AssertionFailed';

  constructor(message: string) {
    super(message);
    this.name = 'AssertionFailed';
  }
}

export function isActionFailure(err: unknown): err is ActionFailure {
  return err instanceof ActionFailure;
}

// ── Planning ──────────────────────────────────────────────────

export class PlanIncomplete extends WebqaError {
  readonly code = 'PlanIncomplete';
  readonly unfulfilled: readonly string[];

  constructor(message: string, unfulfilled: readonly string[] = []) {
    super(message);
    this.name = 'PlanIncomplete';
    this.unfulfilled = unfulfilled;
  }
}

export class PlannerError extends WebqaError {
  readonly code = 'PlannerError';
  readonly exitCode = 3;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlannerError';
  }
}

// ── Cancellation ──────────────────────────────────────────────

export class RunCancelled extends WebqaError {
  readonly code = 'RunCancelled';

  constructor(message = 'Run cancelled') {
    super(message);
    this.name = 'RunCancelled';
  }
}

// ── Helpers ───────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
