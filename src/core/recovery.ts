import type { Action } from '../schema/action.js';
import type {
  AttemptRecord,
  ContextSnapshot,
  DiagnosticRecord,
  Failure,
  Observation,
  StepOutcome,
} from '../schema/transcript.js';
import type { ActionFailure } from './errors.js';
import { RunCancelled, isActionFailure } from './errors.js';
import type { ActionDispatcher } from './dispatcher.js';

// ── Public types ─────────────────────────────────────────────

export interface RecoveryOptions {
  /** Called once, after the first failure and before the diagnostic read. */
  onAwaitingRetry?: ((failure: ActionFailure) => void) | undefined;
  onDiagnostic?: ((diagnostic: DiagnosticRecord) => void) | undefined;
  signal?: AbortSignal | undefined;
}

export interface RecoveryResult {
  outcome: StepOutcome;
  observation: Observation | null;
  attempts: AttemptRecord[];
  diagnostic: DiagnosticRecord | null;
  failure: Failure | null;
}

const DIAGNOSTIC_ACTION: Action = { kind: 'read-markup', description: 'diagnostic markup read' };

// ── Policy ───────────────────────────────────────────────────

/**
 * Dispatch with at most one retry.
 *
 * On a transient failure: one diagnostic markup read (not an attempt,
 * never retried itself), then exactly one more dispatch. Anything that
 * is not an ActionFailure propagates untouched.
 */
export async function executeWithRecovery(
  dispatcher: ActionDispatcher,
  action: Action,
  context: ContextSnapshot,
  options: RecoveryOptions = {},
): Promise<RecoveryResult> {
  const attempts: AttemptRecord[] = [];

  const first = await attempt(dispatcher, action, context, 1);
  attempts.push(first.record);
  if (first.observation !== null) {
    return { outcome: 'success', observation: first.observation, attempts, diagnostic: null, failure: null };
  }

  options.onAwaitingRetry?.(first.error);

  if (options.signal?.aborted) {
    return cancelled(attempts, null);
  }

  const diagnostic = await readDiagnostic(dispatcher, context);
  options.onDiagnostic?.(diagnostic);

  if (options.signal?.aborted) {
    return cancelled(attempts, diagnostic);
  }

  const second = await attempt(dispatcher, action, context, 2);
  attempts.push(second.record);
  if (second.observation !== null) {
    return { outcome: 'retried-success', observation: second.observation, attempts, diagnostic, failure: null };
  }

  return {
    outcome: 'retried-failure',
    observation: null,
    attempts,
    diagnostic,
    failure: second.error.toFailure(),
  };
}

// ── Internals ────────────────────────────────────────────────

type AttemptResult =
  | { observation: Observation; record: AttemptRecord }
  | { observation: null; error: ActionFailure; record: AttemptRecord };

async function attempt(
  dispatcher: ActionDispatcher,
  action: Action,
  context: ContextSnapshot,
  n: number,
): Promise<AttemptResult> {
  const started = Date.now();
  try {
    const observation = await dispatcher.dispatch(action, context);
    return { observation, record: { attempt: n, ok: true, durationMs: Date.now() - started } };
  } catch (err) {
    if (!isActionFailure(err)) throw err;
    return {
      observation: null,
      error: err,
      record: { attempt: n, ok: false, failure: err.toFailure(), durationMs: Date.now() - started },
    };
  }
}

async function readDiagnostic(
  dispatcher: ActionDispatcher,
  context: ContextSnapshot,
): Promise<DiagnosticRecord> {
  try {
    const observation = await dispatcher.dispatch(DIAGNOSTIC_ACTION, context);
    return observation.markup !== undefined
      ? { ok: true, markup: observation.markup }
      : { ok: true };
  } catch (err) {
    if (!isActionFailure(err)) throw err;
    return { ok: false, failure: err.toFailure() };
  }
}

function cancelled(attempts: AttemptRecord[], diagnostic: DiagnosticRecord | null): RecoveryResult {
  return {
    outcome: 'failure',
    observation: null,
    attempts,
    diagnostic,
    failure: new RunCancelled('cancelled while awaiting retry').toFailure(),
  };
}
