import { randomUUID } from 'node:crypto';

import type { Action, ActionKind, Cookie, LocatorAction } from '../schema/action.js';
import { isLocatorAction } from '../schema/action.js';
import type {
  Failure,
  Observation,
  PlanFeedback,
  RunReport,
  RunState,
  RunVerdict,
  Step,
} from '../schema/transcript.js';
import { isSuccessfulOutcome } from '../schema/transcript.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import { describeLocator } from '../browser/selectors.js';
import { withTimeout } from '../utils/timeout.js';
import * as log from '../utils/logger.js';
import type { WebqaError } from './errors.js';
import {
  LifecycleViolation,
  PlanIncomplete,
  PlannerError,
  RunCancelled,
  errorMessage,
  isActionFailure,
} from './errors.js';
import { SessionLifecycleGuard } from './lifecycle.js';
import type { LifecycleDecision } from './lifecycle.js';
import { ContextStack, contextKey } from './contextStack.js';
import { validateLocator } from './locatorPolicy.js';
import type { ActionDispatcher } from './dispatcher.js';
import { executeWithRecovery } from './recovery.js';
import { Transcript } from './transcript.js';
import type { PlanProposal, PlanningCollaborator } from './planning.js';
import { describeAction, payloadOf } from './planning.js';

// ── Public types ─────────────────────────────────────────────

export interface RunConfig {
  request: string;
  maxSteps?: number | undefined;
  maxPlanRevisions?: number | undefined;
  maxPlannerErrors?: number | undefined;
  plannerTimeout?: number | undefined;
  totalTimeout?: number | undefined;
  /** Injected as add-cookie Steps right after start-session. */
  cookies?: readonly Cookie[] | undefined;
  signal?: AbortSignal | undefined;
  onTransition?: ((from: RunState, to: RunState) => void) | undefined;
}

// ── Constants ────────────────────────────────────────────────

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  NotStarted: ['Active', 'AwaitingRetry', 'Failed'],
  Active: ['AwaitingRetry', 'Failed', 'Completed'],
  AwaitingRetry: ['Active', 'Failed'],
  Failed: ['Completed'],
  Completed: [],
};

/** Kinds that leave the document as it was; cached markup stays valid. */
const PRESERVES_DOM: ReadonlySet<ActionKind> = new Set<ActionKind>([
  'exists',
  'does-not-exist',
  'read-url',
  'read-markup',
  'add-cookie',
  'maximize-window',
]);

const STOP_ACTION: Action = { kind: 'stop-session', description: 'release the browser session' };

const SNAPSHOT_ACTION: Action = { kind: 'read-markup', description: 'locator validation snapshot' };

// ── Main entry ───────────────────────────────────────────────

/**
 * Drive one Run: ask the planner for one action at a time, validate it,
 * execute it under the retry policy and append the resulting Step.
 * Always resolves with the full transcript; never throws for run-level
 * failures.
 */
export async function runPlan(
  planner: PlanningCollaborator,
  dispatcher: ActionDispatcher,
  config: RunConfig,
): Promise<RunReport> {
  return new RunBuilder(planner, dispatcher, config).execute();
}

// ── Builder ──────────────────────────────────────────────────

type Admission =
  | { kind: 'accept' }
  | { kind: 'revise'; feedback: PlanFeedback }
  | { kind: 'fatal'; error: WebqaError };

class RunBuilder {
  private readonly runId = randomUUID();
  private readonly transcript = new Transcript();
  private readonly stack = new ContextStack();
  private readonly guard = new SessionLifecycleGuard();
  private readonly feedback: PlanFeedback[] = [];
  private readonly markupCache = new Map<string, string>();
  private readonly pendingCookies: Cookie[];

  private state: RunState = 'NotStarted';
  private failure: Failure | null = null;
  private plannerSummary: string | null = null;

  private readonly maxSteps: number;
  private readonly maxRevisions: number;
  private readonly maxPlannerErrors: number;
  private readonly plannerTimeout: number;
  private readonly totalTimeout: number;

  constructor(
    private readonly planner: PlanningCollaborator,
    private readonly dispatcher: ActionDispatcher,
    private readonly config: RunConfig,
  ) {
    this.maxSteps = config.maxSteps ?? LIMITS.MAX_STEPS;
    this.maxRevisions = config.maxPlanRevisions ?? LIMITS.MAX_PLAN_REVISIONS;
    this.maxPlannerErrors = config.maxPlannerErrors ?? LIMITS.MAX_PLANNER_ERRORS;
    this.plannerTimeout = config.plannerTimeout ?? TIMEOUTS.PLANNER_TIMEOUT;
    this.totalTimeout = config.totalTimeout ?? TIMEOUTS.TOTAL_RUN_TIMEOUT;
    this.pendingCookies = [...(config.cookies ?? [])];
  }

  async execute(): Promise<RunReport> {
    const startedAt = new Date();
    log.section(`Run ${this.runId}`);
    log.info(`Request: ${this.config.request}`);

    await this.loop(startedAt.getTime());
    await this.finalize();

    const finishedAt = new Date();
    const report: RunReport = {
      runId: this.runId,
      request: this.config.request,
      state: this.state,
      verdict: this.verdict(),
      failure: this.failure,
      explanation: this.explain(),
      plannerSummary: this.plannerSummary,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      steps: [...this.transcript.steps()],
      feedback: [...this.feedback],
      context: this.stack.snapshot(),
    };

    log.info(`Verdict: ${report.verdict} (${report.explanation})`);
    return report;
  }

  // ── Control loop ───────────────────────────────────────────

  private async loop(startedMs: number): Promise<void> {
    let revisions = 0;
    let plannerErrors = 0;

    for (;;) {
      if (this.config.signal?.aborted) {
        this.fail(new RunCancelled().toFailure());
        return;
      }
      if (Date.now() - startedMs > this.totalTimeout) {
        this.incomplete(`run exceeded its ${String(this.totalTimeout)}ms time limit`);
        return;
      }
      if (this.transcript.length >= this.maxSteps) {
        this.incomplete(`step budget of ${String(this.maxSteps)} exhausted`);
        return;
      }

      // Seed cookies go in before the planner gets another turn.
      const cookie = this.state === 'Active' ? this.pendingCookies.shift() : undefined;
      if (cookie !== undefined) {
        const step = await this.executeStep({
          kind: 'add-cookie',
          description: `seed cookie ${cookie.name}`,
          cookie,
        });
        if (!isSuccessfulOutcome(step.outcome)) return;
        continue;
      }

      let proposal: PlanProposal;
      try {
        proposal = await this.propose();
        plannerErrors = 0;
      } catch (err) {
        const error = err instanceof PlannerError
          ? err
          : new PlannerError(errorMessage(err), { cause: err });
        plannerErrors++;
        this.addFeedback(error.toFailure());
        log.warn(`Planner error ${String(plannerErrors)}/${String(this.maxPlannerErrors)}: ${error.message}`);
        if (plannerErrors >= this.maxPlannerErrors) {
          this.fail(error.toFailure());
          return;
        }
        continue;
      }

      if (proposal.done) {
        if (proposal.unfulfilled.length === 0) {
          this.plannerSummary = proposal.summary;
          if (this.state === 'NotStarted') {
            this.incomplete('planner finished without starting a session');
          }
          return;
        }
        const pending = new PlanIncomplete(
          `request items not yet covered: ${proposal.unfulfilled.join('; ')}`,
          proposal.unfulfilled,
        );
        revisions++;
        this.addFeedback(pending.toFailure());
        log.rejected(`Plan incomplete (${String(revisions)}/${String(this.maxRevisions)}): ${pending.message}`);
        if (revisions >= this.maxRevisions) {
          this.plannerSummary = proposal.summary;
          this.incomplete(pending.message);
          return;
        }
        continue;
      }

      const action = proposal.action;
      const admission = await this.admit(action);
      if (admission.kind === 'fatal') {
        log.error(admission.error.message);
        this.addFeedback(admission.error.toFailure(), describeAction(action));
        this.fail(admission.error.toFailure());
        return;
      }
      if (admission.kind === 'revise') {
        revisions++;
        this.feedback.push(admission.feedback);
        log.rejected(`Rejected (${String(revisions)}/${String(this.maxRevisions)}): ${admission.feedback.message}`);
        if (revisions >= this.maxRevisions) {
          this.incomplete(`${String(revisions)} consecutive proposals needed revision: ${admission.feedback.message}`);
          return;
        }
        continue;
      }
      revisions = 0;

      const step = await this.executeStep(action);
      if (!isSuccessfulOutcome(step.outcome)) return;
      if (action.kind === 'stop-session') return;
    }
  }

  private async propose(): Promise<PlanProposal> {
    const markup = await this.currentMarkup();
    return withTimeout(
      this.planner.nextAction({
        request: this.config.request,
        state: this.state,
        steps: this.transcript.steps(),
        feedback: [...this.feedback],
        context: this.stack.snapshot(),
        markup,
        remainingSteps: this.maxSteps - this.transcript.length,
      }),
      this.plannerTimeout,
      () => new PlannerError(`planner did not answer within ${String(this.plannerTimeout)}ms`),
    );
  }

  // ── Admission ──────────────────────────────────────────────

  private async admit(action: Action): Promise<Admission> {
    const decision = this.lifecycleDecision(action);
    if (!decision.ok) return { kind: 'fatal', error: decision.error };

    if (action.kind === 'close-window') {
      const handle = action.windowHandle ?? this.stack.windowHandle;
      if (handle !== null) {
        try {
          this.stack.assertClosable(handle);
        } catch (err) {
          if (err instanceof LifecycleViolation) return { kind: 'fatal', error: err };
          throw err;
        }
      }
    }

    if (isLocatorAction(action)) {
      return this.checkLocator(action);
    }
    return { kind: 'accept' };
  }

  private lifecycleDecision(action: Action): LifecycleDecision {
    const view = { state: this.state, steps: this.transcript.steps() };
    switch (action.kind) {
      case 'start-session':
        return this.guard.canStart(view);
      case 'stop-session':
        return this.guard.canStop(view);
      default:
        return this.guard.canAct(view);
    }
  }

  private async checkLocator(action: LocatorAction): Promise<Admission> {
    const snapshot = await this.captureSnapshot();
    if ('failure' in snapshot) {
      return {
        kind: 'revise',
        feedback: this.feedbackEntry(
          snapshot.failure.code,
          `could not capture markup to validate ${describeLocator(action.descriptor)}: ${snapshot.failure.message}`,
          describeAction(action),
        ),
      };
    }

    const assertion = action.kind === 'exists' || action.kind === 'does-not-exist';
    const result = validateLocator(action.descriptor, snapshot.markup, {
      target: action.target,
      requireMatch: !assertion,
    });
    if (result.accepted) return { kind: 'accept' };

    const hint = result.suggestion !== undefined
      ? ` (use ${describeLocator(result.suggestion)})`
      : '';
    return {
      kind: 'revise',
      feedback: this.feedbackEntry(
        'LocatorPolicyViolation',
        `${result.reason}: ${result.message}${hint}`,
        describeAction(action),
      ),
    };
  }

  // ── Step execution ─────────────────────────────────────────

  private async executeStep(action: Action): Promise<Readonly<Step>> {
    const index = this.transcript.nextIndex;
    const context = this.stack.snapshot();
    const description = describeAction(action);
    const started = new Date();
    log.step(index, description);

    const result = await executeWithRecovery(this.dispatcher, action, context, {
      signal: this.config.signal,
      onAwaitingRetry: (failure) => {
        if (this.state === 'Active' || this.state === 'NotStarted') {
          this.transition('AwaitingRetry');
        }
        log.retry(index, failure.message);
      },
      onDiagnostic: (diagnostic) => {
        log.diagnostic(index, diagnostic.ok, diagnostic.markup?.length ?? 0);
      },
    });

    const step = this.transcript.append({
      index,
      kind: action.kind,
      description,
      descriptor: isLocatorAction(action) ? action.descriptor : null,
      payload: payloadOf(action),
      outcome: result.outcome,
      observation: result.observation,
      context,
      attempts: result.attempts,
      diagnostic: result.diagnostic,
      failure: result.failure,
      startedAt: started.toISOString(),
      durationMs: Date.now() - started.getTime(),
    });

    if (action.kind === 'stop-session') this.guard.recordStop();

    if (result.observation !== null) {
      log.stepResult(index, true, result.observation.detail);
      this.applySuccess(action, result.observation);
    } else {
      log.stepResult(index, false, result.failure?.message ?? 'failed');
      this.markupCache.clear();
      this.fail(result.failure ?? { code: 'DriverError', message: `${action.kind} failed` });
    }
    return step;
  }

  private applySuccess(action: Action, observation: Observation): void {
    switch (action.kind) {
      case 'start-session':
        this.guard.recordStart();
        this.stack.setActiveWindow(observation.windowHandle ?? 'window-0');
        break;
      case 'switch-window':
        if (observation.windowHandle !== undefined) {
          this.stack.setActiveWindow(observation.windowHandle);
        }
        break;
      case 'navigate':
        // a new document has no frames
        this.stack.popToRoot();
        break;
      case 'switch-frame-by-id':
        this.stack.pushFrame({ by: 'id', frameId: action.frameId });
        break;
      case 'switch-frame-by-locator':
        this.stack.pushFrame({ by: 'locator', descriptor: action.descriptor });
        break;
      case 'switch-frame-to-original':
        this.stack.popToRoot();
        break;
      case 'close-window':
        this.stack.closeWindow(observation.windowHandle ?? action.windowHandle ?? '');
        break;
      default:
        break;
    }

    if (!PRESERVES_DOM.has(action.kind)) this.markupCache.clear();
    if (observation.markup !== undefined) {
      this.markupCache.set(contextKey(this.stack.snapshot()), observation.markup);
    }

    if (this.state === 'NotStarted' || this.state === 'AwaitingRetry') {
      this.transition('Active');
    }
    if (action.kind === 'stop-session') this.transition('Completed');
  }

  // ── Snapshots ──────────────────────────────────────────────

  private async captureSnapshot(): Promise<{ markup: string } | { failure: Failure }> {
    const context = this.stack.snapshot();
    const key = contextKey(context);
    const cached = this.markupCache.get(key);
    if (cached !== undefined) return { markup: cached };

    try {
      const observation = await this.dispatcher.dispatch(SNAPSHOT_ACTION, context);
      const markup = observation.markup ?? '';
      this.markupCache.set(key, markup);
      return { markup };
    } catch (err) {
      if (!isActionFailure(err)) throw err;
      return { failure: err.toFailure() };
    }
  }

  /** Markup for the planner; only read while a session is open. */
  private async currentMarkup(): Promise<string | undefined> {
    if (this.state !== 'Active' || this.guard.hasStopped) return undefined;
    const snapshot = await this.captureSnapshot();
    if ('failure' in snapshot) {
      log.warn(`Could not read markup for the planner: ${snapshot.failure.message}`);
      return undefined;
    }
    return snapshot.markup;
  }

  // ── Termination ────────────────────────────────────────────

  /** Attempt the terminating stop-session unless one already ran. */
  private async finalize(): Promise<void> {
    if (this.guard.hasStopped) return;
    if (this.state === 'NotStarted') this.transition('Failed');

    const decision = this.guard.canStop({ state: this.state, steps: this.transcript.steps() });
    if (!decision.ok) {
      log.warn(`Skipping stop-session: ${decision.error.message}`);
      return;
    }
    await this.executeStep(STOP_ACTION);
  }

  private fail(failure: Failure): void {
    this.failure ??= failure;
    if (this.state !== 'Failed' && this.state !== 'Completed') {
      this.transition('Failed');
    }
  }

  private incomplete(message: string): void {
    log.warn(`Run incomplete: ${message}`);
    this.failure ??= { code: 'PlanIncomplete', message };
  }

  private transition(to: RunState): void {
    const from = this.state;
    if (from === to) return;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`illegal run state transition ${from} -> ${to}`);
    }
    this.state = to;
    this.config.onTransition?.(from, to);
  }

  // ── Feedback ───────────────────────────────────────────────

  private addFeedback(failure: Failure, proposal?: string): void {
    this.feedback.push(this.feedbackEntry(failure.code, failure.message, proposal));
  }

  private feedbackEntry(code: Failure['code'], message: string, proposal?: string): PlanFeedback {
    const entry: PlanFeedback = { afterStep: this.transcript.length, code, message };
    if (proposal !== undefined) entry.proposal = proposal;
    return entry;
  }

  // ── Verdict ────────────────────────────────────────────────

  private verdict(): RunVerdict {
    if (this.failure === null) return 'COMPLETED';
    return this.failure.code === 'PlanIncomplete' ? 'INCOMPLETE' : 'FAILED';
  }

  private explain(): string {
    const steps = this.transcript.steps();
    const stop = steps.find((s) => s.kind === 'stop-session');
    const stopNote = stop === undefined
      ? 'no stop-session was executed'
      : isSuccessfulOutcome(stop.outcome)
        ? 'the session was stopped'
        : 'stop-session also failed';

    if (this.failure === null) {
      return `All ${String(steps.length)} steps succeeded; ${stopNote}.`;
    }
    if (this.failure.code === 'PlanIncomplete') {
      return `Run incomplete after ${String(steps.length)} steps: ${this.failure.message}; ${stopNote}.`;
    }
    const failed = steps.find((s) => !isSuccessfulOutcome(s.outcome));
    const where = failed !== undefined
      ? `at step ${String(failed.index)} (${failed.kind})`
      : `after ${String(steps.length)} steps`;
    return `Run failed ${where} with ${this.failure.code}: ${this.failure.message}; ${stopNote}.`;
  }
}
