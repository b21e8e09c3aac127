import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { runPlan } from '../../src/core/runBuilder.js';
import type { RunConfig } from '../../src/core/runBuilder.js';
import { createDispatcher } from '../../src/core/dispatcher.js';
import { ElementNotFound } from '../../src/core/errors.js';
import type { PlanProposal, PlanningCollaborator } from '../../src/core/planning.js';
import type { RunState } from '../../src/schema/transcript.js';
import { setMuted } from '../../src/utils/logger.js';
import { FakeDriver } from '../helpers/fakeDriver.js';
import { START, STOP, act, navigate, sequencePlanner } from '../helpers/planners.js';

const SHOP_URL = 'https://shop.test/';
const BLANK = '<html><head></head><body></body></html>';

function run(planner: PlanningCollaborator, driver: FakeDriver, config: Partial<RunConfig> = {}) {
  return runPlan(planner, createDispatcher(driver), { request: 'check the shop', ...config });
}

function recordTransitions(): { seen: string[]; onTransition: (from: RunState, to: RunState) => void } {
  const seen: string[] = [];
  return { seen, onTransition: (from, to) => seen.push(`${from}->${to}`) };
}

beforeAll(() => setMuted(true));
afterAll(() => setMuted(false));

describe('runPlan', () => {
  describe('happy path', () => {
    const page = '<h1 id="title">Shop</h1><button id="buy">Buy</button>';

    it('executes every proposal and completes', async () => {
      const driver = new FakeDriver({ [SHOP_URL]: page });
      const planner = sequencePlanner([
        START,
        navigate(SHOP_URL),
        act({ kind: 'click', descriptor: { strategy: 'id', value: 'buy' } }),
        act({ kind: 'exists', descriptor: { strategy: 'id', value: 'title' } }),
        STOP,
      ]);

      const report = await run(planner, driver);

      expect(report.verdict).toBe('COMPLETED');
      expect(report.state).toBe('Completed');
      expect(report.failure).toBeNull();
      expect(report.explanation).toBe('All 5 steps succeeded; the session was stopped.');
      expect(report.steps.map((s) => s.kind)).toEqual([
        'start-session', 'navigate', 'click', 'exists', 'stop-session',
      ]);
      expect(report.steps.map((s) => s.index)).toEqual([1, 2, 3, 4, 5]);
      expect(report.steps.every((s) => s.outcome === 'success')).toBe(true);
      expect(driver.ops()).toEqual([
        'startSession', 'readMarkup', 'navigate', 'click', 'exists', 'stopSession',
      ]);
    });

    it('shows the planner the current markup once a session is open', async () => {
      const driver = new FakeDriver({ [SHOP_URL]: page });
      const planner = sequencePlanner([START, navigate(SHOP_URL), STOP]);

      await run(planner, driver);

      expect(planner.inputs[0]?.markup).toBeUndefined();
      expect(planner.inputs[0]?.state).toBe('NotStarted');
      expect(planner.inputs[0]?.remainingSteps).toBe(40);
      expect(planner.inputs[1]?.markup).toBe(BLANK);
      expect(planner.inputs[2]?.markup).toBe(page);
      expect(planner.inputs[2]?.steps).toHaveLength(2);
    });
  });

  it('sends a rejected locator back to the planner without dispatching it', async () => {
    const driver = new FakeDriver({ [SHOP_URL]: '<form><button id="submit" class="btn primary">Send</button></form>' });
    const planner = sequencePlanner([
      START,
      navigate(SHOP_URL),
      act({ kind: 'click', descriptor: { strategy: 'css', value: 'button.btn' }, target: 'Send' }),
      act({ kind: 'click', descriptor: { strategy: 'id', value: 'submit' }, target: 'Send' }),
    ]);

    const report = await run(planner, driver);

    expect(report.feedback).toEqual([
      {
        afterStep: 2,
        code: 'LocatorPolicyViolation',
        message: 'LowerPriorityStrategy: css=button.btn used where id=submit identifies the element (use id=submit)',
        proposal: 'click css=button.btn',
      },
    ]);
    expect(planner.inputs[3]?.feedback).toHaveLength(1);
    expect(driver.ops()).toEqual(['startSession', 'readMarkup', 'navigate', 'click', 'stopSession']);
    expect(driver.calls[3]?.args[0]).toEqual({ strategy: 'id', value: 'submit' });

    expect(report.steps.map((s) => s.kind)).toEqual(['start-session', 'navigate', 'click', 'stop-session']);
    expect(report.steps[2]?.payload).toEqual({ target: 'Send' });
    expect(report.steps[3]?.description).toBe('release the browser session');
    expect(report.plannerSummary).toBe('all requested checks done');
    expect(report.verdict).toBe('COMPLETED');
  });

  describe('retry policy', () => {
    const page = '<label>Name <input id="name-input" name="name"></label>';
    const typeName = act({
      kind: 'send-keys',
      descriptor: { strategy: 'id', value: 'name-input' },
      text: 'Ada',
    });

    it('retries a transient failure once and moves through AwaitingRetry', async () => {
      const driver = new FakeDriver({ [SHOP_URL]: page }).failNext('sendKeys', new ElementNotFound('input not ready'));
      const { seen, onTransition } = recordTransitions();

      const report = await run(sequencePlanner([START, navigate(SHOP_URL), typeName]), driver, { onTransition });

      const step = report.steps[2];
      expect(step?.outcome).toBe('retried-success');
      expect(step?.description).toBe('type "Ada" into id=name-input');
      expect(step?.payload).toEqual({ text: 'Ada' });
      expect(step?.attempts.map((a) => a.ok)).toEqual([false, true]);
      expect(step?.attempts[0]?.failure).toEqual({ code: 'ElementNotFound', message: 'input not ready' });
      expect(step?.diagnostic).toEqual({ ok: true, markup: page });

      expect(seen).toEqual([
        'NotStarted->Active',
        'Active->AwaitingRetry',
        'AwaitingRetry->Active',
        'Active->Completed',
      ]);
      expect(driver.ops()).toEqual([
        'startSession', 'readMarkup', 'navigate',
        'sendKeys', 'readMarkup', 'sendKeys',
        'readMarkup', 'stopSession',
      ]);
      expect(report.verdict).toBe('COMPLETED');
    });

    it('fails the run after a second failure and still stops the session', async () => {
      const driver = new FakeDriver({ [SHOP_URL]: page }).failNext(
        'sendKeys',
        new ElementNotFound('input not ready'),
        new ElementNotFound('input still missing'),
      );
      const { seen, onTransition } = recordTransitions();
      const planner = sequencePlanner([START, navigate(SHOP_URL), typeName]);

      const report = await run(planner, driver, { onTransition });

      expect(report.steps.map((s) => s.kind)).toEqual(['start-session', 'navigate', 'send-keys', 'stop-session']);
      const step = report.steps[2];
      expect(step?.outcome).toBe('retried-failure');
      expect(step?.attempts).toHaveLength(2);
      expect(step?.diagnostic?.ok).toBe(true);
      expect(report.steps[3]?.outcome).toBe('success');

      expect(report.verdict).toBe('FAILED');
      expect(report.state).toBe('Completed');
      expect(report.failure).toEqual({ code: 'ElementNotFound', message: 'input still missing' });
      expect(report.explanation).toBe(
        'Run failed at step 3 (send-keys) with ElementNotFound: input still missing; the session was stopped.',
      );
      expect(seen).toEqual([
        'NotStarted->Active',
        'Active->AwaitingRetry',
        'AwaitingRetry->Failed',
        'Failed->Completed',
      ]);
      expect(planner.inputs).toHaveLength(3);
      expect(driver.ops().filter((op) => op === 'sendKeys')).toHaveLength(2);
    });

    it('gives up on the retry when cancelled while awaiting it', async () => {
      const controller = new AbortController();
      const driver = new FakeDriver({ [SHOP_URL]: page }).failNext('sendKeys', new ElementNotFound('input not ready'));

      const report = await run(sequencePlanner([START, navigate(SHOP_URL), typeName]), driver, {
        signal: controller.signal,
        onTransition: (_from, to) => {
          if (to === 'AwaitingRetry') controller.abort();
        },
      });

      const step = report.steps[2];
      expect(step?.outcome).toBe('failure');
      expect(step?.attempts).toHaveLength(1);
      expect(step?.diagnostic).toBeNull();
      expect(report.failure).toEqual({ code: 'RunCancelled', message: 'cancelled while awaiting retry' });
      expect(report.verdict).toBe('FAILED');
      expect(report.steps[3]?.kind).toBe('stop-session');
    });
  });

  describe('lifecycle', () => {
    it('rejects an action before start-session as fatal', async () => {
      const driver = new FakeDriver();
      const planner = sequencePlanner([act({ kind: 'click', descriptor: { strategy: 'id', value: 'buy' } })]);

      const report = await run(planner, driver);

      expect(report.failure).toEqual({
        code: 'LifecycleViolation',
        message: 'start-session must be the first action',
      });
      expect(report.feedback[0]?.proposal).toBe('click id=buy');
      expect(report.steps.map((s) => s.kind)).toEqual(['stop-session']);
      expect(report.verdict).toBe('FAILED');
      expect(driver.ops()).toEqual(['stopSession']);
    });

    it('rejects a second start-session', async () => {
      const driver = new FakeDriver();
      const report = await run(sequencePlanner([START, START]), driver);

      expect(report.failure?.message).toBe('start-session may only occur once per run');
      expect(report.steps.map((s) => s.kind)).toEqual(['start-session', 'stop-session']);
      expect(driver.ops().filter((op) => op === 'startSession')).toHaveLength(1);
    });

    it('rejects closing a window while inside a frame', async () => {
      const driver = new FakeDriver({ [SHOP_URL]: '<iframe id="payment"></iframe>' }, { payment: '<input id="card">' });
      const planner = sequencePlanner([
        START,
        navigate(SHOP_URL),
        act({ kind: 'switch-frame-by-id', frameId: 'payment' }),
        act({ kind: 'close-window' }),
      ]);

      const report = await run(planner, driver);

      expect(report.failure).toEqual({
        code: 'LifecycleViolation',
        message: 'window window-0 closed with 1 frame(s) still pushed',
      });
      expect(report.steps.map((s) => s.kind)).toEqual([
        'start-session', 'navigate', 'switch-frame-by-id', 'stop-session',
      ]);
      expect(driver.ops()).not.toContain('closeWindow');
    });

    it('stops the session when the planner finishes without doing so', async () => {
      const driver = new FakeDriver();
      const report = await run(sequencePlanner([START]), driver);

      expect(report.steps.map((s) => s.kind)).toEqual(['start-session', 'stop-session']);
      expect(report.verdict).toBe('COMPLETED');
    });
  });

  it('scopes actions to the frame chain and returns to the root', async () => {
    const driver = new FakeDriver(
      { [SHOP_URL]: '<iframe id="payment"></iframe><button id="confirm">Pay</button>' },
      { payment: '<input id="card" name="card">' },
    );
    const planner = sequencePlanner([
      START,
      navigate(SHOP_URL),
      act({ kind: 'switch-frame-by-id', frameId: 'payment' }),
      act({ kind: 'send-keys', descriptor: { strategy: 'id', value: 'card' }, text: '4242' }),
      act({ kind: 'switch-frame-to-original' }),
      act({ kind: 'click', descriptor: { strategy: 'id', value: 'confirm' } }),
    ]);

    const report = await run(planner, driver);

    expect(report.verdict).toBe('COMPLETED');
    expect(report.steps).toHaveLength(7);
    expect(planner.inputs[3]?.context.frames).toEqual([{ by: 'id', frameId: 'payment' }]);
    expect(planner.inputs[3]?.markup).toBe('<input id="card" name="card">');
    expect(report.steps[3]?.context).toEqual({
      windowHandle: 'window-0',
      frames: [{ by: 'id', frameId: 'payment' }],
    });
    expect(report.steps[5]?.context).toEqual({ windowHandle: 'window-0', frames: [] });
    expect(report.context).toEqual({ windowHandle: 'window-0', frames: [] });
  });

  it('accepts an absence assertion whose locator matches nothing', async () => {
    const driver = new FakeDriver({ [SHOP_URL]: '<main id="content"></main>' });
    const planner = sequencePlanner([
      START,
      navigate(SHOP_URL),
      act({ kind: 'does-not-exist', descriptor: { strategy: 'id', value: 'error-banner' } }),
    ]);

    const report = await run(planner, driver);

    expect(report.steps[2]?.kind).toBe('does-not-exist');
    expect(report.steps[2]?.outcome).toBe('success');
    expect(report.feedback).toEqual([]);
  });

  it('seeds cookies right after start-session without exposing their values', async () => {
    const driver = new FakeDriver();
    const planner = sequencePlanner([START, navigate(SHOP_URL)]);

    const report = await run(planner, driver, {
      cookies: [{ name: 'session', value: 'test-secret', url: SHOP_URL }],
    });

    expect(report.steps.map((s) => s.kind)).toEqual(['start-session', 'add-cookie', 'navigate', 'stop-session']);
    expect(report.steps[1]?.description).toBe('seed cookie session');
    expect(report.steps[1]?.payload).toEqual({ cookie: { name: 'session', url: SHOP_URL } });
    expect(driver.cookies).toEqual([{ name: 'session', value: 'test-secret', url: SHOP_URL }]);
    expect(planner.inputs[1]?.steps).toHaveLength(2);
  });

  describe('budgets', () => {
    it('ends incomplete when the step budget runs out', async () => {
      const driver = new FakeDriver();
      const planner = sequencePlanner([
        START,
        navigate('https://shop.test/a'),
        navigate('https://shop.test/b'),
        navigate('https://shop.test/c'),
      ]);

      const report = await run(planner, driver, { maxSteps: 3 });

      expect(report.verdict).toBe('INCOMPLETE');
      expect(report.state).toBe('Completed');
      expect(report.failure).toEqual({ code: 'PlanIncomplete', message: 'step budget of 3 exhausted' });
      expect(report.explanation).toBe(
        'Run incomplete after 4 steps: step budget of 3 exhausted; the session was stopped.',
      );
      expect(planner.inputs).toHaveLength(3);
    });

    it('ends incomplete when the planner keeps reporting unfulfilled items', async () => {
      const partial = { done: true as const, summary: 'partial', unfulfilled: ['check the footer'] };
      const planner = sequencePlanner([START, partial, partial, partial]);

      const report = await run(planner, new FakeDriver());

      expect(report.verdict).toBe('INCOMPLETE');
      expect(report.failure).toEqual({
        code: 'PlanIncomplete',
        message: 'request items not yet covered: check the footer',
      });
      expect(report.feedback.map((f) => f.code)).toEqual(['PlanIncomplete', 'PlanIncomplete', 'PlanIncomplete']);
      expect(report.plannerSummary).toBe('partial');
      expect(report.steps.map((s) => s.kind)).toEqual(['start-session', 'stop-session']);
    });

    it('ends incomplete after repeated locator rejections', async () => {
      const driver = new FakeDriver({ [SHOP_URL]: '<button id="submit" class="btn">Send</button>' });
      const bad = act({ kind: 'click', descriptor: { strategy: 'css', value: 'button.btn' } });
      const planner = sequencePlanner([START, navigate(SHOP_URL), bad, bad, bad]);

      const report = await run(planner, driver);

      expect(report.verdict).toBe('INCOMPLETE');
      expect(report.feedback).toHaveLength(3);
      expect(report.steps.map((s) => s.kind)).toEqual(['start-session', 'navigate', 'stop-session']);
      expect(driver.ops()).not.toContain('click');
    });
  });

  describe('planner failures', () => {
    it('fails with PlannerError after consecutive planner errors', async () => {
      const planner: PlanningCollaborator = {
        nextAction: vi.fn().mockRejectedValue(new Error('model offline')),
      };

      const report = await run(planner, new FakeDriver());

      expect(report.failure).toEqual({ code: 'PlannerError', message: 'model offline' });
      expect(report.feedback).toHaveLength(2);
      expect(report.verdict).toBe('FAILED');
      expect(planner.nextAction).toHaveBeenCalledTimes(2);
    });

    it('times out a planner that never answers', async () => {
      const planner: PlanningCollaborator = {
        nextAction: () => new Promise<PlanProposal>(() => undefined),
      };

      const report = await run(planner, new FakeDriver(), { plannerTimeout: 20, maxPlannerErrors: 1 });

      expect(report.failure).toEqual({
        code: 'PlannerError',
        message: 'planner did not answer within 20ms',
      });
    });
  });

  it('fails as cancelled when aborted before the first proposal', async () => {
    const controller = new AbortController();
    controller.abort();
    const planner = sequencePlanner([START]);

    const report = await run(planner, new FakeDriver(), { signal: controller.signal });

    expect(report.failure).toEqual({ code: 'RunCancelled', message: 'Run cancelled' });
    expect(planner.inputs).toHaveLength(0);
  });
});
