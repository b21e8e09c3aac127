import type { Action } from '../schema/action.js';
import type { ContextSnapshot, Observation } from '../schema/transcript.js';
import type { AutomationDriver, DriverResult } from '../browser/driver.js';
import { TIMEOUTS } from '../config/defaults.js';
import { withTimeout } from '../utils/timeout.js';
import {
  ActionTimeout,
  AssertionFailed,
  DriverError,
  ElementNotFound,
  WebqaError,
  errorMessage,
} from './errors.js';
import { describeLocator } from '../browser/selectors.js';

// ── Public types ─────────────────────────────────────────────

export interface ActionDispatcher {
  dispatch(action: Action, context: ContextSnapshot): Promise<Observation>;
}

export interface DispatcherOptions {
  actionTimeout?: number | undefined;
}

// ── Factory ──────────────────────────────────────────────────

/**
 * Thin adapter from validated actions to driver calls.
 * No retries and no locator policy here; both live upstream.
 */
export function createDispatcher(
  driver: AutomationDriver,
  options: DispatcherOptions = {},
): ActionDispatcher {
  // Navigation gets its own driver-side timeout; the outer bound
  // only has to catch a driver that never answers.
  const bound = Math.max(
    options.actionTimeout ?? TIMEOUTS.ACTION_TIMEOUT,
    TIMEOUTS.NAVIGATION_TIMEOUT,
  ) + 5_000;

  async function call(action: Action, run: () => Promise<DriverResult>): Promise<DriverResult> {
    try {
      return await withTimeout(
        run(),
        bound,
        () => new ActionTimeout(`${action.kind} did not answer within ${String(bound)}ms`, bound),
      );
    } catch (err) {
      if (err instanceof WebqaError) throw err;
      throw new DriverError(`${action.kind}: ${errorMessage(err)}`, { cause: err });
    }
  }

  return {
    async dispatch(action, context): Promise<Observation> {
      switch (action.kind) {
        // lifecycle
        case 'start-session': {
          const r = await call(action, () => driver.startSession());
          return observe('session started', r);
        }
        case 'stop-session': {
          const r = await call(action, () => driver.stopSession());
          return observe('session stopped', r);
        }

        // navigation
        case 'navigate': {
          const r = await call(action, () => driver.navigate(context, action.url));
          return observe(`navigated to ${r.url ?? action.url}`, r);
        }
        case 'maximize-window': {
          const r = await call(action, () => driver.maximizeWindow(context));
          return observe('window maximized', r);
        }

        // context switches
        case 'switch-window': {
          const target = action.windowHandle !== undefined
            ? { handle: action.windowHandle }
            : { index: action.index ?? 0 };
          const r = await call(action, () => driver.switchWindow(target));
          if (r.windowHandle === undefined) {
            throw new DriverError('switch-window: driver returned no window handle');
          }
          return observe(`switched to window ${r.windowHandle}`, r);
        }
        case 'close-window': {
          const handle = action.windowHandle ?? context.windowHandle;
          if (handle === null) {
            throw new DriverError('close-window: no window to close');
          }
          const r = await call(action, () => driver.closeWindow(handle));
          return observe(`closed window ${handle}`, { ...r, windowHandle: handle });
        }
        case 'switch-frame-by-id': {
          const r = await call(action, () => driver.switchFrameById(context, action.frameId));
          return observe(`entered frame ${String(action.frameId)}`, r);
        }
        case 'switch-frame-by-locator': {
          const r = await call(action, () => driver.switchFrameByLocator(context, action.descriptor));
          return observe(`entered frame ${describeLocator(action.descriptor)}`, r);
        }
        case 'switch-frame-to-original': {
          const r = await call(action, () => driver.switchFrameToOriginal(context));
          return observe('returned to top-level document', r);
        }

        // interaction
        case 'click': {
          const r = await call(action, () => driver.click(context, action.descriptor));
          return observe(`clicked ${describeLocator(action.descriptor)}`, r);
        }
        case 'double-click': {
          const r = await call(action, () => driver.doubleClick(context, action.descriptor));
          return observe(`double-clicked ${describeLocator(action.descriptor)}`, r);
        }
        case 'right-click': {
          const r = await call(action, () => driver.rightClick(context, action.descriptor));
          return observe(`right-clicked ${describeLocator(action.descriptor)}`, r);
        }
        case 'send-keys': {
          const r = await call(action, () => driver.sendKeys(context, action.descriptor, action.text));
          return observe(`sent keys to ${describeLocator(action.descriptor)}`, r);
        }
        case 'scroll-to': {
          const r = await call(action, () => driver.scrollTo(context, action.descriptor));
          return observe(`scrolled to ${describeLocator(action.descriptor)}`, r);
        }
        case 'add-cookie': {
          const r = await call(action, () => driver.addCookie(context, action.cookie));
          return observe(`cookie ${action.cookie.name} added`, r);
        }

        // assertions
        case 'exists': {
          const r = await call(action, () => driver.exists(context, action.descriptor));
          if (r.value !== true) {
            throw new ElementNotFound(`${describeLocator(action.descriptor)} is not visible`);
          }
          return observe(`${describeLocator(action.descriptor)} exists`, { ...r, value: true });
        }
        case 'does-not-exist': {
          const r = await call(action, () => driver.doesNotExist(context, action.descriptor));
          if (r.value !== true) {
            throw new AssertionFailed(`${describeLocator(action.descriptor)} is still present`);
          }
          return observe(`${describeLocator(action.descriptor)} does not exist`, { ...r, value: true });
        }

        // diagnostics
        case 'read-markup': {
          const r = await call(action, () => driver.readMarkup(context));
          return observe(`read ${String(r.markup?.length ?? 0)} chars of markup`, r);
        }
        case 'read-url': {
          const r = await call(action, () => driver.readUrl(context));
          return observe(`current url ${r.url ?? 'unknown'}`, r);
        }
      }
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────

function observe(detail: string, result: DriverResult): Observation {
  const observation: Observation = { detail };
  if (result.markup !== undefined) observation.markup = result.markup;
  if (result.value !== undefined) observation.value = result.value;
  if (result.url !== undefined) observation.url = result.url;
  if (result.windowHandle !== undefined) observation.windowHandle = result.windowHandle;
  return observation;
}
