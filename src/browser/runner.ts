import { chromium, errors } from 'playwright';
import type { Browser, BrowserContext, Frame, Locator, Page } from 'playwright';

import type { Cookie, LocatorDescriptor } from '../schema/action.js';
import type { FrameRef } from '../schema/transcript.js';
import { TIMEOUTS } from '../config/defaults.js';
import {
  ActionTimeout,
  DriverError,
  ElementNotFound,
  WebqaError,
  errorMessage,
} from '../core/errors.js';
import type { AutomationDriver, DriverResult, DriverScope, WindowTarget } from './driver.js';
import * as log from '../utils/logger.js';
import { cleanMarkup } from './markup.js';
import { frameSelector, toPlaywrightSelector } from './selectors.js';

// ── Public types ─────────────────────────────────────────────

export interface RunnerConfig {
  headless: boolean;
  actionTimeout?: number | undefined;
  navigationTimeout?: number | undefined;
}

type CookieParam = Parameters<BrowserContext['addCookies']>[0][number];

// ── Driver factory ───────────────────────────────────────────

/**
 * Playwright implementation of the automation driver.
 * One instance owns one browser for the lifetime of one run.
 */
export function createPlaywrightDriver(config: RunnerConfig): AutomationDriver {
  const actionTimeout = config.actionTimeout ?? TIMEOUTS.ACTION_TIMEOUT;
  const navigationTimeout = config.navigationTimeout ?? TIMEOUTS.NAVIGATION_TIMEOUT;

  let browser: Browser | undefined;
  let context: BrowserContext | undefined;
  const pagesByHandle = new Map<string, Page>();
  const handlesByPage = new WeakMap<Page, string>();
  let handleCounter = 0;

  // ── Window bookkeeping ─────────────────────────────────────

  function register(page: Page): string {
    const existing = handlesByPage.get(page);
    if (existing !== undefined) return existing;

    const handle = `window-${String(handleCounter++)}`;
    pagesByHandle.set(handle, page);
    handlesByPage.set(page, handle);
    page.on('close', () => pagesByHandle.delete(handle));
    return handle;
  }

  function requireContext(): BrowserContext {
    if (context === undefined) {
      throw new DriverError('no browser session is running');
    }
    return context;
  }

  function pageFor(handle: string | null): Page {
    if (handle === null) {
      throw new DriverError('no active window');
    }
    const page = pagesByHandle.get(handle);
    if (page === undefined) {
      throw new DriverError(`unknown or closed window "${handle}"`);
    }
    return page;
  }

  async function closeBrowser(): Promise<void> {
    if (browser === undefined) return;
    const closing = browser;
    browser = undefined;
    context = undefined;
    pagesByHandle.clear();
    await closing.close();
  }

  // ── Scope resolution ───────────────────────────────────────

  async function frameFor(scope: DriverScope): Promise<Frame> {
    let frame = pageFor(scope.windowHandle).mainFrame();
    for (const ref of scope.frames) {
      frame = await childFrame(frame, ref);
    }
    return frame;
  }

  async function childFrame(parent: Frame, ref: FrameRef): Promise<Frame> {
    let selector: string;
    if (ref.by === 'locator') {
      selector = toPlaywrightSelector(ref.descriptor);
    } else if (typeof ref.frameId === 'number') {
      const child = parent.childFrames()[ref.frameId];
      if (child === undefined) {
        throw new ElementNotFound(`no frame at index ${String(ref.frameId)}`);
      }
      return child;
    } else {
      selector = frameSelector(ref.frameId);
    }

    const element = await parent
      .locator(selector)
      .first()
      .elementHandle({ timeout: actionTimeout });
    const frame = await element?.contentFrame();
    if (!frame) {
      throw new ElementNotFound(`element ${selector} is not a frame`);
    }
    return frame;
  }

  function windowAt(index: number): Page {
    const page = requireContext().pages()[index];
    if (page === undefined) {
      throw new DriverError(`no window at index ${String(index)}`);
    }
    return page;
  }

  async function locate(scope: DriverScope, descriptor: LocatorDescriptor): Promise<Locator> {
    const frame = await frameFor(scope);
    return frame.locator(toPlaywrightSelector(descriptor));
  }

  async function scopeMarkup(scope: DriverScope): Promise<string | undefined> {
    try {
      const frame = await frameFor(scope);
      return cleanMarkup(await frame.content());
    } catch (err) {
      // Frame may have navigated away after the action
      log.detail(`markup unavailable: ${errorMessage(err)}`);
      return undefined;
    }
  }

  // ── Error mapping ──────────────────────────────────────────

  async function guarded<T>(
    what: string,
    fn: () => Promise<T>,
    locator?: Locator,
  ): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof WebqaError) throw err;
      if (err instanceof errors.TimeoutError) {
        const count = locator ? await locator.count().catch(() => -1) : -1;
        if (count === 0) {
          throw new ElementNotFound(`${what}: element not found`);
        }
        throw new ActionTimeout(`${what}: ${err.message}`, actionTimeout);
      }
      throw new DriverError(`${what}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async function interact(
    what: string,
    scope: DriverScope,
    descriptor: LocatorDescriptor,
    act: (locator: Locator) => Promise<void>,
  ): Promise<DriverResult> {
    const locator = await guarded(what, () => locate(scope, descriptor));
    await guarded(what, () => act(locator), locator);
    return {};
  }

  async function waitForState(locator: Locator, state: 'visible' | 'hidden'): Promise<boolean> {
    try {
      await locator.waitFor({ state, timeout: actionTimeout });
      return true;
    } catch (err) {
      if (err instanceof errors.TimeoutError) return false;
      throw new DriverError(`wait for ${state}: ${errorMessage(err)}`, { cause: err });
    }
  }

  // ── Operations ─────────────────────────────────────────────

  return {
    async startSession(): Promise<DriverResult> {
      return guarded('start-session', async () => {
        // A retried start must not orphan the browser of a failed one
        await closeBrowser();
        const launched = await chromium.launch({ headless: config.headless });
        browser = launched;
        context = await launched.newContext();
        context.on('page', (page) => {
          register(page);
        });
        const page = await context.newPage();
        const windowHandle = register(page);
        return { windowHandle, url: page.url() };
      });
    },

    async stopSession(): Promise<DriverResult> {
      await guarded('stop-session', closeBrowser);
      return {};
    },

    async navigate(scope, url): Promise<DriverResult> {
      const page = pageFor(scope.windowHandle);
      await guarded(`navigate ${url}`, () =>
        page.goto(url, { timeout: navigationTimeout, waitUntil: 'domcontentloaded' }),
      );
      return { url: page.url(), markup: cleanMarkup(await page.content()) };
    },

    async switchWindow(target: WindowTarget): Promise<DriverResult> {
      const page = 'handle' in target
        ? pageFor(target.handle)
        : windowAt(target.index);
      const windowHandle = register(page);
      await guarded('switch-window', () => page.bringToFront());
      return { windowHandle, url: page.url(), markup: cleanMarkup(await page.content()) };
    },

    async maximizeWindow(scope): Promise<DriverResult> {
      const page = pageFor(scope.windowHandle);
      await guarded('maximize-window', async () => {
        const size = await page.evaluate(() => ({
          width: window.screen.availWidth,
          height: window.screen.availHeight,
        }));
        await page.setViewportSize(size);
      });
      return {};
    },

    async closeWindow(handle): Promise<DriverResult> {
      const page = pageFor(handle);
      await guarded('close-window', () => page.close());
      pagesByHandle.delete(handle);
      return {};
    },

    async switchFrameById(scope, frameId): Promise<DriverResult> {
      const frame = await guarded('switch-frame-by-id', async () =>
        childFrame(await frameFor(scope), { by: 'id', frameId }),
      );
      return { markup: cleanMarkup(await frame.content()) };
    },

    async switchFrameByLocator(scope, descriptor): Promise<DriverResult> {
      const frame = await guarded('switch-frame-by-locator', async () =>
        childFrame(await frameFor(scope), { by: 'locator', descriptor }),
      );
      return { markup: cleanMarkup(await frame.content()) };
    },

    async switchFrameToOriginal(scope): Promise<DriverResult> {
      const page = pageFor(scope.windowHandle);
      const markup = await guarded('switch-frame-to-original', () => page.content());
      return { markup: cleanMarkup(markup) };
    },

    async click(scope, descriptor): Promise<DriverResult> {
      await interact('click', scope, descriptor, (l) => l.click({ timeout: actionTimeout }));
      const markup = await scopeMarkup(scope);
      return markup !== undefined ? { markup } : {};
    },

    async doubleClick(scope, descriptor): Promise<DriverResult> {
      return interact('double-click', scope, descriptor, (l) =>
        l.dblclick({ timeout: actionTimeout }),
      );
    },

    async rightClick(scope, descriptor): Promise<DriverResult> {
      return interact('right-click', scope, descriptor, (l) =>
        l.click({ button: 'right', timeout: actionTimeout }),
      );
    },

    async sendKeys(scope, descriptor, text): Promise<DriverResult> {
      return interact('send-keys', scope, descriptor, (l) =>
        l.fill(text, { timeout: actionTimeout }),
      );
    },

    async scrollTo(scope, descriptor): Promise<DriverResult> {
      return interact('scroll-to', scope, descriptor, (l) =>
        l.scrollIntoViewIfNeeded({ timeout: actionTimeout }),
      );
    },

    async addCookie(scope, cookie): Promise<DriverResult> {
      const ctx = requireContext();
      const param = toCookieParam(cookie, scope.windowHandle !== null ? pageFor(scope.windowHandle).url() : undefined);
      await guarded('add-cookie', () => ctx.addCookies([param]));
      return {};
    },

    async exists(scope, descriptor): Promise<DriverResult> {
      const locator = await guarded('exists', () => locate(scope, descriptor));
      const value = await waitForState(locator.first(), 'visible');
      return { value };
    },

    async doesNotExist(scope, descriptor): Promise<DriverResult> {
      const locator = await guarded('does-not-exist', () => locate(scope, descriptor));
      const value = await waitForState(locator.first(), 'hidden');
      return { value };
    },

    async readMarkup(scope): Promise<DriverResult> {
      const frame = await guarded('read-markup', () => frameFor(scope));
      const markup = await guarded('read-markup', () => frame.content());
      return { markup: cleanMarkup(markup) };
    },

    async readUrl(scope): Promise<DriverResult> {
      return { url: pageFor(scope.windowHandle).url() };
    },
  };
}

// ── Cookie mapping ───────────────────────────────────────────

export function toCookieParam(cookie: Cookie, currentUrl: string | undefined): CookieParam {
  if (cookie.url !== undefined) {
    return { name: cookie.name, value: cookie.value, url: cookie.url };
  }
  if (cookie.domain !== undefined) {
    return {
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path ?? '/',
    };
  }
  if (currentUrl === undefined || !/^https?:/.test(currentUrl)) {
    throw new DriverError(
      `cookie "${cookie.name}" needs a url or domain before any page is loaded`,
    );
  }
  return { name: cookie.name, value: cookie.value, url: currentUrl };
}
