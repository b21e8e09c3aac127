import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createPlaywrightDriver, toCookieParam } from '../../src/browser/runner.js';
import type { DriverScope } from '../../src/browser/driver.js';
import { createDispatcher } from '../../src/core/dispatcher.js';
import { executeWithRecovery } from '../../src/core/recovery.js';
import { ActionTimeout, DriverError, ElementNotFound } from '../../src/core/errors.js';

const pw = vi.hoisted(() => ({
  launch: vi.fn(),
  TimeoutError: class TimeoutError extends Error {},
}));

vi.mock('playwright', () => ({
  chromium: { launch: pw.launch },
  errors: { TimeoutError: pw.TimeoutError },
}));

// ── In-memory browser ────────────────────────────────────────

class FakeLocator {
  readonly click = vi.fn(async (): Promise<void> => undefined);
  readonly count = vi.fn(async (): Promise<number> => 1);

  first(): FakeLocator {
    return this;
  }
}

class FakePage {
  readonly target = new FakeLocator();
  private readonly closeListeners: Array<() => void> = [];

  constructor(private readonly address: string) {}

  on(event: string, listener: () => void): void {
    if (event === 'close') this.closeListeners.push(listener);
  }

  url(): string {
    return this.address;
  }

  async content(): Promise<string> {
    return `<html><body>${this.address}</body></html>`;
  }

  mainFrame(): { locator: () => FakeLocator } {
    return { locator: () => this.target };
  }

  async bringToFront(): Promise<void> {
    return undefined;
  }

  async close(): Promise<void> {
    this.closeListeners.forEach((listener) => listener());
  }
}

class FakeContext {
  readonly opened: FakePage[] = [];
  private readonly pageListeners: Array<(page: FakePage) => void> = [];

  on(event: string, listener: (page: FakePage) => void): void {
    if (event === 'page') this.pageListeners.push(listener);
  }

  async newPage(): Promise<FakePage> {
    const page = new FakePage('about:blank');
    this.opened.push(page);
    return page;
  }

  /** A page the site opened itself, e.g. a popup. */
  popup(address: string): FakePage {
    const page = new FakePage(address);
    this.opened.push(page);
    this.pageListeners.forEach((listener) => listener(page));
    return page;
  }

  pages(): FakePage[] {
    return this.opened;
  }
}

const closed: number[] = [];
const contexts: FakeContext[] = [];
let launched = 0;

function fakeBrowser(id: number, contextFails: boolean) {
  return {
    async newContext(): Promise<FakeContext> {
      if (contextFails) throw new Error('context crashed');
      const context = new FakeContext();
      contexts.push(context);
      return context;
    },
    async close(): Promise<void> {
      closed.push(id);
    },
  };
}

function onlyContext(): FakeContext {
  const context = contexts[0];
  if (context === undefined) throw new Error('session not started');
  return context;
}

function firstPage(): FakePage {
  const page = onlyContext().opened[0];
  if (page === undefined) throw new Error('no page opened');
  return page;
}

const SCOPE: DriverScope = { windowHandle: 'window-0', frames: [] };
const SUBMIT = { strategy: 'id', value: 'submit' } as const;

beforeEach(() => {
  closed.length = 0;
  contexts.length = 0;
  launched = 0;
  pw.launch.mockReset();
  pw.launch.mockImplementation(async () => fakeBrowser(++launched, false));
});

// ── Session lifecycle ────────────────────────────────────────

describe('createPlaywrightDriver sessions', () => {
  it('closes the browser of a failed start before retrying', async () => {
    pw.launch
      .mockImplementationOnce(async () => fakeBrowser(1, true))
      .mockImplementationOnce(async () => fakeBrowser(2, false));
    const driver = createPlaywrightDriver({ headless: true });

    const result = await executeWithRecovery(
      createDispatcher(driver),
      { kind: 'start-session' },
      { windowHandle: null, frames: [] },
    );
    await driver.stopSession();

    expect(result.outcome).toBe('retried-success');
    expect(result.attempts[0]?.failure).toEqual({
      code: 'DriverError',
      message: 'start-session: context crashed',
    });
    expect(closed).toEqual([1, 2]);
  });

  it('names the first window window-0', async () => {
    const driver = createPlaywrightDriver({ headless: true });

    expect(await driver.startSession()).toEqual({ windowHandle: 'window-0', url: 'about:blank' });
  });

  it('treats stop without a session as a no-op', async () => {
    const driver = createPlaywrightDriver({ headless: true });

    expect(await driver.stopSession()).toEqual({});
    expect(closed).toEqual([]);
  });
});

// ── Window bookkeeping ───────────────────────────────────────

describe('createPlaywrightDriver windows', () => {
  it('registers popups and forgets them once closed', async () => {
    const driver = createPlaywrightDriver({ headless: true });
    await driver.startSession();
    const popup = onlyContext().popup('https://shop.test/help');

    const switched = await driver.switchWindow({ index: 1 });
    expect(switched.windowHandle).toBe('window-1');
    expect(switched.url).toBe('https://shop.test/help');

    await popup.close();
    await expect(driver.switchWindow({ handle: 'window-1' })).rejects.toThrow(
      new DriverError('unknown or closed window "window-1"'),
    );
  });

  it('rejects an index past the open windows', async () => {
    const driver = createPlaywrightDriver({ headless: true });
    await driver.startSession();

    await expect(driver.switchWindow({ index: 3 })).rejects.toThrow('no window at index 3');
  });
});

// ── Error mapping ────────────────────────────────────────────

describe('createPlaywrightDriver error mapping', () => {
  it('reports a timeout on an absent element as ElementNotFound', async () => {
    const driver = createPlaywrightDriver({ headless: true, actionTimeout: 250 });
    await driver.startSession();
    const locator = firstPage().target;
    locator.click.mockRejectedValueOnce(new pw.TimeoutError('Timeout 250ms exceeded'));
    locator.count.mockResolvedValueOnce(0);

    const err = await driver.click(SCOPE, SUBMIT).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ElementNotFound);
    expect(err).toHaveProperty('message', 'click: element not found');
  });

  it('reports a timeout on a present element as ActionTimeout', async () => {
    const driver = createPlaywrightDriver({ headless: true, actionTimeout: 250 });
    await driver.startSession();
    firstPage().target.click.mockRejectedValueOnce(new pw.TimeoutError('Timeout 250ms exceeded'));

    const err = await driver.click(SCOPE, SUBMIT).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ActionTimeout);
    expect(err).toHaveProperty('message', 'click: Timeout 250ms exceeded');
    expect(err).toHaveProperty('timeoutMs', 250);
  });

  it('wraps any other failure as DriverError', async () => {
    const driver = createPlaywrightDriver({ headless: true });
    await driver.startSession();
    firstPage().target.click.mockRejectedValueOnce(new Error('target closed'));

    const err = await driver.click(SCOPE, SUBMIT).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DriverError);
    expect(err).toHaveProperty('message', 'click: target closed');
  });

  it('fails operations before a session starts', async () => {
    const driver = createPlaywrightDriver({ headless: true });

    await expect(driver.addCookie(SCOPE, { name: 'sid', value: 'test-secret' })).rejects.toThrow(
      'no browser session is running',
    );
  });
});

// ── Cookie mapping ───────────────────────────────────────────

describe('toCookieParam', () => {
  it('keeps an explicit url', () => {
    expect(
      toCookieParam({ name: 'sid', value: 'test-secret', url: 'https://shop.test/' }, 'about:blank'),
    ).toEqual({ name: 'sid', value: 'test-secret', url: 'https://shop.test/' });
  });

  it('scopes a domain cookie to the root path by default', () => {
    expect(toCookieParam({ name: 'sid', value: 'test-secret', domain: 'shop.test' }, undefined)).toEqual({
      name: 'sid',
      value: 'test-secret',
      domain: 'shop.test',
      path: '/',
    });
  });

  it('falls back to the current page url', () => {
    expect(toCookieParam({ name: 'sid', value: 'test-secret' }, 'https://shop.test/cart')).toEqual({
      name: 'sid',
      value: 'test-secret',
      url: 'https://shop.test/cart',
    });
  });

  it('refuses an unscoped cookie before any page is loaded', () => {
    expect(() => toCookieParam({ name: 'sid', value: 'test-secret' }, 'about:blank')).toThrow(
      'cookie "sid" needs a url or domain before any page is loaded',
    );
    expect(() => toCookieParam({ name: 'sid', value: 'test-secret' }, undefined)).toThrow(DriverError);
  });
});
