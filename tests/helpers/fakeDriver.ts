import type {
  AutomationDriver,
  DriverResult,
  DriverScope,
  WindowTarget,
} from '../../src/browser/driver.js';
import type { Cookie, LocatorDescriptor } from '../../src/schema/action.js';
import { DriverError } from '../../src/core/errors.js';

export type DriverOp = keyof AutomationDriver;

export interface DriverCall {
  op: DriverOp;
  scope: DriverScope | undefined;
  args: unknown[];
}

const BLANK = '<html><head></head><body></body></html>';

/**
 * In-memory driver. Pages are markup keyed by URL, frames markup keyed
 * by frame id or locator value. Failures are queued per operation.
 */
export class FakeDriver implements AutomationDriver {
  readonly calls: DriverCall[] = [];
  readonly cookies: Cookie[] = [];
  windows: string[] = [];
  url = 'about:blank';
  existsResult = true;
  absentResult = true;

  private readonly failures = new Map<DriverOp, Error[]>();

  constructor(
    private readonly pages: Record<string, string> = {},
    private readonly frames: Record<string, string> = {},
  ) {}

  /** The next calls of `op` throw these errors, in order. */
  failNext(op: DriverOp, ...errors: Error[]): this {
    this.failures.set(op, [...(this.failures.get(op) ?? []), ...errors]);
    return this;
  }

  ops(): DriverOp[] {
    return this.calls.map((c) => c.op);
  }

  // ── Lifecycle ──────────────────────────────────────────────

  async startSession(): Promise<DriverResult> {
    this.enter('startSession', undefined);
    this.windows = ['window-0'];
    return { windowHandle: 'window-0' };
  }

  async stopSession(): Promise<DriverResult> {
    this.enter('stopSession', undefined);
    this.windows = [];
    return {};
  }

  // ── Navigation ─────────────────────────────────────────────

  async navigate(scope: DriverScope, url: string): Promise<DriverResult> {
    this.enter('navigate', scope, url);
    this.url = url;
    return { url, markup: this.pageMarkup() };
  }

  async switchWindow(target: WindowTarget): Promise<DriverResult> {
    this.enter('switchWindow', undefined, target);
    const handle = 'handle' in target ? target.handle : this.windows[target.index];
    if (handle === undefined || !this.windows.includes(handle)) {
      throw new DriverError('no such window');
    }
    return { windowHandle: handle, markup: this.pageMarkup() };
  }

  async maximizeWindow(scope: DriverScope): Promise<DriverResult> {
    this.enter('maximizeWindow', scope);
    return {};
  }

  async closeWindow(handle: string): Promise<DriverResult> {
    this.enter('closeWindow', undefined, handle);
    this.windows = this.windows.filter((w) => w !== handle);
    return {};
  }

  // ── Frames ─────────────────────────────────────────────────

  async switchFrameById(scope: DriverScope, frameId: string | number): Promise<DriverResult> {
    this.enter('switchFrameById', scope, frameId);
    return { markup: this.frames[String(frameId)] ?? BLANK };
  }

  async switchFrameByLocator(scope: DriverScope, descriptor: LocatorDescriptor): Promise<DriverResult> {
    this.enter('switchFrameByLocator', scope, descriptor);
    return { markup: this.frames[descriptor.value] ?? BLANK };
  }

  async switchFrameToOriginal(scope: DriverScope): Promise<DriverResult> {
    this.enter('switchFrameToOriginal', scope);
    return { markup: this.pageMarkup() };
  }

  // ── Interaction ────────────────────────────────────────────

  async click(scope: DriverScope, descriptor: LocatorDescriptor): Promise<DriverResult> {
    this.enter('click', scope, descriptor);
    return { markup: this.scopeMarkup(scope) };
  }

  async doubleClick(scope: DriverScope, descriptor: LocatorDescriptor): Promise<DriverResult> {
    this.enter('doubleClick', scope, descriptor);
    return {};
  }

  async rightClick(scope: DriverScope, descriptor: LocatorDescriptor): Promise<DriverResult> {
    this.enter('rightClick', scope, descriptor);
    return {};
  }

  async sendKeys(scope: DriverScope, descriptor: LocatorDescriptor, text: string): Promise<DriverResult> {
    this.enter('sendKeys', scope, descriptor, text);
    return {};
  }

  async scrollTo(scope: DriverScope, descriptor: LocatorDescriptor): Promise<DriverResult> {
    this.enter('scrollTo', scope, descriptor);
    return {};
  }

  async addCookie(scope: DriverScope, cookie: Cookie): Promise<DriverResult> {
    this.enter('addCookie', scope, cookie);
    this.cookies.push(cookie);
    return {};
  }

  // ── Assertions & diagnostics ───────────────────────────────

  async exists(scope: DriverScope, descriptor: LocatorDescriptor): Promise<DriverResult> {
    this.enter('exists', scope, descriptor);
    return { value: this.existsResult };
  }

  async doesNotExist(scope: DriverScope, descriptor: LocatorDescriptor): Promise<DriverResult> {
    this.enter('doesNotExist', scope, descriptor);
    return { value: this.absentResult };
  }

  async readMarkup(scope: DriverScope): Promise<DriverResult> {
    this.enter('readMarkup', scope);
    return { markup: this.scopeMarkup(scope) };
  }

  async readUrl(scope: DriverScope): Promise<DriverResult> {
    this.enter('readUrl', scope);
    return { url: this.url };
  }

  // ── Internals ──────────────────────────────────────────────

  private enter(op: DriverOp, scope: DriverScope | undefined, ...args: unknown[]): void {
    this.calls.push({ op, scope, args });
    const error = this.failures.get(op)?.shift();
    if (error !== undefined) throw error;
  }

  private pageMarkup(): string {
    return this.pages[this.url] ?? BLANK;
  }

  private scopeMarkup(scope: DriverScope): string {
    const top = scope.frames[scope.frames.length - 1];
    if (top === undefined) return this.pageMarkup();
    const key = top.by === 'id' ? String(top.frameId) : top.descriptor.value;
    return this.frames[key] ?? BLANK;
  }
}
