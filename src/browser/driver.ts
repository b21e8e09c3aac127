import type { Cookie, LocatorDescriptor } from '../schema/action.js';
import type { ContextSnapshot } from '../schema/transcript.js';

// ── Driver contract ──────────────────────────────────────────

/** Where an operation runs: a window plus the frame chain inside it. */
export type DriverScope = ContextSnapshot;

export interface DriverResult {
  markup?: string | undefined;
  value?: boolean | undefined;
  url?: string | undefined;
  windowHandle?: string | undefined;
}

export type WindowTarget = { handle: string } | { index: number };

/**
 * Automation-driver collaborator: one operation per action kind.
 *
 * Frames and windows are addressed through the scope on every call;
 * the driver keeps no notion of a "current" frame of its own.
 * Failures are raised as ElementNotFound, ActionTimeout or DriverError.
 */
export interface AutomationDriver {
  startSession(): Promise<DriverResult>;
  stopSession(): Promise<DriverResult>;

  navigate(scope: DriverScope, url: string): Promise<DriverResult>;
  switchWindow(target: WindowTarget): Promise<DriverResult>;
  maximizeWindow(scope: DriverScope): Promise<DriverResult>;
  closeWindow(handle: string): Promise<DriverResult>;

  /** Verify the frame exists inside `scope`; the caller records the push. */
  switchFrameById(scope: DriverScope, frameId: string | number): Promise<DriverResult>;
  switchFrameByLocator(scope: DriverScope, descriptor: LocatorDescriptor): Promise<DriverResult>;
  switchFrameToOriginal(scope: DriverScope): Promise<DriverResult>;

  click(scope: DriverScope, descriptor: LocatorDescriptor): Promise<DriverResult>;
  doubleClick(scope: DriverScope, descriptor: LocatorDescriptor): Promise<DriverResult>;
  rightClick(scope: DriverScope, descriptor: LocatorDescriptor): Promise<DriverResult>;
  sendKeys(scope: DriverScope, descriptor: LocatorDescriptor, text: string): Promise<DriverResult>;
  scrollTo(scope: DriverScope, descriptor: LocatorDescriptor): Promise<DriverResult>;
  addCookie(scope: DriverScope, cookie: Cookie): Promise<DriverResult>;

  /** Resolves `value: true` when the element becomes visible within the wait. */
  exists(scope: DriverScope, descriptor: LocatorDescriptor): Promise<DriverResult>;
  /** Resolves `value: true` when the element is absent or hidden within the wait. */
  doesNotExist(scope: DriverScope, descriptor: LocatorDescriptor): Promise<DriverResult>;

  readMarkup(scope: DriverScope): Promise<DriverResult>;
  readUrl(scope: DriverScope): Promise<DriverResult>;
}
