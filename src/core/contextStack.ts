import type { ContextSnapshot, FrameRef } from '../schema/transcript.js';
import { LifecycleViolation } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export type ContextFrame =
  | { kind: 'window'; handle: string | null }
  | { kind: 'frame'; ref: FrameRef; windowHandle: string | null };

// ── Context stack ─────────────────────────────────────────────

/**
 * Active window plus the chain of frame switches in effect.
 *
 * Frame nesting is kept per window: switching windows never resets
 * another window's nesting, and a window seen for the first time
 * starts at its own root. The root (top-level document) is implicit
 * and can never be popped.
 */
export class ContextStack {
  private activeWindow: string | null = null;
  private readonly framesByWindow = new Map<string | null, FrameRef[]>();

  pushFrame(ref: FrameRef): void {
    this.activeFrames().push(ref);
  }

  /** Drop every frame of the active window. Idempotent. */
  popToRoot(): void {
    this.framesByWindow.set(this.activeWindow, []);
  }

  setActiveWindow(handle: string): void {
    this.activeWindow = handle;
    if (!this.framesByWindow.has(handle)) {
      this.framesByWindow.set(handle, []);
    }
  }

  /**
   * Forget a window. Closing a window that still has frames pushed is
   * rejected rather than silently unwinding them.
   */
  closeWindow(handle: string): void {
    this.assertClosable(handle);
    this.framesByWindow.delete(handle);
    if (this.activeWindow === handle) {
      this.activeWindow = null;
    }
  }

  assertClosable(handle: string): void {
    const frames = this.framesByWindow.get(handle) ?? [];
    if (frames.length > 0) {
      throw new LifecycleViolation(
        `window ${handle} closed with ${String(frames.length)} frame(s) still pushed`,
      );
    }
  }

  current(): ContextFrame {
    const frames = this.framesByWindow.get(this.activeWindow) ?? [];
    const top = frames[frames.length - 1];
    if (top === undefined) {
      return { kind: 'window', handle: this.activeWindow };
    }
    return { kind: 'frame', ref: top, windowHandle: this.activeWindow };
  }

  /** Root counts as one level. */
  depth(): number {
    return 1 + (this.framesByWindow.get(this.activeWindow)?.length ?? 0);
  }

  get windowHandle(): string | null {
    return this.activeWindow;
  }

  snapshot(): ContextSnapshot {
    return {
      windowHandle: this.activeWindow,
      frames: [...(this.framesByWindow.get(this.activeWindow) ?? [])],
    };
  }

  private activeFrames(): FrameRef[] {
    let frames = this.framesByWindow.get(this.activeWindow);
    if (frames === undefined) {
      frames = [];
      this.framesByWindow.set(this.activeWindow, frames);
    }
    return frames;
  }
}

/** Stable key for caching per-context data such as markup snapshots. */
export function contextKey(snapshot: ContextSnapshot): string {
  return JSON.stringify([snapshot.windowHandle, snapshot.frames]);
}
