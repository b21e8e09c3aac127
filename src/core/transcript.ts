import type { Step } from '../schema/transcript.js';

/**
 * Append-only, ordered record of executed Steps.
 * Steps are frozen on append and indices must increase by one.
 */
export class Transcript {
  private readonly entries: Step[] = [];

  append(step: Step): Readonly<Step> {
    const expected = this.entries.length + 1;
    if (step.index !== expected) {
      throw new Error(`step index ${String(step.index)} out of order (expected ${String(expected)})`);
    }
    const frozen: Step = Object.freeze({ ...step, attempts: [...step.attempts] });
    Object.freeze(frozen.attempts);
    this.entries.push(frozen);
    return frozen;
  }

  get nextIndex(): number {
    return this.entries.length + 1;
  }

  get length(): number {
    return this.entries.length;
  }

  last(): Readonly<Step> | undefined {
    return this.entries[this.entries.length - 1];
  }

  steps(): readonly Step[] {
    return [...this.entries];
  }
}
