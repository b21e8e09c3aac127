import type { LocatorDescriptor } from '../schema/action.js';

// ── Resolver ──────────────────────────────────────────────────

/**
 * Maps a LocatorDescriptor to a Playwright selector string.
 *
 * Priority is enforced upstream by the locator policy, not here.
 * Attribute selectors are used for id and name so that values which
 * are not valid CSS identifiers still resolve.
 */
export function toPlaywrightSelector(descriptor: LocatorDescriptor): string {
  switch (descriptor.strategy) {
    case 'id':
      return `css=[id="${escapeQuoted(descriptor.value)}"]`;

    case 'name':
      return `css=[name="${escapeQuoted(descriptor.value)}"]`;

    case 'class':
      return `css=${descriptor.value
        .split(/\s+/)
        .filter(Boolean)
        .map((cls) => `.${cssEscapeIdent(cls)}`)
        .join('')}`;

    case 'css':
      return `css=${descriptor.value}`;

    case 'xpath':
      return `xpath=${descriptor.value}`;
  }
}

/** Selector for an iframe addressed by id or name. */
export function frameSelector(frameId: string): string {
  const v = escapeQuoted(frameId);
  return `css=iframe[id="${v}"], iframe[name="${v}"], frame[id="${v}"], frame[name="${v}"]`;
}

// ── Description helper ────────────────────────────────────────

/** Human-readable one-liner for logs, prompts and reports. */
export function describeLocator(descriptor: LocatorDescriptor): string {
  return `${descriptor.strategy}=${descriptor.value}`;
}

// ── Helpers ───────────────────────────────────────────────────

function escapeQuoted(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function cssEscapeIdent(ident: string): string {
  return ident.replace(/([^\w-])/g, '\\$1');
}
