import { JSDOM } from 'jsdom';

import type { LocatorDescriptor, LocatorStrategy } from '../schema/action.js';
import { STRATEGY_PRIORITY } from '../schema/action.js';
import { describeLocator } from '../browser/selectors.js';
import type { LocatorRejectionReason } from './errors.js';
import { LocatorPolicyViolation } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface ValidateOptions {
  /** Text or label of the element the plan means to target. */
  target?: string | undefined;
  /** false for assertions, where zero matches is a legitimate state. */
  requireMatch?: boolean | undefined;
}

export type LocatorValidation =
  | { accepted: true; matchCount: number; best: LocatorDescriptor | null }
  | {
      accepted: false;
      reason: LocatorRejectionReason;
      message: string;
      suggestion?: LocatorDescriptor;
    };

// ── Constants ────────────────────────────────────────────────

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const ORDERED_NODE_SNAPSHOT_TYPE = 7;

const STATE_CLASSES = new Set([
  'active', 'hover', 'focus', 'focused', 'selected', 'open', 'opened',
  'closed', 'disabled', 'enabled', 'hidden', 'visible', 'show', 'shown',
  'collapsed', 'expanded', 'checked', 'loading', 'invalid', 'valid',
]);

// text(), . or normalize-space(...) compared against a quoted literal
const TEXT_SUBJECT = String.raw`(?:text\(\)|\.|normalize-space\(\s*(?:text\(\)|\.)?\s*\))`;
const QUOTED = String.raw`(['"])((?:(?!\1).)+)\1`;
const TEXT_COMPARISONS = [
  new RegExp(String.raw`(?:contains|starts-with)\(\s*${TEXT_SUBJECT}\s*,\s*${QUOTED}`),
  new RegExp(String.raw`${TEXT_SUBJECT}\s*=\s*${QUOTED}`),
] as const;

const STABLE_CSS_ATTRIBUTES = [
  'data-testid', 'data-test', 'data-qa', 'aria-label', 'placeholder',
  'type', 'title', 'alt', 'href', 'for', 'role',
] as const;

// ── Public API ───────────────────────────────────────────────

export function parseDomSnapshot(markup: string): Document {
  return new JSDOM(markup).window.document;
}

/**
 * Check a locator against the policy and a captured DOM.
 *
 * Order of checks: the descriptor must parse; it must use the
 * highest-priority strategy that uniquely identifies the intended
 * element; text-based XPath must land on the element holding the
 * text, not an ancestor; and it must match exactly one element.
 */
export function validateLocator(
  descriptor: LocatorDescriptor,
  snapshot: string | Document,
  options: ValidateOptions = {},
): LocatorValidation {
  const doc = typeof snapshot === 'string' ? parseDomSnapshot(snapshot) : snapshot;

  let matches: Element[];
  try {
    matches = queryDescriptor(doc, descriptor);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return reject('InvalidSelector', `cannot evaluate ${describeLocator(descriptor)}: ${detail}`);
  }

  const text = textLiteralOf(descriptor);
  const target = resolveTarget(doc, options.target, text, matches);

  // 1. Priority
  const candidates = target !== undefined ? [target] : matches;
  for (const candidate of candidates) {
    const best = bestLocatorFor(doc, candidate);
    if (rank(best.strategy) < rank(descriptor.strategy)) {
      return reject(
        'LowerPriorityStrategy',
        `${describeLocator(descriptor)} used where ${describeLocator(best)} identifies the element`,
        best,
      );
    }
  }

  // 2. Presence
  if (matches.length === 0) {
    if (options.requireMatch === false) {
      return { accepted: true, matchCount: 0, best: null };
    }
    return reject(
      'NoMatch',
      `${describeLocator(descriptor)} matches no element`,
      target !== undefined ? bestLocatorFor(doc, target) : undefined,
    );
  }

  // 3. Text precision
  if (text !== undefined) {
    const ancestors = matches.filter((el) => !ownText(el).includes(text));
    if (ancestors.length > 0) {
      const holder = target ?? findTextHolders(doc, text)[0];
      return reject(
        'ImpreciseTextMatch',
        `${describeLocator(descriptor)} matches an ancestor of the element containing "${text}"`,
        holder !== undefined ? bestLocatorFor(doc, holder) : undefined,
      );
    }
  }

  // 4. Uniqueness
  const [only, ...rest] = matches;
  if (only === undefined || rest.length > 0) {
    return reject(
      'AmbiguousMatch',
      `${describeLocator(descriptor)} matches ${String(matches.length)} elements`,
      target !== undefined ? bestLocatorFor(doc, target) : undefined,
    );
  }

  if (target !== undefined && only !== target) {
    return reject(
      'TargetMismatch',
      `${describeLocator(descriptor)} matches a different element than "${options.target ?? text ?? ''}"`,
      bestLocatorFor(doc, target),
    );
  }

  return { accepted: true, matchCount: 1, best: bestLocatorFor(doc, only) };
}

function reject(
  reason: LocatorRejectionReason,
  message: string,
  suggestion?: LocatorDescriptor,
): LocatorValidation {
  return suggestion !== undefined
    ? { accepted: false, reason, message, suggestion }
    : { accepted: false, reason, message };
}

/** Throwing variant for callers that route rejections as errors. */
export function assertLocator(
  descriptor: LocatorDescriptor,
  snapshot: string | Document,
  options: ValidateOptions = {},
): void {
  const result = validateLocator(descriptor, snapshot, options);
  if (!result.accepted) {
    throw new LocatorPolicyViolation(result.reason, descriptor, result.message, result.suggestion);
  }
}

/**
 * Highest-priority locator that uniquely identifies `el`.
 * XPath is the fallback and always exists.
 */
export function bestLocatorFor(doc: Document, el: Element): LocatorDescriptor {
  const id = el.getAttribute('id');
  if (id && countMatches(doc, { strategy: 'id', value: id }) === 1) {
    return { strategy: 'id', value: id };
  }

  const name = el.getAttribute('name');
  if (name && countMatches(doc, { strategy: 'name', value: name }) === 1) {
    return { strategy: 'name', value: name };
  }

  for (const cls of Array.from(el.classList)) {
    if (isStableClass(cls) && countMatches(doc, { strategy: 'class', value: cls }) === 1) {
      return { strategy: 'class', value: cls };
    }
  }

  const tag = el.tagName.toLowerCase();
  for (const attr of STABLE_CSS_ATTRIBUTES) {
    const value = el.getAttribute(attr);
    if (!value) continue;
    const selector = `${tag}[${attr}="${escapeAttribute(value)}"]`;
    if (countMatches(doc, { strategy: 'css', value: selector }) === 1) {
      return { strategy: 'css', value: selector };
    }
  }

  return { strategy: 'xpath', value: absoluteXPath(el) };
}

export function isStableClass(cls: string): boolean {
  if (!/^-?[_a-zA-Z][\w-]*$/.test(cls)) return false;
  if (STATE_CLASSES.has(cls.toLowerCase())) return false;
  if (/^(is|has)-/.test(cls)) return false;
  if (/^(css|sc|jsx|emotion|svelte)-/.test(cls)) return false;
  if (/(?=[0-9a-f]*\d)[0-9a-f]{5,}/i.test(cls)) return false;
  if (/\d+\D+\d+/.test(cls)) return false;
  if (/__[\w-]*\d/.test(cls)) return false;
  return true;
}

// ── Matching ─────────────────────────────────────────────────

function queryDescriptor(doc: Document, descriptor: LocatorDescriptor): Element[] {
  const { value } = descriptor;
  switch (descriptor.strategy) {
    case 'id':
      return Array.from(doc.querySelectorAll(`[id="${escapeAttribute(value)}"]`));
    case 'name':
      return Array.from(doc.querySelectorAll(`[name="${escapeAttribute(value)}"]`));
    case 'class': {
      const tokens = value.split(/\s+/).filter(Boolean);
      return Array.from(doc.querySelectorAll('[class]')).filter((el) =>
        tokens.every((t) => el.classList.contains(t)),
      );
    }
    case 'css':
      return Array.from(doc.querySelectorAll(value));
    case 'xpath':
      return evaluateXPath(doc, value);
  }
}

function evaluateXPath(doc: Document, expression: string): Element[] {
  const result = doc.evaluate(expression, doc, null, ORDERED_NODE_SNAPSHOT_TYPE, null);
  const elements: Element[] = [];
  for (let i = 0; i < result.snapshotLength; i++) {
    const node = result.snapshotItem(i);
    if (node !== null && isElement(node)) {
      elements.push(node);
    }
  }
  return elements;
}

function countMatches(doc: Document, descriptor: LocatorDescriptor): number {
  try {
    return queryDescriptor(doc, descriptor).length;
  } catch {
    return 0;
  }
}

// ── Target resolution ────────────────────────────────────────

function resolveTarget(
  doc: Document,
  hint: string | undefined,
  text: string | undefined,
  matches: readonly Element[],
): Element | undefined {
  if (hint !== undefined) {
    const hinted = findHinted(doc, hint);
    if (hinted.length === 1) return hinted[0];
  }
  if (text !== undefined) {
    const holders = findTextHolders(doc, text);
    if (holders.length === 1) return holders[0];
  }
  return matches.length === 1 ? matches[0] : undefined;
}

function findHinted(doc: Document, hint: string): Element[] {
  const needle = normalize(hint);
  return Array.from(doc.querySelectorAll('*')).filter((el) => {
    if (ownText(el).includes(needle)) return true;
    return ['placeholder', 'aria-label', 'value', 'title', 'alt'].some(
      (attr) => normalize(el.getAttribute(attr) ?? '') === needle,
    );
  });
}

function findTextHolders(doc: Document, text: string): Element[] {
  return Array.from(doc.querySelectorAll('*')).filter((el) => ownText(el).includes(text));
}

/** XPath literal the descriptor compares against element text, if any. */
function textLiteralOf(descriptor: LocatorDescriptor): string | undefined {
  if (descriptor.strategy !== 'xpath') return undefined;
  for (const pattern of TEXT_COMPARISONS) {
    const literal = pattern.exec(descriptor.value)?.[2];
    if (literal !== undefined) return normalize(literal);
  }
  return undefined;
}

// ── DOM helpers ──────────────────────────────────────────────

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function ownText(el: Element): string {
  const parts: string[] = [];
  el.childNodes.forEach((child) => {
    if (child.nodeType === TEXT_NODE) {
      parts.push(child.textContent ?? '');
    }
  });
  return normalize(parts.join(' '));
}

function normalize(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function absoluteXPath(el: Element): string {
  const segments: string[] = [];
  let node: Element | null = el;
  while (node !== null) {
    const tag = node.tagName.toLowerCase();
    let index = 1;
    let sibling = node.previousElementSibling;
    while (sibling !== null) {
      if (sibling.tagName === node.tagName) index++;
      sibling = sibling.previousElementSibling;
    }
    segments.unshift(`${tag}[${String(index)}]`);
    node = node.parentElement;
  }
  return `/${segments.join('/')}`;
}

function escapeAttribute(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function rank(strategy: LocatorStrategy): number {
  return STRATEGY_PRIORITY.indexOf(strategy);
}
