import { z } from 'zod';

// ── LocatorDescriptor ─────────────────────────────────────────
// Declaration order is the priority order (highest first).

export const locatorStrategySchema = z.enum(['id', 'name', 'class', 'css', 'xpath']);

export type LocatorStrategy = z.infer<typeof locatorStrategySchema>;

export const STRATEGY_PRIORITY: readonly LocatorStrategy[] = locatorStrategySchema.options;

export const locatorDescriptorSchema = z.object({
  strategy: locatorStrategySchema,
  value: z.string().min(1),
});

export type LocatorDescriptor = z.infer<typeof locatorDescriptorSchema>;

// ── Cookie ────────────────────────────────────────────────────

export const cookieSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  url: z.string().url().optional(),
  domain: z.string().min(1).optional(),
  path: z.string().min(1).optional(),
});

export type Cookie = z.infer<typeof cookieSchema>;

// ── Action kinds ──────────────────────────────────────────────

export const actionKindSchema = z.enum([
  'start-session',
  'stop-session',
  'navigate',
  'switch-window',
  'switch-frame-by-id',
  'switch-frame-by-locator',
  'switch-frame-to-original',
  'click',
  'double-click',
  'right-click',
  'send-keys',
  'scroll-to',
  'add-cookie',
  'exists',
  'does-not-exist',
  'read-markup',
  'maximize-window',
  'read-url',
  'close-window',
]);

export type ActionKind = z.infer<typeof actionKindSchema>;

const baseFields = {
  description: z.string().min(1).optional(),
};

const locatorFields = {
  ...baseFields,
  descriptor: locatorDescriptorSchema,
  target: z.string().min(1).optional(),
};

const startSessionSchema = z.object({ ...baseFields, kind: z.literal('start-session') });
const stopSessionSchema = z.object({ ...baseFields, kind: z.literal('stop-session') });

const navigateSchema = z.object({
  ...baseFields,
  kind: z.literal('navigate'),
  url: z.string().url(),
});

const switchWindowSchema = z
  .object({
    ...baseFields,
    kind: z.literal('switch-window'),
    windowHandle: z.string().min(1).optional(),
    index: z.number().int().nonnegative().optional(),
  })
  .refine((a) => a.windowHandle !== undefined || a.index !== undefined, {
    message: 'switch-window requires windowHandle or index',
  });

const switchFrameByIdSchema = z.object({
  ...baseFields,
  kind: z.literal('switch-frame-by-id'),
  frameId: z.union([z.string().min(1), z.number().int().nonnegative()]),
});

const switchFrameByLocatorSchema = z.object({
  ...locatorFields,
  kind: z.literal('switch-frame-by-locator'),
});

const switchFrameToOriginalSchema = z.object({
  ...baseFields,
  kind: z.literal('switch-frame-to-original'),
});

const clickSchema = z.object({ ...locatorFields, kind: z.literal('click') });
const doubleClickSchema = z.object({ ...locatorFields, kind: z.literal('double-click') });
const rightClickSchema = z.object({ ...locatorFields, kind: z.literal('right-click') });

const sendKeysSchema = z.object({
  ...locatorFields,
  kind: z.literal('send-keys'),
  text: z.string(),
});

const scrollToSchema = z.object({ ...locatorFields, kind: z.literal('scroll-to') });

const addCookieSchema = z.object({
  ...baseFields,
  kind: z.literal('add-cookie'),
  cookie: cookieSchema,
});

const existsSchema = z.object({ ...locatorFields, kind: z.literal('exists') });
const doesNotExistSchema = z.object({ ...locatorFields, kind: z.literal('does-not-exist') });

const readMarkupSchema = z.object({ ...baseFields, kind: z.literal('read-markup') });
const maximizeWindowSchema = z.object({ ...baseFields, kind: z.literal('maximize-window') });
const readUrlSchema = z.object({ ...baseFields, kind: z.literal('read-url') });

const closeWindowSchema = z.object({
  ...baseFields,
  kind: z.literal('close-window'),
  windowHandle: z.string().min(1).optional(),
});

// refine() wraps switch-window in ZodEffects, which discriminatedUnion
// does not accept, so the union is a plain one.
export const actionSchema = z.union([
  startSessionSchema,
  stopSessionSchema,
  navigateSchema,
  switchWindowSchema,
  switchFrameByIdSchema,
  switchFrameByLocatorSchema,
  switchFrameToOriginalSchema,
  clickSchema,
  doubleClickSchema,
  rightClickSchema,
  sendKeysSchema,
  scrollToSchema,
  addCookieSchema,
  existsSchema,
  doesNotExistSchema,
  readMarkupSchema,
  maximizeWindowSchema,
  readUrlSchema,
  closeWindowSchema,
]);

export type Action = z.infer<typeof actionSchema>;

export type LocatorAction = Extract<Action, { descriptor: LocatorDescriptor }>;

export const planSchema = z.array(actionSchema).min(1);

// ── Guards ────────────────────────────────────────────────────

export function isLocatorAction(action: Action): action is LocatorAction {
  return 'descriptor' in action;
}

// ── Capability groups ─────────────────────────────────────────

export type ActionCapability =
  | 'lifecycle'
  | 'navigation'
  | 'context-switch'
  | 'interaction'
  | 'assertion'
  | 'diagnostic';

export interface ActionCatalogEntry {
  kind: ActionKind;
  capability: ActionCapability;
  fields: readonly string[];
  summary: string;
}

export const ACTION_CATALOG: readonly ActionCatalogEntry[] = [
  { kind: 'start-session', capability: 'lifecycle', fields: [], summary: 'Open the browser session. Always the first action.' },
  { kind: 'stop-session', capability: 'lifecycle', fields: [], summary: 'Close the browser session. Always the last action.' },
  { kind: 'navigate', capability: 'navigation', fields: ['url'], summary: 'Load a URL in the current window. Returns the page markup.' },
  { kind: 'switch-window', capability: 'context-switch', fields: ['windowHandle | index'], summary: 'Focus another window or tab. Returns its markup.' },
  { kind: 'switch-frame-by-id', capability: 'context-switch', fields: ['frameId'], summary: 'Enter an iframe by id, name or index.' },
  { kind: 'switch-frame-by-locator', capability: 'context-switch', fields: ['descriptor'], summary: 'Enter the iframe matched by a locator.' },
  { kind: 'switch-frame-to-original', capability: 'context-switch', fields: [], summary: 'Leave all iframes and return to the top-level document.' },
  { kind: 'click', capability: 'interaction', fields: ['descriptor'], summary: 'Click an element. Returns the markup after the click.' },
  { kind: 'double-click', capability: 'interaction', fields: ['descriptor'], summary: 'Double-click an element.' },
  { kind: 'right-click', capability: 'interaction', fields: ['descriptor'], summary: 'Right-click an element.' },
  { kind: 'send-keys', capability: 'interaction', fields: ['descriptor', 'text'], summary: 'Type text into an element.' },
  { kind: 'scroll-to', capability: 'interaction', fields: ['descriptor'], summary: 'Scroll an element into view.' },
  { kind: 'add-cookie', capability: 'interaction', fields: ['cookie'], summary: 'Add a cookie to the session.' },
  { kind: 'exists', capability: 'assertion', fields: ['descriptor'], summary: 'Assert an element is visible. Prefer over reading markup.' },
  { kind: 'does-not-exist', capability: 'assertion', fields: ['descriptor'], summary: 'Assert an element is absent.' },
  { kind: 'read-markup', capability: 'diagnostic', fields: [], summary: 'Read the cleaned markup of the current context.' },
  { kind: 'maximize-window', capability: 'navigation', fields: [], summary: 'Maximize the browser window.' },
  { kind: 'read-url', capability: 'diagnostic', fields: [], summary: 'Read the URL of the current window.' },
  { kind: 'close-window', capability: 'context-switch', fields: ['windowHandle?'], summary: 'Close a window (the active one by default).' },
];
