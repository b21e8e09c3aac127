import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { LLMClient } from '../llm/client.js';
import type { PlanFeedback, Step } from '../schema/transcript.js';
import { ACTION_CATALOG } from '../schema/action.js';
import { TOKEN_GUARDS } from '../config/defaults.js';
import { truncateMarkup } from '../browser/markup.js';
import { describeLocator } from '../browser/selectors.js';
import * as log from '../utils/logger.js';
import { PlannerError } from './errors.js';
import type { PlanProposal, PlanningCollaborator, PlanningInput } from './planning.js';
import { planProposalSchema } from './planning.js';

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

// ── Pre-validation fixups ────────────────────────────────────
// Models drift toward snake_case method names and driver-style locator
// constants. Map them onto the action schema before Zod validation.

const KIND_ALIASES: Readonly<Record<string, string>> = {
  start: 'start-session',
  start_session: 'start-session',
  stop: 'stop-session',
  stop_session: 'stop-session',
  navigate_to_url: 'navigate',
  goto: 'navigate',
  change_window: 'switch-window',
  switch_window: 'switch-window',
  change_frame_by_id: 'switch-frame-by-id',
  change_frame_by_locator: 'switch-frame-by-locator',
  change_frame_to_original: 'switch-frame-to-original',
  switch_to_default_content: 'switch-frame-to-original',
  click: 'click',
  click_element: 'click',
  double_click: 'double-click',
  right_click: 'right-click',
  send_keys: 'send-keys',
  type: 'send-keys',
  fill: 'send-keys',
  scroll_to_element: 'scroll-to',
  scroll_to: 'scroll-to',
  add_cookie: 'add-cookie',
  exists: 'exists',
  element_exists: 'exists',
  does_not_exist: 'does-not-exist',
  get_html_source: 'read-markup',
  read_markup: 'read-markup',
  maximize_window: 'maximize-window',
  return_current_url: 'read-url',
  read_url: 'read-url',
  close_window: 'close-window',
};

const STRATEGY_ALIASES: Readonly<Record<string, string>> = {
  id: 'id',
  name: 'name',
  class: 'class',
  class_name: 'class',
  classname: 'class',
  css: 'css',
  css_selector: 'css',
  'css selector': 'css',
  xpath: 'xpath',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fixupRawProposal(parsed: unknown): unknown {
  if (!isRecord(parsed)) return parsed;

  // A bare action without the envelope
  if (!('done' in parsed) && ('kind' in parsed || 'type' in parsed)) {
    return fixupRawProposal({ done: false, action: parsed });
  }

  const action = parsed['action'];
  if (parsed['done'] === false && isRecord(action)) {
    if (typeof action['kind'] !== 'string' && typeof action['type'] === 'string') {
      action['kind'] = action['type'];
      delete action['type'];
    }

    const kind = action['kind'];
    if (typeof kind === 'string') {
      const normalized = kind.trim().toLowerCase();
      action['kind'] = KIND_ALIASES[normalized] ?? normalized.replace(/_/g, '-');
    }

    // locator_type / locator_value pairs
    if (!isRecord(action['descriptor'])) {
      const strategy = action['locator_type'] ?? action['strategy'];
      const locatorValue = action['locator_value'] ?? action['locator'];
      const value = typeof locatorValue === 'string' ? locatorValue : action['value'];
      if (typeof strategy === 'string' && typeof value === 'string') {
        // send_keys(locator_type, locator_value, value): value is the text
        if (
          action['kind'] === 'send-keys'
          && typeof locatorValue === 'string'
          && typeof action['value'] === 'string'
          && action['text'] === undefined
        ) {
          action['text'] = action['value'];
        }
        action['descriptor'] = { strategy, value };
        delete action['locator_type'];
        delete action['locator_value'];
        delete action['locator'];
        delete action['strategy'];
        delete action['value'];
      }
    }

    const descriptor = action['descriptor'];
    const rawStrategy = isRecord(descriptor) ? descriptor['strategy'] : undefined;
    if (isRecord(descriptor) && typeof rawStrategy === 'string') {
      const strategy = rawStrategy.trim().toLowerCase();
      descriptor['strategy'] = STRATEGY_ALIASES[strategy] ?? strategy;
    }
  }

  if (parsed['done'] === true && !Array.isArray(parsed['unfulfilled'])) {
    parsed['unfulfilled'] = [];
  }

  return parsed;
}

// ── Planner ──────────────────────────────────────────────────

/**
 * LLM-backed planning collaborator. One model call per proposal, plus
 * one repair call when the first answer does not parse.
 */
export function createLLMPlanner(client: LLMClient): PlanningCollaborator {
  return {
    async nextAction(input: PlanningInput): Promise<PlanProposal> {
      const systemPrompt = await buildSystemPrompt();
      const userPrompt = buildUserPrompt(input);

      const raw = await client.generate(systemPrompt, userPrompt);
      const first = tryParse(raw);
      if (first.ok) {
        logProposal(first.proposal);
        return first.proposal;
      }

      log.warn(`Planner parse failed, attempting repair: ${first.error}`);
      const repairPrompt = await buildRepairPrompt(raw, first.error);
      const repaired = await client.generate(systemPrompt, repairPrompt);

      const second = tryParse(repaired);
      if (second.ok) {
        logProposal(second.proposal);
        return second.proposal;
      }

      throw new PlannerError(`Planner failed after repair attempt: ${second.error}`);
    },
  };
}

function logProposal(proposal: PlanProposal): void {
  if (proposal.done) {
    log.llm(`Planner: done (${proposal.summary})`);
  } else {
    log.llm(`Planner: ${proposal.action.kind}`);
  }
}

// ── Template rendering ───────────────────────────────────────

async function buildSystemPrompt(): Promise<string> {
  const template = await readFile(path.join(PROMPTS_DIR, 'planner.txt'), 'utf-8');
  const catalog = ACTION_CATALOG
    .map((entry) => {
      const fields = entry.fields.length > 0 ? ` {${entry.fields.join(', ')}}` : '';
      return `- ${entry.kind}${fields}: ${entry.summary}`;
    })
    .join('\n');
  return template.replace('{{actions}}', catalog);
}

export function buildUserPrompt(input: PlanningInput): string {
  const frames = input.context.frames.length === 0
    ? 'top-level document'
    : input.context.frames
        .map((f) => (f.by === 'id' ? `frame ${String(f.frameId)}` : `frame ${describeLocator(f.descriptor)}`))
        .join(' > ');

  const markup = input.markup !== undefined
    ? truncateMarkup(input.markup, TOKEN_GUARDS.MAX_MARKUP_CHARS)
    : '(no markup captured yet)';

  return [
    `REQUEST:\n${input.request}`,
    `RUN STATE: ${input.state}`,
    `CONTEXT: window ${input.context.windowHandle ?? '(none)'}, ${frames}`,
    `STEPS REMAINING: ${String(input.remainingSteps)}`,
    `TRANSCRIPT:\n${formatSteps(input.steps)}`,
    `FEEDBACK ON REJECTED PROPOSALS:\n${formatFeedback(input.feedback)}`,
    `CURRENT MARKUP:\n${markup}`,
  ].join('\n\n');
}

async function buildRepairPrompt(previousOutput: string, error: string): Promise<string> {
  const template = await readFile(path.join(PROMPTS_DIR, 'planner_repair.txt'), 'utf-8');
  return template
    .replace('{{error}}', error)
    .replace('{{previousOutput}}', previousOutput);
}

// ── History formatting ──────────────────────────────────────

function formatSteps(steps: readonly Step[]): string {
  if (steps.length === 0) return '(no steps executed yet)';

  return steps
    .slice(-TOKEN_GUARDS.MAX_TRANSCRIPT_STEPS)
    .map((step) => {
      const icon = step.outcome === 'success' || step.outcome === 'retried-success' ? '✓' : '✗';
      const note = step.observation?.detail ?? step.failure?.message ?? '';
      return `${String(step.index)}. [${step.kind}] ${step.description} → ${icon} ${note.slice(0, TOKEN_GUARDS.MAX_OBSERVATION_CHARS)}`;
    })
    .join('\n');
}

function formatFeedback(feedback: readonly PlanFeedback[]): string {
  if (feedback.length === 0) return '(none)';
  return feedback
    .map((f) => `- after step ${String(f.afterStep)}: ${f.code}: ${f.message}`)
    .join('\n');
}

// ── JSON extraction + validation ─────────────────────────────

type ParseResult =
  | { ok: true; proposal: PlanProposal }
  | { ok: false; error: string };

export function tryParse(raw: string): ParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJSON(raw));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: `Invalid JSON: ${message}` };
  }

  const result = planProposalSchema.safeParse(fixupRawProposal(parsed));
  if (!result.success) {
    return { ok: false, error: result.error.message };
  }
  return { ok: true, proposal: result.data };
}

export function extractJSON(raw: string): string {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return raw.trim();
}
