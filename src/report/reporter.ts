import type {
  ContextSnapshot,
  RunReport,
  RunVerdict,
  Step,
} from '../schema/index.js';
import { exitCodeForVerdict } from '../schema/index.js';
import {
  JSON_OUTPUT_VERSION,
} from '../schema/jsonOutput.js';
import type {
  JsonOutput,
  JsonOutputStep,
  JsonOutputFeedback,
} from '../schema/jsonOutput.js';
import { describeLocator } from '../browser/selectors.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputStep, JsonOutputFeedback };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(
  run: RunReport,
  exitCode: number = exitCodeForVerdict(run.verdict),
): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    verdict: run.verdict,
    state: run.state,
    failure: run.failure,
    explanation: run.explanation,
    runId: run.runId,
    request: run.request,
    durationMs: run.durationMs,
    exitCode,
    steps: run.steps.map(stepToJSON),
    feedback: run.feedback.map((f) => ({ afterStep: f.afterStep, code: f.code, message: f.message })),
  };
}

function stepToJSON(step: Step): JsonOutputStep {
  return {
    index: step.index,
    kind: step.kind,
    description: step.description,
    locator: step.descriptor !== null ? describeLocator(step.descriptor) : null,
    outcome: step.outcome,
    attempts: step.attempts.length,
    diagnosticRead: step.diagnostic !== null,
    detail: step.observation?.detail ?? null,
    context: describeContext(step.context),
    failure: step.failure,
    durationMs: step.durationMs,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    sorted[k] = v;
  }
  return sorted;
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: RunReport): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# webqa Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Request** | ${escapeMarkdownCell(run.request)} |`);
  lines.push(`| **Run ID** | \`${run.runId}\` |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  lines.push(`| **Final state** | ${run.state} |`);
  lines.push(`| **Result** | **${run.verdict}** ${verdictIcon(run.verdict)} |`);
  lines.push('');
  lines.push(run.explanation);
  lines.push('');

  if (run.failure !== null) {
    lines.push(`## Failure`);
    lines.push('');
    lines.push(`**${run.failure.code}**: ${run.failure.message}`);
    lines.push('');
  }

  // Step summary table
  lines.push(`## Steps`);
  lines.push('');
  lines.push(`| # | Action | Locator | Outcome | Attempts | Detail |`);
  lines.push(`|---|--------|---------|---------|----------|--------|`);

  for (const step of run.steps) {
    const locator = step.descriptor !== null ? `\`${escapeMarkdownCell(describeLocator(step.descriptor))}\`` : '';
    const detail = escapeMarkdownCell(step.observation?.detail ?? step.failure?.message ?? '');
    lines.push(
      `| ${String(step.index)} | ${escapeMarkdownCell(step.description)} | ${locator} | ${step.outcome} | ${String(step.attempts.length)} | ${detail} |`,
    );
  }

  lines.push('');

  // Retried steps
  const retried = run.steps.filter((s) => s.attempts.length > 1);
  if (retried.length > 0) {
    lines.push(`## Retries`);
    lines.push('');
    for (const step of retried) {
      lines.push(`### Step ${String(step.index)}: ${step.description}`);
      lines.push('');
      for (const attempt of step.attempts) {
        const result = attempt.ok
          ? 'ok'
          : `${attempt.failure?.code ?? 'failed'}: ${attempt.failure?.message ?? ''}`;
        lines.push(`- attempt ${String(attempt.attempt)}: ${result}`);
      }
      if (step.diagnostic !== null) {
        lines.push(
          step.diagnostic.ok
            ? `- diagnostic read: ${String(step.diagnostic.markup?.length ?? 0)} chars`
            : `- diagnostic read failed: ${step.diagnostic.failure?.message ?? ''}`,
        );
      }
      lines.push('');
    }
  }

  // Planner feedback
  if (run.feedback.length > 0) {
    lines.push(`## Planner Feedback`);
    lines.push('');
    for (const f of run.feedback) {
      lines.push(`- after step ${String(f.afterStep)}: **${f.code}** ${f.message}`);
    }
    lines.push('');
  }

  if (run.plannerSummary !== null) {
    lines.push(`## Planner Summary`);
    lines.push('');
    lines.push(run.plannerSummary);
    lines.push('');
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

export function describeContext(context: ContextSnapshot): string {
  const window = context.windowHandle ?? '(no window)';
  if (context.frames.length === 0) return window;
  const frames = context.frames.map((f) =>
    f.by === 'id' ? String(f.frameId) : describeLocator(f.descriptor),
  );
  return [window, ...frames].join(' > ');
}

function verdictIcon(verdict: RunVerdict): string {
  switch (verdict) {
    case 'COMPLETED':
      return '[PASS]';
    case 'FAILED':
      return '[FAIL]';
    case 'INCOMPLETE':
      return '[?]';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
