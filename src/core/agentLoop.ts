import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Cookie, RunReport } from '../schema/index.js';
import { exitCodeForVerdict } from '../schema/index.js';
import type { AutomationDriver } from '../browser/driver.js';
import { createPlaywrightDriver } from '../browser/runner.js';
import { generateJSON, generateMarkdown, serializeJSON } from '../report/reporter.js';
import { generatePlanYAML } from '../report/plan.js';
import * as log from '../utils/logger.js';
import { errorMessage } from './errors.js';
import { createDispatcher } from './dispatcher.js';
import type { PlanningCollaborator } from './planning.js';
import { runPlan } from './runBuilder.js';

// ── Public types ─────────────────────────────────────────────

export interface AgentLoopConfig {
  prompt: string;
  /** Appended to the request so the planner knows where to start. */
  url?: string | undefined;
  headless: boolean;
  outputDir: string;
  maxSteps?: number | undefined;
  totalTimeout?: number | undefined;
  actionTimeout?: number | undefined;
  cookies?: readonly Cookie[] | undefined;
  signal?: AbortSignal | undefined;
  /** Defaults to a Playwright driver. */
  driver?: AutomationDriver | undefined;
}

export interface AgentLoopResult {
  report: RunReport;
  exitCode: number;
}

export const ARTIFACT_FILES = {
  summary: 'summary.json',
  report: 'report.md',
  plan: 'plan.yaml',
} as const;

// ── Main agent loop ──────────────────────────────────────────

/**
 * One complete run: build the driver, drive the planner through the
 * run builder and write summary.json, report.md and plan.yaml.
 */
export async function runAgentLoop(
  planner: PlanningCollaborator,
  config: AgentLoopConfig,
): Promise<AgentLoopResult> {
  await mkdir(config.outputDir, { recursive: true });

  const driver = config.driver ?? createPlaywrightDriver({
    headless: config.headless,
    actionTimeout: config.actionTimeout,
  });
  const dispatcher = createDispatcher(driver, { actionTimeout: config.actionTimeout });

  const request = config.url !== undefined
    ? `${config.prompt}\n\nStart URL: ${config.url}`
    : config.prompt;

  const report = await runPlan(planner, dispatcher, {
    request,
    maxSteps: config.maxSteps,
    totalTimeout: config.totalTimeout,
    cookies: config.cookies,
    signal: config.signal,
  });

  const exitCode = exitCodeForVerdict(report.verdict);

  await writeArtifact(
    config.outputDir,
    ARTIFACT_FILES.summary,
    serializeJSON(generateJSON(report, exitCode)) + '\n',
  );
  await writeArtifact(config.outputDir, ARTIFACT_FILES.report, generateMarkdown(report));
  await writeArtifact(config.outputDir, ARTIFACT_FILES.plan, generatePlanYAML(report));

  return { report, exitCode };
}

// ── Artifact writing ─────────────────────────────────────────

async function writeArtifact(outputDir: string, name: string, content: string): Promise<void> {
  try {
    await writeFile(path.join(outputDir, name), content, 'utf-8');
  } catch (err) {
    log.warn(`Could not write ${name}: ${errorMessage(err)}`);
  }
}
