import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';

import type { Cookie, FileConfig, RunReport } from '../schema/index.js';
import { ACTION_CATALOG } from '../schema/index.js';
import { createLLMClient, llmProviderSchema } from '../llm/client.js';
import type { LLMOverrides } from '../llm/client.js';
import { createLLMPlanner } from '../core/planner.js';
import { createScriptedPlanner } from '../core/scriptedPlanner.js';
import type { PlanningCollaborator } from '../core/planning.js';
import { runAgentLoop } from '../core/agentLoop.js';
import type { AgentLoopResult } from '../core/agentLoop.js';
import { generateJSON, serializeJSON } from '../report/reporter.js';
import { parsePlanYAML } from '../report/plan.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import { loadConfigFile, parseCookies } from '../config/loader.js';
import { PlannerError, errorMessage } from '../core/errors.js';
import * as log from '../utils/logger.js';
import { mapWithConcurrency } from '../utils/concurrency.js';

// ── Exit codes ───────────────────────────────────────────────

const EXIT_CLI_ERROR = 4;

// ── Shared option shapes ─────────────────────────────────────

interface RunFlags {
  json?: true;
  reportPath?: string;
  maxSteps?: string;
  headless?: true;
  timeout?: string;
  actionTimeout?: string;
  cookie?: string;
}

// ── Cancellation ─────────────────────────────────────────────

/** First Ctrl-C cancels runs (stop-session still runs); a second one exits. */
function cancelOnInterrupt(): AbortController {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    log.warn('Interrupted: cancelling run, stopping session...');
    controller.abort();
    process.once('SIGINT', () => process.exit(130));
  });
  return controller;
}

// ── Planner setup ────────────────────────────────────────────

function createPlanner(overrides: LLMOverrides): PlanningCollaborator {
  try {
    return createLLMPlanner(createLLMClient(overrides, TIMEOUTS.PLANNER_TIMEOUT));
  } catch (err) {
    throw new PlannerError(`planner setup failed: ${errorMessage(err)}`, { cause: err });
  }
}

function exitCodeFor(err: unknown): number {
  return err instanceof PlannerError ? err.exitCode : EXIT_CLI_ERROR;
}

// ── Parsing helpers ──────────────────────────────────────────

function positiveInt(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${flag} must be a positive integer (got "${raw}")`);
  }
  return n;
}

function cookiesFor(raw: string | undefined, url: string | undefined): Cookie[] | undefined {
  if (raw === undefined) return undefined;
  if (url === undefined) {
    throw new Error('--cookie needs a target URL to scope the cookies to');
  }
  return parseCookies(raw, url);
}

// ── Output ───────────────────────────────────────────────────

function emit(result: AgentLoopResult, json: boolean): void {
  if (json) {
    process.stdout.write(serializeJSON(generateJSON(result.report, result.exitCode)) + '\n');
  }
  printSummary(result.report);
}

function printSummary(report: RunReport): void {
  const retried = report.steps.filter((s) => s.attempts.length > 1).length;
  const failed = report.steps.filter(
    (s) => s.outcome === 'failure' || s.outcome === 'retried-failure',
  ).length;

  process.stderr.write(`\n--- webqa Result ---\n`);
  process.stderr.write(`Request: ${report.request.split('\n')[0] ?? ''}\n`);
  process.stderr.write(`Result:  ${report.verdict} (${report.state})\n`);
  process.stderr.write(
    `Steps:   ${String(report.steps.length)} executed, ${String(retried)} retried, ${String(failed)} failed\n`,
  );
  if (report.failure !== null) {
    process.stderr.write(`Failure: ${report.failure.code}: ${report.failure.message}\n`);
  }
  process.stderr.write(`Time:    ${(report.durationMs / 1000).toFixed(1)}s\n`);
  process.stderr.write(`Run ID:  ${report.runId}\n\n`);
}

// ── test ─────────────────────────────────────────────────────

export function registerTestCommand(program: Command): void {
  program
    .command('test')
    .description('Run a natural-language browser test against a URL')
    .argument('<url>', 'Target URL to test')
    .argument('<prompt>', 'Natural language test request')
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Custom artifact directory', '.artifacts')
    .option('--max-steps <n>', 'Override max steps', String(LIMITS.MAX_STEPS))
    .option('--headless', 'Run browser headless')
    .option(
      '--timeout <seconds>',
      'Total run timeout in seconds',
      String(TIMEOUTS.TOTAL_RUN_TIMEOUT / 1000),
    )
    .option('--action-timeout <ms>', 'Per-action driver timeout in milliseconds')
    .option('--provider <name>', 'LLM provider (anthropic, openai, mock)')
    .option('--model <name>', 'LLM model override')
    .option('--cookie <string>', 'Pre-authenticated cookie string')
    .action(
      async (
        url: string,
        prompt: string,
        opts: RunFlags & { reportPath: string; provider?: string; model?: string },
      ) => {
        try {
          const provider = opts.provider !== undefined
            ? llmProviderSchema.parse(opts.provider)
            : undefined;
          const planner = createPlanner({ provider, model: opts.model });
          const controller = cancelOnInterrupt();

          const result = await runAgentLoop(planner, {
            prompt,
            url,
            headless: opts.headless ?? false,
            outputDir: path.resolve(opts.reportPath),
            maxSteps: positiveInt(opts.maxSteps, '--max-steps'),
            totalTimeout: (positiveInt(opts.timeout, '--timeout') ?? TIMEOUTS.TOTAL_RUN_TIMEOUT / 1000) * 1000,
            actionTimeout: positiveInt(opts.actionTimeout, '--action-timeout'),
            cookies: cookiesFor(opts.cookie, url),
            signal: controller.signal,
          });

          emit(result, opts.json === true);
          process.exitCode = result.exitCode;
        } catch (err) {
          process.stderr.write(`Error: ${errorMessage(err)}\n`);
          process.exitCode = exitCodeFor(err);
        }
      },
    );
}

// ── run (config-driven multi-test) ──────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run tests defined in a .webqa.yaml config file')
    .option('--config <path>', 'Path to config file', '.webqa.yaml')
    .option('--test <name>', 'Run a single test by name')
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Custom artifact directory')
    .option('--max-steps <n>', 'Override max steps')
    .option('--headless', 'Run browser headless')
    .option('--timeout <seconds>', 'Total run timeout in seconds')
    .option('--action-timeout <ms>', 'Per-action driver timeout in milliseconds')
    .option('--cookie <string>', 'Pre-authenticated cookie string')
    .option('--concurrency <n>', 'Tests to run in parallel, each with its own browser')
    .action(
      async (opts: RunFlags & { config: string; test?: string; concurrency?: string }) => {
        let config: FileConfig;
        try {
          config = await loadConfigFile(opts.config);
        } catch (err) {
          process.stderr.write(`Config error: ${errorMessage(err)}\n`);
          process.exitCode = EXIT_CLI_ERROR;
          return;
        }

        // Filter to single test if --test specified
        const tests = opts.test !== undefined
          ? config.tests.filter((t) => t.name === opts.test)
          : config.tests;

        if (tests.length === 0) {
          process.stderr.write(
            opts.test !== undefined
              ? `No test named "${opts.test}" found in config\n`
              : 'No tests defined in config\n',
          );
          process.exitCode = EXIT_CLI_ERROR;
          return;
        }

        let planner: PlanningCollaborator;
        let concurrency: number;
        let maxSteps: number;
        let timeoutSec: number;
        let actionTimeout: number | undefined;
        try {
          // Config provider/model override env
          planner = createPlanner({ provider: config.provider, model: config.model });
          concurrency = Math.min(
            positiveInt(opts.concurrency, '--concurrency') ?? config.concurrency,
            LIMITS.MAX_CONCURRENCY,
          );
          maxSteps = positiveInt(opts.maxSteps, '--max-steps') ?? config.maxSteps;
          timeoutSec = positiveInt(opts.timeout, '--timeout') ?? config.timeout;
          actionTimeout = positiveInt(opts.actionTimeout, '--action-timeout') ?? config.actionTimeout;
        } catch (err) {
          process.stderr.write(`Error: ${errorMessage(err)}\n`);
          process.exitCode = exitCodeFor(err);
          return;
        }

        const headless = opts.headless ?? config.headless;
        const cookieString = opts.cookie ?? config.auth?.cookie;
        const reportDir = opts.reportPath ?? config.reportPath ?? '.artifacts';
        const controller = cancelOnInterrupt();

        const exitCodes = await mapWithConcurrency(tests, concurrency, async (test) => {
          const testUrl = test.url ?? config.baseUrl;
          log.section(`Test: ${test.name}`);
          try {
            const result = await runAgentLoop(planner, {
              prompt: test.prompt,
              url: testUrl,
              headless,
              outputDir: path.resolve(reportDir, test.name),
              maxSteps,
              totalTimeout: timeoutSec * 1000,
              actionTimeout,
              cookies: cookiesFor(cookieString, testUrl),
              signal: controller.signal,
            });
            emit(result, opts.json === true);
            return result.exitCode;
          } catch (err) {
            process.stderr.write(`Error [${test.name}]: ${errorMessage(err)}\n`);
            return EXIT_CLI_ERROR;
          }
        });

        process.exitCode = Math.max(0, ...exitCodes);
      },
    );
}

// ── replay ───────────────────────────────────────────────────

export function registerReplayCommand(program: Command): void {
  program
    .command('replay')
    .description('Replay a recorded plan.yaml without an LLM')
    .argument('<plan>', 'Path to a recorded plan.yaml')
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Custom artifact directory', '.artifacts/replay')
    .option('--headless', 'Run browser headless')
    .option('--action-timeout <ms>', 'Per-action driver timeout in milliseconds')
    .option('--cookie <string>', 'Cookie string to seed after start-session')
    .option('--url <url>', 'URL the cookies are scoped to')
    .action(async (planPath: string, opts: RunFlags & { reportPath: string; url?: string }) => {
      try {
        const plan = parsePlanYAML(await readFile(planPath, 'utf-8'));
        const cookies = cookiesFor(opts.cookie, opts.url);
        const controller = cancelOnInterrupt();

        const result = await runAgentLoop(
          createScriptedPlanner(plan.actions, { summary: `replayed ${planPath}` }),
          {
            prompt: plan.request,
            headless: opts.headless ?? false,
            outputDir: path.resolve(opts.reportPath),
            // room for seeded cookies and a stop-session the plan may lack
            maxSteps: plan.actions.length + (cookies?.length ?? 0) + 1,
            actionTimeout: positiveInt(opts.actionTimeout, '--action-timeout'),
            cookies,
            signal: controller.signal,
          },
        );

        emit(result, opts.json === true);
        process.exitCode = result.exitCode;
      } catch (err) {
        process.stderr.write(`Error: ${errorMessage(err)}\n`);
        process.exitCode = EXIT_CLI_ERROR;
      }
    });
}

// ── actions ──────────────────────────────────────────────────

export function registerActionsCommand(program: Command): void {
  program
    .command('actions')
    .description('List the action kinds a plan may use')
    .option('--json', 'Output JSON to stdout')
    .action((opts: { json?: true }) => {
      if (opts.json) {
        process.stdout.write(JSON.stringify(ACTION_CATALOG, null, 2) + '\n');
        return;
      }
      const width = Math.max(...ACTION_CATALOG.map((e) => e.kind.length));
      for (const entry of ACTION_CATALOG) {
        const fields = entry.fields.length > 0 ? ` {${entry.fields.join(', ')}}` : '';
        process.stdout.write(
          `${entry.kind.padEnd(width)}  [${entry.capability}] ${entry.summary}${fields}\n`,
        );
      }
    });
}
