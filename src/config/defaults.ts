/**
 * Default configuration values.
 * All values are overridable via config file or CLI flags.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 15_000,
  ACTION_TIMEOUT: 10_000,
  PLANNER_TIMEOUT: 60_000,
  TOTAL_RUN_TIMEOUT: 300_000,
  RATE_LIMIT_BACKOFF: 5_000,
} as const;

export const LIMITS = {
  MAX_STEPS: 40,
  MAX_PLAN_REVISIONS: 3,
  MAX_PLANNER_ERRORS: 2,
  MAX_LLM_ATTEMPTS: 3,
  MAX_CONCURRENCY: 4,
} as const;

export const TOKEN_GUARDS = {
  MAX_MARKUP_CHARS: 12_000,
  MAX_OBSERVATION_CHARS: 160,
  MAX_TRANSCRIPT_STEPS: 30,
} as const;
