import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { delay } from '../utils/timeout.js';

/** Thrown by a provider call the API turned away with a 429. */
export class RateLimited extends Error {
  constructor(
    readonly provider: string,
    readonly retryAfterMs?: number,
  ) {
    super(`${provider} API rate limited the request`);
    this.name = 'RateLimited';
  }
}

export interface RetryOptions {
  attempts?: number | undefined;
  backoffMs?: number | undefined;
}

/**
 * Run a provider call, waiting out rate limits with linear backoff.
 * A Retry-After hint from the API wins over the backoff.
 */
export async function retryRateLimited<T>(
  call: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const attempts = options.attempts ?? LIMITS.MAX_LLM_ATTEMPTS;
  const backoffMs = options.backoffMs ?? TIMEOUTS.RATE_LIMIT_BACKOFF;

  for (let attempt = 1; ; attempt++) {
    try {
      return await call();
    } catch (err) {
      if (!(err instanceof RateLimited)) throw err;
      if (attempt >= attempts) {
        throw new Error(`${err.provider} API: still rate limited after ${String(attempts)} attempts`, {
          cause: err,
        });
      }

      const waitMs = err.retryAfterMs ?? attempt * backoffMs;
      log.warn(`[llm] Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await delay(waitMs);
    }
  }
}
