import { logger } from './logger.js';
import { classifyError, retryPolicyFor, toBotError } from '../errors.js';
import { sleep } from './helpers.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitter: true,
};

/**
 * Retries chain reads whose error kind is retryable. Anything the retry
 * table marks as final (reverts, funds, safety) is rethrown at once.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  opts: Partial<RetryOptions> = {},
): Promise<T> {
  const options = { ...DEFAULT_OPTIONS, ...opts };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const kind = classifyError(err);
      if (attempt >= options.maxRetries || !retryPolicyFor(kind).retry) {
        throw toBotError(err, label);
      }

      let delay = Math.min(options.baseDelayMs * Math.pow(2, attempt), options.maxDelayMs);
      if (options.jitter) delay = delay * (0.5 + Math.random() * 0.5);

      logger.warn(`[retry] ${label} attempt ${attempt + 1} failed (${kind}), retrying in ${Math.round(delay)}ms`);
      await sleep(delay);
    }
  }
}
