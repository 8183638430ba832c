import { LLMError } from './errors.js';
import { sleep } from './cancellation.js';
import type { RetryPolicy } from './types.js';
import * as log from '../utils/logger.js';

export type RetryOptions = RetryPolicy;

const DEFAULTS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

export interface RetryHooks {
  signal?: AbortSignal;
  onRetry?(attempt: number, waitMs: number, err: LLMError): void;
  /** Source of jitter in [0, 1); injectable so tests get deterministic delays. */
  random?: () => number;
}

/**
 * Retry with exponential backoff + jitter.
 * Only LLMErrors flagged retryable (network, timeout, rate_limit) are retried;
 * a provider-supplied retry-after hint replaces the computed delay.
 * Backoff sleeps are abortable through `hooks.signal`.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  opts: Partial<RetryOptions> = {},
  hooks: RetryHooks = {},
): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs } = { ...DEFAULTS, ...opts };
  const random = hooks.random ?? Math.random;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxRetries || !isRetryable(err) || hooks.signal?.aborted) {
        throw err;
      }

      const backoffDelay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
      const jitter = backoffDelay * 0.5 * random();
      const waitMs = err.retryAfterMs !== undefined
        ? Math.min(err.retryAfterMs, maxDelayMs)
        : backoffDelay + jitter;

      log.warn(`Retry ${attempt + 1}/${maxRetries} after ${Math.round(waitMs)}ms: ${err.message}`);
      hooks.onRetry?.(attempt + 1, waitMs, err);
      await sleep(waitMs, hooks.signal);
    }
  }
}

export function isRetryable(err: unknown): err is LLMError {
  return err instanceof LLMError && err.retryable;
}
