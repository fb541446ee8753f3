/**
 * Backoff for GitHub REST calls.
 *
 * Rate limiting (429), server errors (5xx) and failures without a
 * response (network errors, timeouts) are retried. Any other status
 * is an answer and goes straight back to the caller, so a missing team
 * (404) costs exactly one request.
 *
 * @module github/retry
 */

import type { Logger } from '../utils/logger.js';
import { GitHubAPIError } from './errors.js';

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

export interface RetryHooks {
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export function isRetriable(error: unknown): boolean {
  if (!(error instanceof GitHubAPIError) || error.statusCode === undefined) return true;
  return error.statusCode === 429 || error.statusCode >= 500;
}

/**
 * Delay before retry number `retry` (0-based): doubling from the base,
 * scaled by a factor in [0.5, 1] and capped.
 */
export function backoffDelay(retry: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * 2 ** retry;
  return Math.min(exponential * (0.5 + random() * 0.5), policy.maxDelayMs);
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function retryRequest<T>(
  url: string,
  request: () => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks,
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);
  const sleep = hooks.sleep ?? wait;

  for (let attempt = 1; ; attempt++) {
    try {
      return await request();
    } catch (error) {
      if (attempt >= attempts || !isRetriable(error)) throw error;

      const delayMs = backoffDelay(attempt - 1, policy, hooks.random);
      hooks.logger.debug('Retrying GitHub request', {
        url,
        attempt,
        attempts,
        status: error instanceof GitHubAPIError ? error.statusCode : undefined,
        delayMs: Math.round(delayMs),
        error: error instanceof Error ? error.message : String(error),
      });
      await sleep(delayMs);
    }
  }
}
