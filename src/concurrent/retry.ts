import type { ScopedLogger } from '../utils/logger.js';

/**
 * Retry with Retry-After header support
 *
 * Only rate-limit errors are retried. Uses the Retry-After header when the
 * provider sends one, exponential backoff (2s, 4s, 8s, ...) otherwise, capped
 * at 60 seconds (the token window).
 */

const MAX_WAIT_SECONDS = 60;

export interface RetryOptions {
  maxRetries: number;
  isRateLimitError: (error: unknown) => boolean;
  retryAfter: (error: unknown) => string | null | undefined;
  logger: ScopedLogger;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Seconds to wait before the next attempt (attempt is zero-based)
 */
export function backoffSeconds(attempt: number, retryAfter: string | null | undefined): number {
  const fromHeader = retryAfter ? Number.parseInt(retryAfter, 10) : Number.NaN;
  const waitSeconds = Number.isNaN(fromHeader) ? Math.pow(2, attempt + 1) : fromHeader;
  return Math.min(waitSeconds, MAX_WAIT_SECONDS);
}

export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!options.isRateLimitError(error) || attempt >= options.maxRetries) {
        throw error;
      }

      const retryAfter = options.retryAfter(error);
      const waitSeconds = backoffSeconds(attempt, retryAfter);
      options.logger.info('Rate limit hit, retrying', {
        retryAfter: retryAfter ?? null,
        waitSeconds,
        attempt: attempt + 1,
        maxRetries: options.maxRetries,
      });

      await sleep(waitSeconds * 1000);
    }
  }
}
