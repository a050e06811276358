import type { Logger } from './logger.js';

/** Exponential backoff for calls that leave the process (generator APIs). */

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  retryOn?: (error: unknown) => boolean;
}

const DEFAULTS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
  retryOn: isRetryableError,
};

export async function withRetry<T>(
  fn: () => Promise<T>,
  logger: Logger,
  label: string,
  options?: RetryOptions,
): Promise<T> {
  const opts = { ...DEFAULTS, ...options };
  let delay = opts.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);

      if (attempt >= opts.maxAttempts || !opts.retryOn(err)) {
        logger.error({ attempt, label, error: message }, 'Giving up after failure');
        throw err;
      }

      logger.warn(
        { attempt, maxAttempts: opts.maxAttempts, label, error: message, nextRetryMs: delay },
        'Retrying after failure',
      );

      await sleep(delay);
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }
}

/** Rate limits, server errors and dropped connections are worth another try.
 * Errors carrying a numeric `status` are judged by it; others by their message. */
export function isRetryableError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;

  const status = 'status' in err ? err.status : undefined;
  if (typeof status === 'number') {
    return status === 429 || status >= 500;
  }

  const msg = err.message.toLowerCase();
  if (msg.includes('rate limit') || msg.includes('too many requests')) return true;
  if (msg.includes('econnreset') || msg.includes('etimedout') || msg.includes('fetch failed')) return true;
  if (msg.includes('socket hang up') || msg.includes('network')) return true;

  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
