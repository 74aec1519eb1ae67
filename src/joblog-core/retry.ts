/**
 * Retry loop with capped exponential backoff.
 *
 * Delay after failed attempt n (1-based) is min(maxDelayMs, baseDelayMs * 2^(n-1)).
 * The last error is rethrown unchanged once attempts run out or an error is
 * not retryable.
 */

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  isRetryable: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

export async function withRetry<T>(
  tag: string,
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!options.isRetryable(err) || attempt >= options.attempts) {
        throw err;
      }

      const delayMs = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      const message = err instanceof Error ? err.message : String(err);
      console.warn(
        `[RETRY] ${tag} attempt ${attempt}/${options.attempts} failed (${message}), retrying in ${delayMs}ms`,
      );
      await wait(delayMs);
    }
  }
}
