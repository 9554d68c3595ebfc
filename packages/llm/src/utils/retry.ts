import { ProviderError } from '../types/error.js';
import type { RetryPolicy } from '../types/config.js';

export type RetryOptions = {
  readonly policy: RetryPolicy;
  readonly onRetry?: (error: ProviderError, attempt: number, delayMs: number) => void;
  /** Once aborted, the pending error is rethrown instead of waiting it out. */
  readonly signal?: AbortSignal;
};

/**
 * Delay before retry number `attempt + 1`, without jitter.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.initialDelayMs * policy.backoffMultiplier ** attempt, policy.maxDelayMs);
}

/**
 * How long to wait before retrying after `error`, or null to give up.
 * A provider-requested delay replaces the backoff but never exceeds
 * `maxDelayMs`; asking for more ends the retries.
 */
export function retryDelay(error: unknown, attempt: number, policy: RetryPolicy): number | null {
  if (!(error instanceof ProviderError) || !error.retryable || attempt >= policy.maxRetries) {
    return null;
  }
  if (error.retryAfterMs !== null && error.retryAfterMs > policy.maxDelayMs) {
    return null;
  }
  const base = error.retryAfterMs ?? backoffDelay(attempt, policy);
  // up to 25% jitter
  return base + Math.random() * 0.25 * base;
}

function wait(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });

    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
  });
}

/**
 * Runs `fn`, retrying retryable provider errors with exponential backoff.
 *
 * Only wrap the establishment of a stream, never its iteration: once chunks
 * have reached the caller a retry would replay them.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { policy, onRetry, signal } = options;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      const delayMs = retryDelay(error, attempt, policy);
      if (delayMs === null || !(error instanceof ProviderError) || signal?.aborted) {
        throw error;
      }

      onRetry?.(error, attempt + 1, delayMs);
      await wait(delayMs, signal);

      if (signal?.aborted) {
        throw error;
      }
    }
  }
}
