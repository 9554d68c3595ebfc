import type { RetryPolicy } from '../types/config.js';

/**
 * Default retry policy for opening a provider stream.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialDelayMs: 100,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
};
