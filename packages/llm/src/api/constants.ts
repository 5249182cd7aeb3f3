import { ALL_FAILURE_KINDS, type RetryPolicy } from '../types/config.js';

/**
 * Default retry policy for API calls: up to six attempts, exponential backoff
 * from one second, capped at a minute.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 6,
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
  jitterRatio: 0.25,
  retryableKinds: ALL_FAILURE_KINDS,
};
