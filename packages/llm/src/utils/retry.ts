import {
  NetworkError,
  RateLimitError,
  RequestTimeoutError,
  RetryExhaustedError,
  ServerError,
} from '../types/error.js';
import type { FailureKind, RetryPolicy } from '../types/config.js';

export type RetryListener = (
  error: Error,
  kind: FailureKind,
  attempt: number,
  delayMs: number,
) => void;

export type RetryOptions = {
  readonly policy: RetryPolicy;
  /** Called before each wait; `attempt` is the 1-based number of the attempt that failed. */
  readonly onRetry?: RetryListener;
};

/**
 * Returns the transient failure class of an error, or null when the error is
 * fatal and must surface without another attempt.
 */
export function classifyFailure(error: unknown): FailureKind | null {
  if (error instanceof RequestTimeoutError) {
    return 'timeout';
  }
  if (error instanceof RateLimitError) {
    return 'rate_limited';
  }
  if (error instanceof NetworkError) {
    return 'connection';
  }
  if (error instanceof ServerError) {
    return 'server';
  }
  return null;
}

export function calculateBackoff(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
): number {
  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
  return Math.min(exponentialDelay, maxDelayMs);
}

/**
 * Retries a single operation with exponential backoff.
 *
 * Attempts never overlap: each one settles before the next starts. Wrap one
 * atomic operation per call. For streams, wrap only the part that runs before
 * the first chunk reaches the caller.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, onRetry } = options;
  const { maxAttempts, initialDelayMs, maxDelayMs, backoffMultiplier, jitterRatio, retryableKinds } = policy;

  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (error) {
      attempt += 1;

      const kind = classifyFailure(error);
      if (kind === null || !retryableKinds.includes(kind) || !(error instanceof Error)) {
        throw error;
      }

      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, kind, error);
      }

      let delayMs = calculateBackoff(attempt - 1, initialDelayMs, maxDelayMs, backoffMultiplier);

      const retryAfter = error instanceof RateLimitError || error instanceof ServerError ? error.retryAfter : null;
      if (retryAfter !== null) {
        if (retryAfter > maxDelayMs) {
          // The server asks for a longer pause than the policy tolerates
          throw new RetryExhaustedError(attempt, kind, error);
        }
        delayMs = retryAfter;
      }

      const finalDelayMs = delayMs + Math.random() * jitterRatio * delayMs;

      onRetry?.(error, kind, attempt, finalDelayMs);

      await new Promise((resolve) => {
        setTimeout(resolve, finalDelayMs);
      });
    }
  }
}
