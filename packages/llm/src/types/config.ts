export type TimeoutConfig = {
  readonly requestMs?: number;
};

/** Transient failure classes eligible for backoff retry. */
export const ALL_FAILURE_KINDS = ['timeout', 'rate_limited', 'connection', 'server'] as const;

export type FailureKind = (typeof ALL_FAILURE_KINDS)[number];

export type RetryPolicy = {
  /** Total attempts, the first one included. */
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
  /** Upper bound of the random extra delay, as a fraction of the computed delay. */
  readonly jitterRatio: number;
  readonly retryableKinds: ReadonlyArray<FailureKind>;
};
