/** State handed to each attempt of a retried game-file operation. */
export type RetryContext = {
  /** 1-based. */
  attempt: number;
  startedAt: number;
  lastError?: unknown;
};

/**
 * Bounded exponential backoff for file operations that can fail for a moment
 * (a launcher or antivirus holding a game file open).
 */
export type RetryPolicy = {
  /** Total attempts including the first; 1 disables retries. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay applied as +/- random jitter. */
  jitterRatio: number;
  /** Errors refused here are rethrown at once. */
  shouldRetry: (err: unknown) => boolean;
};

export type Sleeper = (ms: number) => Promise<void>;
