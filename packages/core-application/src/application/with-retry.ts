import type { RetryContext, RetryPolicy, Sleeper } from "../ports/retry-policy";

export function computeBackoffMs(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exp = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jitter = exp * policy.jitterRatio * (random() * 2 - 1);
  return Math.max(0, Math.round(exp + jitter));
}

/**
 * Runs fn until it succeeds, the policy refuses the error, or maxAttempts is
 * reached. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (ctx: RetryContext) => Promise<T>,
  policy: RetryPolicy,
  sleeper: Sleeper
): Promise<T> {
  const ctx: RetryContext = { attempt: 1, startedAt: Date.now() };

  for (;;) {
    try {
      return await fn(ctx);
    } catch (err) {
      ctx.lastError = err;
      if (ctx.attempt >= policy.maxAttempts || !policy.shouldRetry(err)) throw err;

      await sleeper(computeBackoffMs(policy, ctx.attempt));
      ctx.attempt += 1;
    }
  }
}

/** Runs a single file operation under the I/O retry policy. */
export type IoRunner = <T>(fn: () => Promise<T>) => Promise<T>;

export function createIoRunner(policy: RetryPolicy, sleeper: Sleeper): IoRunner {
  return (fn) => withRetry(() => fn(), policy, sleeper);
}
