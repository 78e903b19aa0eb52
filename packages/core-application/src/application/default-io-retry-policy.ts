import type { RetryPolicy } from "../ports/retry-policy";

// locked files and momentary permission failures, common on Windows game dirs
const TRANSIENT_IO_CODES = new Set(["EBUSY", "EAGAIN", "EPERM", "EACCES", "EMFILE", "ENFILE"]);

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function isTransientIoError(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && TRANSIENT_IO_CODES.has(code);
}

export function defaultIoRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: 3,
    baseDelayMs: 25,
    maxDelayMs: 400,
    jitterRatio: 0.2,
    shouldRetry: isTransientIoError,
    ...overrides,
  };
}
