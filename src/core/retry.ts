import { sleep } from "./time";

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before the attempt that follows `attempt` (1-based). */
  delayMs: (attempt: number) => number;
  /** Errors for which this returns false are rethrown at once. */
  shouldRetry?: (error: unknown) => boolean;
}

export interface RetryHooks {
  onAttemptFailed?: (error: unknown, attempt: number, willRetry: boolean) => void;
  sleepFn?: (ms: number) => Promise<void>;
}

export function fixedDelay(maxAttempts: number, delayMs: number): RetryPolicy {
  return { maxAttempts, delayMs: () => delayMs };
}

export function exponentialBackoff(maxAttempts: number, baseMs = 1_000, capMs = 10_000): RetryPolicy {
  return { maxAttempts, delayMs: (attempt) => Math.min(baseMs * 2 ** (attempt - 1), capMs) };
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`Gave up after ${attempts} attempt(s)`, { cause: lastError });
    this.name = "RetryExhaustedError";
  }
}

export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {},
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const pause = hooks.sleepFn ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (policy.shouldRetry && !policy.shouldRetry(error)) {
        hooks.onAttemptFailed?.(error, attempt, false);
        throw error;
      }

      const willRetry = attempt < maxAttempts;
      hooks.onAttemptFailed?.(error, attempt, willRetry);
      if (willRetry) {
        await pause(policy.delayMs(attempt));
      }
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError);
}
