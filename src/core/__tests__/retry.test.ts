import { describe, expect, it, vi } from "vitest";
import { RetryExhaustedError, exponentialBackoff, fixedDelay, withRetry } from "../retry";

describe("withRetry", () => {
  it("returns the first successful attempt", async () => {
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 3) {
        throw new Error(`attempt ${attempt} failed`);
      }
      return "done";
    });
    const sleepFn = vi.fn(async (_ms: number) => undefined);

    await expect(withRetry(fixedDelay(3, 50), operation, { sleepFn })).resolves.toBe("done");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleepFn.mock.calls).toEqual([[50], [50]]);
  });

  it("reports every failed attempt and gives up", async () => {
    const failures: Array<[number, boolean]> = [];
    const lastError = new Error("still down");

    const outcome = await withRetry(
      fixedDelay(2, 0),
      async () => {
        throw lastError;
      },
      {
        sleepFn: async () => undefined,
        onAttemptFailed: (_error, attempt, willRetry) => failures.push([attempt, willRetry]),
      },
    ).catch((error: unknown) => error);

    expect(outcome).toBeInstanceOf(RetryExhaustedError);
    expect(outcome instanceof RetryExhaustedError ? outcome.lastError : undefined).toBe(lastError);
    expect(failures).toEqual([
      [1, true],
      [2, false],
    ]);
  });

  it("rethrows at once when the policy refuses to retry", async () => {
    const fatal = new Error("fatal");
    const operation = vi.fn(async () => {
      throw fatal;
    });

    await expect(
      withRetry({ ...fixedDelay(5, 0), shouldRetry: (error) => error !== fatal }, operation, {
        sleepFn: async () => undefined,
      }),
    ).rejects.toBe(fatal);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe("exponentialBackoff", () => {
  it("doubles the delay up to the cap", () => {
    const policy = exponentialBackoff(5, 100, 300);

    expect([1, 2, 3, 4].map((attempt) => policy.delayMs(attempt))).toEqual([100, 200, 300, 300]);
  });
});
