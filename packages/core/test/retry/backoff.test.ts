import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import {
  Backoff,
  addJitter,
  calculateBackoffDelay,
  resolveDelay,
  retrySchedule,
} from "../../src";

describe("backoff", () => {
  it("grows exponentially up to the cap", () => {
    const strategy = Backoff.exponential(100, { maxDelayMs: 500 });
    expect([0, 1, 2, 3].map((n) => calculateBackoffDelay(strategy, n))).toEqual([
      100, 200, 400, 500,
    ]);
  });

  it("grows linearly", () => {
    const strategy = Backoff.linear(1000, 500);
    expect([0, 1, 2].map((n) => calculateBackoffDelay(strategy, n))).toEqual([
      1000, 1500, 2000,
    ]);
  });

  it("keeps a constant delay", () => {
    expect(calculateBackoffDelay(Backoff.constant(250), 7)).toBe(250);
  });

  it("follows the standard preset", () => {
    const strategy = Backoff.presets.standard();
    expect([0, 4, 5].map((n) => calculateBackoffDelay(strategy, n))).toEqual([
      1000, 16000, 30000,
    ]);
  });

  it("applies full jitter", () => {
    expect(addJitter(1000, () => 0.5)).toBe(500);
    expect(addJitter(1000, () => 0)).toBe(0);
  });

  it("resolves durations, strategies and functions", () => {
    expect(resolveDelay("2 seconds", 0)).toBe(2000);
    expect(resolveDelay(Backoff.constant(300), 3)).toBe(300);
    expect(resolveDelay((attempt) => attempt * 10, 3)).toBe(30);
  });
});

describe("retrySchedule", () => {
  it("retries up to maxAttempts times", async () => {
    let calls = 0;
    const result = await Effect.runPromise(
      Effect.suspend(() => {
        calls++;
        return calls < 3 ? Effect.fail("flaky") : Effect.succeed("ok");
      }).pipe(
        Effect.retry(retrySchedule({ maxAttempts: 5, delay: Backoff.constant(0) })),
      ),
    );
    expect(result).toBe("ok");
    expect(calls).toBe(3);
  });

  it("gives up after maxAttempts retries", async () => {
    let calls = 0;
    const error = await Effect.runPromise(
      Effect.flip(
        Effect.suspend(() => {
          calls++;
          return Effect.fail(`failure ${calls}`);
        }).pipe(
          Effect.retry(retrySchedule({ maxAttempts: 2, delay: Backoff.constant(0) })),
        ),
      ),
    );
    expect(error).toBe("failure 3");
    expect(calls).toBe(3);
  });
});
