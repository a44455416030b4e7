// packages/core/src/retry/backoff.ts

import { Duration, Schedule } from "effect";
import type { BackoffStrategy, BaseRetryConfig, RetryDelay } from "./types";

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate the delay for a given attempt (0-indexed) before jitter.
 */
export function calculateBackoffDelay(
  strategy: BackoffStrategy,
  attempt: number,
): number {
  switch (strategy.type) {
    case "constant":
      return strategy.delayMs;

    case "linear": {
      const delay = strategy.initialDelayMs + attempt * strategy.incrementMs;
      return strategy.maxDelayMs !== undefined
        ? Math.min(delay, strategy.maxDelayMs)
        : delay;
    }

    case "exponential": {
      const multiplier = strategy.multiplier ?? 2;
      const delay = strategy.initialDelayMs * Math.pow(multiplier, attempt);
      return strategy.maxDelayMs !== undefined
        ? Math.min(delay, strategy.maxDelayMs)
        : delay;
    }
  }
}

/**
 * Full jitter: `random(0, delay)`.
 */
export function addJitter(
  delayMs: number,
  random: () => number = Math.random,
): number {
  return Math.floor(random() * delayMs);
}

const isBackoffStrategy = (delay: RetryDelay): delay is BackoffStrategy =>
  typeof delay === "object" && !Array.isArray(delay) && "type" in delay;

/**
 * Resolve a retry delay to milliseconds for the given attempt.
 */
export function resolveDelay(delay: RetryDelay, attempt: number): number {
  if (typeof delay === "function") {
    return delay(attempt);
  }
  if (isBackoffStrategy(delay)) {
    return calculateBackoffDelay(delay, attempt);
  }
  return Duration.toMillis(Duration.decode(delay));
}

// =============================================================================
// Presets
// =============================================================================

export const Backoff = {
  exponential: (
    initialDelayMs: number,
    options: { multiplier?: number; maxDelayMs?: number } = {},
  ): BackoffStrategy => ({ type: "exponential", initialDelayMs, ...options }),

  linear: (
    initialDelayMs: number,
    incrementMs: number,
    maxDelayMs?: number,
  ): BackoffStrategy => ({
    type: "linear",
    initialDelayMs,
    incrementMs,
    maxDelayMs,
  }),

  constant: (delayMs: number): BackoffStrategy => ({
    type: "constant",
    delayMs,
  }),

  presets: {
    /** 1s → 2s → 4s → 8s → 16s (max 30s) */
    standard: (): BackoffStrategy => ({
      type: "exponential",
      initialDelayMs: 1000,
      multiplier: 2,
      maxDelayMs: 30000,
    }),

    /** 100ms → 200ms → 400ms → 800ms (max 5s) */
    aggressive: (): BackoffStrategy => ({
      type: "exponential",
      initialDelayMs: 100,
      multiplier: 2,
      maxDelayMs: 5000,
    }),
  },
} as const;

// =============================================================================
// Schedule
// =============================================================================

/**
 * Build an Effect Schedule from a retry config, for use with `Effect.retry`.
 *
 * Recurs at most `maxAttempts` times; the delay before retry `n` is
 * `resolveDelay(delay, n)`, jittered when configured.
 */
export const retrySchedule = (
  config: BaseRetryConfig,
  random: () => number = Math.random,
): Schedule.Schedule<[number, number]> => {
  const delay = config.delay ?? Backoff.presets.standard();
  return Schedule.forever.pipe(
    Schedule.addDelay((attempt) => {
      const ms = resolveDelay(delay, attempt);
      return Duration.millis(config.jitter ? addJitter(ms, random) : ms);
    }),
    Schedule.intersect(Schedule.recurs(config.maxAttempts)),
  );
};
