// packages/core/src/retry/types.ts

import type { Duration } from "effect";

/**
 * Backoff strategy for calculating retry delays.
 */
export type BackoffStrategy =
  | { readonly type: "constant"; readonly delayMs: number }
  | {
      readonly type: "linear";
      readonly initialDelayMs: number;
      readonly incrementMs: number;
      readonly maxDelayMs?: number;
    }
  | {
      readonly type: "exponential";
      readonly initialDelayMs: number;
      readonly multiplier?: number;
      readonly maxDelayMs?: number;
    };

/**
 * Delay configuration for retries: a fixed duration, a backoff strategy or a
 * function of the attempt number returning milliseconds.
 */
export type RetryDelay =
  | Duration.DurationInput
  | BackoffStrategy
  | ((attempt: number) => number);

/**
 * Retry configuration for client-side calls to infrastructure.
 */
export interface BaseRetryConfig {
  /**
   * Maximum number of retry attempts (not including initial attempt).
   * Example: maxAttempts: 3 means up to 4 total executions.
   */
  readonly maxAttempts: number;

  /**
   * Delay between retries.
   *
   * @default Backoff.presets.standard()
   */
  readonly delay?: RetryDelay;

  /**
   * Whether to add random jitter to delays.
   *
   * @default false
   */
  readonly jitter?: boolean;
}
