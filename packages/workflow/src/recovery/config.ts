// packages/workflow/src/recovery/config.ts

import { Schema } from "effect";

/**
 * Configuration for boot-time recovery.
 */
export interface RecoveryConfig {
  /**
   * Time in milliseconds after which a "Running" claim is considered stale.
   * A claim older than this belonged to a process that died mid-state.
   *
   * Default: 30 seconds
   */
  readonly staleThresholdMs: number;

  /**
   * Maximum number of times a stale claim is taken back before the
   * execution fails with RecoveryExhausted.
   *
   * Default: 3 attempts
   */
  readonly maxRecoveryAttempts: number;
}

/**
 * Default recovery configuration.
 */
export const defaultRecoveryConfig: RecoveryConfig = {
  staleThresholdMs: 30_000,
  maxRecoveryAttempts: 3,
};

/**
 * Create a recovery config by merging with defaults.
 */
export function createRecoveryConfig(
  overrides?: Partial<RecoveryConfig>,
): RecoveryConfig {
  return {
    ...defaultRecoveryConfig,
    ...overrides,
  };
}

/**
 * Schema for validating recovery config.
 */
export const RecoveryConfigSchema = Schema.Struct({
  staleThresholdMs: Schema.Number.pipe(
    Schema.greaterThanOrEqualTo(1000),
    Schema.annotations({
      message: () => "staleThresholdMs must be at least 1000ms",
    }),
  ),
  maxRecoveryAttempts: Schema.Number.pipe(
    Schema.int(),
    Schema.greaterThanOrEqualTo(1),
    Schema.annotations({
      message: () => "maxRecoveryAttempts must be at least 1",
    }),
  ),
});

/**
 * Validate recovery config using Schema (Effect-based).
 */
export const validateRecoveryConfigEffect = (config: unknown) =>
  Schema.decodeUnknown(RecoveryConfigSchema)(config);
