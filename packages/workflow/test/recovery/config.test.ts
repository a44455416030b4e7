import { describe, it, expect } from "vitest";
import { Effect, Either } from "effect";
import {
  defaultRecoveryConfig,
  createRecoveryConfig,
  validateRecoveryConfigEffect,
} from "../../src";

describe("RecoveryConfig", () => {
  it("defaults to a 30s stale threshold and 3 attempts", () => {
    expect(defaultRecoveryConfig).toEqual({
      staleThresholdMs: 30_000,
      maxRecoveryAttempts: 3,
    });
  });

  it("merges overrides with defaults", () => {
    expect(createRecoveryConfig({ maxRecoveryAttempts: 5 })).toEqual({
      staleThresholdMs: 30_000,
      maxRecoveryAttempts: 5,
    });
  });

  it("accepts a valid config", () => {
    const result = Effect.runSync(
      Effect.either(validateRecoveryConfigEffect(defaultRecoveryConfig)),
    );
    expect(Either.isRight(result)).toBe(true);
  });

  it("rejects a stale threshold under one second", () => {
    const result = Effect.runSync(
      Effect.either(
        validateRecoveryConfigEffect({ staleThresholdMs: 10, maxRecoveryAttempts: 3 }),
      ),
    );
    expect(Either.isLeft(result)).toBe(true);
  });

  it("rejects a fractional attempt count", () => {
    const result = Effect.runSync(
      Effect.either(
        validateRecoveryConfigEffect({ staleThresholdMs: 5_000, maxRecoveryAttempts: 1.5 }),
      ),
    );
    expect(Either.isLeft(result)).toBe(true);
  });
});
