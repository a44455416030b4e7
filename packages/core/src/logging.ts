// packages/core/src/logging.ts

import { Effect, Logger, LogLevel } from "effect";

/**
 * Logging option accepted by workflow definitions and the service config.
 *
 * - undefined/false → errors only
 * - true → everything
 * - LogLevel → as given
 */
export type LoggingOption = boolean | LogLevel.LogLevel;

export const resolveLogLevel = (option?: LoggingOption): LogLevel.LogLevel => {
  if (option === undefined || option === false) {
    return LogLevel.Error;
  }
  if (option === true) {
    return LogLevel.Debug;
  }
  return option;
};

/**
 * Parse a level name from the environment ("debug", "info", ...).
 * Unknown names fall back to Info.
 */
export const parseLogLevel = (name: string): LogLevel.LogLevel =>
  LogLevel.allLevels.find(
    (level) => level.label.toLowerCase() === name.trim().toLowerCase(),
  ) ?? LogLevel.Info;

export interface ExecutionLoggingConfig {
  readonly logging?: LoggingOption;
  readonly executionId: string;
  readonly workflowKind: string;
}

/**
 * Wrap an effect with execution-scoped logging.
 *
 * Annotations propagate to every nested log; the minimum level follows the
 * definition's logging option.
 */
export const withExecutionLogging = <A, E, R>(
  effect: Effect.Effect<A, E, R>,
  config: ExecutionLoggingConfig,
): Effect.Effect<A, E, R> =>
  effect.pipe(
    Effect.annotateLogs({
      executionId: config.executionId,
      workflowKind: config.workflowKind,
    }),
    Logger.withMinimumLogLevel(resolveLogLevel(config.logging)),
  );

/**
 * Wrap an effect in a log span. Duration is added to logs inside it.
 */
export const withLogSpan = <A, E, R>(
  effect: Effect.Effect<A, E, R>,
  spanName: string,
): Effect.Effect<A, E, R> => effect.pipe(Effect.withLogSpan(spanName));
