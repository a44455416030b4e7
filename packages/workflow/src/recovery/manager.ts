// packages/workflow/src/recovery/manager.ts

import { Context, Effect, Layer } from "effect";
import { RuntimeAdapter, SchedulerAdapter } from "@labelflow/core";
import { ErrorKinds, OrchestratorError } from "../errors";
import { isTerminalStatus, reclaim } from "../state/transitions";
import type { ExecutionRecord } from "../state/types";
import { ExecutionStore } from "../store/execution-store";
import { WorkflowExecutor } from "../executor/executor";
import { WorkflowOrchestrator } from "../orchestrator/orchestrator";
import { type RecoveryConfig, defaultRecoveryConfig } from "./config";

// =============================================================================
// Types
// =============================================================================

/**
 * What recovery did to one active execution.
 */
export type RecoveryAction =
  | "driven"
  | "rearmed"
  | "fired"
  | "reclaimed"
  | "exhausted"
  | "archived"
  | "skipped"
  | "failed";

/**
 * Summary of one recovery pass.
 */
export interface RecoveryResult {
  readonly actions: ReadonlyArray<{
    readonly executionId: string;
    readonly action: RecoveryAction;
  }>;
}

// =============================================================================
// Service Interface
// =============================================================================

/**
 * RecoveryManager service interface.
 *
 * Run once when the process boots, before serving traffic.
 */
export interface RecoveryManagerService {
  /**
   * Resume every active execution from its persisted state:
   * - Ready: driven
   * - Waiting: timer re-armed, or fired now when overdue
   * - Running past the stale threshold: reclaimed and driven, or failed
   *   with RecoveryExhausted once the attempts are used up
   */
  readonly recover: () => Effect.Effect<RecoveryResult, OrchestratorError>;
}

/**
 * Effect service tag for RecoveryManager.
 */
export class RecoveryManager extends Context.Tag("@labelflow/RecoveryManager")<
  RecoveryManager,
  RecoveryManagerService
>() {}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create the RecoveryManager service implementation.
 */
export const createRecoveryManager = (
  config: RecoveryConfig = defaultRecoveryConfig,
) =>
  Effect.gen(function* () {
    const store = yield* ExecutionStore;
    const scheduler = yield* SchedulerAdapter;
    const runtime = yield* RuntimeAdapter;
    const executor = yield* WorkflowExecutor;
    const orchestrator = yield* WorkflowOrchestrator;

    const recoverOne = (record: ExecutionRecord, now: number) =>
      Effect.gen(function* () {
        const { executionId } = record;
        const status = record.status;

        if (isTerminalStatus(status)) {
          // Crashed between the final write and the archive move
          yield* store.archive(record);
          return "archived" as const;
        }

        switch (status._tag) {
          case "Ready": {
            yield* orchestrator.drive(executionId);
            return "driven" as const;
          }

          case "Waiting": {
            if (status.resumeAt <= now) {
              yield* orchestrator.handleTimer(executionId);
              return "fired" as const;
            }
            yield* scheduler.schedule(executionId, status.resumeAt);
            return "rearmed" as const;
          }

          case "Running": {
            const staleFor = now - status.claimedAt;
            if (staleFor < config.staleThresholdMs) {
              return "skipped" as const;
            }

            if (record.recoveryAttempts >= config.maxRecoveryAttempts) {
              yield* Effect.logError("Recovery attempts exhausted").pipe(
                Effect.annotateLogs({
                  attempts: record.recoveryAttempts,
                  alert: true,
                }),
              );
              yield* executor.abort(
                record,
                ErrorKinds.RecoveryExhausted,
                `Stale claim not recovered after ${record.recoveryAttempts} attempts`,
              );
              return "exhausted" as const;
            }

            yield* Effect.logWarning("Reclaiming stale execution").pipe(
              Effect.annotateLogs({
                staleForMs: staleFor,
                attempt: record.recoveryAttempts + 1,
              }),
            );
            yield* store.replace(record, yield* reclaim(record, now));
            yield* orchestrator.drive(executionId);
            return "reclaimed" as const;
          }
        }
      }).pipe(
        Effect.catchAll((error) =>
          Effect.logError("Recovery failed for execution").pipe(
            Effect.annotateLogs({ error: error.message }),
            Effect.as("failed" as const),
          ),
        ),
        Effect.annotateLogs({
          executionId: record.executionId,
          workflowKind: record.workflowKind,
        }),
        Effect.map((action) => ({
          executionId: record.executionId,
          action,
        })),
      );

    const service: RecoveryManagerService = {
      recover: () =>
        Effect.gen(function* () {
          const records = yield* store.listActive();
          const now = yield* runtime.now();
          const actions = yield* Effect.forEach(records, (record) =>
            recoverOne(record, now),
          );
          yield* Effect.logInfo("Recovery pass finished").pipe(
            Effect.annotateLogs({ executions: actions.length }),
          );
          return { actions };
        }).pipe(
          Effect.mapError(
            (cause) => new OrchestratorError({ operation: "recover", cause }),
          ),
        ),
    };

    return service;
  });

/**
 * Create a RecoveryManager layer with the given config.
 */
export const RecoveryManagerLayer = (config?: RecoveryConfig) =>
  Layer.effect(RecoveryManager, createRecoveryManager(config));
