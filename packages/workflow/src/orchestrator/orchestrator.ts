// packages/workflow/src/orchestrator/orchestrator.ts

import { Context, Effect, Layer } from "effect";
import { v4 as uuidv4 } from "uuid";
import {
  RuntimeAdapter,
  createExecutionBaseEvent,
  emitEvent,
} from "@labelflow/core";
import { ExecutionNotFoundError, OrchestratorError } from "../errors";
import { resume } from "../state/transitions";
import type { ExecutionRecord, StatusTag } from "../state/types";
import { ExecutionStore } from "../store/execution-store";
import { WorkflowExecutor } from "../executor/executor";
import { WorkflowRegistry } from "./registry";

// =============================================================================
// Types
// =============================================================================

export interface StartOptions {
  readonly kind: string;
  readonly input: unknown;
  /**
   * Deterministic id. Starting twice with the same id returns the existing
   * execution instead of creating another.
   */
  readonly executionId?: string;
}

export interface StartResult {
  readonly executionId: string;
  /** False when the id already existed */
  readonly created: boolean;
  readonly status: StatusTag;
}

// =============================================================================
// Service Interface
// =============================================================================

/**
 * WorkflowOrchestrator service interface.
 *
 * The main API for starting and resuming executions.
 */
export interface WorkflowOrchestratorService {
  /**
   * Create an execution and drive it until it waits or ends.
   */
  readonly start: (
    options: StartOptions,
  ) => Effect.Effect<StartResult, OrchestratorError>;

  /**
   * Dispatch states while the execution is Ready.
   * Returns the record where it stopped (active or archived).
   */
  readonly drive: (
    executionId: string,
  ) => Effect.Effect<ExecutionRecord | undefined, OrchestratorError>;

  /**
   * Resume a Waiting execution whose timer fired.
   * Stale or duplicate timers are ignored.
   */
  readonly handleTimer: (
    executionId: string,
  ) => Effect.Effect<void, OrchestratorError>;

  /**
   * Read an execution, active or archived.
   */
  readonly getExecution: (
    executionId: string,
  ) => Effect.Effect<ExecutionRecord, ExecutionNotFoundError | OrchestratorError>;
}

/**
 * Effect service tag for WorkflowOrchestrator.
 */
export class WorkflowOrchestrator extends Context.Tag(
  "@labelflow/WorkflowOrchestrator",
)<WorkflowOrchestrator, WorkflowOrchestratorService>() {}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create the WorkflowOrchestrator service implementation.
 */
export const createWorkflowOrchestrator = Effect.gen(function* () {
  const store = yield* ExecutionStore;
  const runtime = yield* RuntimeAdapter;
  const executor = yield* WorkflowExecutor;
  const registry = yield* WorkflowRegistry;

  const find = (executionId: string) =>
    Effect.gen(function* () {
      const active = yield* store.load(executionId);
      return active ?? (yield* store.loadArchived(executionId));
    });

  const drive = (executionId: string) =>
    Effect.gen(function* () {
      let record = yield* store.load(executionId);
      while (record !== undefined && record.status._tag === "Ready") {
        record = yield* executor.step(record);
      }
      return record ?? (yield* store.loadArchived(executionId));
    }).pipe(
      Effect.catchTag("ConflictError", (error) =>
        Effect.logDebug("Lease lost to another dispatcher").pipe(
          Effect.annotateLogs({ executionId, version: error.expectedVersion }),
          Effect.zipRight(find(executionId)),
        ),
      ),
      Effect.mapError(
        (cause) =>
          new OrchestratorError({ operation: "drive", executionId, cause }),
      ),
    );

  const service: WorkflowOrchestratorService = {
    start: ({ kind, input, executionId }) =>
      Effect.gen(function* () {
        const definition = yield* registry.get(kind);
        const id = executionId ?? uuidv4();

        const existing = yield* find(id);
        if (existing !== undefined) {
          return {
            executionId: id,
            created: false,
            status: existing.status._tag,
          } satisfies StartResult;
        }

        const now = yield* runtime.now();
        const record: ExecutionRecord = {
          executionId: id,
          workflowKind: kind,
          currentState: definition.startAt,
          context: { input: input === undefined ? null : input, outputs: [] },
          attemptCount: 0,
          status: { _tag: "Ready" },
          version: 0,
          recoveryAttempts: 0,
          createdAt: now,
          updatedAt: now,
        };

        const created = yield* store.create(record);
        if (!created) {
          const raced = yield* find(id);
          return {
            executionId: id,
            created: false,
            status: raced?.status._tag ?? "Ready",
          } satisfies StartResult;
        }

        yield* Effect.logInfo("Execution started").pipe(
          Effect.annotateLogs({ executionId: id, workflowKind: kind }),
        );
        yield* emitEvent({
          ...createExecutionBaseEvent(id, kind, now),
          type: "execution.started",
          input: record.context.input,
        });

        const final = yield* drive(id);
        return {
          executionId: id,
          created: true,
          status: final?.status._tag ?? "Ready",
        } satisfies StartResult;
      }).pipe(
        Effect.mapError((cause) =>
          cause._tag === "OrchestratorError"
            ? cause
            : new OrchestratorError({
                operation: "start",
                executionId,
                cause,
              }),
        ),
      ),

    drive,

    handleTimer: (executionId) =>
      Effect.gen(function* () {
        const record = yield* store.load(executionId);
        if (record === undefined || record.status._tag !== "Waiting") {
          yield* Effect.logDebug("Ignoring timer").pipe(
            Effect.annotateLogs({
              executionId,
              status: record?.status._tag ?? "none",
            }),
          );
          return;
        }

        const now = yield* runtime.now();
        const resumed = yield* store
          .replace(record, yield* resume(record, now))
          .pipe(
            Effect.as(true),
            Effect.catchTag("ConflictError", () => Effect.succeed(false)),
          );
        if (!resumed) {
          yield* Effect.logDebug("Timer already handled").pipe(
            Effect.annotateLogs({ executionId }),
          );
          return;
        }
        yield* drive(executionId);
      }).pipe(
        Effect.mapError((cause) =>
          cause._tag === "OrchestratorError"
            ? cause
            : new OrchestratorError({ operation: "timer", executionId, cause }),
        ),
      ),

    getExecution: (executionId) =>
      find(executionId).pipe(
        Effect.mapError(
          (cause) =>
            new OrchestratorError({ operation: "get", executionId, cause }),
        ),
        Effect.flatMap((record) =>
          record === undefined
            ? Effect.fail(new ExecutionNotFoundError({ executionId }))
            : Effect.succeed(record),
        ),
      ),
  };

  return service;
});

/**
 * Layer that provides WorkflowOrchestrator.
 */
export const WorkflowOrchestratorLayer = Layer.effect(
  WorkflowOrchestrator,
  createWorkflowOrchestrator,
);
