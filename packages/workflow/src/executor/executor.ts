// packages/workflow/src/executor/executor.ts

import { Context, Duration, Effect, Exit, Layer, Option } from "effect";
import {
  RuntimeAdapter,
  SchedulerAdapter,
  createExecutionBaseEvent,
  emitEvent,
  flushEvents,
  withExecutionLogging,
  withLogSpan,
  type BaseEvent,
  type ExecutionEvent,
} from "@labelflow/core";
import {
  ConflictError,
  ErrorKinds,
  InvalidTransitionError,
  SchedulerError,
  StorageError,
  TaskTimeoutError,
  WorkflowNotFoundError,
} from "../errors";
import type {
  ParallelState,
  StateDefinition,
  StateFailure,
  WorkflowDefinition,
} from "../definition/types";
import {
  classifyCause,
  matchCatch,
  type ClassifiedFailure,
} from "../definition/catch";
import { claim, fail, transition, isTerminalStatus } from "../state/transitions";
import type {
  ExecutionContext,
  ExecutionRecord,
  ExecutionStatus,
} from "../state/types";
import { ExecutionStore } from "../store/execution-store";
import { WorkflowRegistry } from "../orchestrator/registry";

// =============================================================================
// Types
// =============================================================================

export type StepError =
  | ConflictError
  | InvalidTransitionError
  | StorageError
  | SchedulerError
  | WorkflowNotFoundError;

/**
 * WorkflowExecutor service interface.
 *
 * Runs exactly one state of an execution per `step`: claim the lease, run the
 * state's side effect, then persist its output and the next position.
 */
export interface WorkflowExecutorService {
  /**
   * Dispatch the current state of a Ready record.
   * Fails with ConflictError, before any side effect, if the lease is lost.
   */
  readonly step: (
    record: ExecutionRecord,
  ) => Effect.Effect<ExecutionRecord, StepError>;

  /**
   * End a non-terminal execution as Failed and archive it.
   */
  readonly abort: (
    record: ExecutionRecord,
    errorKind: string,
    message: string,
  ) => Effect.Effect<ExecutionRecord, StepError>;
}

/**
 * Effect service tag for WorkflowExecutor.
 */
export class WorkflowExecutor extends Context.Tag("@labelflow/WorkflowExecutor")<
  WorkflowExecutor,
  WorkflowExecutorService
>() {}

/**
 * Where in the definition the next dispatch is.
 */
interface Location {
  readonly name: string;
  readonly state: StateDefinition;
  readonly parallel?: {
    readonly name: string;
    readonly state: ParallelState;
  };
}

type Changes = Partial<
  Omit<ExecutionRecord, "status" | "version" | "updatedAt">
>;

interface Decision {
  readonly status: ExecutionStatus;
  readonly changes: Changes;
}

// =============================================================================
// Helpers
// =============================================================================

const locate = (
  definition: WorkflowDefinition,
  record: ExecutionRecord,
): Location | undefined => {
  const top = definition.states[record.currentState];
  if (top === undefined) return undefined;
  if (record.branch === undefined) {
    return { name: record.currentState, state: top };
  }
  if (top.type !== "Parallel") return undefined;
  const state = top.branches[record.branch.index]?.states[record.branch.state];
  return state === undefined
    ? undefined
    : {
        name: record.branch.state,
        state,
        parallel: { name: record.currentState, state: top },
      };
};

/**
 * Value the current state receives as `previous`.
 */
export const previousOutput = (record: ExecutionRecord): unknown => {
  if (record.branch !== undefined) {
    const outputs = record.branch.outputs;
    return outputs.length > 0 ? outputs[outputs.length - 1] : record.branch.input;
  }
  const outputs = record.context.outputs;
  return outputs.length > 0
    ? outputs[outputs.length - 1].output
    : record.context.input;
};

const appendOutput = (
  context: ExecutionContext,
  state: string,
  output: unknown,
): ExecutionContext => ({
  ...context,
  outputs: [...context.outputs, { state, output }],
});

/** Move to another state in the same scope. */
const goTo = (record: ExecutionRecord, target: string): Changes =>
  record.branch !== undefined
    ? { branch: { ...record.branch, state: target } }
    : { currentState: target };

const ready: ExecutionStatus = { _tag: "Ready" };

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create the WorkflowExecutor service implementation.
 */
export const createWorkflowExecutor = Effect.gen(function* () {
  const store = yield* ExecutionStore;
  const scheduler = yield* SchedulerAdapter;
  const runtime = yield* RuntimeAdapter;
  const registry = yield* WorkflowRegistry;

  const emit = (
    record: ExecutionRecord,
    now: number,
    event: DistributiveOmit<ExecutionEvent, keyof BaseEvent>,
  ) =>
    emitEvent({
      ...createExecutionBaseEvent(record.executionId, record.workflowKind, now),
      ...event,
    });

  /**
   * Archive a terminal record and report its outcome.
   */
  const finalize = (record: ExecutionRecord, stateName: string, now: number) =>
    Effect.gen(function* () {
      yield* store.archive(record);
      yield* scheduler.cancel(record.executionId);

      if (record.status._tag === "Completed") {
        yield* Effect.logInfo("Execution completed");
        yield* emit(record, now, {
          type: "execution.completed",
          finalState: stateName,
          durationMs: now - record.createdAt,
        });
      } else if (record.status._tag === "Failed") {
        yield* Effect.logError("Execution failed").pipe(
          Effect.annotateLogs({
            errorKind: record.status.errorKind,
            error: record.status.message,
          }),
        );
        yield* emit(record, now, {
          type: "execution.failed",
          errorKind: record.status.errorKind,
          message: record.status.message,
        });
      }
    });

  /**
   * Decide where a successful Task or Pass leads.
   */
  const onSuccess = (
    record: ExecutionRecord,
    location: Location,
    output: unknown,
    now: number,
  ): Decision => {
    const { name, state } = location;
    const context = appendOutput(record.context, name, output);
    const next = state.next;

    const branch = record.branch;
    const parallel = location.parallel;
    if (branch !== undefined && parallel !== undefined) {
      const outputs = [...branch.outputs, output];
      if (next !== undefined) {
        return {
          status: ready,
          changes: {
            context,
            attemptCount: 0,
            branch: { ...branch, state: next, outputs },
          },
        };
      }

      // Branch finished
      const results = [...branch.results, output];
      const nextIndex = branch.index + 1;
      const nextBranch = parallel.state.branches[nextIndex];
      if (nextBranch !== undefined) {
        return {
          status: ready,
          changes: {
            context,
            attemptCount: 0,
            branch: {
              index: nextIndex,
              state: nextBranch.startAt,
              input: branch.input,
              outputs: [],
              results,
            },
          },
        };
      }

      // Parallel finished
      const joined = appendOutput(context, parallel.name, results);
      return parallel.state.next !== undefined
        ? {
            status: ready,
            changes: {
              context: joined,
              attemptCount: 0,
              branch: undefined,
              currentState: parallel.state.next,
            },
          }
        : {
            status: { _tag: "Completed", completedAt: now },
            changes: { context: joined, attemptCount: 0, branch: undefined },
          };
    }

    if (next !== undefined) {
      return {
        status: ready,
        changes: { context, attemptCount: 0, currentState: next },
      };
    }

    const failWith = state.type === "Task" || state.type === "Pass"
      ? state.failWith
      : undefined;
    return {
      status:
        failWith !== undefined
          ? {
              _tag: "Failed",
              failedAt: now,
              errorKind: failWith,
              message: `State "${name}" ended the execution as ${failWith}`,
            }
          : { _tag: "Completed", completedAt: now },
      changes: { context, attemptCount: 0 },
    };
  };

  /**
   * Decide where a failed Task or Pass leads: re-arm, catch or fail.
   */
  const onFailure = (
    record: ExecutionRecord,
    location: Location,
    failure: ClassifiedFailure,
    now: number,
  ) =>
    Effect.gen(function* () {
      const { name, state } = location;

      const rearm = state.type === "Task" ? state.rearm : undefined;
      if (rearm !== undefined && rearm.on.includes(failure.errorKind)) {
        const attempts = record.attemptCount + 1;
        const target = attempts < rearm.maxAttempts ? rearm.target : rearm.exhausted;
        yield* Effect.logDebug("Re-arming").pipe(
          Effect.annotateLogs({ attempt: attempts, target }),
        );
        return {
          status: ready,
          changes: { ...goTo(record, target), attemptCount: attempts },
        } satisfies Decision;
      }

      const parallel = location.parallel;
      if (parallel !== undefined) {
        const rule = matchCatch(parallel.state.catch, failure.errorKind);
        if (Option.isSome(rule)) {
          yield* Effect.logWarning("Error caught").pipe(
            Effect.annotateLogs({
              errorKind: failure.errorKind,
              next: rule.value.next,
            }),
          );
          yield* emit(record, now, {
            type: "catch.matched",
            state: name,
            errorKind: failure.errorKind,
            next: rule.value.next,
          });
          return {
            status: ready,
            changes: {
              currentState: rule.value.next,
              branch: undefined,
              attemptCount: 0,
              context: {
                ...record.context,
                caught: {
                  state: name,
                  errorKind: failure.errorKind,
                  message: failure.message,
                  details: failure.details,
                },
              },
            },
          } satisfies Decision;
        }
      }

      return {
        status: {
          _tag: "Failed",
          failedAt: now,
          errorKind: failure.errorKind,
          message: failure.message,
        },
        changes: {},
      } satisfies Decision;
    });

  /**
   * Run a Task or Pass side effect.
   */
  const runHandler = (
    record: ExecutionRecord,
    location: Location,
  ): Effect.Effect<unknown, StateFailure> => {
    const { name, state } = location;
    const input = {
      executionId: record.executionId,
      input: record.context.input,
      previous: previousOutput(record),
      context: record.context,
      attempt: record.attemptCount,
    };

    if (state.type === "Pass") {
      if (state.handler) return state.handler(input);
      return Effect.succeed(
        state.result !== undefined ? state.result : input.previous,
      );
    }
    if (state.type !== "Task") {
      return Effect.die(new Error(`State "${name}" has no handler`));
    }

    const timeout = state.timeout;
    const run = state.handler(input);
    if (timeout === undefined) return run;

    const timeoutMs = Duration.toMillis(Duration.decode(timeout));
    return run.pipe(
      Effect.timeoutFail({
        duration: timeout,
        onTimeout: () => new TaskTimeoutError({ state: name, timeoutMs }),
      }),
    );
  };

  const dispatch = (
    claimed: ExecutionRecord,
    location: Location,
    now: number,
  ) =>
    Effect.gen(function* () {
      const { name, state } = location;

      switch (state.type) {
        case "Wait": {
          const resumeAt =
            now + Duration.toMillis(Duration.decode(state.duration));
          return {
            status: { _tag: "Waiting", resumeAt },
            changes: goTo(claimed, state.next),
          } satisfies Decision;
        }

        case "Parallel": {
          const first = state.branches[0];
          return {
            status: ready,
            changes: {
              branch: {
                index: 0,
                state: first.startAt,
                input: previousOutput(claimed),
                outputs: [],
                results: [],
              },
            },
          } satisfies Decision;
        }

        case "Task":
        case "Pass": {
          const exit = yield* runHandler(claimed, location).pipe(
            (effect) => withLogSpan(effect, name),
            Effect.exit,
          );
          const finishedAt = yield* runtime.now();

          if (Exit.isSuccess(exit)) {
            // JSON has no undefined
            const output = exit.value === undefined ? null : exit.value;
            const decision = onSuccess(claimed, location, output, finishedAt);
            const nextName =
              decision.changes.branch?.state ?? decision.changes.currentState;
            yield* emit(claimed, finishedAt, {
              type: "state.completed",
              state: name,
              next: nextName,
              durationMs: finishedAt - now,
            });
            return decision;
          }

          const failure = classifyCause(exit.cause);
          yield* Effect.logWarning("State failed").pipe(
            Effect.annotateLogs({
              errorKind: failure.errorKind,
              error: failure.message,
            }),
          );
          yield* emit(claimed, finishedAt, {
            type: "state.failed",
            state: name,
            errorKind: failure.errorKind,
            message: failure.message,
          });
          return yield* onFailure(claimed, location, failure, finishedAt);
        }
      }
    });

  const runStep = (definition: WorkflowDefinition, record: ExecutionRecord) =>
    Effect.gen(function* () {
      const now = yield* runtime.now();
      const claimed = yield* store.replace(record, yield* claim(record, now));

      const location = locate(definition, claimed);
      if (location === undefined) {
        return yield* service.abort(
          claimed,
          ErrorKinds.Runtime,
          `Unknown state "${claimed.branch?.state ?? claimed.currentState}"`,
        );
      }

      yield* Effect.logDebug("Entering state");
      yield* emit(claimed, now, {
        type: "state.entered",
        state: location.name,
        kind: location.state.type,
        attempt: claimed.attemptCount,
      });

      const decision = yield* dispatch(claimed, location, now).pipe(
        Effect.annotateLogs({ state: location.name }),
      );

      const finishedAt = yield* runtime.now();
      const next = yield* transition(
        claimed,
        decision.status,
        finishedAt,
        decision.changes,
      );
      const saved = yield* store.replace(claimed, next);

      // arm after Waiting is stored
      if (saved.status._tag === "Waiting") {
        yield* scheduler.schedule(saved.executionId, saved.status.resumeAt);
        yield* emit(saved, finishedAt, {
          type: "timer.scheduled",
          state: location.name,
          resumeAt: new Date(saved.status.resumeAt).toISOString(),
        });
      }
      if (isTerminalStatus(saved.status)) {
        yield* finalize(saved, location.name, finishedAt);
      }
      if (saved.status._tag !== "Ready") {
        yield* flushEvents;
      }
      return saved;
    });

  const service: WorkflowExecutorService = {
    step: (record) =>
      Effect.flatMap(registry.get(record.workflowKind), (definition) =>
        withExecutionLogging(runStep(definition, record), {
          executionId: record.executionId,
          workflowKind: record.workflowKind,
          logging: definition.logging,
        }),
      ),

    abort: (record, errorKind, message) =>
      Effect.gen(function* () {
        const now = yield* runtime.now();
        const failed = yield* store.replace(
          record,
          yield* fail(record, now, errorKind, message),
        );
        yield* finalize(failed, record.branch?.state ?? record.currentState, now);
        yield* flushEvents;
        return failed;
      }),
  };

  return service;
});

/**
 * Layer that provides WorkflowExecutor.
 */
export const WorkflowExecutorLayer = Layer.effect(
  WorkflowExecutor,
  createWorkflowExecutor,
);

// =============================================================================
// Internal types
// =============================================================================

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;
