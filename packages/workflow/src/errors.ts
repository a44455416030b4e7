// packages/workflow/src/errors.ts

import { Data } from "effect";

// Re-export adapter errors from core
export { StorageError, SchedulerError } from "@labelflow/core";

/**
 * Error kinds the executor assigns itself.
 */
export const ErrorKinds = {
  /** Catch-table wildcard */
  All: "*",
  /** Defect or interruption inside a state handler */
  Runtime: "States.Runtime",
  /** Task exceeded its timeout */
  Timeout: "States.Timeout",
  /** Stale claim could not be recovered */
  RecoveryExhausted: "RecoveryExhausted",
} as const;

/**
 * Task exceeded its configured timeout.
 * Its tag is the error kind catch tables match on.
 */
export class TaskTimeoutError extends Data.TaggedError("States.Timeout")<{
  readonly state: string;
  readonly timeoutMs: number;
}> {
  get message(): string {
    return `State "${this.state}" timed out after ${this.timeoutMs}ms`;
  }
}

/**
 * Invalid status transition attempted on an execution record.
 */
export class InvalidTransitionError extends Data.TaggedError(
  "InvalidTransitionError",
)<{
  readonly executionId: string;
  readonly fromStatus: string;
  readonly toStatus: string;
  readonly validTransitions: ReadonlyArray<string>;
}> {
  get message(): string {
    return `Execution "${this.executionId}" cannot move from "${this.fromStatus}" to "${this.toStatus}". Valid transitions: [${this.validTransitions.join(", ")}]`;
  }
}

/**
 * Another writer advanced the execution first.
 * The loser of the lease never runs the state's side effect.
 */
export class ConflictError extends Data.TaggedError("ConflictError")<{
  readonly executionId: string;
  readonly expectedVersion: number;
}> {
  get message(): string {
    return `Execution "${this.executionId}" was modified concurrently (expected version ${this.expectedVersion})`;
  }
}

/**
 * Workflow definition rejected at registration.
 */
export class InvalidDefinitionError extends Data.TaggedError(
  "InvalidDefinitionError",
)<{
  readonly kind: string;
  readonly reason: string;
}> {
  get message(): string {
    return `Invalid workflow definition "${this.kind}": ${this.reason}`;
  }
}

/**
 * No workflow definition registered under the requested kind.
 */
export class WorkflowNotFoundError extends Data.TaggedError(
  "WorkflowNotFoundError",
)<{
  readonly kind: string;
  readonly available: ReadonlyArray<string>;
}> {
  get message(): string {
    return `Workflow "${this.kind}" not found. Available: [${this.available.join(", ")}]`;
  }
}

/**
 * No active or archived execution with the requested id.
 */
export class ExecutionNotFoundError extends Data.TaggedError(
  "ExecutionNotFoundError",
)<{
  readonly executionId: string;
}> {
  get message(): string {
    return `Execution "${this.executionId}" not found`;
  }
}

/**
 * Orchestrator-level operation failed.
 */
export class OrchestratorError extends Data.TaggedError("OrchestratorError")<{
  readonly operation: "start" | "drive" | "timer" | "recover" | "get";
  readonly executionId?: string;
  readonly cause: unknown;
}> {
  get message(): string {
    return `Orchestrator ${this.operation} failed: ${
      this.cause instanceof Error ? this.cause.message : String(this.cause)
    }`;
  }
}
