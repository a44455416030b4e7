// packages/workflow/src/state/types.ts

import { Schema } from "effect";

// =============================================================================
// Execution Status
// =============================================================================

/**
 * Next dispatch may claim the execution.
 */
export const Ready = Schema.TaggedStruct("Ready", {});

/**
 * A dispatcher holds the lease and is running the current state.
 */
export const Running = Schema.TaggedStruct("Running", {
  /** When the lease was taken (for stale detection) */
  claimedAt: Schema.Number,
});

/**
 * Parked on a timer. No worker is held.
 */
export const Waiting = Schema.TaggedStruct("Waiting", {
  resumeAt: Schema.Number,
});

export const Completed = Schema.TaggedStruct("Completed", {
  completedAt: Schema.Number,
});

export const Failed = Schema.TaggedStruct("Failed", {
  failedAt: Schema.Number,
  errorKind: Schema.String,
  message: Schema.String,
});

/**
 * Lifecycle:
 *   Ready → Running → Ready (next state)
 *                   ↘ Waiting → Ready
 *                   ↘ Completed | Failed
 */
export const ExecutionStatusSchema = Schema.Union(
  Ready,
  Running,
  Waiting,
  Completed,
  Failed,
);
export type ExecutionStatus = Schema.Schema.Type<typeof ExecutionStatusSchema>;
export type StatusTag = ExecutionStatus["_tag"];

// =============================================================================
// Execution Context
// =============================================================================

export const StepOutputSchema = Schema.Struct({
  state: Schema.String,
  output: Schema.Unknown,
});
export type StepOutput = Schema.Schema.Type<typeof StepOutputSchema>;

/**
 * Error routed by a catch table, visible to the fallback state.
 */
export const CaughtErrorSchema = Schema.Struct({
  state: Schema.String,
  errorKind: Schema.String,
  message: Schema.String,
  /** Fields of the tagged error, minus its tag and message */
  details: Schema.optional(
    Schema.Record({ key: Schema.String, value: Schema.Unknown }),
  ),
});
export type CaughtError = Schema.Schema.Type<typeof CaughtErrorSchema>;

/**
 * Data flowing between states. Outputs are append-only.
 */
export const ExecutionContextSchema = Schema.Struct({
  input: Schema.Unknown,
  outputs: Schema.Array(StepOutputSchema),
  caught: Schema.optional(CaughtErrorSchema),
});
export type ExecutionContext = Schema.Schema.Type<typeof ExecutionContextSchema>;

/**
 * Position inside a Parallel state. Branches run one after another.
 */
export const BranchPositionSchema = Schema.Struct({
  index: Schema.Number,
  state: Schema.String,
  /** Value the branch started from */
  input: Schema.Unknown,
  /** Outputs of the current branch */
  outputs: Schema.Array(Schema.Unknown),
  /** Final output of each finished branch */
  results: Schema.Array(Schema.Unknown),
});
export type BranchPosition = Schema.Schema.Type<typeof BranchPositionSchema>;

// =============================================================================
// Execution Record
// =============================================================================

export const ExecutionRecordSchema = Schema.Struct({
  executionId: Schema.String,
  workflowKind: Schema.String,
  /** Top-level state */
  currentState: Schema.String,
  branch: Schema.optional(BranchPositionSchema),
  context: ExecutionContextSchema,
  /** Re-arm counter of the current loop */
  attemptCount: Schema.Number,
  status: ExecutionStatusSchema,
  /** Lease version, bumped on every write */
  version: Schema.Number,
  recoveryAttempts: Schema.Number,
  createdAt: Schema.Number,
  updatedAt: Schema.Number,
});
export type ExecutionRecord = Schema.Schema.Type<typeof ExecutionRecordSchema>;

/**
 * Name of the state the next dispatch runs.
 */
export const activeStateName = (record: ExecutionRecord): string =>
  record.branch?.state ?? record.currentState;
