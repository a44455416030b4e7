/**
 * Tracking events for workflow executions.
 *
 * Every lifecycle point of an execution (start, each state entered and left,
 * catch routing, timers, terminal outcome) is described here as an Effect
 * Schema, so sinks can validate what they receive.
 */

import { Schema } from "effect";
import { v7 as uuidv7 } from "uuid";

// =============================================================================
// Base Fields
// =============================================================================

const BaseFields = {
  /** Unique event ID for deduplication */
  eventId: Schema.String,
  /** ISO timestamp when event occurred */
  timestamp: Schema.String,
  /** Execution the event belongs to */
  executionId: Schema.String,
  /** Workflow definition kind */
  workflowKind: Schema.String,
};

export const BaseEventSchema = Schema.Struct(BaseFields);
export type BaseEvent = Schema.Schema.Type<typeof BaseEventSchema>;

const StateKind = Schema.Literal("Task", "Wait", "Parallel", "Pass");

// =============================================================================
// Execution Events
// =============================================================================

export const ExecutionStartedEventSchema = Schema.Struct({
  ...BaseFields,
  type: Schema.Literal("execution.started"),
  input: Schema.Unknown,
});
export type ExecutionStartedEvent = Schema.Schema.Type<
  typeof ExecutionStartedEventSchema
>;

export const ExecutionCompletedEventSchema = Schema.Struct({
  ...BaseFields,
  type: Schema.Literal("execution.completed"),
  finalState: Schema.String,
  durationMs: Schema.Number,
});
export type ExecutionCompletedEvent = Schema.Schema.Type<
  typeof ExecutionCompletedEventSchema
>;

export const ExecutionFailedEventSchema = Schema.Struct({
  ...BaseFields,
  type: Schema.Literal("execution.failed"),
  errorKind: Schema.String,
  message: Schema.String,
});
export type ExecutionFailedEvent = Schema.Schema.Type<
  typeof ExecutionFailedEventSchema
>;

// =============================================================================
// State Events
// =============================================================================

export const StateEnteredEventSchema = Schema.Struct({
  ...BaseFields,
  type: Schema.Literal("state.entered"),
  state: Schema.String,
  kind: StateKind,
  attempt: Schema.Number,
});
export type StateEnteredEvent = Schema.Schema.Type<
  typeof StateEnteredEventSchema
>;

export const StateCompletedEventSchema = Schema.Struct({
  ...BaseFields,
  type: Schema.Literal("state.completed"),
  state: Schema.String,
  next: Schema.optional(Schema.String),
  durationMs: Schema.Number,
});
export type StateCompletedEvent = Schema.Schema.Type<
  typeof StateCompletedEventSchema
>;

export const StateFailedEventSchema = Schema.Struct({
  ...BaseFields,
  type: Schema.Literal("state.failed"),
  state: Schema.String,
  errorKind: Schema.String,
  message: Schema.String,
});
export type StateFailedEvent = Schema.Schema.Type<typeof StateFailedEventSchema>;

export const CatchMatchedEventSchema = Schema.Struct({
  ...BaseFields,
  type: Schema.Literal("catch.matched"),
  state: Schema.String,
  errorKind: Schema.String,
  next: Schema.String,
});
export type CatchMatchedEvent = Schema.Schema.Type<
  typeof CatchMatchedEventSchema
>;

export const TimerScheduledEventSchema = Schema.Struct({
  ...BaseFields,
  type: Schema.Literal("timer.scheduled"),
  state: Schema.String,
  resumeAt: Schema.String,
});
export type TimerScheduledEvent = Schema.Schema.Type<
  typeof TimerScheduledEventSchema
>;

// =============================================================================
// Combined
// =============================================================================

export const ExecutionEventSchema = Schema.Union(
  ExecutionStartedEventSchema,
  ExecutionCompletedEventSchema,
  ExecutionFailedEventSchema,
  StateEnteredEventSchema,
  StateCompletedEventSchema,
  StateFailedEventSchema,
  CatchMatchedEventSchema,
  TimerScheduledEventSchema,
);
export type ExecutionEvent = Schema.Schema.Type<typeof ExecutionEventSchema>;
export type ExecutionEventType = ExecutionEvent["type"];

// =============================================================================
// Helpers
// =============================================================================

/**
 * Create the shared fields of an execution event.
 */
export function createExecutionBaseEvent(
  executionId: string,
  workflowKind: string,
  now: number,
): BaseEvent {
  return {
    eventId: uuidv7(),
    timestamp: new Date(now).toISOString(),
    executionId,
    workflowKind,
  };
}
