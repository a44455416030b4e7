// packages/workflow/src/definition/types.ts

import type { Duration, Effect } from "effect";
import type { LoggingOption } from "@labelflow/core";
import type { ExecutionContext } from "../state/types";

// =============================================================================
// Handlers
// =============================================================================

/**
 * What a state handler sees when it runs.
 */
export interface StateInput {
  readonly executionId: string;
  /** Input the execution was started with */
  readonly input: unknown;
  /** Output of the previous state, or the input when there is none */
  readonly previous: unknown;
  readonly context: ExecutionContext;
  /** Re-arm counter of the current loop */
  readonly attempt: number;
}

/**
 * Failure a handler may raise. Its `_tag` is the error kind catch tables
 * and re-arm clauses match on. Any `Data.TaggedError` fits.
 */
export interface StateFailure {
  readonly _tag: string;
  readonly message: string;
}

export type StateHandler<R = never> = (
  input: StateInput,
) => Effect.Effect<unknown, StateFailure, R>;

// =============================================================================
// States
// =============================================================================

interface Transition {
  /** State to go to on success */
  readonly next?: string;
  /** Ends the branch (inside a Parallel) or the execution */
  readonly end?: boolean;
}

/**
 * Loop back on selected error kinds, bounded by `maxAttempts` runs.
 */
export interface RearmPolicy {
  readonly on: ReadonlyArray<string>;
  readonly target: string;
  readonly maxAttempts: number;
  /** Where to go once the bound is reached */
  readonly exhausted: string;
}

export interface TaskState<R = never> extends Transition {
  readonly type: "Task";
  readonly handler: StateHandler<R>;
  readonly timeout?: Duration.DurationInput;
  readonly rearm?: RearmPolicy;
  /** End the execution as Failed with this kind when this state ends it */
  readonly failWith?: string;
}

export interface WaitState {
  readonly type: "Wait";
  readonly duration: Duration.DurationInput;
  readonly next: string;
}

export interface PassState<R = never> extends Transition {
  readonly type: "Pass";
  /** Static output */
  readonly result?: unknown;
  /** Side-effecting pass-through; its output replaces `result` */
  readonly handler?: StateHandler<R>;
  readonly failWith?: string;
}

/**
 * Catch rule. `"*"` matches any error kind.
 */
export interface CatchRule {
  readonly errorEquals: ReadonlyArray<string>;
  readonly next: string;
}

export interface Branch<R = never> {
  readonly startAt: string;
  readonly states: Readonly<Record<string, StateDefinition<R>>>;
}

export interface ParallelState<R = never> extends Transition {
  readonly type: "Parallel";
  readonly branches: ReadonlyArray<Branch<R>>;
  /** Evaluated in order; first match wins */
  readonly catch?: ReadonlyArray<CatchRule>;
}

export type StateDefinition<R = never> =
  | TaskState<R>
  | WaitState
  | PassState<R>
  | ParallelState<R>;

export type StateType = StateDefinition["type"];

// =============================================================================
// Workflow
// =============================================================================

export interface WorkflowDefinition<R = never> {
  readonly kind: string;
  readonly startAt: string;
  readonly states: Readonly<Record<string, StateDefinition<R>>>;
  readonly logging?: LoggingOption;
}
