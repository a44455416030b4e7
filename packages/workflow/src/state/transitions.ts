// packages/workflow/src/state/transitions.ts

import { Effect } from "effect";
import { InvalidTransitionError } from "../errors";
import type { ExecutionRecord, ExecutionStatus, StatusTag } from "./types";

/**
 * Valid status transitions.
 */
export const VALID_TRANSITIONS: Record<StatusTag, ReadonlyArray<StatusTag>> = {
  Ready: ["Running", "Failed"],
  Running: ["Ready", "Waiting", "Completed", "Failed"],
  Waiting: ["Ready", "Failed"],
  Completed: [],
  Failed: [],
};

export function isValidTransition(from: StatusTag, to: StatusTag): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(
  status: ExecutionStatus,
): status is Extract<ExecutionStatus, { _tag: "Completed" | "Failed" }> {
  return status._tag === "Completed" || status._tag === "Failed";
}

/**
 * Produce the next version of a record with a new status.
 *
 * `changes` carries the other fields the transition rewrites.
 */
export const transition = (
  record: ExecutionRecord,
  status: ExecutionStatus,
  now: number,
  changes: Partial<
    Omit<ExecutionRecord, "status" | "version" | "updatedAt">
  > = {},
): Effect.Effect<ExecutionRecord, InvalidTransitionError> =>
  isValidTransition(record.status._tag, status._tag)
    ? Effect.succeed({
        ...record,
        ...changes,
        status,
        version: record.version + 1,
        updatedAt: now,
      })
    : Effect.fail(
        new InvalidTransitionError({
          executionId: record.executionId,
          fromStatus: record.status._tag,
          toStatus: status._tag,
          validTransitions: VALID_TRANSITIONS[record.status._tag],
        }),
      );

// =============================================================================
// Named Transitions
// =============================================================================

/** Ready → Running. Taking the lease. */
export const claim = (record: ExecutionRecord, now: number) =>
  transition(record, { _tag: "Running", claimedAt: now }, now);

/** Waiting → Ready. A timer fired. */
export const resume = (record: ExecutionRecord, now: number) =>
  transition(record, { _tag: "Ready" }, now);

/** Running → Ready. Recovery takes a stale lease back. */
export const reclaim = (record: ExecutionRecord, now: number) =>
  transition(record, { _tag: "Ready" }, now, {
    recoveryAttempts: record.recoveryAttempts + 1,
  });

/** Any non-terminal → Failed. */
export const fail = (
  record: ExecutionRecord,
  now: number,
  errorKind: string,
  message: string,
) =>
  transition(
    record,
    { _tag: "Failed", failedAt: now, errorKind, message },
    now,
  );
