// packages/core/src/adapters/scheduler.ts

import { Context, Effect } from "effect";
import type { SchedulerError } from "../errors";

/**
 * Abstract scheduler interface for delayed execution.
 *
 * Timers are keyed by an id (an execution id). Firing a timer never runs
 * work inline: the implementation hands the id back to whoever consumes
 * alarms, so a waiting execution holds no worker.
 *
 * Implementations:
 * - Node: setTimeout feeding an alarm queue
 * - Testing: recorded timers fired manually
 */
export interface SchedulerAdapterService {
  /**
   * Schedule an alarm for `id` at a specific timestamp (ms since epoch).
   * One alarm per id - overwrites previous.
   */
  readonly schedule: (
    id: string,
    time: number,
  ) => Effect.Effect<void, SchedulerError>;

  /**
   * Cancel the alarm for `id`.
   * No-op if nothing scheduled.
   */
  readonly cancel: (id: string) => Effect.Effect<void, SchedulerError>;

  /**
   * Get the scheduled time for `id` (if any).
   */
  readonly getScheduled: (
    id: string,
  ) => Effect.Effect<number | undefined, SchedulerError>;
}

/**
 * Effect service tag for SchedulerAdapter.
 */
export class SchedulerAdapter extends Context.Tag(
  "@labelflow/SchedulerAdapter",
)<SchedulerAdapter, SchedulerAdapterService>() {}
