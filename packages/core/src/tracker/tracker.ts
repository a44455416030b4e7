// packages/core/src/tracker/tracker.ts

import { Context, Effect } from "effect";
import type { ExecutionEvent } from "../events";

// =============================================================================
// Service Interface
// =============================================================================

/**
 * EventTracker service interface.
 *
 * Receives execution lifecycle events. Sinks may buffer; `flush` is called
 * when an execution reaches a suspension point or a terminal state.
 */
export interface EventTrackerService {
  /**
   * Emit an event.
   */
  readonly emit: (event: ExecutionEvent) => Effect.Effect<void>;

  /**
   * Flush all buffered events.
   */
  readonly flush: () => Effect.Effect<void>;

  /**
   * Get count of pending events.
   */
  readonly pending: () => Effect.Effect<number>;
}

/**
 * Effect service tag for EventTracker.
 *
 * The tracker is optional: nothing fails when it is absent.
 */
export class EventTracker extends Context.Tag("@labelflow/EventTracker")<
  EventTracker,
  EventTrackerService
>() {}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Emit an event using the tracker from context.
 * Does nothing if tracker not available.
 */
export const emitEvent = (event: ExecutionEvent): Effect.Effect<void> =>
  Effect.flatMap(Effect.serviceOption(EventTracker), (option) =>
    option._tag === "Some" ? option.value.emit(event) : Effect.void,
  );

/**
 * Flush events using the tracker from context.
 * Does nothing if tracker not available.
 */
export const flushEvents: Effect.Effect<void> = Effect.flatMap(
  Effect.serviceOption(EventTracker),
  (option) => (option._tag === "Some" ? option.value.flush() : Effect.void),
);
