// packages/core/src/tracker/in-memory.ts

import { Effect, Ref } from "effect";
import type { EventTrackerService } from "./tracker";
import type { ExecutionEvent, ExecutionEventType } from "../events";

/**
 * Handle for accessing recorded events in tests.
 */
export interface InMemoryTrackerHandle {
  /**
   * Get all recorded events.
   */
  readonly getEvents: () => Effect.Effect<ReadonlyArray<ExecutionEvent>>;

  /**
   * Get events of a specific type.
   */
  readonly getEventsByType: <T extends ExecutionEventType>(
    type: T,
  ) => Effect.Effect<Array<Extract<ExecutionEvent, { type: T }>>>;

  /**
   * Clear all recorded events.
   */
  readonly clear: () => Effect.Effect<void>;
}

const isType =
  <T extends ExecutionEventType>(type: T) =>
  (event: ExecutionEvent): event is Extract<ExecutionEvent, { type: T }> =>
    event.type === type;

/**
 * Create an in-memory tracker for testing.
 */
export function createInMemoryTracker(): Effect.Effect<{
  service: EventTrackerService;
  handle: InMemoryTrackerHandle;
}> {
  return Effect.gen(function* () {
    const events = yield* Ref.make<ReadonlyArray<ExecutionEvent>>([]);

    const service: EventTrackerService = {
      emit: (event) => Ref.update(events, (e) => [...e, event]),
      flush: () => Effect.void,
      pending: () => Ref.get(events).pipe(Effect.map((e) => e.length)),
    };

    const handle: InMemoryTrackerHandle = {
      getEvents: () => Ref.get(events),
      getEventsByType: (type) =>
        Ref.get(events).pipe(Effect.map((e) => e.filter(isType(type)))),
      clear: () => Ref.set(events, []),
    };

    return { service, handle };
  });
}
