// packages/core/src/tracker/noop.ts

import { Effect, Layer } from "effect";
import { EventTracker, type EventTrackerService } from "./tracker";

/**
 * Tracker that discards every event.
 */
export const noopTracker: EventTrackerService = {
  emit: () => Effect.void,
  flush: () => Effect.void,
  pending: () => Effect.succeed(0),
};

export const NoopTrackerLayer = Layer.succeed(EventTracker, noopTracker);
