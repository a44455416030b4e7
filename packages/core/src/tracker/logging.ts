// packages/core/src/tracker/logging.ts

import { Effect, Layer } from "effect";
import { EventTracker, type EventTrackerService } from "./tracker";

/**
 * Tracker that writes each event to the Effect logger at debug level,
 * annotated with the execution it belongs to.
 */
export function createLoggingTracker(): EventTrackerService {
  return {
    emit: (event) =>
      Effect.logDebug(`event ${event.type}`).pipe(
        Effect.annotateLogs({
          eventId: event.eventId,
          executionId: event.executionId,
          workflowKind: event.workflowKind,
        }),
      ),
    flush: () => Effect.void,
    pending: () => Effect.succeed(0),
  };
}

export const LoggingTrackerLayer = Layer.sync(EventTracker, createLoggingTracker);
