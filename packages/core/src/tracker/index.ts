// packages/core/src/tracker/index.ts

// Tracker service interface
export {
  EventTracker,
  emitEvent,
  flushEvents,
  type EventTrackerService,
} from "./tracker";

// Logging tracker
export { createLoggingTracker, LoggingTrackerLayer } from "./logging";

// No-op tracker
export { noopTracker, NoopTrackerLayer } from "./noop";

// In-memory tracker (testing)
export {
  createInMemoryTracker,
  type InMemoryTrackerHandle,
} from "./in-memory";
