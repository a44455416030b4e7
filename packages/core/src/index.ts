// packages/core/src/index.ts

// Errors
export { StorageError, SchedulerError } from "./errors";

// Adapters
export {
  StorageAdapter,
  SchedulerAdapter,
  RuntimeAdapter,
  createTimerScheduler,
  createNodeRuntime,
  createLibSqlStorage,
  type StorageAdapterService,
  type SchedulerAdapterService,
  type RuntimeAdapterService,
  type RuntimeLayer,
  type LibSqlStorageOptions,
} from "./adapters";

// Event Schemas
export {
  BaseEventSchema,
  ExecutionEventSchema,
  ExecutionStartedEventSchema,
  ExecutionCompletedEventSchema,
  ExecutionFailedEventSchema,
  StateEnteredEventSchema,
  StateCompletedEventSchema,
  StateFailedEventSchema,
  CatchMatchedEventSchema,
  TimerScheduledEventSchema,
  createExecutionBaseEvent,
  type BaseEvent,
  type ExecutionEvent,
  type ExecutionEventType,
  type ExecutionStartedEvent,
  type ExecutionCompletedEvent,
  type ExecutionFailedEvent,
  type StateEnteredEvent,
  type StateCompletedEvent,
  type StateFailedEvent,
  type CatchMatchedEvent,
  type TimerScheduledEvent,
} from "./events";

// Tracker
export {
  EventTracker,
  emitEvent,
  flushEvents,
  createLoggingTracker,
  LoggingTrackerLayer,
  noopTracker,
  NoopTrackerLayer,
  createInMemoryTracker,
  type EventTrackerService,
  type InMemoryTrackerHandle,
} from "./tracker";

// Retry
export {
  Backoff,
  calculateBackoffDelay,
  addJitter,
  resolveDelay,
  retrySchedule,
  type BackoffStrategy,
  type RetryDelay,
  type BaseRetryConfig,
} from "./retry";

// Logging
export {
  resolveLogLevel,
  parseLogLevel,
  withExecutionLogging,
  withLogSpan,
  type LoggingOption,
  type ExecutionLoggingConfig,
} from "./logging";
