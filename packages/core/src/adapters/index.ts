// packages/core/src/adapters/index.ts

export {
  StorageAdapter,
  type StorageAdapterService,
} from "./storage";

export {
  SchedulerAdapter,
  type SchedulerAdapterService,
} from "./scheduler";

export {
  RuntimeAdapter,
  type RuntimeAdapterService,
  type RuntimeLayer,
} from "./runtime";

// Node
export { createTimerScheduler } from "./node/scheduler";
export { createNodeRuntime } from "./node/runtime";
export {
  createLibSqlStorage,
  type LibSqlStorageOptions,
} from "./libsql/storage";
