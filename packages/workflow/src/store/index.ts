// packages/workflow/src/store/index.ts

export {
  ExecutionStore,
  ExecutionStoreLayer,
  createExecutionStore,
  KEYS as ExecutionKeys,
  type ExecutionStoreService,
} from "./execution-store";
