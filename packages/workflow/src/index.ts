// packages/workflow/src/index.ts

// Errors
export {
  StorageError,
  SchedulerError,
  ErrorKinds,
  TaskTimeoutError,
  InvalidTransitionError,
  ConflictError,
  InvalidDefinitionError,
  WorkflowNotFoundError,
  ExecutionNotFoundError,
  OrchestratorError,
} from "./errors";

// Definitions
export {
  validateDefinition,
  findDefinitionProblem,
  classifyCause,
  matchCatch,
  provideDefinition,
  type ClassifiedFailure,
  type StateInput,
  type StateFailure,
  type StateHandler,
  type RearmPolicy,
  type TaskState,
  type WaitState,
  type PassState,
  type CatchRule,
  type Branch,
  type ParallelState,
  type StateDefinition,
  type StateType,
  type WorkflowDefinition,
} from "./definition";

// State
export {
  ExecutionRecordSchema,
  ExecutionStatusSchema,
  ExecutionContextSchema,
  BranchPositionSchema,
  CaughtErrorSchema,
  StepOutputSchema,
  activeStateName,
  VALID_TRANSITIONS,
  isValidTransition,
  isTerminalStatus,
  type ExecutionRecord,
  type ExecutionStatus,
  type ExecutionContext,
  type BranchPosition,
  type CaughtError,
  type StepOutput,
  type StatusTag,
} from "./state";

// Store
export {
  ExecutionStore,
  ExecutionStoreLayer,
  createExecutionStore,
  ExecutionKeys,
  type ExecutionStoreService,
} from "./store";

// Executor
export {
  WorkflowExecutor,
  WorkflowExecutorLayer,
  createWorkflowExecutor,
  previousOutput,
  type WorkflowExecutorService,
  type StepError,
} from "./executor";

// Orchestrator
export {
  WorkflowOrchestrator,
  WorkflowOrchestratorLayer,
  createWorkflowOrchestrator,
  WorkflowRegistry,
  WorkflowRegistryLayer,
  createWorkflowRegistry,
  runAlarmLoop,
  type WorkflowOrchestratorService,
  type WorkflowRegistryService,
  type StartOptions,
  type StartResult,
} from "./orchestrator";

// Recovery
export {
  RecoveryManager,
  RecoveryManagerLayer,
  createRecoveryManager,
  defaultRecoveryConfig,
  createRecoveryConfig,
  RecoveryConfigSchema,
  validateRecoveryConfigEffect,
  type RecoveryConfig,
  type RecoveryManagerService,
  type RecoveryResult,
  type RecoveryAction,
} from "./recovery";

// Engine
export {
  WorkflowEngineLayer,
  type WorkflowEngine,
  type WorkflowEngineOptions,
} from "./engine";
