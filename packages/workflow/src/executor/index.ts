// packages/workflow/src/executor/index.ts

export {
  WorkflowExecutor,
  WorkflowExecutorLayer,
  createWorkflowExecutor,
  previousOutput,
  type WorkflowExecutorService,
  type StepError,
} from "./executor";
