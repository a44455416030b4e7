// packages/workflow/src/orchestrator/index.ts

export {
  WorkflowOrchestrator,
  WorkflowOrchestratorLayer,
  createWorkflowOrchestrator,
  type WorkflowOrchestratorService,
  type StartOptions,
  type StartResult,
} from "./orchestrator";

export {
  WorkflowRegistry,
  WorkflowRegistryLayer,
  createWorkflowRegistry,
  type WorkflowRegistryService,
} from "./registry";

export { runAlarmLoop } from "./alarm-loop";
