// packages/workflow/src/definition/index.ts

export type {
  StateInput,
  StateFailure,
  StateHandler,
  RearmPolicy,
  TaskState,
  WaitState,
  PassState,
  CatchRule,
  Branch,
  ParallelState,
  StateDefinition,
  StateType,
  WorkflowDefinition,
} from "./types";

export { validateDefinition, findDefinitionProblem } from "./validate";
export { classifyCause, matchCatch, type ClassifiedFailure } from "./catch";
export { provideDefinition } from "./provide";
