// packages/workflow/src/state/index.ts

export {
  ExecutionRecordSchema,
  ExecutionStatusSchema,
  ExecutionContextSchema,
  BranchPositionSchema,
  CaughtErrorSchema,
  StepOutputSchema,
  activeStateName,
  type ExecutionRecord,
  type ExecutionStatus,
  type ExecutionContext,
  type BranchPosition,
  type CaughtError,
  type StepOutput,
  type StatusTag,
} from "./types";

export {
  VALID_TRANSITIONS,
  isValidTransition,
  isTerminalStatus,
  transition,
  claim,
  resume,
  reclaim,
  fail,
} from "./transitions";
