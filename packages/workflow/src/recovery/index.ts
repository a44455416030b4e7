// packages/workflow/src/recovery/index.ts

export {
  defaultRecoveryConfig,
  createRecoveryConfig,
  RecoveryConfigSchema,
  validateRecoveryConfigEffect,
  type RecoveryConfig,
} from "./config";

export {
  RecoveryManager,
  RecoveryManagerLayer,
  createRecoveryManager,
  type RecoveryManagerService,
  type RecoveryResult,
  type RecoveryAction,
} from "./manager";
