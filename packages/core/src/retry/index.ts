// packages/core/src/retry/index.ts

// Types
export type { BackoffStrategy, RetryDelay, BaseRetryConfig } from "./types";

// Backoff utilities
export {
  Backoff,
  calculateBackoffDelay,
  addJitter,
  resolveDelay,
  retrySchedule,
} from "./backoff";
