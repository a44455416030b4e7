import { Data } from "effect";

// =============================================================================
// Adapter Errors (shared across workflow and recognition)
// =============================================================================

/**
 * Storage operation failed.
 */
export class StorageError extends Data.TaggedError("StorageError")<{
  readonly operation:
    | "get"
    | "put"
    | "delete"
    | "list"
    | "putIfAbsent"
    | "compareAndSet"
    | "open";
  readonly key?: string;
  readonly cause: unknown;
}> {
  get message(): string {
    const keyPart = this.key ? ` for key "${this.key}"` : "";
    return `Storage ${this.operation}${keyPart} failed: ${
      this.cause instanceof Error ? this.cause.message : String(this.cause)
    }`;
  }
}

/**
 * Scheduler operation failed.
 */
export class SchedulerError extends Data.TaggedError("SchedulerError")<{
  readonly operation: "schedule" | "cancel" | "get";
  readonly id: string;
  readonly cause: unknown;
}> {
  get message(): string {
    return `Scheduler ${this.operation} for "${this.id}" failed: ${
      this.cause instanceof Error ? this.cause.message : String(this.cause)
    }`;
  }
}
