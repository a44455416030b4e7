// packages/core/src/adapters/runtime.ts

import { Context, Effect, Layer } from "effect";
import type { StorageAdapter } from "./storage";
import type { SchedulerAdapter } from "./scheduler";

/**
 * Runtime information for the current process.
 */
export interface RuntimeAdapterService {
  /** Identifier of this worker process (used in claims and logs) */
  readonly instanceId: string;

  /** Current time in ms since epoch. */
  readonly now: () => Effect.Effect<number>;
}

/**
 * Effect service tag for RuntimeAdapter.
 */
export class RuntimeAdapter extends Context.Tag("@labelflow/RuntimeAdapter")<
  RuntimeAdapter,
  RuntimeAdapterService
>() {}

/**
 * Layer providing every adapter a workflow runtime needs.
 */
export type RuntimeLayer = Layer.Layer<
  StorageAdapter | SchedulerAdapter | RuntimeAdapter
>;
