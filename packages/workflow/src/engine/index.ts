// packages/workflow/src/engine/index.ts

import { Layer } from "effect";
import type {
  RuntimeAdapter,
  SchedulerAdapter,
  StorageAdapter,
} from "@labelflow/core";
import type { InvalidDefinitionError } from "../errors";
import type { WorkflowDefinition } from "../definition/types";
import { ExecutionStore, ExecutionStoreLayer } from "../store/execution-store";
import {
  WorkflowExecutor,
  WorkflowExecutorLayer,
} from "../executor/executor";
import {
  WorkflowRegistry,
  WorkflowRegistryLayer,
} from "../orchestrator/registry";
import {
  WorkflowOrchestrator,
  WorkflowOrchestratorLayer,
} from "../orchestrator/orchestrator";
import { RecoveryManager, RecoveryManagerLayer } from "../recovery/manager";
import type { RecoveryConfig } from "../recovery/config";

export interface WorkflowEngineOptions {
  readonly recovery?: RecoveryConfig;
}

/**
 * Services the engine layer provides.
 */
export type WorkflowEngine =
  | WorkflowOrchestrator
  | WorkflowExecutor
  | WorkflowRegistry
  | ExecutionStore
  | RecoveryManager;

/**
 * Compose the full engine for a set of definitions.
 *
 * Requires the runtime adapters plus whatever the definitions' handlers need.
 */
export const WorkflowEngineLayer = <R>(
  definitions: ReadonlyArray<WorkflowDefinition<R>>,
  options: WorkflowEngineOptions = {},
): Layer.Layer<
  WorkflowEngine,
  InvalidDefinitionError,
  StorageAdapter | SchedulerAdapter | RuntimeAdapter | R
> => {
  const registry = WorkflowRegistryLayer(definitions);
  const base = Layer.merge(registry, ExecutionStoreLayer);
  const executor = WorkflowExecutorLayer.pipe(Layer.provideMerge(base));
  const orchestrator = WorkflowOrchestratorLayer.pipe(
    Layer.provideMerge(executor),
  );
  return RecoveryManagerLayer(options.recovery).pipe(
    Layer.provideMerge(orchestrator),
  );
};
