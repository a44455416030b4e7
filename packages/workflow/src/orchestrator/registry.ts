// packages/workflow/src/orchestrator/registry.ts

import { Context, Effect, Layer } from "effect";
import { InvalidDefinitionError, WorkflowNotFoundError } from "../errors";
import type { WorkflowDefinition } from "../definition/types";
import { validateDefinition } from "../definition/validate";
import { provideDefinition } from "../definition/provide";

/**
 * WorkflowRegistry service interface.
 *
 * Holds validated definitions whose handlers already have their services.
 */
export interface WorkflowRegistryService {
  readonly get: (
    kind: string,
  ) => Effect.Effect<WorkflowDefinition, WorkflowNotFoundError>;

  readonly kinds: () => ReadonlyArray<string>;

  readonly has: (kind: string) => boolean;
}

/**
 * Effect service tag for WorkflowRegistry.
 */
export class WorkflowRegistry extends Context.Tag("@labelflow/WorkflowRegistry")<
  WorkflowRegistry,
  WorkflowRegistryService
>() {}

/**
 * Create a registry from definitions that need no further services.
 */
export function createWorkflowRegistry(
  definitions: ReadonlyArray<WorkflowDefinition>,
): Effect.Effect<WorkflowRegistryService, InvalidDefinitionError> {
  return Effect.gen(function* () {
    const byKind = new Map<string, WorkflowDefinition>();

    for (const definition of definitions) {
      if (byKind.has(definition.kind)) {
        return yield* Effect.fail(
          new InvalidDefinitionError({
            kind: definition.kind,
            reason: "kind is registered twice",
          }),
        );
      }
      byKind.set(definition.kind, yield* validateDefinition(definition));
    }

    const kinds = Array.from(byKind.keys());

    return {
      get: (kind) => {
        const definition = byKind.get(kind);
        return definition
          ? Effect.succeed(definition)
          : Effect.fail(new WorkflowNotFoundError({ kind, available: kinds }));
      },
      kinds: () => kinds,
      has: (kind) => byKind.has(kind),
    };
  });
}

/**
 * Layer that validates definitions and provides their handlers with the
 * services `R` taken from the layer's own context.
 */
export const WorkflowRegistryLayer = <R>(
  definitions: ReadonlyArray<WorkflowDefinition<R>>,
): Layer.Layer<WorkflowRegistry, InvalidDefinitionError, R> =>
  Layer.effect(
    WorkflowRegistry,
    Effect.gen(function* () {
      const context = yield* Effect.context<R>();
      return yield* createWorkflowRegistry(
        definitions.map((definition) => provideDefinition(definition, context)),
      );
    }),
  );
