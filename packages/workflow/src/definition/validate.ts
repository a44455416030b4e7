// packages/workflow/src/definition/validate.ts

import { Duration, Effect, Option } from "effect";
import { ErrorKinds, InvalidDefinitionError } from "../errors";
import type { StateDefinition, WorkflowDefinition } from "./types";

const checkTransition = (
  at: string,
  state: { readonly next?: string; readonly end?: boolean },
  exists: (name: string) => boolean,
): string | undefined => {
  if (state.next !== undefined && state.end) {
    return `${at} declares both next and end`;
  }
  if (state.next === undefined && !state.end) {
    return `${at} declares neither next nor end`;
  }
  if (state.next !== undefined && !exists(state.next)) {
    return `${at} has unknown next "${state.next}"`;
  }
  return undefined;
};

const checkScope = <R>(
  states: Readonly<Record<string, StateDefinition<R>>>,
  startAt: string,
  scope: string,
  nested: boolean,
): string | undefined => {
  const exists = (name: string) => Object.hasOwn(states, name);
  if (!exists(startAt)) {
    return `${scope}startAt "${startAt}" is not a state`;
  }

  for (const [name, state] of Object.entries(states)) {
    const at = `${scope}state "${name}"`;

    switch (state.type) {
      case "Wait": {
        if (!exists(state.next)) {
          return `${at} has unknown next "${state.next}"`;
        }
        if (Option.isNone(Duration.decodeUnknown(state.duration))) {
          return `${at} has an invalid duration`;
        }
        break;
      }

      case "Pass": {
        const problem = checkTransition(at, state, exists);
        if (problem) return problem;
        break;
      }

      case "Task": {
        const problem = checkTransition(at, state, exists);
        if (problem) return problem;
        if (state.rearm) {
          const { target, exhausted, maxAttempts } = state.rearm;
          if (!exists(target)) {
            return `${at} re-arms to unknown state "${target}"`;
          }
          if (!exists(exhausted)) {
            return `${at} has unknown exhausted target "${exhausted}"`;
          }
          if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
            return `${at} needs a positive integer maxAttempts`;
          }
        }
        break;
      }

      case "Parallel": {
        if (nested) {
          return `${at} is a nested Parallel, which is not supported`;
        }
        const problem = checkTransition(at, state, exists);
        if (problem) return problem;
        if (state.branches.length === 0) {
          return `${at} has no branches`;
        }
        for (const [index, branch] of state.branches.entries()) {
          const branchProblem = checkScope(
            branch.states,
            branch.startAt,
            `${at} branch ${index}: `,
            true,
          );
          if (branchProblem) return branchProblem;
        }
        const rules = state.catch ?? [];
        for (const rule of rules) {
          if (rule.errorEquals.length === 0) {
            return `${at} has a catch rule without error kinds`;
          }
          if (!exists(rule.next)) {
            return `${at} catches into unknown state "${rule.next}"`;
          }
        }
        const last = rules[rules.length - 1];
        if (last && !last.errorEquals.includes(ErrorKinds.All)) {
          return `${at} catch table must end with a "${ErrorKinds.All}" rule`;
        }
        break;
      }
    }
  }

  return undefined;
};

/**
 * Find the first structural problem in a definition, if any.
 */
export function findDefinitionProblem<R>(
  definition: WorkflowDefinition<R>,
): string | undefined {
  return checkScope(definition.states, definition.startAt, "", false);
}

/**
 * Validate a workflow definition (Effect-based).
 */
export const validateDefinition = <R>(
  definition: WorkflowDefinition<R>,
): Effect.Effect<WorkflowDefinition<R>, InvalidDefinitionError> => {
  const problem = findDefinitionProblem(definition);
  return problem === undefined
    ? Effect.succeed(definition)
    : Effect.fail(
        new InvalidDefinitionError({ kind: definition.kind, reason: problem }),
      );
};
