// packages/workflow/src/definition/provide.ts

import { Context, Effect } from "effect";
import type {
  StateDefinition,
  StateHandler,
  WorkflowDefinition,
} from "./types";

const provideHandler =
  <R>(handler: StateHandler<R>, context: Context.Context<R>): StateHandler =>
  (input) =>
    Effect.mapInputContext(
      handler(input),
      (current: Context.Context<never>) => Context.merge(current, context),
    );

const provideState = <R>(
  state: StateDefinition<R>,
  context: Context.Context<R>,
): StateDefinition => {
  switch (state.type) {
    case "Wait":
      return state;
    case "Task":
      return { ...state, handler: provideHandler(state.handler, context) };
    case "Pass":
      return state.handler
        ? { ...state, handler: provideHandler(state.handler, context) }
        : { ...state, handler: undefined };
    case "Parallel":
      return {
        ...state,
        branches: state.branches.map((branch) => ({
          startAt: branch.startAt,
          states: provideStates(branch.states, context),
        })),
      };
  }
};

const provideStates = <R>(
  states: Readonly<Record<string, StateDefinition<R>>>,
  context: Context.Context<R>,
): Record<string, StateDefinition> =>
  Object.fromEntries(
    Object.entries(states).map(([name, state]) => [
      name,
      provideState(state, context),
    ]),
  );

/**
 * Provide the services a definition's handlers need, once, at registration.
 * The executor then runs handlers with no remaining requirements.
 */
export function provideDefinition<R>(
  definition: WorkflowDefinition<R>,
  context: Context.Context<R>,
): WorkflowDefinition {
  return {
    ...definition,
    states: provideStates(definition.states, context),
  };
}
