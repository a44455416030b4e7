// packages/workflow/src/definition/catch.ts

import { Cause, Option } from "effect";
import { ErrorKinds } from "../errors";
import type { CatchRule, StateFailure } from "./types";

/**
 * A handler failure reduced to what routing and persistence need.
 */
export interface ClassifiedFailure {
  readonly errorKind: string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

const failureDetails = (
  failure: StateFailure,
): Record<string, unknown> | undefined => {
  const details: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(failure)) {
    if (key === "_tag" || key === "message" || key === "stack") continue;
    if (typeof value === "function") continue;
    details[key] = value;
  }
  return Object.keys(details).length > 0 ? details : undefined;
};

/**
 * Classify the cause of a failed state.
 *
 * Typed failures keep their tag as error kind. Defects and interruptions
 * become `States.Runtime`.
 */
export function classifyCause(
  cause: Cause.Cause<StateFailure>,
): ClassifiedFailure {
  const failure = Cause.failureOption(cause);
  if (Option.isSome(failure)) {
    return {
      errorKind: failure.value._tag,
      message: failure.value.message,
      details: failureDetails(failure.value),
    };
  }

  const squashed = Cause.squash(cause);
  return {
    errorKind: ErrorKinds.Runtime,
    message: squashed instanceof Error ? squashed.message : String(squashed),
  };
}

/**
 * First catch rule matching the error kind, in declaration order.
 */
export function matchCatch(
  rules: ReadonlyArray<CatchRule> | undefined,
  errorKind: string,
): Option.Option<CatchRule> {
  return Option.fromNullable(
    rules?.find(
      (rule) =>
        rule.errorEquals.includes(errorKind) ||
        rule.errorEquals.includes(ErrorKinds.All),
    ),
  );
}
