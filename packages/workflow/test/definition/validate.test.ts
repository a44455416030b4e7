import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import {
  findDefinitionProblem,
  validateDefinition,
  type WorkflowDefinition,
} from "../../src";

const ok = () => Effect.succeed("ok");

const valid: WorkflowDefinition = {
  kind: "valid",
  startAt: "Wait",
  states: {
    Wait: { type: "Wait", duration: "5 seconds", next: "Check" },
    Check: {
      type: "Task",
      handler: ok,
      rearm: { on: ["NotYet"], target: "Wait", maxAttempts: 2, exhausted: "Give" },
      next: "Flow",
    },
    Give: { type: "Task", handler: ok, failWith: "Timeout", end: true },
    Flow: {
      type: "Parallel",
      branches: [
        {
          startAt: "A",
          states: {
            A: { type: "Task", handler: ok, next: "B" },
            B: { type: "Pass", end: true },
          },
        },
      ],
      catch: [
        { errorEquals: ["Domain"], next: "Fallback" },
        { errorEquals: ["*"], next: "Fallback" },
      ],
      end: true,
    },
    Fallback: { type: "Pass", end: true },
  },
};

describe("validateDefinition", () => {
  it("accepts a well-formed definition", async () => {
    const result = await Effect.runPromise(validateDefinition(valid));
    expect(result.kind).toBe("valid");
  });

  it("rejects an unknown startAt", () => {
    expect(findDefinitionProblem({ ...valid, startAt: "Nope" })).toBe(
      'startAt "Nope" is not a state',
    );
  });

  it("rejects an unknown next", () => {
    const problem = findDefinitionProblem({
      ...valid,
      states: { ...valid.states, Give: { type: "Pass", next: "Missing" } },
    });
    expect(problem).toBe('state "Give" has unknown next "Missing"');
  });

  it("rejects a state declaring both next and end", () => {
    const problem = findDefinitionProblem({
      ...valid,
      states: {
        ...valid.states,
        Give: { type: "Pass", next: "Fallback", end: true },
      },
    });
    expect(problem).toBe('state "Give" declares both next and end');
  });

  it("rejects a state declaring neither next nor end", () => {
    const problem = findDefinitionProblem({
      ...valid,
      states: { ...valid.states, Give: { type: "Task", handler: ok } },
    });
    expect(problem).toBe('state "Give" declares neither next nor end');
  });

  it("rejects a re-arm target that does not exist", () => {
    const problem = findDefinitionProblem({
      ...valid,
      states: {
        ...valid.states,
        Check: {
          type: "Task",
          handler: ok,
          rearm: { on: ["NotYet"], target: "Gone", maxAttempts: 2, exhausted: "Give" },
          end: true,
        },
      },
    });
    expect(problem).toBe('state "Check" re-arms to unknown state "Gone"');
  });

  it("rejects a nested Parallel", () => {
    const problem = findDefinitionProblem({
      kind: "nested",
      startAt: "Outer",
      states: {
        Outer: {
          type: "Parallel",
          branches: [
            {
              startAt: "Inner",
              states: {
                Inner: {
                  type: "Parallel",
                  branches: [
                    { startAt: "X", states: { X: { type: "Pass", end: true } } },
                  ],
                  end: true,
                },
              },
            },
          ],
          end: true,
        },
      },
    });
    expect(problem).toBe(
      'state "Outer" branch 0: state "Inner" is a nested Parallel, which is not supported',
    );
  });

  it("requires the catch table to end with a wildcard", () => {
    const flow = valid.states.Flow;
    if (flow.type !== "Parallel") throw new Error("unexpected");
    const problem = findDefinitionProblem({
      ...valid,
      states: {
        ...valid.states,
        Flow: { ...flow, catch: [{ errorEquals: ["Domain"], next: "Fallback" }] },
      },
    });
    expect(problem).toBe('state "Flow" catch table must end with a "*" rule');
  });

  it("fails with InvalidDefinitionError", async () => {
    const error = await Effect.runPromise(
      Effect.flip(validateDefinition({ ...valid, startAt: "Nope" })),
    );
    expect(error._tag).toBe("InvalidDefinitionError");
    expect(error.kind).toBe("valid");
  });
});
