import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import type { WorkflowDefinition } from "../../src";
import { createEngineHarness } from "../harness/workflow-harness";

const counting = () => {
  let runs = 0;
  const definition: WorkflowDefinition = {
    kind: "counting",
    startAt: "Work",
    states: {
      Work: {
        type: "Task",
        handler: ({ input }) =>
          Effect.sync(() => {
            runs++;
            return input;
          }),
        end: true,
      },
    },
  };
  return { definition, runs: () => runs };
};

describe("WorkflowOrchestrator", () => {
  it("starts an execution with a generated id", async () => {
    const { definition } = counting();
    const harness = createEngineHarness([definition]);

    const result = await harness.orchestrate((o) =>
      o.start({ kind: "counting", input: { n: 1 } }),
    );
    expect(result.created).toBe(true);
    expect(result.executionId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("is idempotent on the execution id", async () => {
    const { definition, runs } = counting();
    const harness = createEngineHarness([definition]);

    const first = await harness.orchestrate((o) =>
      o.start({ kind: "counting", input: "x", executionId: "fixed" }),
    );
    const second = await harness.orchestrate((o) =>
      o.start({ kind: "counting", input: "y", executionId: "fixed" }),
    );

    expect(first).toEqual({ executionId: "fixed", created: true, status: "Completed" });
    expect(second).toEqual({ executionId: "fixed", created: false, status: "Completed" });
    expect(runs()).toBe(1);

    const record = await harness.execution("fixed");
    expect(record.context.input).toBe("x");
  });

  it("fails to start an unknown kind", async () => {
    const { definition } = counting();
    const harness = createEngineHarness([definition]);

    const error = await harness.orchestrate((o) =>
      Effect.flip(o.start({ kind: "missing", input: null })),
    );
    expect(error._tag).toBe("OrchestratorError");
    expect(error.operation).toBe("start");
  });

  it("reports an unknown execution", async () => {
    const { definition } = counting();
    const harness = createEngineHarness([definition]);

    const error = await harness.orchestrate((o) =>
      Effect.flip(o.getExecution("nobody")),
    );
    expect(error._tag).toBe("ExecutionNotFoundError");
  });

  it("rejects invalid definitions when the engine is built", async () => {
    const harness = createEngineHarness([
      { kind: "broken", startAt: "Nowhere", states: {} },
    ]);

    await expect(
      harness.orchestrate((o) => o.start({ kind: "broken", input: null })),
    ).rejects.toThrow('Invalid workflow definition "broken"');
  });
});
