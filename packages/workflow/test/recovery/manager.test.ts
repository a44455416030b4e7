import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { RecoveryManager, type WorkflowDefinition } from "../../src";
import { createEngineHarness, makeRecord } from "../harness/workflow-harness";

const NOW = 100_000;

const single: WorkflowDefinition = {
  kind: "single",
  startAt: "Work",
  states: {
    Work: { type: "Task", handler: () => Effect.succeed("worked"), end: true },
  },
};

const setup = () =>
  createEngineHarness([single], {
    initialTime: NOW,
    recovery: { staleThresholdMs: 30_000, maxRecoveryAttempts: 3 },
  });

const recover = (harness: ReturnType<typeof setup>) =>
  harness.run(Effect.flatMap(RecoveryManager, (m) => m.recover()));

describe("RecoveryManager", () => {
  it("drives Ready executions", async () => {
    const harness = setup();
    await harness.seed(makeRecord({ executionId: "ready-1" }));

    const result = await recover(harness);
    expect(result.actions).toEqual([{ executionId: "ready-1", action: "driven" }]);
    expect((await harness.execution("ready-1")).status._tag).toBe("Completed");
  });

  it("fires overdue timers immediately", async () => {
    const harness = setup();
    await harness.seed(
      makeRecord({
        executionId: "late-1",
        status: { _tag: "Waiting", resumeAt: NOW - 1 },
      }),
    );

    const result = await recover(harness);
    expect(result.actions).toEqual([{ executionId: "late-1", action: "fired" }]);
    expect((await harness.execution("late-1")).status._tag).toBe("Completed");
  });

  it("re-arms timers that are still in the future", async () => {
    const harness = setup();
    await harness.seed(
      makeRecord({
        executionId: "later-1",
        status: { _tag: "Waiting", resumeAt: NOW + 5_000 },
      }),
    );

    const result = await recover(harness);
    expect(result.actions).toEqual([{ executionId: "later-1", action: "rearmed" }]);
    expect(harness.handles.scheduler.getScheduledTime("later-1")).toBe(NOW + 5_000);
  });

  it("leaves fresh claims alone", async () => {
    const harness = setup();
    await harness.seed(
      makeRecord({
        executionId: "busy-1",
        status: { _tag: "Running", claimedAt: NOW - 1_000 },
      }),
    );

    const result = await recover(harness);
    expect(result.actions).toEqual([{ executionId: "busy-1", action: "skipped" }]);
  });

  it("reclaims stale claims and drives them", async () => {
    const harness = setup();
    await harness.seed(
      makeRecord({
        executionId: "stale-1",
        status: { _tag: "Running", claimedAt: NOW - 60_000 },
      }),
    );

    const result = await recover(harness);
    expect(result.actions).toEqual([{ executionId: "stale-1", action: "reclaimed" }]);

    const record = await harness.execution("stale-1");
    expect(record.status._tag).toBe("Completed");
    expect(record.recoveryAttempts).toBe(1);
  });

  it("fails executions that exhausted their recovery attempts", async () => {
    const harness = setup();
    await harness.seed(
      makeRecord({
        executionId: "stuck-1",
        status: { _tag: "Running", claimedAt: NOW - 60_000 },
        recoveryAttempts: 3,
      }),
    );

    const result = await recover(harness);
    expect(result.actions).toEqual([{ executionId: "stuck-1", action: "exhausted" }]);

    const record = await harness.execution("stuck-1");
    expect(record.status).toEqual({
      _tag: "Failed",
      failedAt: NOW,
      errorKind: "RecoveryExhausted",
      message: "Stale claim not recovered after 3 attempts",
    });
  });
});
