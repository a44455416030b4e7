import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import {
  isTerminalStatus,
  isValidTransition,
  VALID_TRANSITIONS,
} from "../../src";
import { claim, reclaim, resume } from "../../src/state/transitions";
import { makeRecord } from "../harness/workflow-harness";

describe("execution transitions", () => {
  it("claims a Ready record and bumps the version", async () => {
    const claimed = await Effect.runPromise(
      claim(makeRecord({ executionId: "e1", version: 4 }), 2000),
    );
    expect(claimed.status).toEqual({ _tag: "Running", claimedAt: 2000 });
    expect(claimed.version).toBe(5);
    expect(claimed.updatedAt).toBe(2000);
  });

  it("resumes a Waiting record", async () => {
    const resumed = await Effect.runPromise(
      resume(
        makeRecord({ executionId: "e1", status: { _tag: "Waiting", resumeAt: 10 } }),
        20,
      ),
    );
    expect(resumed.status._tag).toBe("Ready");
  });

  it("counts recovery attempts on reclaim", async () => {
    const reclaimed = await Effect.runPromise(
      reclaim(
        makeRecord({
          executionId: "e1",
          status: { _tag: "Running", claimedAt: 0 },
          recoveryAttempts: 1,
        }),
        50_000,
      ),
    );
    expect(reclaimed.status._tag).toBe("Ready");
    expect(reclaimed.recoveryAttempts).toBe(2);
  });

  it("refuses to claim a terminal record", async () => {
    const error = await Effect.runPromise(
      Effect.flip(
        claim(
          makeRecord({
            executionId: "e1",
            status: { _tag: "Completed", completedAt: 1 },
          }),
          2,
        ),
      ),
    );
    expect(error._tag).toBe("InvalidTransitionError");
    expect(error.fromStatus).toBe("Completed");
    expect(error.toStatus).toBe("Running");
  });

  it("has no way out of terminal statuses", () => {
    expect(VALID_TRANSITIONS.Completed).toEqual([]);
    expect(VALID_TRANSITIONS.Failed).toEqual([]);
    expect(isValidTransition("Waiting", "Running")).toBe(false);
    expect(
      isTerminalStatus({ _tag: "Failed", failedAt: 0, errorKind: "X", message: "" }),
    ).toBe(true);
  });
});
