// packages/workflow/src/orchestrator/alarm-loop.ts

import { Effect, Queue } from "effect";
import { WorkflowOrchestrator } from "./orchestrator";

/**
 * Drain fired timers and resume their executions, one at a time.
 *
 * Never returns; fork it into the scope that owns the runtime. A failing
 * execution is logged and the loop moves on to the next timer.
 */
export const runAlarmLoop = (alarms: Queue.Dequeue<string>) =>
  Effect.gen(function* () {
    const orchestrator = yield* WorkflowOrchestrator;

    return yield* Queue.take(alarms).pipe(
      Effect.flatMap((executionId) =>
        orchestrator.handleTimer(executionId).pipe(
          Effect.catchAll((error) =>
            Effect.logError("Timer handling failed").pipe(
              Effect.annotateLogs({ executionId, error: error.message }),
            ),
          ),
        ),
      ),
      Effect.forever,
    );
  });
