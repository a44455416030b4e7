// packages/core/src/adapters/node/runtime.ts

import { Effect, Layer, Queue } from "effect";
import { v4 as uuidv4 } from "uuid";
import { StorageAdapter, type StorageAdapterService } from "../storage";
import { SchedulerAdapter } from "../scheduler";
import { RuntimeAdapter, type RuntimeLayer } from "../runtime";
import { createTimerScheduler } from "./scheduler";

/**
 * Create a complete Node runtime layer.
 *
 * Returns the layer plus the queue fired timers land on. Whoever owns the
 * executor drains `alarms` and resumes the matching execution.
 */
export function createNodeRuntime(options: {
  readonly storage: StorageAdapterService;
  readonly instanceId?: string;
}): Effect.Effect<{
  readonly layer: RuntimeLayer;
  readonly alarms: Queue.Dequeue<string>;
}> {
  return Effect.gen(function* () {
    const alarms = yield* Queue.unbounded<string>();
    const scheduler = createTimerScheduler(alarms);

    const runtimeService = {
      instanceId: options.instanceId ?? `node-${uuidv4()}`,
      now: () => Effect.sync(() => Date.now()),
    };

    const layer = Layer.mergeAll(
      Layer.succeed(StorageAdapter, options.storage),
      Layer.succeed(SchedulerAdapter, scheduler),
      Layer.succeed(RuntimeAdapter, runtimeService),
    );

    return { layer, alarms };
  });
}
