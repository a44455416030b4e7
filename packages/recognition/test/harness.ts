import { Effect, Layer, ManagedRuntime } from "effect";
import * as HttpApp from "@effect/platform/HttpApp";
import { createTestRuntime } from "@labelflow/core/testing";
import {
  ExecutionStore,
  WorkflowOrchestrator,
  type ExecutionRecord,
} from "@labelflow/workflow";
import {
  CallbackInvoker,
  InMemoryObjectStoreLayer,
  ObjectStore,
  RecognitionAppLayer,
  RecognitionBackend,
  RecordStore,
  blobRoutes,
  confirmUpload,
  createRecognitionConfig,
  registerBlob,
  type BlobRecord,
  type CallbackDelivery,
  type Label,
  type RecognitionConfig,
} from "../src";
import {
  createFakeCallbackInvoker,
  createFakeRecognitionBackend,
  type DetectBehavior,
} from "../src/testing";

export const T0 = 1_000_000;
export const CALLBACK_URL = "http://client.test/callback";

export const catBoxDog: ReadonlyArray<Label> = [
  { name: "cat", confidence: 90 },
  { name: "dog", confidence: 40 },
  { name: "box", confidence: 60 },
];

export interface HarnessOptions {
  readonly config?: Partial<RecognitionConfig>;
  readonly detect?: DetectBehavior;
  readonly delivery?: CallbackDelivery;
}

/**
 * The whole service in process: test runtime with manual time, in-memory
 * object store, fake backend and callback.
 */
export function createRecognitionHarness(options: HarnessOptions = {}) {
  const config = createRecognitionConfig(options.config);
  const runtime = createTestRuntime("test-instance", T0);
  const backend = createFakeRecognitionBackend(
    options.detect ?? (() => Effect.succeed(catBoxDog)),
  );
  const invoker = createFakeCallbackInvoker(options.delivery);

  const leaves = Layer.mergeAll(
    InMemoryObjectStoreLayer({
      publicUrl: "http://labelflow.test",
      signingSecret: "test-secret",
      ttlSeconds: config.presignedUrlTTL,
    }),
    Layer.succeed(RecognitionBackend, backend.service),
    Layer.succeed(CallbackInvoker, invoker.service),
  ).pipe(Layer.provideMerge(runtime.layer));

  const appLayer = RecognitionAppLayer(config).pipe(Layer.provideMerge(leaves));
  type Services = Layer.Layer.Success<typeof appLayer>;
  const managed = ManagedRuntime.make(appLayer);

  const run = <A, E>(effect: Effect.Effect<A, E, Services>) =>
    managed.runPromise(effect);

  const fireDue = async () => {
    const due = runtime.handles.scheduler.due(runtime.time.get());
    for (const id of due) {
      runtime.handles.scheduler.fire(id);
      await run(Effect.flatMap(WorkflowOrchestrator, (o) => o.handleTimer(id)));
    }
    return due;
  };

  return {
    config,
    time: runtime.time,
    handles: runtime.handles,
    backend,
    invoker,
    run,
    fireDue,

    /** Advance to each pending timer and fire it, until none remain */
    runTimers: async (limit = 20) => {
      let fired = 0;
      while (fired < limit) {
        const next = runtime.handles.scheduler.due(Number.MAX_SAFE_INTEGER)[0];
        if (next === undefined) break;
        const at = runtime.handles.scheduler.getScheduledTime(next) ?? 0;
        runtime.time.set(Math.max(runtime.time.get(), at));
        fired += (await fireDue()).length;
      }
      return fired;
    },

    execution: (executionId: string): Promise<ExecutionRecord> =>
      run(Effect.flatMap(WorkflowOrchestrator, (o) => o.getExecution(executionId))),

    seedExecution: (record: ExecutionRecord) =>
      run(Effect.flatMap(ExecutionStore, (store) => store.create(record))),

    record: async (blobId: string): Promise<BlobRecord> => {
      const found = await run(Effect.flatMap(RecordStore, (store) => store.get(blobId)));
      if (found === undefined) throw new Error(`no record for ${blobId}`);
      return found;
    },

    register: (callbackUrl: string = CALLBACK_URL) => run(registerBlob(callbackUrl)),

    /** Store the object and confirm it, as the notification would */
    upload: async (blobId: string) => {
      await run(
        Effect.flatMap(ObjectStore, (objects) =>
          objects.put(blobId, new Uint8Array([1, 2, 3])),
        ),
      );
      return run(confirmUpload(blobId));
    },

    /** Web handler over the routes, for in-process requests */
    handler: async () =>
      HttpApp.toWebHandlerRuntime(await managed.runtime())(blobRoutes),

    dispose: () => managed.dispose(),
  };
}

export type RecognitionHarness = ReturnType<typeof createRecognitionHarness>;
