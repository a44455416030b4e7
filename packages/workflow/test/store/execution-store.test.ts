import { describe, it, expect } from "vitest";
import { Effect, Layer } from "effect";
import { StorageAdapter } from "@labelflow/core";
import { createInMemoryStorageWithHandle } from "@labelflow/core/testing";
import {
  ExecutionStore,
  ExecutionStoreLayer,
  type ExecutionRecord,
  type ExecutionStoreService,
} from "../../src";
import { makeRecord } from "../harness/workflow-harness";

const setup = () => {
  const storage = createInMemoryStorageWithHandle();
  const layer = ExecutionStoreLayer.pipe(
    Layer.provide(Layer.succeed(StorageAdapter, storage)),
  );
  const run = <A, E>(f: (store: ExecutionStoreService) => Effect.Effect<A, E>) =>
    Effect.runPromise(
      Effect.flatMap(ExecutionStore, f).pipe(Effect.provide(layer)),
    );
  return { storage, run };
};

describe("ExecutionStore", () => {
  it("creates a record once", async () => {
    const { run, storage } = setup();
    const record = makeRecord({ executionId: "exec-1" });

    expect(await run((store) => store.create(record))).toBe(true);
    expect(await run((store) => store.create(record))).toBe(false);
    expect(storage.has("executions/active/exec-1")).toBe(true);
  });

  it("round-trips a record through storage", async () => {
    const { run } = setup();
    const record = makeRecord({
      executionId: "exec-1",
      context: { input: { blob: "b1" }, outputs: [{ state: "A", output: [1, 2] }] },
    });
    await run((store) => store.create(record));

    const loaded = await run((store) => store.load("exec-1"));
    expect(loaded).toEqual(record);
  });

  it("replaces only from the stored version", async () => {
    const { run } = setup();
    const original = makeRecord({ executionId: "exec-1" });
    await run((store) => store.create(original));

    const first: ExecutionRecord = { ...original, version: 1, attemptCount: 1 };
    await run((store) => store.replace(original, first));

    const error = await run((store) =>
      Effect.flip(store.replace(original, { ...original, version: 1 })),
    );
    expect(error._tag).toBe("ConflictError");

    const loaded = await run((store) => store.load("exec-1"));
    expect(loaded?.attemptCount).toBe(1);
  });

  it("moves terminal records to the archive", async () => {
    const { run, storage } = setup();
    const record = makeRecord({
      executionId: "exec-1",
      status: { _tag: "Completed", completedAt: 5 },
    });
    await run((store) => store.create(record));
    await run((store) => store.archive(record));

    expect(storage.has("executions/active/exec-1")).toBe(false);
    expect(await run((store) => store.load("exec-1"))).toBeUndefined();
    expect(await run((store) => store.loadArchived("exec-1"))).toEqual(record);
    expect(await run((store) => store.listActive())).toEqual([]);
  });

  it("reports undecodable records as StorageError", async () => {
    const { run, storage } = setup();
    storage.getData().set("executions/active/bad", { executionId: 42 });

    const error = await run((store) => Effect.flip(store.load("bad")));
    expect(error._tag).toBe("StorageError");
  });
});
