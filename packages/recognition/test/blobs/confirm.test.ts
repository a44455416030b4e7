import { afterEach, describe, it, expect, vi } from "vitest";
import { Effect, Exit, Scope } from "effect";
import {
  ObjectStore,
  RecordStore,
  confirmUpload,
  getBlob,
  recognitionExecutionId,
  registerBlob,
  startUploadConfirmations,
} from "../../src";
import {
  CALLBACK_URL,
  T0,
  catBoxDog,
  createRecognitionHarness,
  type RecognitionHarness,
} from "../harness";

let harness: RecognitionHarness | undefined;
afterEach(async () => {
  await harness?.dispose();
  harness = undefined;
});

describe("registerBlob", () => {
  it("trims the callback url and hands out an upload url", async () => {
    harness = createRecognitionHarness();
    const registration = await harness.run(registerBlob(`  ${CALLBACK_URL}  `));

    expect(registration.callback_url).toBe(CALLBACK_URL);
    expect(registration.upload_url).toMatch(
      new RegExp(
        `^http://labelflow\\.test/uploads/${registration.blob_id}\\?expires=${T0 + 30_000}&signature=[0-9a-f]{64}$`,
      ),
    );

    const record = await harness.record(registration.blob_id);
    expect(record).toEqual({
      blob_id: registration.blob_id,
      status: "PENDING_UPLOAD",
      callback_url: CALLBACK_URL,
      created_at: T0,
      updated_at: T0,
    });
  });

  it.each(["", "not a url", "ftp://client.test/cb", "mailto:someone@client.test"])(
    "refuses the callback url %j",
    async (callbackUrl) => {
      harness = createRecognitionHarness();
      const error = await harness.run(Effect.flip(registerBlob(callbackUrl)));

      expect(error._tag).toBe("InvalidCallbackUrlError");
      expect(error.message).toBe("Invalid callback url supplied.");
      expect(harness.handles.storage.keys().filter((k) => k.startsWith("blobs/"))).toEqual([]);
    },
  );
});

describe("getBlob", () => {
  it("fails for an unknown blob", async () => {
    harness = createRecognitionHarness();
    const error = await harness.run(Effect.flip(getBlob("ghost")));
    expect(error._tag).toBe("RecordNotFoundError");
  });
});

describe("confirmUpload", () => {
  it("ignores notifications for unknown blobs", async () => {
    harness = createRecognitionHarness();
    expect(await harness.run(confirmUpload("ghost"))).toBe("ignored");
  });

  it("ignores a repeated notification once the blob is labeled", async () => {
    harness = createRecognitionHarness();
    const { blob_id } = await harness.register();

    expect(await harness.upload(blob_id)).toBe("started");
    expect(await harness.run(confirmUpload(blob_id))).toBe("ignored");
    expect(harness.backend.requests()).toHaveLength(1);
    expect(harness.invoker.deliveries()).toHaveLength(1);
  });

  it("lands on the running execution when recognition is under way", async () => {
    harness = createRecognitionHarness();
    const blobId = "b-busy";
    await harness.run(
      Effect.flatMap(RecordStore, (store) =>
        store.create({
          blob_id: blobId,
          status: "RECOGNIZING",
          callback_url: CALLBACK_URL,
          created_at: T0,
          updated_at: T0,
        }),
      ),
    );
    await harness.seedExecution({
      executionId: recognitionExecutionId(blobId),
      workflowKind: "RECOGNITION",
      currentState: "RecognitionFlow",
      context: { input: { blobId }, outputs: [] },
      attemptCount: 0,
      status: { _tag: "Running", claimedAt: T0 },
      version: 1,
      recoveryAttempts: 0,
      createdAt: T0,
      updatedAt: T0,
    });

    expect(await harness.run(confirmUpload(blobId))).toBe("duplicate");
    expect(harness.backend.requests()).toHaveLength(0);
  });
});

describe("startUploadConfirmations", () => {
  it("confirms uploads as objects are stored", async () => {
    harness = createRecognitionHarness();
    const h = harness;
    const { blob_id } = await h.register();

    const scope = await h.run(Scope.make());
    await h.run(startUploadConfirmations.pipe(Scope.extend(scope)));
    await h.run(
      Effect.flatMap(ObjectStore, (objects) => objects.put(blob_id, new Uint8Array([9]))),
    );

    await vi.waitFor(async () => {
      expect((await h.record(blob_id)).status).toBe("LABELED");
    });
    await h.run(Scope.close(scope, Exit.void));
  });

  it("keeps labeling other blobs while one recognition hangs", async () => {
    let stuck = "";
    harness = createRecognitionHarness({
      detect: ({ blobId }) =>
        blobId === stuck ? Effect.never : Effect.succeed(catBoxDog),
    });
    const h = harness;
    const first = await h.register();
    const second = await h.register();
    stuck = first.blob_id;

    const scope = await h.run(Scope.make());
    await h.run(startUploadConfirmations.pipe(Scope.extend(scope)));
    await h.run(
      Effect.flatMap(ObjectStore, (objects) =>
        Effect.zipRight(
          objects.put(first.blob_id, new Uint8Array([1])),
          objects.put(second.blob_id, new Uint8Array([2])),
        ),
      ),
    );

    await vi.waitFor(async () => {
      expect((await h.record(second.blob_id)).status).toBe("LABELED");
    });
    expect((await h.record(first.blob_id)).status).toBe("RECOGNIZING");
    await h.run(Scope.close(scope, Exit.void));
  });
});
