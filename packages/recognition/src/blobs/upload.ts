// packages/recognition/src/blobs/upload.ts

import { Effect, Queue } from "effect";
import { WorkflowOrchestrator } from "@labelflow/workflow";
import type { BlobStatus } from "../domain/blob-record";
import { RecordNotFoundError } from "../errors";
import { ObjectStore } from "../services/object-store";
import { RecordStore } from "../services/record-store";
import { WorkflowKinds, recognitionExecutionId } from "../workflows/kinds";

export interface UploadSignature {
  readonly expires: number;
  readonly signature: string;
}

/**
 * Accept the bytes sent to a presigned upload URL.
 */
export const receiveUpload = (
  blobId: string,
  signature: UploadSignature,
  body: Uint8Array,
) =>
  Effect.gen(function* () {
    const objects = yield* ObjectStore;
    yield* objects.verifyUpload(blobId, signature.expires, signature.signature);

    const record = yield* Effect.flatMap(RecordStore, (records) => records.get(blobId));
    if (record === undefined) {
      return yield* Effect.fail(new RecordNotFoundError({ blobId }));
    }
    yield* objects.put(blobId, body);
  });

export type ConfirmOutcome = "started" | "duplicate" | "ignored";

/**
 * React to a stored object: PENDING_UPLOAD → UPLOADED → RECOGNIZING, then
 * start recognition under the blob's execution id. Safe to repeat.
 */
export const confirmUpload = (blobId: string) =>
  Effect.gen(function* () {
    const records = yield* RecordStore;
    const orchestrator = yield* WorkflowOrchestrator;

    const advance = (from: BlobStatus, to: BlobStatus) =>
      records.update(blobId, (record) => ({ ...record, status: to }), from).pipe(
        Effect.map((record): BlobStatus | undefined => record.status),
        Effect.catchTag("RecordConflictError", (conflict) =>
          Effect.succeed(conflict.actual),
        ),
      );

    let status = (yield* records.get(blobId))?.status;
    if (status === "PENDING_UPLOAD") {
      status = yield* advance("PENDING_UPLOAD", "UPLOADED");
    }
    if (status === "UPLOADED") {
      status = yield* advance("UPLOADED", "RECOGNIZING");
    }
    if (status !== "RECOGNIZING") {
      yield* Effect.logInfo("Ignoring upload notification").pipe(
        Effect.annotateLogs({ blobId, status: status ?? "unknown" }),
      );
      return "ignored" satisfies ConfirmOutcome;
    }

    const result = yield* orchestrator.start({
      kind: WorkflowKinds.Recognition,
      input: { blobId },
      executionId: recognitionExecutionId(blobId),
    });
    const outcome: ConfirmOutcome = result.created ? "started" : "duplicate";
    return outcome;
  }).pipe(Effect.annotateLogs({ blobId }));

/**
 * Subscribe to object-created notifications. Each upload is confirmed on its
 * own fiber, so a slow recognition never holds back the next blob. All of
 * them live as long as the surrounding scope.
 */
export const startUploadConfirmations = Effect.gen(function* () {
  const notifications = yield* Effect.flatMap(ObjectStore, (objects) => objects.subscribe);

  return yield* Queue.take(notifications).pipe(
    Effect.flatMap(({ blobId }) =>
      confirmUpload(blobId).pipe(
        Effect.catchAll((error) =>
          Effect.logError("Upload confirmation failed").pipe(
            Effect.annotateLogs({ blobId, error: error.message }),
          ),
        ),
        Effect.forkScoped,
      ),
    ),
    Effect.forever,
    Effect.forkScoped,
  );
});
