// packages/recognition/src/blobs/register.ts

import { Effect } from "effect";
import { v4 as uuidv4 } from "uuid";
import { RuntimeAdapter } from "@labelflow/core";
import { WorkflowOrchestrator } from "@labelflow/workflow";
import { InvalidCallbackUrlError } from "../errors";
import { ObjectStore } from "../services/object-store";
import { RecordStore } from "../services/record-store";
import { WorkflowKinds, uploadWatchExecutionId } from "../workflows/kinds";

export interface Registration {
  readonly blob_id: string;
  readonly callback_url: string;
  readonly upload_url: string;
}

/**
 * Absolute http(s) URL with a host.
 */
export const isCallbackUrl = (value: string): boolean => {
  if (!URL.canParse(value)) return false;
  const { protocol, hostname } = new URL(value);
  return (protocol === "http:" || protocol === "https:") && hostname.length > 0;
};

/**
 * Create a PENDING_UPLOAD record, start watching for its upload and hand out
 * the presigned upload URL.
 */
export const registerBlob = (rawCallbackUrl: string) =>
  Effect.gen(function* () {
    const callbackUrl = rawCallbackUrl.trim();
    if (!isCallbackUrl(callbackUrl)) {
      return yield* Effect.fail(new InvalidCallbackUrlError({ callbackUrl }));
    }

    const records = yield* RecordStore;
    const objects = yield* ObjectStore;
    const orchestrator = yield* WorkflowOrchestrator;
    const now = yield* Effect.flatMap(RuntimeAdapter, (runtime) => runtime.now());
    const blobId = uuidv4();

    yield* records.create({
      blob_id: blobId,
      status: "PENDING_UPLOAD",
      callback_url: callbackUrl,
      created_at: now,
      updated_at: now,
    });
    yield* orchestrator.start({
      kind: WorkflowKinds.UploadWatch,
      input: { blobId },
      executionId: uploadWatchExecutionId(blobId),
    });
    const upload = yield* objects.putUrl(blobId);

    yield* Effect.logInfo("Blob registered").pipe(Effect.annotateLogs({ blobId }));
    return {
      blob_id: blobId,
      callback_url: callbackUrl,
      upload_url: upload.url,
    } satisfies Registration;
  });
