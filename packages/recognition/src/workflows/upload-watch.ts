// packages/recognition/src/workflows/upload-watch.ts

import { Duration, Effect } from "effect";
import type { StateHandler, WorkflowDefinition } from "@labelflow/workflow";
import { uploadWatchMaxAttempts, type RecognitionConfig } from "../config";
import { RecordNotFoundError, UploadNotObserved } from "../errors";
import { RecordStore } from "../services/record-store";
import {
  WorkflowKinds,
  decodeBlobInput,
  type RecognitionHandlerServices,
} from "./kinds";

/**
 * Succeeds once the upload has been confirmed. The watch only reads; the
 * PENDING_UPLOAD → UPLOADED move belongs to the upload confirmation.
 */
export const checkUploading: StateHandler<RecordStore> = ({ input, attempt }) =>
  Effect.gen(function* () {
    const { blobId } = yield* decodeBlobInput(input);
    const record = yield* Effect.flatMap(RecordStore, (store) => store.get(blobId));

    if (record === undefined) {
      return yield* Effect.fail(new RecordNotFoundError({ blobId }));
    }
    if (record.status === "PENDING_UPLOAD") {
      yield* Effect.logDebug("Upload not observed yet").pipe(
        Effect.annotateLogs({ blobId, attempt }),
      );
      return yield* Effect.fail(new UploadNotObserved({ blobId }));
    }
    return { blobId, status: record.status };
  });

/**
 * Marks the record FAILED/UploadTimeout, unless the upload landed meanwhile.
 */
export const markUploadTimedOut: StateHandler<RecordStore> = ({ input }) =>
  Effect.gen(function* () {
    const { blobId } = yield* decodeBlobInput(input);
    const store = yield* RecordStore;

    return yield* store
      .update(
        blobId,
        (record) => ({ ...record, status: "FAILED", error_kind: "UploadTimeout" }),
        "PENDING_UPLOAD",
      )
      .pipe(
        Effect.map((record) => ({ blobId, status: record.status })),
        Effect.tap(() =>
          Effect.logWarning("Upload timed out").pipe(Effect.annotateLogs({ blobId })),
        ),
        Effect.catchTag("RecordConflictError", (conflict) =>
          Effect.logInfo("Upload arrived after the watch gave up").pipe(
            Effect.annotateLogs({ blobId, status: conflict.actual ?? "gone" }),
            Effect.as({ blobId, status: conflict.actual ?? null }),
          ),
        ),
      );
  });

/**
 * `Wait` → `CheckUploading`, re-armed on UploadNotObserved until the upload
 * URL can no longer be used.
 */
export const makeUploadWatchWorkflow = (
  config: RecognitionConfig,
): WorkflowDefinition<RecognitionHandlerServices> => ({
  kind: WorkflowKinds.UploadWatch,
  startAt: "Wait",
  states: {
    Wait: {
      type: "Wait",
      duration: Duration.seconds(config.uploadingWaitingTime),
      next: "CheckUploading",
    },
    CheckUploading: {
      type: "Task",
      handler: checkUploading,
      rearm: {
        on: ["UploadNotObserved"],
        target: "Wait",
        maxAttempts: uploadWatchMaxAttempts(config),
        exhausted: "UploadTimedOut",
      },
      end: true,
    },
    UploadTimedOut: {
      type: "Task",
      handler: markUploadTimedOut,
      failWith: "UploadTimeout",
      end: true,
    },
  },
});
