// packages/recognition/src/workflows/recognition.ts

import { Duration, Effect, Option, Schema } from "effect";
import { RuntimeAdapter } from "@labelflow/core";
import type { StateHandler, WorkflowDefinition } from "@labelflow/workflow";
import type { RecognitionConfig } from "../config";
import {
  DomainErrorKindSchema,
  LabelSchema,
  isTerminalBlobStatus,
  type Label,
} from "../domain/blob-record";
import {
  RecognitionBackendError,
  RecognitionStepHasBeenFailed,
  RecordNotFoundError,
} from "../errors";
import { AuditLog } from "../services/audit-log";
import { CallbackInvoker } from "../services/callback-invoker";
import { ObjectStore } from "../services/object-store";
import { RecognitionBackend } from "../services/recognition-backend";
import { RecordStore } from "../services/record-store";
import {
  WorkflowKinds,
  decodeBlobInput,
  type RecognitionHandlerServices,
} from "./kinds";

// =============================================================================
// Step Data
// =============================================================================

/**
 * What GetLabels, TransformLabels and SaveLabels hand to the next step.
 */
export const LabelsOutputSchema = Schema.Struct({
  blobId: Schema.String,
  labels: Schema.Array(LabelSchema),
});
export type LabelsOutput = typeof LabelsOutputSchema.Type;

const decodeLabelsOutput = Schema.decodeUnknown(LabelsOutputSchema);
const sameLabels = Schema.equivalence(Schema.Array(LabelSchema));

/**
 * Keep labels at or above `minConfidence`, at most `maxLabels` of them, in
 * the order the backend ranked them.
 */
export const transformLabels = (
  labels: ReadonlyArray<Label>,
  config: Pick<RecognitionConfig, "minConfidence" | "maxLabels">,
): ReadonlyArray<Label> =>
  labels
    .filter((label) => label.confidence >= config.minConfidence)
    .slice(0, config.maxLabels);

// =============================================================================
// Branch Steps
// =============================================================================

export const getLabels =
  (config: RecognitionConfig): StateHandler<ObjectStore | RecognitionBackend> =>
  ({ input }) =>
    Effect.gen(function* () {
      const { blobId } = yield* decodeBlobInput(input);
      const body = yield* Effect.flatMap(ObjectStore, (store) => store.get(blobId));
      const backend = yield* RecognitionBackend;

      const labels = yield* backend.detect({ blobId, body }).pipe(
        Effect.timeoutFail({
          duration: Duration.seconds(config.recognitionTimeout),
          onTimeout: () =>
            new RecognitionBackendError({ blobId, reason: "timed out" }),
        }),
        Effect.catchTag("ImageRejectedError", (rejected) =>
          Effect.fail(
            new RecognitionStepHasBeenFailed({ blobId, reason: rejected.reason }),
          ),
        ),
      );
      return { blobId, labels } satisfies LabelsOutput;
    });

export const transformLabelsStep =
  (config: RecognitionConfig): StateHandler =>
  ({ previous }) =>
    Effect.gen(function* () {
      const { blobId, labels } = yield* decodeLabelsOutput(previous);
      const kept = transformLabels(labels, config);

      if (kept.length === 0) {
        yield* Effect.logInfo("No label met the confidence bar").pipe(
          Effect.annotateLogs({ blobId, received: labels.length }),
        );
        return yield* Effect.fail(
          new RecognitionStepHasBeenFailed({ blobId, reason: "DomainMismatch" }),
        );
      }
      return { blobId, labels: kept } satisfies LabelsOutput;
    });

/**
 * RECOGNIZING → LABELED. Re-running with the same execution and labels leaves
 * the record untouched.
 */
export const saveLabels: StateHandler<RecordStore> = ({ previous, executionId }) =>
  Effect.gen(function* () {
    const output = yield* decodeLabelsOutput(previous);
    const store = yield* RecordStore;

    const current = yield* store.get(output.blobId);
    if (
      current?.status === "LABELED" &&
      current.labeled_by === executionId &&
      current.labels !== undefined &&
      sameLabels(current.labels, output.labels)
    ) {
      yield* Effect.logDebug("Labels already saved").pipe(
        Effect.annotateLogs({ blobId: output.blobId }),
      );
      return output;
    }

    yield* store.update(
      output.blobId,
      (record) => ({
        ...record,
        status: "LABELED",
        labels: output.labels,
        labeled_by: executionId,
      }),
      "RECOGNIZING",
    );
    return output;
  });

/**
 * Best effort: the outcome is recorded on the blob, the status stays LABELED.
 */
export const invokeCallback: StateHandler<RecordStore | CallbackInvoker> = ({
  previous,
}) =>
  Effect.gen(function* () {
    const { blobId, labels } = yield* decodeLabelsOutput(previous);
    const store = yield* RecordStore;
    const invoker = yield* CallbackInvoker;

    const record = yield* store.get(blobId);
    if (record === undefined) {
      return yield* Effect.fail(new RecordNotFoundError({ blobId }));
    }

    const delivery = yield* invoker.deliver(record.callback_url, {
      blob_id: blobId,
      labels,
    });
    if (delivery !== "Delivered") {
      yield* Effect.logWarning("Callback not delivered").pipe(
        Effect.annotateLogs({ blobId, delivery }),
      );
    }

    yield* store.update(
      blobId,
      (current) => ({ ...current, callback_delivery: delivery }),
      "LABELED",
    );
    return { blobId, delivery };
  });

// =============================================================================
// Fallbacks
// =============================================================================

/**
 * Expected failure: the record ends FAILED with the domain kind the step
 * raised.
 */
export const recognitionPredefinedErrorFallback: StateHandler<RecordStore> = ({
  input,
  context,
}) =>
  Effect.gen(function* () {
    const { blobId } = yield* decodeBlobInput(input);
    const errorKind = Schema.decodeUnknownOption(DomainErrorKindSchema)(
      context.caught?.details?.reason,
    ).pipe(Option.getOrElse(() => "DomainMismatch" as const));

    yield* Effect.flatMap(RecordStore, (store) =>
      store.update(
        blobId,
        (record) => ({ ...record, status: "FAILED", error_kind: errorKind }),
        ["UPLOADED", "RECOGNIZING"],
      ),
    );
    yield* Effect.logInfo("Recognition ended with a domain failure").pipe(
      Effect.annotateLogs({ blobId, errorKind }),
    );
    return { blobId, errorKind };
  });

/**
 * Anything else: audit entry for operators, record FAILED/Unexpected, alert.
 */
export const unexpectedErrorFallback: StateHandler<
  RecordStore | AuditLog | RuntimeAdapter
> = ({ input, context, executionId }) =>
  Effect.gen(function* () {
    const { blobId } = yield* decodeBlobInput(input);
    const store = yield* RecordStore;
    const caught = context.caught;

    yield* Effect.flatMap(AuditLog, (audit) =>
      Effect.flatMap(RuntimeAdapter, (runtime) => runtime.now()).pipe(
        Effect.flatMap((recordedAt) =>
          audit.record({
            executionId,
            blobId,
            state: caught?.state ?? "unknown",
            errorKind: caught?.errorKind ?? "unknown",
            message: caught?.message ?? "",
            recordedAt,
          }),
        ),
      ),
    );

    // Failures after SaveLabels leave the record LABELED
    const record = yield* store.get(blobId);
    if (record !== undefined && !isTerminalBlobStatus(record.status)) {
      yield* store.update(
        blobId,
        (current) => ({ ...current, status: "FAILED", error_kind: "Unexpected" }),
        record.status,
      );
    }

    yield* Effect.logError("Recognition failed unexpectedly").pipe(
      Effect.annotateLogs({
        blobId,
        state: caught?.state,
        errorKind: caught?.errorKind,
        error: caught?.message,
        alert: true,
      }),
    );
    return { blobId, errorKind: caught?.errorKind ?? null };
  });

// =============================================================================
// Definition
// =============================================================================

/**
 * One-branch Parallel so the whole pipeline shares a catch table.
 */
export const makeRecognitionWorkflow = (
  config: RecognitionConfig,
): WorkflowDefinition<RecognitionHandlerServices> => ({
  kind: WorkflowKinds.Recognition,
  startAt: "RecognitionFlow",
  states: {
    RecognitionFlow: {
      type: "Parallel",
      branches: [
        {
          startAt: "GetLabels",
          states: {
            GetLabels: {
              type: "Task",
              handler: getLabels(config),
              next: "TransformLabels",
            },
            TransformLabels: {
              type: "Task",
              handler: transformLabelsStep(config),
              next: "SaveLabels",
            },
            SaveLabels: { type: "Task", handler: saveLabels, next: "InvokeCallback" },
            InvokeCallback: { type: "Task", handler: invokeCallback, end: true },
          },
        },
      ],
      catch: [
        {
          errorEquals: ["RecognitionStepHasBeenFailed"],
          next: "RecognitionPredefinedErrorFallback",
        },
        { errorEquals: ["*"], next: "UnexpectedErrorFallback" },
      ],
      end: true,
    },
    RecognitionPredefinedErrorFallback: {
      type: "Pass",
      handler: recognitionPredefinedErrorFallback,
      end: true,
    },
    UnexpectedErrorFallback: {
      type: "Task",
      handler: unexpectedErrorFallback,
      failWith: "Unexpected",
      end: true,
    },
  },
});
