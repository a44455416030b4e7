// packages/recognition/src/workflows/kinds.ts

import { Schema } from "effect";
import type { RuntimeAdapter } from "@labelflow/core";
import type { AuditLog } from "../services/audit-log";
import type { CallbackInvoker } from "../services/callback-invoker";
import type { ObjectStore } from "../services/object-store";
import type { RecognitionBackend } from "../services/recognition-backend";
import type { RecordStore } from "../services/record-store";

export const WorkflowKinds = {
  UploadWatch: "UPLOAD_WATCH",
  Recognition: "RECOGNITION",
} as const;

/**
 * Execution ids are derived from the blob, so a duplicate trigger lands on
 * the execution that already exists.
 */
export const uploadWatchExecutionId = (blobId: string) => `upload-watch:${blobId}`;
export const recognitionExecutionId = (blobId: string) => `recognition:${blobId}`;

/**
 * Input both workflows are started with.
 */
export const BlobInputSchema = Schema.Struct({ blobId: Schema.String });
export type BlobInput = typeof BlobInputSchema.Type;

export const decodeBlobInput = Schema.decodeUnknown(BlobInputSchema);

/**
 * Services the step handlers of both workflows use.
 */
export type RecognitionHandlerServices =
  | RecordStore
  | ObjectStore
  | RecognitionBackend
  | CallbackInvoker
  | AuditLog
  | RuntimeAdapter;
