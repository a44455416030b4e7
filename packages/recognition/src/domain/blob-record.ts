// packages/recognition/src/domain/blob-record.ts

import { Schema } from "effect";

// =============================================================================
// Values
// =============================================================================

export const BlobStatusSchema = Schema.Literal(
  "PENDING_UPLOAD",
  "UPLOADED",
  "RECOGNIZING",
  "LABELED",
  "FAILED",
);
export type BlobStatus = typeof BlobStatusSchema.Type;

/**
 * Domain failures a record can end with. Each one maps to a fixed,
 * documented outcome for the client.
 */
export const DomainErrorKindSchema = Schema.Literal(
  "DomainMismatch",
  "InvalidImage",
  "ImageTooLarge",
);
export type DomainErrorKind = typeof DomainErrorKindSchema.Type;

export const BlobErrorKindSchema = Schema.Union(
  DomainErrorKindSchema,
  Schema.Literal("UploadTimeout", "Unexpected"),
);
export type BlobErrorKind = typeof BlobErrorKindSchema.Type;

export const CallbackDeliverySchema = Schema.Literal(
  "Delivered",
  "Rejected",
  "TimedOut",
  "Unreachable",
);
export type CallbackDelivery = typeof CallbackDeliverySchema.Type;

export const LabelSchema = Schema.Struct({
  name: Schema.String,
  confidence: Schema.Number.pipe(Schema.between(0, 100)),
  parents: Schema.optional(Schema.Array(Schema.String)),
});
export type Label = typeof LabelSchema.Type;

// =============================================================================
// Record
// =============================================================================

export const BlobRecordSchema = Schema.Struct({
  blob_id: Schema.String,
  status: BlobStatusSchema,
  callback_url: Schema.String,
  labels: Schema.optional(Schema.Array(LabelSchema)),
  error_kind: Schema.optional(BlobErrorKindSchema),
  callback_delivery: Schema.optional(CallbackDeliverySchema),
  /** Execution that saved the labels */
  labeled_by: Schema.optional(Schema.String),
  created_at: Schema.Number,
  updated_at: Schema.Number,
});
export type BlobRecord = typeof BlobRecordSchema.Type;

// =============================================================================
// Status Transitions
// =============================================================================

/**
 * Forward-only status moves. PENDING_UPLOAD → FAILED is the upload timeout.
 */
export const BLOB_TRANSITIONS: Record<BlobStatus, ReadonlyArray<BlobStatus>> = {
  PENDING_UPLOAD: ["UPLOADED", "FAILED"],
  UPLOADED: ["RECOGNIZING", "FAILED"],
  RECOGNIZING: ["LABELED", "FAILED"],
  LABELED: [],
  FAILED: [],
};

export const canAdvance = (from: BlobStatus, to: BlobStatus): boolean =>
  BLOB_TRANSITIONS[from].includes(to);

export const isTerminalBlobStatus = (status: BlobStatus): boolean =>
  BLOB_TRANSITIONS[status].length === 0;

/**
 * What `GET /blobs/:blobId` exposes. Never more than the coarse error kind.
 */
export interface BlobView {
  readonly blob_id: string;
  readonly status: BlobStatus;
  readonly labels?: ReadonlyArray<Label>;
  readonly error_kind?: BlobErrorKind;
}

export const toBlobView = (record: BlobRecord): BlobView => ({
  blob_id: record.blob_id,
  status: record.status,
  ...(record.status === "LABELED" && record.labels !== undefined
    ? { labels: record.labels }
    : {}),
  ...(record.status === "FAILED" && record.error_kind !== undefined
    ? { error_kind: record.error_kind }
    : {}),
});
