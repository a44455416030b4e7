// packages/recognition/src/errors.ts

import { Data } from "effect";
import type { BlobStatus, DomainErrorKind } from "./domain/blob-record";

// =============================================================================
// Record Store
// =============================================================================

export class RecordNotFoundError extends Data.TaggedError("RecordNotFoundError")<{
  readonly blobId: string;
}> {
  get message(): string {
    return `Blob "${this.blobId}" not found`;
  }
}

export class RecordAlreadyExistsError extends Data.TaggedError(
  "RecordAlreadyExistsError",
)<{
  readonly blobId: string;
}> {
  get message(): string {
    return `Blob "${this.blobId}" already exists`;
  }
}

/**
 * The record was not in one of the expected statuses, or changed between
 * read and write.
 */
export class RecordConflictError extends Data.TaggedError("RecordConflictError")<{
  readonly blobId: string;
  readonly expected: ReadonlyArray<BlobStatus>;
  readonly actual?: BlobStatus;
}> {
  get message(): string {
    return `Blob "${this.blobId}" is ${this.actual ?? "gone"}, expected one of [${this.expected.join(", ")}]`;
  }
}

export class InvalidBlobTransitionError extends Data.TaggedError(
  "InvalidBlobTransitionError",
)<{
  readonly blobId: string;
  readonly from: BlobStatus;
  readonly to: BlobStatus;
}> {
  get message(): string {
    return `Blob "${this.blobId}" cannot move from ${this.from} to ${this.to}`;
  }
}

/**
 * Storage failure underneath the record store.
 */
export class RecordStoreError extends Data.TaggedError("RecordStoreError")<{
  readonly operation: "get" | "create" | "update";
  readonly blobId: string;
  readonly cause: unknown;
}> {
  get message(): string {
    const reason =
      this.cause instanceof Error ? this.cause.message : String(this.cause);
    return `Record store ${this.operation} failed for "${this.blobId}": ${reason}`;
  }
}

// =============================================================================
// Object Store
// =============================================================================

export class ObjectStoreError extends Data.TaggedError("ObjectStoreError")<{
  readonly operation: "put" | "get";
  readonly blobId: string;
  readonly cause: unknown;
}> {
  get message(): string {
    const reason =
      this.cause instanceof Error ? this.cause.message : String(this.cause);
    return `Object store ${this.operation} failed for "${this.blobId}": ${reason}`;
  }
}

export class ObjectNotFoundError extends Data.TaggedError("ObjectNotFoundError")<{
  readonly blobId: string;
}> {
  get message(): string {
    return `Object "${this.blobId}" has not been uploaded`;
  }
}

export class InvalidUploadSignatureError extends Data.TaggedError(
  "InvalidUploadSignatureError",
)<{
  readonly blobId: string;
  readonly reason: "expired" | "mismatch";
}> {
  get message(): string {
    return this.reason === "expired"
      ? "Upload URL has expired"
      : "Upload signature is invalid";
  }
}

// =============================================================================
// Recognition
// =============================================================================

/**
 * Backend unreachable, timed out or answered with something unreadable.
 */
export class RecognitionBackendError extends Data.TaggedError(
  "RecognitionBackendError",
)<{
  readonly blobId: string;
  readonly reason: string;
  readonly status?: number;
}> {
  get message(): string {
    return `Recognition backend failed for "${this.blobId}": ${this.reason}`;
  }
}

/**
 * Backend refused the object itself.
 */
export class ImageRejectedError extends Data.TaggedError("ImageRejectedError")<{
  readonly blobId: string;
  readonly reason: "InvalidImage" | "ImageTooLarge";
}> {
  get message(): string {
    return this.reason === "InvalidImage"
      ? "Invalid image format has been uploaded"
      : "Too large image has been uploaded";
  }
}

/**
 * Expected, business-level failure of a recognition step. `reason` is the
 * error kind the record ends with.
 */
export class RecognitionStepHasBeenFailed extends Data.TaggedError(
  "RecognitionStepHasBeenFailed",
)<{
  readonly blobId: string;
  readonly reason: DomainErrorKind;
}> {
  get message(): string {
    return `Recognition of "${this.blobId}" failed: ${this.reason}`;
  }
}

// =============================================================================
// Upload Watch
// =============================================================================

export class UploadNotObserved extends Data.TaggedError("UploadNotObserved")<{
  readonly blobId: string;
}> {
  get message(): string {
    return `Blob "${this.blobId}" is still waiting for upload`;
  }
}

// =============================================================================
// Front Door
// =============================================================================

export class InvalidCallbackUrlError extends Data.TaggedError(
  "InvalidCallbackUrlError",
)<{
  readonly callbackUrl: string;
}> {
  get message(): string {
    return "Invalid callback url supplied.";
  }
}
