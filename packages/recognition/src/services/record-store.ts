// packages/recognition/src/services/record-store.ts

import { Context, Effect, Layer, Schema } from "effect";
import { RuntimeAdapter, StorageAdapter } from "@labelflow/core";
import {
  BlobRecordSchema,
  canAdvance,
  type BlobRecord,
  type BlobStatus,
} from "../domain/blob-record";
import {
  InvalidBlobTransitionError,
  RecordAlreadyExistsError,
  RecordConflictError,
  RecordNotFoundError,
  RecordStoreError,
} from "../errors";

const blobKey = (blobId: string) => `blobs/${blobId}`;

/**
 * Change applied by `update`. `blob_id`, `created_at` and `updated_at` are
 * owned by the store.
 */
export type BlobMutation = (
  record: BlobRecord,
) => Omit<BlobRecord, "blob_id" | "created_at" | "updated_at">;

// =============================================================================
// Service Interface
// =============================================================================

export interface RecordStoreService {
  readonly get: (
    blobId: string,
  ) => Effect.Effect<BlobRecord | undefined, RecordStoreError>;

  readonly create: (
    record: BlobRecord,
  ) => Effect.Effect<void, RecordAlreadyExistsError | RecordStoreError>;

  /**
   * Compare-and-set on the current status. Fails with RecordConflictError when
   * the record is not in one of `expected`, or changes underneath the write.
   */
  readonly update: (
    blobId: string,
    mutation: BlobMutation,
    expected: BlobStatus | ReadonlyArray<BlobStatus>,
  ) => Effect.Effect<
    BlobRecord,
    | RecordNotFoundError
    | RecordConflictError
    | InvalidBlobTransitionError
    | RecordStoreError
  >;
}

export class RecordStore extends Context.Tag("@labelflow/RecordStore")<
  RecordStore,
  RecordStoreService
>() {}

// =============================================================================
// Implementation
// =============================================================================

export const createRecordStore = Effect.gen(function* () {
  const storage = yield* StorageAdapter;
  const runtime = yield* RuntimeAdapter;

  const encode = (operation: RecordStoreError["operation"], record: BlobRecord) =>
    Schema.encode(BlobRecordSchema)(record).pipe(
      Effect.mapError(
        (cause) =>
          new RecordStoreError({ operation, blobId: record.blob_id, cause }),
      ),
    );

  // Raw value alongside the decoded one: compare-and-set needs what is stored
  const read = (operation: RecordStoreError["operation"], blobId: string) =>
    storage.get<unknown>(blobKey(blobId)).pipe(
      Effect.flatMap((raw) =>
        raw === undefined
          ? Effect.succeed(undefined)
          : Schema.decodeUnknown(BlobRecordSchema)(raw).pipe(
              Effect.map((record) => ({ raw, record })),
            ),
      ),
      Effect.mapError((cause) => new RecordStoreError({ operation, blobId, cause })),
    );

  const service: RecordStoreService = {
    get: (blobId) =>
      read("get", blobId).pipe(Effect.map((found) => found?.record)),

    create: (record) =>
      Effect.gen(function* () {
        const encoded = yield* encode("create", record);
        const created = yield* storage
          .putIfAbsent(blobKey(record.blob_id), encoded)
          .pipe(
            Effect.mapError(
              (cause) =>
                new RecordStoreError({
                  operation: "create",
                  blobId: record.blob_id,
                  cause,
                }),
            ),
          );
        if (!created) {
          return yield* Effect.fail(
            new RecordAlreadyExistsError({ blobId: record.blob_id }),
          );
        }
      }),

    update: (blobId, mutation, expected) =>
      Effect.gen(function* () {
        const allowed: ReadonlyArray<BlobStatus> =
          typeof expected === "string" ? [expected] : expected;

        const found = yield* read("update", blobId);
        if (found === undefined) {
          return yield* Effect.fail(new RecordNotFoundError({ blobId }));
        }
        const { raw, record } = found;

        if (!allowed.includes(record.status)) {
          return yield* Effect.fail(
            new RecordConflictError({
              blobId,
              expected: allowed,
              actual: record.status,
            }),
          );
        }

        const changes = mutation(record);
        if (
          changes.status !== record.status &&
          !canAdvance(record.status, changes.status)
        ) {
          return yield* Effect.fail(
            new InvalidBlobTransitionError({
              blobId,
              from: record.status,
              to: changes.status,
            }),
          );
        }

        const next: BlobRecord = {
          ...changes,
          blob_id: record.blob_id,
          created_at: record.created_at,
          updated_at: yield* runtime.now(),
        };
        const swapped = yield* storage
          .compareAndSet(blobKey(blobId), raw, yield* encode("update", next))
          .pipe(
            Effect.mapError(
              (cause) =>
                new RecordStoreError({ operation: "update", blobId, cause }),
            ),
          );
        if (!swapped) {
          const current = yield* read("update", blobId);
          return yield* Effect.fail(
            new RecordConflictError({
              blobId,
              expected: allowed,
              actual: current?.record.status,
            }),
          );
        }

        yield* Effect.logDebug("Blob record updated").pipe(
          Effect.annotateLogs({ blobId, from: record.status, to: next.status }),
        );
        return next;
      }),
  };

  return service;
});

export const RecordStoreLayer = Layer.effect(RecordStore, createRecordStore);
