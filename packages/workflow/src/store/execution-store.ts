// packages/workflow/src/store/execution-store.ts

import { Context, Effect, Layer, Schema } from "effect";
import { StorageAdapter } from "@labelflow/core";
import { ConflictError, StorageError } from "../errors";
import { ExecutionRecordSchema, type ExecutionRecord } from "../state/types";

// =============================================================================
// Storage Keys
// =============================================================================

export const KEYS = {
  activePrefix: "executions/active/",
  archivePrefix: "executions/archive/",
  active: (executionId: string) => `executions/active/${executionId}`,
  archive: (executionId: string) => `executions/archive/${executionId}`,
} as const;

// =============================================================================
// Service Interface
// =============================================================================

/**
 * Durable execution records.
 *
 * Every update is a compare-and-set against the record previously read, so
 * two dispatchers can never both advance the same version.
 */
export interface ExecutionStoreService {
  /**
   * Insert a new record. Returns false if the id is already active.
   */
  readonly create: (
    record: ExecutionRecord,
  ) => Effect.Effect<boolean, StorageError>;

  /**
   * Read an active record.
   */
  readonly load: (
    executionId: string,
  ) => Effect.Effect<ExecutionRecord | undefined, StorageError>;

  /**
   * Read an archived (terminal) record.
   */
  readonly loadArchived: (
    executionId: string,
  ) => Effect.Effect<ExecutionRecord | undefined, StorageError>;

  /**
   * Replace `previous` with `next`. Fails with ConflictError when the stored
   * record is no longer `previous`.
   */
  readonly replace: (
    previous: ExecutionRecord,
    next: ExecutionRecord,
  ) => Effect.Effect<ExecutionRecord, ConflictError | StorageError>;

  /**
   * Move a terminal record from the active keyspace to the archive.
   */
  readonly archive: (
    record: ExecutionRecord,
  ) => Effect.Effect<void, StorageError>;

  /**
   * All active records.
   */
  readonly listActive: () => Effect.Effect<
    ReadonlyArray<ExecutionRecord>,
    StorageError
  >;
}

/**
 * Effect service tag for ExecutionStore.
 */
export class ExecutionStore extends Context.Tag("@labelflow/ExecutionStore")<
  ExecutionStore,
  ExecutionStoreService
>() {}

// =============================================================================
// Implementation
// =============================================================================

const encodeRecord = (record: ExecutionRecord) =>
  Schema.encode(ExecutionRecordSchema)(record).pipe(
    Effect.mapError(
      (cause) =>
        new StorageError({
          operation: "put",
          key: KEYS.active(record.executionId),
          cause,
        }),
    ),
  );

const decodeRecord = (key: string, raw: unknown) =>
  Schema.decodeUnknown(ExecutionRecordSchema)(raw).pipe(
    Effect.mapError(
      (cause) => new StorageError({ operation: "get", key, cause }),
    ),
  );

/**
 * Create the ExecutionStore service implementation.
 *
 * Records are written in their Schema-encoded form, and the expected value of
 * a compare-and-set is re-encoded the same way.
 */
export const createExecutionStore = Effect.gen(function* () {
  const storage = yield* StorageAdapter;

  const read = (key: string) =>
    Effect.gen(function* () {
      const raw = yield* storage.get<unknown>(key);
      return raw === undefined ? undefined : yield* decodeRecord(key, raw);
    });

  const service: ExecutionStoreService = {
    create: (record) =>
      Effect.gen(function* () {
        const encoded = yield* encodeRecord(record);
        return yield* storage.putIfAbsent(
          KEYS.active(record.executionId),
          encoded,
        );
      }),

    load: (executionId) => read(KEYS.active(executionId)),

    loadArchived: (executionId) => read(KEYS.archive(executionId)),

    replace: (previous, next) =>
      Effect.gen(function* () {
        const expected = yield* encodeRecord(previous);
        const encoded = yield* encodeRecord(next);
        const swapped = yield* storage.compareAndSet(
          KEYS.active(previous.executionId),
          expected,
          encoded,
        );
        if (!swapped) {
          return yield* Effect.fail(
            new ConflictError({
              executionId: previous.executionId,
              expectedVersion: previous.version,
            }),
          );
        }
        return next;
      }),

    archive: (record) =>
      Effect.gen(function* () {
        const encoded = yield* encodeRecord(record);
        yield* storage.put(KEYS.archive(record.executionId), encoded);
        yield* storage.delete(KEYS.active(record.executionId));
      }),

    listActive: () =>
      Effect.gen(function* () {
        const entries = yield* storage.list<unknown>(KEYS.activePrefix);
        return yield* Effect.forEach(entries, ([key, raw]) =>
          decodeRecord(key, raw),
        );
      }),
  };

  return service;
});

/**
 * Layer that provides ExecutionStore.
 */
export const ExecutionStoreLayer = Layer.effect(
  ExecutionStore,
  createExecutionStore,
);
