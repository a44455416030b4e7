// packages/recognition/src/services/audit-log.ts

import { Context, Effect, Layer, Schema } from "effect";
import { StorageAdapter, type StorageError } from "@labelflow/core";

/**
 * Durable note left for operators when an execution fails unexpectedly.
 */
export const AuditEntrySchema = Schema.Struct({
  executionId: Schema.String,
  blobId: Schema.String,
  /** State that raised the failure */
  state: Schema.String,
  errorKind: Schema.String,
  message: Schema.String,
  recordedAt: Schema.Number,
});
export type AuditEntry = typeof AuditEntrySchema.Type;

const auditKey = (executionId: string) => `audit/${executionId}`;

export interface AuditLogService {
  readonly record: (entry: AuditEntry) => Effect.Effect<void, StorageError>;
  readonly get: (
    executionId: string,
  ) => Effect.Effect<AuditEntry | undefined, StorageError>;
  readonly list: () => Effect.Effect<ReadonlyArray<AuditEntry>, StorageError>;
}

export class AuditLog extends Context.Tag("@labelflow/AuditLog")<
  AuditLog,
  AuditLogService
>() {}

export const createAuditLog = Effect.gen(function* () {
  const storage = yield* StorageAdapter;
  const isEntry = Schema.is(AuditEntrySchema);

  const service: AuditLogService = {
    record: (entry) => storage.put(auditKey(entry.executionId), entry),

    get: (executionId) =>
      storage
        .get<unknown>(auditKey(executionId))
        .pipe(Effect.map((raw) => (isEntry(raw) ? raw : undefined))),

    list: () =>
      storage
        .list<unknown>("audit/")
        .pipe(Effect.map((entries) => Array.from(entries.values()).filter(isEntry))),
  };

  return service;
});

export const AuditLogLayer = Layer.effect(AuditLog, createAuditLog);
