// packages/core/src/adapters/libsql/storage.ts

import { createClient, type Client, type InValue } from "@libsql/client";
import { Effect, Scope } from "effect";
import { StorageError } from "../../errors";
import type { StorageAdapterService } from "../storage";

/**
 * Options for the libSQL / SQLite storage adapter.
 */
export interface LibSqlStorageOptions {
  /**
   * libSQL database URL.
   *
   * - "file:./labelflow.db" (local file)
   * - "libsql://your-db.turso.io" (remote)
   *
   * @default "file:./labelflow.db"
   */
  readonly url?: string;

  /** Authentication token for remote libSQL databases. */
  readonly authToken?: string;

  /**
   * Table holding key/value rows.
   * @default "labelflow_kv"
   */
  readonly tableName?: string;
}

const decode = <T>(raw: unknown): T | undefined =>
  typeof raw === "string" ? JSON.parse(raw) : undefined;

/**
 * Create a durable storage adapter on a libSQL / SQLite table.
 *
 * The client is closed when the surrounding scope closes. Conditional writes
 * are single statements, so they stay atomic across processes sharing the
 * same database file.
 */
export const createLibSqlStorage = (
  options: LibSqlStorageOptions = {},
): Effect.Effect<StorageAdapterService, StorageError, Scope.Scope> =>
  Effect.gen(function* () {
    const tableName = options.tableName ?? "labelflow_kv";
    if (!/^[A-Za-z0-9_]+$/.test(tableName)) {
      return yield* Effect.fail(
        new StorageError({
          operation: "open",
          cause: new Error(`Invalid table name '${tableName}'`),
        }),
      );
    }

    const client: Client = yield* Effect.acquireRelease(
      Effect.try({
        try: () =>
          createClient({
            url: options.url ?? "file:./labelflow.db",
            authToken: options.authToken,
          }),
        catch: (cause) => new StorageError({ operation: "open", cause }),
      }),
      (c) => Effect.sync(() => c.close()),
    );

    const run = (
      operation: StorageError["operation"],
      sql: string,
      args: InValue[],
      key?: string,
    ) =>
      Effect.tryPromise({
        try: () => client.execute({ sql, args }),
        catch: (cause) => new StorageError({ operation, key, cause }),
      });

    yield* run(
      "open",
      `CREATE TABLE IF NOT EXISTS ${tableName} (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      )`,
      [],
    );

    const service: StorageAdapterService = {
      get: <T>(key: string) =>
        run("get", `SELECT value FROM ${tableName} WHERE key = ?`, [key], key).pipe(
          Effect.map((rs) => decode<T>(rs.rows[0]?.value)),
        ),

      put: <T>(key: string, value: T) =>
        run(
          "put",
          `INSERT INTO ${tableName} (key, value, updated_at) VALUES (?, ?, ?)
           ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
          [key, JSON.stringify(value), Date.now()],
          key,
        ).pipe(Effect.asVoid),

      putIfAbsent: <T>(key: string, value: T) =>
        run(
          "putIfAbsent",
          `INSERT INTO ${tableName} (key, value, updated_at) VALUES (?, ?, ?)
           ON CONFLICT(key) DO NOTHING`,
          [key, JSON.stringify(value), Date.now()],
          key,
        ).pipe(Effect.map((rs) => rs.rowsAffected === 1)),

      compareAndSet: <T>(key: string, expected: T, next: T) =>
        run(
          "compareAndSet",
          `UPDATE ${tableName} SET value = ?, updated_at = ? WHERE key = ? AND value = ?`,
          [JSON.stringify(next), Date.now(), key, JSON.stringify(expected)],
          key,
        ).pipe(Effect.map((rs) => rs.rowsAffected === 1)),

      delete: (key) =>
        run("delete", `DELETE FROM ${tableName} WHERE key = ?`, [key], key).pipe(
          Effect.map((rs) => rs.rowsAffected > 0),
        ),

      list: <T = unknown>(prefix: string) =>
        run(
          "list",
          `SELECT key, value FROM ${tableName} WHERE substr(key, 1, ?) = ? ORDER BY key`,
          [prefix.length, prefix],
        ).pipe(
          Effect.map((rs) => {
            const result = new Map<string, T>();
            for (const row of rs.rows) {
              const value = decode<T>(row.value);
              if (typeof row.key === "string" && value !== undefined) {
                result.set(row.key, value);
              }
            }
            return result;
          }),
        ),
    };

    return service;
  });
