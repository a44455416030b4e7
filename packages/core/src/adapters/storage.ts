// packages/core/src/adapters/storage.ts

import { Context, Effect } from "effect";
import type { StorageError } from "../errors";

/**
 * Abstract key-value storage shared by workflow executions and domain records.
 *
 * Implementations provide runtime-specific storage:
 * - Node: libSQL / SQLite table
 * - Testing: In-memory Map
 *
 * Values must be JSON-serializable.
 */
export interface StorageAdapterService {
  /**
   * Get a value by key.
   * Returns undefined if key doesn't exist.
   */
  readonly get: <T>(key: string) => Effect.Effect<T | undefined, StorageError>;

  /**
   * Store a value.
   * Overwrites if key already exists.
   */
  readonly put: <T>(key: string, value: T) => Effect.Effect<void, StorageError>;

  /**
   * Store a value only if the key is absent.
   * Returns false (and writes nothing) when the key already exists.
   */
  readonly putIfAbsent: <T>(
    key: string,
    value: T,
  ) => Effect.Effect<boolean, StorageError>;

  /**
   * Replace a value only if the stored value still equals `expected`.
   *
   * Equality is structural over the JSON encoding, so `expected` should be
   * the value previously read from this adapter. Returns false when another
   * writer got there first.
   */
  readonly compareAndSet: <T>(
    key: string,
    expected: T,
    next: T,
  ) => Effect.Effect<boolean, StorageError>;

  /**
   * Delete a key.
   * Returns true if key existed, false otherwise.
   */
  readonly delete: (key: string) => Effect.Effect<boolean, StorageError>;

  /**
   * List all keys with a given prefix.
   * Returns a Map of key -> value pairs.
   */
  readonly list: <T = unknown>(
    prefix: string,
  ) => Effect.Effect<Map<string, T>, StorageError>;
}

/**
 * Effect service tag for StorageAdapter.
 */
export class StorageAdapter extends Context.Tag("@labelflow/StorageAdapter")<
  StorageAdapter,
  StorageAdapterService
>() {}
