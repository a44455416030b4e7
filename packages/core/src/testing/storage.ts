// packages/core/src/testing/storage.ts

import { Effect } from "effect";
import { StorageError } from "../errors";
import type { StorageAdapterService } from "../adapters/storage";

type Operation = StorageError["operation"];

const sameValue = (a: unknown, b: unknown): boolean =>
  JSON.stringify(a) === JSON.stringify(b);

/**
 * Create an in-memory storage adapter for testing.
 *
 * Provides a simple Map-backed implementation that works synchronously.
 */
export function createInMemoryStorage(): StorageAdapterService {
  return createInMemoryStorageWithHandle();
}

/**
 * Failure simulation settings.
 */
export interface StorageFailureConfig {
  /** Operations that should fail (undefined = all operations) */
  readonly operations?: ReadonlyArray<Operation>;
  /** Key prefixes that should fail (undefined = all keys) */
  readonly keyPrefixes?: ReadonlyArray<string>;
  /** If true, only fail once then succeed */
  readonly failOnce?: boolean;
}

/**
 * In-memory storage with test helpers.
 */
export interface InMemoryStorageHandle extends StorageAdapterService {
  /**
   * Get the raw data map for inspection.
   */
  readonly getData: () => Map<string, unknown>;

  /**
   * Check if a key exists.
   */
  readonly has: (key: string) => boolean;

  /**
   * Get all keys.
   */
  readonly keys: () => string[];

  /**
   * Make matching operations fail with StorageError.
   */
  readonly simulateFailure: (config: StorageFailureConfig) => void;

  /**
   * Stop simulating failures.
   */
  readonly clearFailure: () => void;
}

/**
 * Create an in-memory storage adapter with test helpers.
 */
export function createInMemoryStorageWithHandle(): InMemoryStorageHandle {
  const data = new Map<string, unknown>();
  let failure: StorageFailureConfig | undefined;
  let failures = 0;

  const guard = <A>(
    operation: Operation,
    key: string | undefined,
    body: () => A,
  ): Effect.Effect<A, StorageError> =>
    Effect.suspend(() => {
      const matches =
        failure !== undefined &&
        !(failure.failOnce && failures > 0) &&
        (failure.operations === undefined ||
          failure.operations.includes(operation)) &&
        (failure.keyPrefixes === undefined ||
          (key !== undefined &&
            failure.keyPrefixes.some((prefix) => key.startsWith(prefix))));

      if (matches) {
        failures++;
        return Effect.fail(
          new StorageError({
            operation,
            key,
            cause: new Error("Simulated storage failure"),
          }),
        );
      }
      return Effect.sync(body);
    });

  return {
    get: <T>(key: string) =>
      guard("get", key, () => data.get(key) as T | undefined),

    put: <T>(key: string, value: T) =>
      guard("put", key, () => {
        data.set(key, value);
      }),

    putIfAbsent: <T>(key: string, value: T) =>
      guard("putIfAbsent", key, () => {
        if (data.has(key)) return false;
        data.set(key, value);
        return true;
      }),

    compareAndSet: <T>(key: string, expected: T, next: T) =>
      guard("compareAndSet", key, () => {
        if (!data.has(key) || !sameValue(data.get(key), expected)) {
          return false;
        }
        data.set(key, next);
        return true;
      }),

    delete: (key) =>
      guard("delete", key, () => {
        const existed = data.has(key);
        data.delete(key);
        return existed;
      }),

    list: <T = unknown>(prefix: string) =>
      guard("list", prefix, () => {
        const result = new Map<string, T>();
        for (const [k, v] of data) {
          if (k.startsWith(prefix)) {
            result.set(k, v as T);
          }
        }
        return result;
      }),

    // Test helpers
    getData: () => data,
    has: (key) => data.has(key),
    keys: () => Array.from(data.keys()),
    simulateFailure: (config) => {
      failure = config;
      failures = 0;
    },
    clearFailure: () => {
      failure = undefined;
      failures = 0;
    },
  };
}
