// packages/recognition/src/services/object-store.ts

import { createHmac, timingSafeEqual } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { Context, Effect, Layer, PubSub, type Queue, type Scope } from "effect";
import { RuntimeAdapter } from "@labelflow/core";
import {
  InvalidUploadSignatureError,
  ObjectNotFoundError,
  ObjectStoreError,
} from "../errors";

// =============================================================================
// Types
// =============================================================================

/**
 * Published once per stored object.
 */
export interface ObjectCreated {
  readonly blobId: string;
  readonly size: number;
  readonly createdAt: number;
}

export interface PresignedUpload {
  readonly url: string;
  /** Epoch ms after which the URL is refused */
  readonly expiresAt: number;
}

export interface ObjectStoreService {
  /** Signed URL a client can PUT the object to */
  readonly putUrl: (blobId: string) => Effect.Effect<PresignedUpload>;

  readonly verifyUpload: (
    blobId: string,
    expires: number,
    signature: string,
  ) => Effect.Effect<void, InvalidUploadSignatureError>;

  /** Store the object and publish an ObjectCreated notification */
  readonly put: (
    blobId: string,
    body: Uint8Array,
  ) => Effect.Effect<void, ObjectStoreError>;

  readonly get: (
    blobId: string,
  ) => Effect.Effect<Uint8Array, ObjectStoreError | ObjectNotFoundError>;

  /** Subscribe to ObjectCreated notifications for the lifetime of the scope */
  readonly subscribe: Effect.Effect<
    Queue.Dequeue<ObjectCreated>,
    never,
    Scope.Scope
  >;
}

export class ObjectStore extends Context.Tag("@labelflow/ObjectStore")<
  ObjectStore,
  ObjectStoreService
>() {}

/**
 * Where the bytes live.
 */
export interface ObjectBackend {
  readonly write: (blobId: string, body: Uint8Array) => Promise<void>;
  readonly read: (blobId: string) => Promise<Uint8Array | undefined>;
}

export interface ObjectStoreOptions {
  /** Base URL upload URLs are built on, e.g. "http://localhost:3000" */
  readonly publicUrl: string;
  /** HMAC-SHA256 key for upload URLs */
  readonly signingSecret: string;
  /** Upload URL lifetime in seconds */
  readonly ttlSeconds: number;
}

// =============================================================================
// Implementation
// =============================================================================

const sign = (secret: string, blobId: string, expires: number) =>
  createHmac("sha256", secret).update(`${blobId}.${expires}`).digest("hex");

const sameSignature = (a: string, b: string) => {
  const left = Buffer.from(a, "hex");
  const right = Buffer.from(b, "hex");
  return left.length === right.length && timingSafeEqual(left, right);
};

export const makeObjectStore = (
  backend: ObjectBackend,
  options: ObjectStoreOptions,
) =>
  Effect.gen(function* () {
    const runtime = yield* RuntimeAdapter;
    const created = yield* PubSub.unbounded<ObjectCreated>();
    const baseUrl = options.publicUrl.replace(/\/+$/, "");

    const service: ObjectStoreService = {
      putUrl: (blobId) =>
        Effect.map(runtime.now(), (now) => {
          const expiresAt = now + options.ttlSeconds * 1000;
          const query = new URLSearchParams({
            expires: String(expiresAt),
            signature: sign(options.signingSecret, blobId, expiresAt),
          });
          return {
            url: `${baseUrl}/uploads/${encodeURIComponent(blobId)}?${query.toString()}`,
            expiresAt,
          };
        }),

      verifyUpload: (blobId, expires, signature) =>
        Effect.flatMap(runtime.now(), (now) => {
          if (now > expires) {
            return Effect.fail(
              new InvalidUploadSignatureError({ blobId, reason: "expired" }),
            );
          }
          return sameSignature(sign(options.signingSecret, blobId, expires), signature)
            ? Effect.void
            : Effect.fail(
                new InvalidUploadSignatureError({ blobId, reason: "mismatch" }),
              );
        }),

      put: (blobId, body) =>
        Effect.gen(function* () {
          yield* Effect.tryPromise({
            try: () => backend.write(blobId, body),
            catch: (cause) =>
              new ObjectStoreError({ operation: "put", blobId, cause }),
          });
          const createdAt = yield* runtime.now();
          yield* PubSub.publish(created, { blobId, size: body.byteLength, createdAt });
          yield* Effect.logInfo("Object stored").pipe(
            Effect.annotateLogs({ blobId, size: body.byteLength }),
          );
        }),

      get: (blobId) =>
        Effect.tryPromise({
          try: () => backend.read(blobId),
          catch: (cause) =>
            new ObjectStoreError({ operation: "get", blobId, cause }),
        }).pipe(
          Effect.flatMap((body) =>
            body === undefined
              ? Effect.fail(new ObjectNotFoundError({ blobId }))
              : Effect.succeed(body),
          ),
        ),

      subscribe: PubSub.subscribe(created),
    };

    return service;
  });

// =============================================================================
// Backends
// =============================================================================

export const inMemoryObjectBackend = (): ObjectBackend => {
  const objects = new Map<string, Uint8Array>();
  return {
    write: async (blobId, body) => {
      objects.set(blobId, body);
    },
    read: async (blobId) => objects.get(blobId),
  };
};

const isMissing = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * One file per object under `directory`.
 */
export const fileObjectBackend = (directory: string): ObjectBackend => {
  const pathOf = (blobId: string) => {
    if (blobId.length === 0 || basename(blobId) !== blobId) {
      throw new Error(`Invalid object key '${blobId}'`);
    }
    return join(directory, blobId);
  };

  return {
    write: async (blobId, body) => {
      await mkdir(directory, { recursive: true });
      await writeFile(pathOf(blobId), body);
    },
    read: async (blobId) => {
      try {
        return new Uint8Array(await readFile(pathOf(blobId)));
      } catch (error) {
        if (isMissing(error)) return undefined;
        throw error;
      }
    },
  };
};

// =============================================================================
// Layers
// =============================================================================

export const InMemoryObjectStoreLayer = (options: ObjectStoreOptions) =>
  Layer.effect(ObjectStore, makeObjectStore(inMemoryObjectBackend(), options));

export const FileObjectStoreLayer = (
  directory: string,
  options: ObjectStoreOptions,
) =>
  Layer.effect(
    ObjectStore,
    makeObjectStore(fileObjectBackend(directory), options),
  );
