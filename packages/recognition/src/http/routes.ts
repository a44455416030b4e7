// packages/recognition/src/http/routes.ts

import * as HttpRouter from "@effect/platform/HttpRouter";
import * as HttpServerRequest from "@effect/platform/HttpServerRequest";
import * as HttpServerResponse from "@effect/platform/HttpServerResponse";
import { Effect, Schema } from "effect";
import { getBlob, receiveUpload, registerBlob } from "../blobs";
import { InvalidUploadSignatureError } from "../errors";

// =============================================================================
// Request Schemas
// =============================================================================

const RegisterRequest = Schema.Struct({
  callback_url: Schema.optionalWith(Schema.String, { default: () => "" }),
});

const BlobParams = Schema.Struct({
  blobId: Schema.String,
});

const UploadQuery = Schema.Struct({
  expires: Schema.NumberFromString,
  signature: Schema.String,
});

// =============================================================================
// Responses
// =============================================================================

/**
 * Error body: a human description plus the values it is about.
 */
const failure = (
  status: number,
  description: string,
  payload: Record<string, unknown> = {},
) => HttpServerResponse.json({ description, payload }, { status });

const internalError = (error: { readonly _tag: string }) =>
  Effect.logError("Request failed").pipe(
    Effect.annotateLogs({ errorKind: error._tag }),
    Effect.zipRight(failure(500, "Internal error.")),
  );

// =============================================================================
// Routes
// =============================================================================

export const blobRoutes = HttpRouter.empty.pipe(
  // POST /blobs - register a blob and get its upload URL
  HttpRouter.post(
    "/blobs",
    Effect.gen(function* () {
      const body = yield* HttpServerRequest.schemaBodyJson(RegisterRequest);
      const registration = yield* registerBlob(body.callback_url);
      return yield* HttpServerResponse.json(registration, { status: 201 });
    }).pipe(
      Effect.catchTags({
        ParseError: () => failure(400, "Invalid request body."),
        RequestError: () => failure(400, "Invalid request body."),
        InvalidCallbackUrlError: (error) =>
          failure(400, error.message, { callback_url: error.callbackUrl }),
      }),
      Effect.catchAll(internalError),
    ),
  ),

  // GET /blobs/:blobId - current status, labels or error kind
  HttpRouter.get(
    "/blobs/:blobId",
    Effect.gen(function* () {
      const { blobId } = yield* HttpRouter.schemaPathParams(BlobParams);
      return yield* HttpServerResponse.json(yield* getBlob(blobId));
    }).pipe(
      Effect.catchTags({
        RecordNotFoundError: (error) =>
          failure(404, "Blob not found.", { blob_id: error.blobId }),
        ParseError: () => failure(400, "Invalid blob id."),
      }),
      Effect.catchAll(internalError),
    ),
  ),

  // PUT /uploads/:blobId?expires=…&signature=… - presigned upload target
  HttpRouter.put(
    "/uploads/:blobId",
    Effect.gen(function* () {
      const { blobId } = yield* HttpRouter.schemaPathParams(BlobParams);
      const request = yield* HttpServerRequest.HttpServerRequest;

      const query = yield* Schema.decodeUnknown(UploadQuery)(
        Object.fromEntries(new URL(request.url, "http://localhost").searchParams),
      ).pipe(
        Effect.mapError(
          () => new InvalidUploadSignatureError({ blobId, reason: "mismatch" }),
        ),
      );
      const body = yield* request.arrayBuffer;

      yield* receiveUpload(blobId, query, new Uint8Array(body));
      return HttpServerResponse.empty({ status: 204 });
    }).pipe(
      Effect.catchTags({
        InvalidUploadSignatureError: (error) =>
          failure(403, error.message, { blob_id: error.blobId }),
        RecordNotFoundError: (error) =>
          failure(404, "Blob not found.", { blob_id: error.blobId }),
        ParseError: () => failure(400, "Invalid blob id."),
        RequestError: () => failure(400, "Invalid upload body."),
      }),
      Effect.catchAll(internalError),
    ),
  ),

  // GET /health
  HttpRouter.get("/health", HttpServerResponse.json({ status: "ok" })),
);
