// packages/recognition/src/services/recognition-backend.ts

import { Context, Duration, Effect, Layer, Schema } from "effect";
import { Backoff, retrySchedule, type BaseRetryConfig } from "@labelflow/core";
import { LabelSchema, type Label } from "../domain/blob-record";
import { ImageRejectedError, RecognitionBackendError } from "../errors";

export interface DetectRequest {
  readonly blobId: string;
  readonly body: Uint8Array;
}

export interface RecognitionBackendService {
  /**
   * Labels for the object, in the backend's ranking order.
   */
  readonly detect: (
    request: DetectRequest,
  ) => Effect.Effect<
    ReadonlyArray<Label>,
    RecognitionBackendError | ImageRejectedError
  >;
}

export class RecognitionBackend extends Context.Tag(
  "@labelflow/RecognitionBackend",
)<RecognitionBackend, RecognitionBackendService>() {}

// =============================================================================
// HTTP Backend
// =============================================================================

const DetectResponse = Schema.Struct({
  labels: Schema.Array(LabelSchema),
});

export interface HttpRecognitionBackendOptions {
  /** URL the object bytes are POSTed to */
  readonly endpoint: string;
  /** Bound on a single request */
  readonly timeout: Duration.DurationInput;
  /** Retries on infrastructure failures; rejections are never retried */
  readonly retry?: BaseRetryConfig;
  readonly fetch?: typeof fetch;
}

const defaultRetry: BaseRetryConfig = {
  maxAttempts: 2,
  delay: Backoff.exponential(200, { maxDelayMs: 2000 }),
  jitter: true,
};

const rejectionFor = (status: number) => {
  switch (status) {
    case 413:
      return "ImageTooLarge" as const;
    case 415:
    case 422:
      return "InvalidImage" as const;
    default:
      return undefined;
  }
};

/**
 * Recognition over HTTP: `POST {endpoint}` with the raw object, answered by
 * `{ labels: [{ name, confidence }] }`.
 */
export const createHttpRecognitionBackend = (
  options: HttpRecognitionBackendOptions,
): RecognitionBackendService => {
  const doFetch = options.fetch ?? fetch;

  const attempt = ({ blobId, body }: DetectRequest) =>
    Effect.gen(function* () {
      const response = yield* Effect.tryPromise({
        try: (signal) =>
          doFetch(options.endpoint, {
            method: "POST",
            headers: {
              "content-type": "application/octet-stream",
              "x-blob-id": blobId,
            },
            body,
            signal,
          }),
        catch: (cause) =>
          new RecognitionBackendError({
            blobId,
            reason: cause instanceof Error ? cause.message : "request failed",
          }),
      });

      const rejected = rejectionFor(response.status);
      if (rejected !== undefined) {
        return yield* Effect.fail(new ImageRejectedError({ blobId, reason: rejected }));
      }
      if (!response.ok) {
        return yield* Effect.fail(
          new RecognitionBackendError({
            blobId,
            reason: `unexpected status ${response.status}`,
            status: response.status,
          }),
        );
      }

      const json = yield* Effect.tryPromise({
        try: () => response.json(),
        catch: () =>
          new RecognitionBackendError({ blobId, reason: "response is not JSON" }),
      });
      const decoded = yield* Schema.decodeUnknown(DetectResponse)(json).pipe(
        Effect.mapError(
          () => new RecognitionBackendError({ blobId, reason: "malformed response" }),
        ),
      );
      return decoded.labels;
    }).pipe(
      Effect.timeoutFail({
        duration: options.timeout,
        onTimeout: () => new RecognitionBackendError({ blobId, reason: "timed out" }),
      }),
    );

  return {
    detect: (request) =>
      attempt(request).pipe(
        Effect.tapError((error) =>
          Effect.logWarning("Recognition request failed").pipe(
            Effect.annotateLogs({ blobId: request.blobId, error: error.message }),
          ),
        ),
        Effect.retry({
          schedule: retrySchedule(options.retry ?? defaultRetry),
          while: (error) => error._tag === "RecognitionBackendError",
        }),
        Effect.withLogSpan("recognition.detect"),
      ),
  };
};

export const HttpRecognitionBackendLayer = (options: HttpRecognitionBackendOptions) =>
  Layer.succeed(RecognitionBackend, createHttpRecognitionBackend(options));
