// packages/recognition/src/services/callback-invoker.ts

import { Context, Duration, Effect, Layer } from "effect";
import type { CallbackDelivery, Label } from "../domain/blob-record";

export interface CallbackPayload {
  readonly blob_id: string;
  readonly labels: ReadonlyArray<Label>;
}

export interface CallbackInvokerService {
  /**
   * Deliver the payload once. Never fails; the outcome says what happened.
   */
  readonly deliver: (
    url: string,
    payload: CallbackPayload,
  ) => Effect.Effect<CallbackDelivery>;
}

export class CallbackInvoker extends Context.Tag("@labelflow/CallbackInvoker")<
  CallbackInvoker,
  CallbackInvokerService
>() {}

export interface FetchCallbackInvokerOptions {
  readonly timeout: Duration.DurationInput;
  readonly fetch?: typeof fetch;
}

/**
 * POST the payload as JSON. Any 2xx counts as delivered.
 */
export const createFetchCallbackInvoker = (
  options: FetchCallbackInvokerOptions,
): CallbackInvokerService => {
  const doFetch = options.fetch ?? fetch;

  return {
    deliver: (url, payload) =>
      Effect.tryPromise({
        try: (signal) =>
          doFetch(url, {
            method: "POST",
            headers: { "content-type": "application/json" },
            body: JSON.stringify(payload),
            signal,
          }),
        catch: () => "Unreachable" as const,
      }).pipe(
        Effect.map((response): CallbackDelivery =>
          response.ok ? "Delivered" : "Rejected",
        ),
        Effect.timeoutFail({
          duration: options.timeout,
          onTimeout: () => "TimedOut" as const,
        }),
        Effect.catchAll((delivery) => Effect.succeed<CallbackDelivery>(delivery)),
        Effect.tap((delivery) =>
          Effect.logDebug("Callback attempted").pipe(
            Effect.annotateLogs({ blobId: payload.blob_id, delivery }),
          ),
        ),
      ),
  };
};

export const FetchCallbackInvokerLayer = (options: FetchCallbackInvokerOptions) =>
  Layer.succeed(CallbackInvoker, createFetchCallbackInvoker(options));
