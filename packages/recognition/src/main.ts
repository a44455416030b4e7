// packages/recognition/src/main.ts

import { createServer } from "node:http";
import * as HttpMiddleware from "@effect/platform/HttpMiddleware";
import * as HttpServer from "@effect/platform/HttpServer";
import { NodeHttpServer, NodeRuntime } from "@effect/platform-node";
import { Duration, Effect, Layer, Logger, Redacted } from "effect";
import {
  LoggingTrackerLayer,
  createLibSqlStorage,
  createNodeRuntime,
} from "@labelflow/core";
import { RecoveryManager, runAlarmLoop } from "@labelflow/workflow";
import { RecognitionAppLayer } from "./app";
import { startUploadConfirmations } from "./blobs";
import { loadServiceConfig } from "./config";
import { blobRoutes } from "./http/routes";
import { FetchCallbackInvokerLayer } from "./services/callback-invoker";
import { FileObjectStoreLayer } from "./services/object-store";
import { HttpRecognitionBackendLayer } from "./services/recognition-backend";

const ServiceLayer = Layer.unwrapScoped(
  Effect.gen(function* () {
    const settings = yield* loadServiceConfig;
    const { recognition } = settings;

    const storage = yield* createLibSqlStorage({ url: settings.databaseUrl });
    const runtime = yield* createNodeRuntime({ storage });

    const leaves = Layer.mergeAll(
      FileObjectStoreLayer(settings.blobDirectory, {
        publicUrl: settings.publicUrl,
        signingSecret: Redacted.value(settings.uploadSigningSecret),
        ttlSeconds: recognition.presignedUrlTTL,
      }),
      HttpRecognitionBackendLayer({
        endpoint: settings.recognitionEndpoint,
        timeout: Duration.seconds(recognition.recognitionTimeout),
      }),
      FetchCallbackInvokerLayer({
        timeout: Duration.seconds(recognition.callbackTimeout),
      }),
    ).pipe(Layer.provideMerge(runtime.layer));

    const app = RecognitionAppLayer(recognition).pipe(Layer.provideMerge(leaves));

    // Resume what the previous process left, then start consuming timers and
    // upload notifications
    const background = Layer.scopedDiscard(
      Effect.gen(function* () {
        const { actions } = yield* Effect.flatMap(RecoveryManager, (manager) =>
          manager.recover(),
        );
        yield* Effect.logInfo("Recovery finished").pipe(
          Effect.annotateLogs({ executions: actions.length }),
        );
        yield* Effect.forkScoped(runAlarmLoop(runtime.alarms));
        yield* startUploadConfirmations;
      }),
    );

    const server = HttpServer.serve(blobRoutes, HttpMiddleware.logger).pipe(
      HttpServer.withLogAddress,
      Layer.provide(NodeHttpServer.layer(createServer, { port: settings.port })),
    );

    return Layer.merge(server, background).pipe(
      Layer.provide(Layer.merge(app, LoggingTrackerLayer)),
      Layer.provide(Logger.minimumLogLevel(settings.logLevel)),
    );
  }),
);

NodeRuntime.runMain(Layer.launch(ServiceLayer));
