// packages/recognition/src/app.ts

import { Layer } from "effect";
import { WorkflowEngineLayer, type RecoveryConfig } from "@labelflow/workflow";
import type { RecognitionConfig } from "./config";
import { AuditLogLayer } from "./services/audit-log";
import { RecordStoreLayer } from "./services/record-store";
import { makeRecognitionWorkflow } from "./workflows/recognition";
import { makeUploadWatchWorkflow } from "./workflows/upload-watch";

export interface RecognitionAppOptions {
  readonly recovery?: RecoveryConfig;
}

/**
 * Workflow engine running both workflows, plus the record store and audit
 * log their steps write to.
 *
 * Still needs the runtime adapters and the leaf clients: ObjectStore,
 * RecognitionBackend and CallbackInvoker.
 */
export const RecognitionAppLayer = (
  config: RecognitionConfig,
  options: RecognitionAppOptions = {},
) =>
  WorkflowEngineLayer(
    [makeUploadWatchWorkflow(config), makeRecognitionWorkflow(config)],
    { recovery: options.recovery },
  ).pipe(Layer.provideMerge(Layer.merge(RecordStoreLayer, AuditLogLayer)));
