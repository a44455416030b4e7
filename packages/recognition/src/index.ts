// packages/recognition/src/index.ts

// Domain
export {
  BlobRecordSchema,
  BlobStatusSchema,
  BlobErrorKindSchema,
  DomainErrorKindSchema,
  CallbackDeliverySchema,
  LabelSchema,
  BLOB_TRANSITIONS,
  canAdvance,
  isTerminalBlobStatus,
  toBlobView,
  type BlobRecord,
  type BlobStatus,
  type BlobErrorKind,
  type DomainErrorKind,
  type CallbackDelivery,
  type Label,
  type BlobView,
} from "./domain/blob-record";

// Errors
export {
  RecordNotFoundError,
  RecordAlreadyExistsError,
  RecordConflictError,
  InvalidBlobTransitionError,
  RecordStoreError,
  ObjectStoreError,
  ObjectNotFoundError,
  InvalidUploadSignatureError,
  RecognitionBackendError,
  ImageRejectedError,
  RecognitionStepHasBeenFailed,
  UploadNotObserved,
  InvalidCallbackUrlError,
} from "./errors";

// Config
export {
  defaultRecognitionConfig,
  createRecognitionConfig,
  RecognitionConfigSchema,
  validateRecognitionConfigEffect,
  uploadWatchMaxAttempts,
  loadServiceConfig,
  type RecognitionConfig,
  type ServiceConfig,
} from "./config";

// Services
export {
  RecordStore,
  RecordStoreLayer,
  createRecordStore,
  type RecordStoreService,
  type BlobMutation,
} from "./services/record-store";
export {
  ObjectStore,
  makeObjectStore,
  inMemoryObjectBackend,
  fileObjectBackend,
  InMemoryObjectStoreLayer,
  FileObjectStoreLayer,
  type ObjectStoreService,
  type ObjectStoreOptions,
  type ObjectBackend,
  type ObjectCreated,
  type PresignedUpload,
} from "./services/object-store";
export {
  RecognitionBackend,
  createHttpRecognitionBackend,
  HttpRecognitionBackendLayer,
  type RecognitionBackendService,
  type HttpRecognitionBackendOptions,
  type DetectRequest,
} from "./services/recognition-backend";
export {
  CallbackInvoker,
  createFetchCallbackInvoker,
  FetchCallbackInvokerLayer,
  type CallbackInvokerService,
  type CallbackPayload,
  type FetchCallbackInvokerOptions,
} from "./services/callback-invoker";
export {
  AuditLog,
  AuditLogLayer,
  AuditEntrySchema,
  createAuditLog,
  type AuditEntry,
  type AuditLogService,
} from "./services/audit-log";

// Workflows
export {
  WorkflowKinds,
  uploadWatchExecutionId,
  recognitionExecutionId,
  BlobInputSchema,
  type BlobInput,
  type RecognitionHandlerServices,
} from "./workflows/kinds";
export {
  makeUploadWatchWorkflow,
  checkUploading,
  markUploadTimedOut,
} from "./workflows/upload-watch";
export {
  makeRecognitionWorkflow,
  transformLabels,
  getLabels,
  transformLabelsStep,
  saveLabels,
  invokeCallback,
  recognitionPredefinedErrorFallback,
  unexpectedErrorFallback,
  LabelsOutputSchema,
  type LabelsOutput,
} from "./workflows/recognition";

// Front door
export {
  registerBlob,
  isCallbackUrl,
  getBlob,
  receiveUpload,
  confirmUpload,
  startUploadConfirmations,
  type Registration,
  type ConfirmOutcome,
  type UploadSignature,
} from "./blobs";
export { blobRoutes } from "./http/routes";
export { RecognitionAppLayer, type RecognitionAppOptions } from "./app";
