// packages/recognition/src/config.ts

import { Config, Effect, Schema, type LogLevel, type Redacted } from "effect";
import { parseLogLevel } from "@labelflow/core";

// =============================================================================
// Recognition Settings
// =============================================================================

/**
 * Tunables of the upload and recognition workflows. Durations are seconds.
 */
export interface RecognitionConfig {
  /** How long a presigned upload URL stays valid */
  readonly presignedUrlTTL: number;
  /** Length of one upload-watch wait cycle */
  readonly uploadingWaitingTime: number;
  /** Cap on the number of labels kept */
  readonly maxLabels: number;
  /** Labels below this confidence (0–100) are dropped */
  readonly minConfidence: number;
  /** Bound on one callback delivery */
  readonly callbackTimeout: number;
  /** Bound on one recognition backend call */
  readonly recognitionTimeout: number;
}

export const defaultRecognitionConfig: RecognitionConfig = {
  presignedUrlTTL: 30,
  uploadingWaitingTime: 40,
  maxLabels: 10,
  minConfidence: 50,
  callbackTimeout: 10,
  recognitionTimeout: 30,
};

export function createRecognitionConfig(
  overrides?: Partial<RecognitionConfig>,
): RecognitionConfig {
  return {
    ...defaultRecognitionConfig,
    ...overrides,
  };
}

const positiveSeconds = (name: string) =>
  Schema.Number.pipe(
    Schema.positive(),
    Schema.annotations({ message: () => `${name} must be a positive number of seconds` }),
  );

export const RecognitionConfigSchema = Schema.Struct({
  presignedUrlTTL: positiveSeconds("presignedUrlTTL"),
  uploadingWaitingTime: positiveSeconds("uploadingWaitingTime"),
  maxLabels: Schema.Number.pipe(
    Schema.int(),
    Schema.greaterThanOrEqualTo(1),
    Schema.annotations({ message: () => "maxLabels must be a positive integer" }),
  ),
  minConfidence: Schema.Number.pipe(
    Schema.between(0, 100),
    Schema.annotations({ message: () => "minConfidence must be between 0 and 100" }),
  ),
  callbackTimeout: positiveSeconds("callbackTimeout"),
  recognitionTimeout: positiveSeconds("recognitionTimeout"),
});

export const validateRecognitionConfigEffect = (config: unknown) =>
  Schema.decodeUnknown(RecognitionConfigSchema)(config);

/**
 * Number of CheckUploading runs the watch allows: enough wait cycles to
 * outlast the presigned URL, plus one.
 */
export const uploadWatchMaxAttempts = (config: RecognitionConfig): number =>
  Math.max(
    1,
    Math.ceil(config.presignedUrlTTL / config.uploadingWaitingTime) + 1,
  );

// =============================================================================
// Service Settings (environment)
// =============================================================================

export interface ServiceConfig {
  readonly recognition: RecognitionConfig;
  readonly port: number;
  /** Base URL clients reach this service on; upload URLs are built from it */
  readonly publicUrl: string;
  readonly databaseUrl: string;
  readonly blobDirectory: string;
  readonly recognitionEndpoint: string;
  readonly uploadSigningSecret: Redacted.Redacted;
  readonly logLevel: LogLevel.LogLevel;
}

const numberOr = (name: string, fallback: number) =>
  Config.number(name).pipe(Config.withDefault(fallback));

const RecognitionEnv = Config.all({
  presignedUrlTTL: numberOr("PRESIGNED_URL_TTL", defaultRecognitionConfig.presignedUrlTTL),
  uploadingWaitingTime: numberOr(
    "UPLOADING_WAITING_TIME",
    defaultRecognitionConfig.uploadingWaitingTime,
  ),
  maxLabels: Config.integer("MAX_LABELS").pipe(
    Config.withDefault(defaultRecognitionConfig.maxLabels),
  ),
  minConfidence: numberOr("MIN_CONFIDENCE", defaultRecognitionConfig.minConfidence),
  callbackTimeout: numberOr("CALLBACK_TIMEOUT", defaultRecognitionConfig.callbackTimeout),
  recognitionTimeout: numberOr(
    "RECOGNITION_TIMEOUT",
    defaultRecognitionConfig.recognitionTimeout,
  ),
});

/**
 * Read the service settings from the environment and validate them.
 */
export const loadServiceConfig = Effect.gen(function* () {
  const recognition = yield* validateRecognitionConfigEffect(yield* RecognitionEnv);
  const port = yield* Config.integer("PORT").pipe(Config.withDefault(3000));

  return {
    recognition,
    port,
    publicUrl: yield* Config.string("PUBLIC_URL").pipe(
      Config.withDefault(`http://localhost:${port}`),
    ),
    databaseUrl: yield* Config.string("DATABASE_URL").pipe(
      Config.withDefault("file:./labelflow.db"),
    ),
    blobDirectory: yield* Config.string("BLOB_DIRECTORY").pipe(
      Config.withDefault("./blobs"),
    ),
    recognitionEndpoint: yield* Config.string("RECOGNITION_ENDPOINT"),
    uploadSigningSecret: yield* Config.redacted("UPLOAD_SIGNING_SECRET"),
    logLevel: yield* Config.string("LOG_LEVEL").pipe(
      Config.withDefault("info"),
      Config.map(parseLogLevel),
    ),
  } satisfies ServiceConfig;
});
