// packages/recognition/src/blobs/index.ts

export { registerBlob, isCallbackUrl, type Registration } from "./register";
export { getBlob } from "./result";
export {
  receiveUpload,
  confirmUpload,
  startUploadConfirmations,
  type ConfirmOutcome,
  type UploadSignature,
} from "./upload";
