export { loadEnv, type Env } from "./env";
export { createMediaServices, createNotesApp, type MediaServices, type NotesApp } from "./services";
export { createMediaUpload, createNoteSchema, mediaUploadSchema } from "./schemas";
export { MongoNoteRepository, publishNote, type NoteRepository } from "./notes";
export { R2Storage, type StorageBackend, type StorageResult } from "./r2";
export * from "./media/errors";
export { classify, IMAGE_EXTENSIONS, VIDEO_EXTENSIONS } from "./media/media-kind";
export { IMAGE_POLICY, MAX_UPLOAD_BYTES, VIDEO_POLICY, policyFor } from "./media/size-policy";
export { ImageTranscoder, type ImageCompression } from "./media/image-transcoder";
export {
  createVideoTranscoder,
  detectVideoBackend,
  FfmpegVideoTranscoder,
  FluentFfmpegBackend,
  PassThroughVideoTranscoder,
  type VideoBackend,
  type VideoTranscoder,
} from "./media/video-transcoder";
export { UploadGateway, buildStorageKey } from "./media/upload-gateway";
export { MediaPipeline } from "./media/pipeline";
export { generateThumbnail, getMediaInfo } from "./media/media-info";
export type * from "../shared/types";
