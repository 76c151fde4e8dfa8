import type {
  BatchItemReport,
  BatchProgressSink,
  MediaKind,
  MediaUpload,
  ProgressSink,
  TranscodeResult,
  UploadRecord,
} from "../../shared/types";
import { ClassificationError, describeError, errorCode, ValidationError } from "./errors";
import type { ImageTranscoder } from "./image-transcoder";
import { classify, extensionOf, kindForFilename, mimeForFilename } from "./media-kind";
import { MAX_UPLOAD_BYTES, MIB } from "./size-policy";
import type { UploadGateway } from "./upload-gateway";
import type { VideoTranscoder } from "./video-transcoder";
import type { Logger } from "./logger";

export type MediaPipelineDeps = {
  images: ImageTranscoder;
  videos: VideoTranscoder;
  uploads: UploadGateway;
  logger?: Logger;
};

export type ProcessedUpload = UploadRecord & { kind: MediaKind };

export class MediaPipeline {
  private readonly images: ImageTranscoder;
  private readonly videos: VideoTranscoder;
  private readonly uploads: UploadGateway;
  private readonly logger: Logger;

  constructor(deps: MediaPipelineDeps) {
    this.images = deps.images;
    this.videos = deps.videos;
    this.uploads = deps.uploads;
    this.logger = deps.logger ?? console;
  }

  async processAndUpload(upload: MediaUpload, onProgress?: ProgressSink): Promise<ProcessedUpload> {
    try {
      onProgress?.(0, "Starting compression...");
      const kind = classify(upload.filename);

      onProgress?.(25, kind === "image" ? "Compressing image..." : "Compressing video...");
      const transcoded = await this.transcode(kind, upload);

      onProgress?.(75, "Uploading to storage...");
      const contentType =
        transcoded.filename === upload.filename
          ? upload.contentType
          : mimeForFilename(transcoded.filename, upload.contentType);
      const stored = await this.uploads.uploadWithRetry(transcoded.bytes, transcoded.filename, contentType);

      onProgress?.(100, "Upload complete!");
      return { publicUrl: stored.publicUrl, sizeMb: stored.sizeMb, filename: transcoded.filename, kind };
    } catch (error) {
      this.logger.error(`Failed to process and upload ${upload.filename}: ${describeError(error)}`);
      throw error;
    }
  }

  async batchProcess(uploads: MediaUpload[], onProgress?: BatchProgressSink): Promise<BatchItemReport[]> {
    const reports: BatchItemReport[] = [];
    const total = uploads.length;

    for (const [index, upload] of uploads.entries()) {
      onProgress?.(index, total, `Processing ${upload.filename}...`);
      try {
        assertAcceptable(upload.filename, upload.data.length);
        const record = await this.processAndUpload(upload);
        reports.push({
          filename: upload.filename,
          success: true,
          newFilename: record.filename,
          publicUrl: record.publicUrl,
          sizeMb: record.sizeMb,
        });
      } catch (error) {
        reports.push({
          filename: upload.filename,
          success: false,
          error: describeError(error),
          errorCode: errorCode(error),
        });
      }
    }

    onProgress?.(total, total, "Batch processing complete!");
    return reports;
  }

  validateMediaFile(filename: string, sizeBytes: number) {
    try {
      assertAcceptable(filename, sizeBytes);
      return { valid: true, message: "Valid" };
    } catch (error) {
      return { valid: false, message: describeError(error) };
    }
  }

  private async transcode(kind: MediaKind, upload: MediaUpload): Promise<TranscodeResult> {
    if (kind === "video") {
      return this.videos.compress(upload.data, upload.filename);
    }
    const result = await this.images.compress(upload.data, upload.filename);
    if (result.status === "skipped") {
      this.logger.warn(
        `Image compression failed for ${upload.filename}: ${result.reason}. Uploading original file without compression.`,
      );
    }
    return { bytes: result.bytes, filename: result.filename };
  }
}

function assertAcceptable(filename: string, sizeBytes: number) {
  if (!kindForFilename(filename)) {
    throw new ClassificationError(extensionOf(filename));
  }
  if (sizeBytes > MAX_UPLOAD_BYTES) {
    throw new ValidationError([
      {
        path: "",
        message: `File too large: ${(sizeBytes / MIB).toFixed(1)}MB > ${(MAX_UPLOAD_BYTES / MIB).toFixed(0)}MB`,
      },
    ]);
  }
}
