import type { Env } from "./env";
import { connectDatabase, type Database } from "./db";
import { MongoNoteRepository, publishNote, type NoteRepository } from "./notes";
import { R2Storage, type StorageBackend } from "./r2";
import { ImageTranscoder } from "./media/image-transcoder";
import { MediaPipeline } from "./media/pipeline";
import { UploadGateway } from "./media/upload-gateway";
import {
  configureFfmpeg,
  createVideoTranscoder,
  detectVideoBackend,
  type VideoTranscoder,
} from "./media/video-transcoder";
import type { Logger } from "./media/logger";

export type MediaServices = {
  storage: StorageBackend;
  uploads: UploadGateway;
  images: ImageTranscoder;
  videos: VideoTranscoder;
  pipeline: MediaPipeline;
};

export type MediaServicesOptions = {
  logger?: Logger;
  storage?: StorageBackend;
  videoBackendAvailable?: boolean;
};

export async function createMediaServices(env: Env, options: MediaServicesOptions = {}): Promise<MediaServices> {
  const logger = options.logger ?? console;
  configureFfmpeg({ ffmpegPath: env.FFMPEG_PATH, ffprobePath: env.FFPROBE_PATH });

  const available = options.videoBackendAvailable ?? (await detectVideoBackend());
  if (!available) {
    logger.warn("ffmpeg with libx264/aac not found, videos will be stored without transcoding");
  }

  const storage =
    options.storage ??
    new R2Storage({
      endpoint: env.R2_ENDPOINT,
      region: env.R2_REGION,
      accessKeyId: env.R2_ACCESS_KEY_ID,
      secretAccessKey: env.R2_SECRET_ACCESS_KEY,
      bucket: env.R2_BUCKET,
      publicBaseUrl: env.R2_PUBLIC_BASE_URL,
    });
  const uploads = new UploadGateway(storage, { maxAttempts: env.UPLOAD_MAX_ATTEMPTS, logger });
  const images = new ImageTranscoder({ logger });
  const videos = createVideoTranscoder({ available, logger });
  const pipeline = new MediaPipeline({ images, videos, uploads, logger });

  return { storage, uploads, images, videos, pipeline };
}

export type NotesApp = MediaServices & {
  database: Database;
  notes: NoteRepository;
  publishNote: (input: Parameters<typeof publishNote>[1], onProgress?: Parameters<typeof publishNote>[2]) => ReturnType<typeof publishNote>;
  close: () => Promise<void>;
};

export async function createNotesApp(env: Env, options: MediaServicesOptions = {}): Promise<NotesApp> {
  const services = await createMediaServices(env, options);
  const database = await connectDatabase(env.MONGODB_URI, env.MONGODB_DB);
  const notes = new MongoNoteRepository(database.collections);
  return {
    ...services,
    database,
    notes,
    publishNote: (input, onProgress) =>
      publishNote({ notes, pipeline: services.pipeline, logger: options.logger }, input, onProgress),
    close: database.close,
  };
}
