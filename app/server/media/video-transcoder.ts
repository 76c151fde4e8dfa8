import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import ffmpeg from "fluent-ffmpeg";
import type { TranscodeResult } from "../../shared/types";
import { describeError, TranscodeError } from "./errors";
import { extensionOf, withExtension } from "./media-kind";
import { VIDEO_POLICY, type BoundingBox, type VideoPolicy } from "./size-policy";
import type { Logger } from "./logger";

export type VideoProbe = { width: number; height: number; fps: number; duration: number };

export type VideoEncodeOptions = {
  size: BoundingBox | null;
  fps: number | null;
  bitrateKbps: number;
};

export interface VideoBackend {
  probe(inputPath: string): Promise<VideoProbe>;
  encode(inputPath: string, outputPath: string, options: VideoEncodeOptions): Promise<void>;
}

export interface VideoTranscoder {
  readonly available: boolean;
  compress(bytes: Buffer, filename: string): Promise<TranscodeResult>;
}

export type VideoTranscoderOptions = {
  available: boolean;
  backend?: VideoBackend;
  policy?: VideoPolicy;
  logger?: Logger;
  tmpDir?: string;
};

export function createVideoTranscoder(options: VideoTranscoderOptions): VideoTranscoder {
  const logger = options.logger ?? console;
  if (!options.available) return new PassThroughVideoTranscoder(logger);
  return new FfmpegVideoTranscoder(options.backend ?? new FluentFfmpegBackend(), {
    policy: options.policy,
    logger,
    tmpDir: options.tmpDir,
  });
}

export class PassThroughVideoTranscoder implements VideoTranscoder {
  readonly available = false;
  constructor(private readonly logger: Logger = console) {}

  async compress(bytes: Buffer, filename: string): Promise<TranscodeResult> {
    this.logger.warn(`Video backend unavailable, uploading ${filename} without transcoding`);
    return { bytes, filename };
  }
}

export class FfmpegVideoTranscoder implements VideoTranscoder {
  readonly available = true;
  private readonly policy: VideoPolicy;
  private readonly logger: Logger;
  private readonly tmpDir: string;

  constructor(
    private readonly backend: VideoBackend,
    options: { policy?: VideoPolicy; logger?: Logger; tmpDir?: string } = {},
  ) {
    this.policy = options.policy ?? VIDEO_POLICY;
    this.logger = options.logger ?? console;
    this.tmpDir = options.tmpDir ?? os.tmpdir();
  }

  async compress(bytes: Buffer, filename: string): Promise<TranscodeResult> {
    let workDir: string | undefined;
    try {
      workDir = await fs.mkdtemp(path.join(this.tmpDir, "paddock-video-"));
      const inputPath = path.join(workDir, `input${extensionOf(filename) || ".bin"}`);
      await fs.writeFile(inputPath, bytes);
      const probe = await this.backend.probe(inputPath);

      const firstPath = path.join(workDir, "pass1.mp4");
      await this.backend.encode(
        inputPath,
        firstPath,
        planEncode(probe, this.policy.box, this.policy.bitrateKbps, this.policy.maxFps),
      );
      let output = await fs.readFile(firstPath);

      if (output.length > this.policy.maxBytes) {
        const secondPath = path.join(workDir, "pass2.mp4");
        await this.backend.encode(
          inputPath,
          secondPath,
          planEncode(probe, this.policy.fallbackBox, this.policy.fallbackBitrateKbps, this.policy.maxFps),
        );
        output = await fs.readFile(secondPath);
      }

      this.logger.info(`Video compressed: ${bytes.length} -> ${output.length} bytes`);
      return { bytes: output, filename: withExtension(filename, ".mp4") };
    } catch (error) {
      if (error instanceof TranscodeError) throw error;
      throw new TranscodeError(`Failed to compress video ${filename}: ${describeError(error)}`, { cause: error });
    } finally {
      if (workDir) await this.cleanup(workDir);
    }
  }

  private async cleanup(workDir: string) {
    await fs.rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
      this.logger.warn(`Failed to remove ${workDir}: ${describeError(error)}`);
    });
  }
}

export function planEncode(
  probe: VideoProbe,
  box: BoundingBox,
  bitrateKbps: number,
  maxFps: number,
): VideoEncodeOptions {
  const exceeds = probe.width > box.width || probe.height > box.height;
  return {
    size: exceeds ? fitEven(probe.width, probe.height, box) : null,
    fps: probe.fps > maxFps ? maxFps : null,
    bitrateKbps,
  };
}

/** Fits `width`×`height` inside `box` keeping aspect ratio, both sides floored to even. */
export function fitEven(width: number, height: number, box: BoundingBox): BoundingBox {
  let targetWidth = Math.min(width, box.width);
  let targetHeight = Math.min(height, box.height);
  if (targetWidth * height > targetHeight * width) {
    targetWidth = Math.floor((targetHeight * width) / height);
  } else {
    targetHeight = Math.floor((targetWidth * height) / width);
  }
  return { width: toEven(targetWidth), height: toEven(targetHeight) };
}

function toEven(value: number) {
  return Math.max(2, value - (value % 2));
}

export function parseFrameRate(value: string | number | undefined) {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (!value) return 0;
  const [num, den] = value.split("/").map(Number);
  if (den === undefined) return Number.isFinite(num) ? num : 0;
  if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0) return 0;
  return num / den;
}

export class FluentFfmpegBackend implements VideoBackend {
  probe(inputPath: string) {
    return new Promise<VideoProbe>((resolve, reject) => {
      ffmpeg.ffprobe(inputPath, (error: Error | undefined, metadata: ffmpeg.FfprobeData) => {
        if (error) {
          reject(error);
          return;
        }
        const stream = metadata.streams?.find((item) => item.codec_type === "video");
        if (!stream?.width || !stream?.height) {
          reject(new TranscodeError("No video stream found"));
          return;
        }
        resolve({
          width: stream.width,
          height: stream.height,
          fps: parseFrameRate(stream.avg_frame_rate) || parseFrameRate(stream.r_frame_rate),
          duration: Number(metadata.format?.duration ?? 0),
        });
      });
    });
  }

  encode(inputPath: string, outputPath: string, options: VideoEncodeOptions) {
    return new Promise<void>((resolve, reject) => {
      let command = ffmpeg(inputPath)
        .videoCodec("libx264")
        .audioCodec("aac")
        .videoBitrate(options.bitrateKbps)
        .outputOptions(["-movflags +faststart", "-pix_fmt yuv420p"]);
      if (options.size) command = command.size(`${options.size.width}x${options.size.height}`);
      if (options.fps) command = command.fps(options.fps);
      command
        .output(outputPath)
        .on("end", () => resolve())
        .on("error", (err: Error) => reject(err))
        .run();
    });
  }
}

export function detectVideoBackend() {
  return new Promise<boolean>((resolve) => {
    ffmpeg.getAvailableEncoders((error: unknown, encoders: Record<string, unknown>) => {
      if (error) {
        resolve(false);
        return;
      }
      resolve(Boolean(encoders.libx264) && Boolean(encoders.aac));
    });
  });
}

export function configureFfmpeg(paths: { ffmpegPath?: string; ffprobePath?: string }) {
  if (paths.ffmpegPath) ffmpeg.setFfmpegPath(paths.ffmpegPath);
  if (paths.ffprobePath) ffmpeg.setFfprobePath(paths.ffprobePath);
}
