import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import sharp from "sharp";
import type { MediaKind } from "../../shared/types";
import { extensionOf, kindForFilename } from "./media-kind";
import { bytesToMb } from "./size-policy";
import type { VideoBackend } from "./video-transcoder";

export type MediaInfo = {
  filename: string;
  sizeBytes: number;
  sizeMb: number;
  extension: string;
  type: MediaKind | "unknown";
  width?: number;
  height?: number;
  format?: string;
  duration?: number;
  fps?: number;
};

export async function getMediaInfo(
  bytes: Buffer,
  filename: string,
  options: { videoBackend?: VideoBackend | null; tmpDir?: string } = {},
): Promise<MediaInfo> {
  const extension = extensionOf(filename);
  const info: MediaInfo = {
    filename,
    sizeBytes: bytes.length,
    sizeMb: bytesToMb(bytes.length),
    extension,
    type: kindForFilename(filename) ?? "unknown",
  };

  if (info.type === "image") {
    try {
      const metadata = await sharp(bytes).metadata();
      return { ...info, width: metadata.width, height: metadata.height, format: metadata.format };
    } catch {
      return info;
    }
  }

  if (info.type === "video" && options.videoBackend) {
    let workDir: string | undefined;
    try {
      workDir = await fs.mkdtemp(path.join(options.tmpDir ?? os.tmpdir(), "paddock-info-"));
      const inputPath = path.join(workDir, `input${extension}`);
      await fs.writeFile(inputPath, bytes);
      const probe = await options.videoBackend.probe(inputPath);
      return { ...info, width: probe.width, height: probe.height, duration: probe.duration, fps: probe.fps };
    } catch {
      return info;
    } finally {
      if (workDir) await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  return info;
}

export async function generateThumbnail(bytes: Buffer, size: { width: number; height: number } = { width: 200, height: 200 }) {
  return sharp(bytes)
    .rotate()
    .flatten({ background: "#ffffff" })
    .resize({ width: size.width, height: size.height, fit: "inside", withoutEnlargement: true, kernel: "lanczos3" })
    .jpeg({ quality: 80, mozjpeg: true })
    .toBuffer();
}
