import path from "node:path";
import type { MediaKind } from "../../shared/types";
import { ClassificationError } from "./errors";

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([".jpg", ".jpeg", ".png", ".gif", ".heic", ".heif"]);
export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([".mp4", ".mov", ".avi", ".m4v"]);

const MIME_BY_EXTENSION: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".heic": "image/heic",
  ".heif": "image/heif",
  ".mp4": "video/mp4",
  ".m4v": "video/mp4",
  ".mov": "video/quicktime",
  ".avi": "video/x-msvideo",
};

export function extensionOf(filename: string) {
  return path.extname(filename.trim()).toLowerCase();
}

export function kindForFilename(filename: string): MediaKind | null {
  const ext = extensionOf(filename);
  if (IMAGE_EXTENSIONS.has(ext)) return "image";
  if (VIDEO_EXTENSIONS.has(ext)) return "video";
  return null;
}

export function classify(filename: string): MediaKind {
  const kind = kindForFilename(filename);
  if (!kind) throw new ClassificationError(extensionOf(filename));
  return kind;
}

export function withExtension(filename: string, extension: string) {
  const base = path.basename(filename.trim());
  const current = path.extname(base);
  return `${current ? base.slice(0, -current.length) : base}${extension}`;
}

export function mimeForFilename(filename: string, fallback = "application/octet-stream") {
  return MIME_BY_EXTENSION[extensionOf(filename)] ?? fallback;
}
