import type { MediaKind } from "../../shared/types";

export const MIB = 1024 * 1024;

export const MAX_UPLOAD_BYTES = 100 * MIB;

export type BoundingBox = { width: number; height: number };

export type ImagePolicy = {
  kind: "image";
  box: BoundingBox;
  quality: number;
  fallbackQuality: number;
  maxBytes: number;
  largePngBytes: number;
};

export type VideoPolicy = {
  kind: "video";
  box: BoundingBox;
  bitrateKbps: number;
  maxFps: number;
  maxBytes: number;
  fallbackBox: BoundingBox;
  fallbackBitrateKbps: number;
};

export const IMAGE_POLICY: ImagePolicy = {
  kind: "image",
  box: { width: 1920, height: 1080 },
  quality: 85,
  fallbackQuality: 50,
  maxBytes: 10 * MIB,
  largePngBytes: 2 * MIB,
};

export const VIDEO_POLICY: VideoPolicy = {
  kind: "video",
  box: { width: 1280, height: 720 },
  bitrateKbps: 1000,
  maxFps: 30,
  maxBytes: 50 * MIB,
  fallbackBox: { width: 854, height: 480 },
  fallbackBitrateKbps: 500,
};

export function policyFor(kind: "image"): ImagePolicy;
export function policyFor(kind: "video"): VideoPolicy;
export function policyFor(kind: MediaKind): ImagePolicy | VideoPolicy;
export function policyFor(kind: MediaKind) {
  return kind === "image" ? IMAGE_POLICY : VIDEO_POLICY;
}

export function bytesToMb(bytes: number) {
  return bytes / MIB;
}
