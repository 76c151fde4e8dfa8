import sharp from "sharp";
import exifr from "exifr";
import type { TranscodeResult } from "../../shared/types";
import { describeError, TranscodeError } from "./errors";
import { extensionOf, withExtension } from "./media-kind";
import { IMAGE_POLICY, type ImagePolicy } from "./size-policy";
import type { Logger } from "./logger";

export type ImageCompression =
  | (TranscodeResult & { status: "compressed"; width: number; height: number })
  | (TranscodeResult & { status: "skipped"; reason: string });

export type HeicDecoder = (buffer: Buffer) => Promise<Buffer>;

export type ImageTranscoderOptions = {
  policy?: ImagePolicy;
  decodeHeic?: HeicDecoder;
  logger?: Logger;
};

const HEIF_BRANDS = new Set(["heic", "heix", "hevc", "hevx", "heim", "heis"]);

export class ImageTranscoder {
  private readonly policy: ImagePolicy;
  private readonly decodeHeic: HeicDecoder;
  private readonly logger: Logger;

  constructor(options: ImageTranscoderOptions = {}) {
    this.policy = options.policy ?? IMAGE_POLICY;
    this.decodeHeic = options.decodeHeic ?? decodeHeicToJpeg;
    this.logger = options.logger ?? console;
  }

  /**
   * Never throws: a decode or encode failure comes back as `skipped` with the
   * original bytes so the caller can still upload them.
   */
  async compress(bytes: Buffer, filename: string): Promise<ImageCompression> {
    try {
      const result = await this.transcode(bytes, filename);
      this.logger.info(`Image compressed: ${bytes.length} -> ${result.bytes.length} bytes`);
      return { status: "compressed", ...result };
    } catch (error) {
      return { status: "skipped", bytes, filename, reason: describeError(error) };
    }
  }

  private async transcode(bytes: Buffer, filename: string) {
    const heif = isHeif(bytes, filename);
    const source = heif ? await this.decodeHeic(bytes) : bytes;
    const metadata = await sharp(source).metadata();
    if (!metadata.format || !metadata.width || !metadata.height) {
      throw new TranscodeError(`Unrecognised image data in ${filename}`);
    }

    const orientation = normalizeOrientation((await readOrientation(source)) ?? metadata.orientation);
    const oriented = getOrientedDimensions(metadata.width, metadata.height, orientation);
    const { box } = this.policy;
    const needsResize = oriented.width > box.width || oriented.height > box.height;

    const render = () => {
      let image = sharp(source);
      if (orientation && orientation !== 1) image = image.rotate();
      if (metadata.hasAlpha) image = image.flatten({ background: "#ffffff" });
      image = image.toColourspace("srgb");
      if (needsResize) {
        image = image.resize({
          width: box.width,
          height: box.height,
          fit: "inside",
          withoutEnlargement: true,
          kernel: "lanczos3",
        });
      }
      return image;
    };

    const toJpeg =
      heif || metadata.format === "heif" || (metadata.format === "png" && bytes.length > this.policy.largePngBytes);

    let output: { data: Buffer; info: sharp.OutputInfo };
    let finalName = filename;
    if (toJpeg) {
      output = await render().jpeg({ quality: this.policy.quality, mozjpeg: true }).toBuffer({ resolveWithObject: true });
      finalName = withExtension(filename, ".jpg");
    } else {
      output = await encodeKeepingFormat(render(), metadata.format, this.policy.quality);
    }

    if (output.data.length > this.policy.maxBytes) {
      output = await render()
        .jpeg({ quality: this.policy.fallbackQuality, mozjpeg: true })
        .toBuffer({ resolveWithObject: true });
      finalName = withExtension(filename, ".jpg");
    }

    return {
      bytes: output.data,
      filename: finalName,
      width: output.info.width,
      height: output.info.height,
    };
  }
}

function encodeKeepingFormat(image: sharp.Sharp, format: keyof sharp.FormatEnum, quality: number) {
  switch (format) {
    case "jpeg":
    case "jpg":
      return image.jpeg({ quality, mozjpeg: true }).toBuffer({ resolveWithObject: true });
    case "webp":
      return image.webp({ quality }).toBuffer({ resolveWithObject: true });
    case "png":
      return image.png({ compressionLevel: 9 }).toBuffer({ resolveWithObject: true });
    case "gif":
      return image.gif({ reuse: false }).toBuffer({ resolveWithObject: true });
    default:
      return image.toFormat(format).toBuffer({ resolveWithObject: true });
  }
}

export function isHeif(bytes: Buffer, filename: string) {
  const ext = extensionOf(filename);
  if (ext === ".heic" || ext === ".heif") return true;
  if (bytes.length < 12 || bytes.toString("latin1", 4, 8) !== "ftyp") return false;
  return HEIF_BRANDS.has(bytes.toString("latin1", 8, 12));
}

async function readOrientation(buffer: Buffer) {
  try {
    return await exifr.orientation(buffer);
  } catch {
    return undefined;
  }
}

function normalizeOrientation(value: unknown) {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return undefined;
}

export function getOrientedDimensions(width: number, height: number, orientation?: number) {
  if (orientation && [5, 6, 7, 8].includes(orientation)) {
    return { width: height, height: width };
  }
  return { width, height };
}

async function decodeHeicToJpeg(buffer: Buffer) {
  const heicConvert = (await import("heic-convert")).default;
  const output = await heicConvert({
    buffer,
    format: "JPEG",
    quality: 0.92,
  });
  return Buffer.from(output);
}
