import { DeleteObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { describeError } from "./media/errors";

export type StorageResult = { error?: string };

export interface StorageBackend {
  putObject(key: string, bytes: Buffer, contentType: string): Promise<StorageResult>;
  getPublicUrl(key: string): string;
  deleteObject(key: string): Promise<StorageResult>;
  keyFromPublicUrl(url: string): string | null;
}

export type R2Config = {
  endpoint: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
  publicBaseUrl: string;
};

export function createS3Client(config: R2Config) {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  });
}

export class R2Storage implements StorageBackend {
  private readonly baseUrl: string;

  constructor(
    private readonly config: R2Config,
    private readonly client: S3Client = createS3Client(config),
  ) {
    this.baseUrl = config.publicBaseUrl.replace(/\/+$/, "");
  }

  async putObject(key: string, bytes: Buffer, contentType: string): Promise<StorageResult> {
    const command = new PutObjectCommand({
      Bucket: this.config.bucket,
      Key: key,
      Body: bytes,
      ContentType: contentType,
      CacheControl: "public, max-age=31536000, immutable",
    });
    try {
      await this.client.send(command);
      return {};
    } catch (error) {
      return { error: describeError(error) };
    }
  }

  async deleteObject(key: string): Promise<StorageResult> {
    const command = new DeleteObjectCommand({ Bucket: this.config.bucket, Key: key });
    try {
      await this.client.send(command);
      return {};
    } catch (error) {
      return { error: describeError(error) };
    }
  }

  getPublicUrl(key: string) {
    return toPublicUrl(this.baseUrl, key);
  }

  keyFromPublicUrl(url: string) {
    return keyFromPublicUrl(this.baseUrl, url);
  }
}

export function toPublicUrl(baseUrl: string, key: string) {
  const encoded = key.split("/").map(encodeURIComponent).join("/");
  return `${baseUrl.replace(/\/+$/, "")}/${encoded}`;
}

export function keyFromPublicUrl(baseUrl: string, url: string) {
  const prefix = `${baseUrl.replace(/\/+$/, "")}/`;
  if (!url.startsWith(prefix)) return null;
  const rest = url.slice(prefix.length).split(/[?#]/)[0];
  if (!rest) return null;
  try {
    return rest.split("/").map(decodeURIComponent).join("/");
  } catch {
    return null;
  }
}
