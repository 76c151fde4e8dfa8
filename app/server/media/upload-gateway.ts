import { randomUUID } from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";
import type { StorageBackend } from "../r2";
import { describeError, UploadError } from "./errors";
import { bytesToMb } from "./size-policy";
import type { Logger } from "./logger";

export const RETRY_DELAYS_MS = [1000, 2000, 4000, 8000, 16000] as const;
export const DEFAULT_MAX_ATTEMPTS = 5;

export type StoredObject = {
  key: string;
  publicUrl: string;
  sizeMb: number;
};

export type UploadGatewayOptions = {
  maxAttempts?: number;
  delaysMs?: readonly number[];
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => Date;
  token?: () => string;
  logger?: Logger;
};

export class UploadGateway {
  private readonly maxAttempts: number;
  private readonly delaysMs: readonly number[];
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly now: () => Date;
  private readonly token: () => string;
  private readonly logger: Logger;

  constructor(
    private readonly storage: StorageBackend,
    options: UploadGatewayOptions = {},
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.delaysMs = options.delaysMs ?? RETRY_DELAYS_MS;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? (() => new Date());
    this.token = options.token ?? randomUUID;
    this.logger = options.logger ?? console;
  }

  /** Single attempt under a fresh key. */
  async upload(bytes: Buffer, filename: string, contentType: string): Promise<StoredObject> {
    const key = buildStorageKey(filename, this.now(), this.token());
    const result = await this.storage.putObject(key, bytes, contentType);
    if (result.error) {
      throw new Error(`Storage upload failed: ${result.error}`);
    }
    this.logger.info(`Media uploaded successfully: ${key}`);
    return {
      key,
      publicUrl: this.storage.getPublicUrl(key),
      sizeMb: bytesToMb(bytes.length),
    };
  }

  async uploadWithRetry(bytes: Buffer, filename: string, contentType: string): Promise<StoredObject> {
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        return await this.upload(bytes, filename, contentType);
      } catch (error) {
        lastError = error;
        this.logger.error(`Upload attempt ${attempt} failed: ${describeError(error)}`);
        if (attempt < this.maxAttempts) {
          await this.sleep(this.delayFor(attempt));
        }
      }
    }
    throw new UploadError(
      `Failed to upload after ${this.maxAttempts} attempts: ${describeError(lastError)}`,
      this.maxAttempts,
      { cause: lastError },
    );
  }

  async deleteByUrl(url: string) {
    const key = this.storage.keyFromPublicUrl(url);
    if (!key) {
      this.logger.error(`Failed to delete media: invalid file URL ${url}`);
      return false;
    }
    const result = await this.storage.deleteObject(key);
    if (result.error) {
      this.logger.error(`Failed to delete media ${key}: ${result.error}`);
      return false;
    }
    this.logger.info(`Media deleted successfully: ${key}`);
    return true;
  }

  private delayFor(attempt: number) {
    const index = Math.min(attempt - 1, this.delaysMs.length - 1);
    return this.delaysMs[index] ?? 0;
  }
}

export function buildStorageKey(filename: string, now: Date, token: string) {
  const year = String(now.getUTCFullYear());
  const month = String(now.getUTCMonth() + 1).padStart(2, "0");
  return `${year}/${month}/${token}_${filename}`;
}
