import { describe, expect, it, vi } from "vitest";
import { MemoryStorage, sequentialTokens } from "../testing/memory-storage";
import { UploadError } from "./errors";
import { silentLogger } from "./logger";
import { buildStorageKey, UploadGateway } from "./upload-gateway";

const march = () => new Date(Date.UTC(2024, 2, 15, 12));

function setup() {
  const storage = new MemoryStorage();
  const sleep = vi.fn(async (_ms: number) => undefined);
  const gateway = new UploadGateway(storage, {
    sleep,
    now: march,
    token: sequentialTokens(),
    logger: silentLogger,
  });
  return { storage, sleep, gateway };
}

describe("buildStorageKey", () => {
  it("prefixes year and zero-padded month", () => {
    expect(buildStorageKey("lap.jpg", march(), "abc")).toBe("2024/03/abc_lap.jpg");
    expect(buildStorageKey("start.mp4", new Date(Date.UTC(2025, 11, 31)), "xyz")).toBe("2025/12/xyz_start.mp4");
  });
});

describe("UploadGateway.uploadWithRetry", () => {
  it("stores the object and reports its size in megabytes", async () => {
    const { storage, gateway, sleep } = setup();
    const bytes = Buffer.alloc(524288, 1);

    const result = await gateway.uploadWithRetry(bytes, "lap.jpg", "image/jpeg");

    expect(result).toEqual({
      key: "2024/03/token-1_lap.jpg",
      publicUrl: "https://media.test/2024/03/token-1_lap.jpg",
      sizeMb: 0.5,
    });
    expect(storage.objects.get("2024/03/token-1_lap.jpg")).toEqual({ bytes, contentType: "image/jpeg" });
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries with 1s, 2s, 4s, 8s delays and a fresh key per attempt", async () => {
    const { storage, gateway, sleep } = setup();
    storage.failNext("boom 1", "boom 2", "boom 3", "boom 4");

    const result = await gateway.uploadWithRetry(Buffer.from("x"), "lap.jpg", "image/jpeg");

    expect(storage.puts).toEqual([
      "2024/03/token-1_lap.jpg",
      "2024/03/token-2_lap.jpg",
      "2024/03/token-3_lap.jpg",
      "2024/03/token-4_lap.jpg",
      "2024/03/token-5_lap.jpg",
    ]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000, 8000]);
    expect(result.publicUrl).toBe("https://media.test/2024/03/token-5_lap.jpg");
    expect([...storage.objects.keys()]).toEqual(["2024/03/token-5_lap.jpg"]);
  });

  it("gives up after exactly five attempts", async () => {
    const { storage, gateway, sleep } = setup();
    storage.failNext("boom 1", "boom 2", "boom 3", "boom 4", "boom 5", "never used");

    const attempt = gateway.uploadWithRetry(Buffer.from("x"), "lap.jpg", "image/jpeg");

    await expect(attempt).rejects.toBeInstanceOf(UploadError);
    await expect(attempt).rejects.toThrow("Failed to upload after 5 attempts: Storage upload failed: boom 5");
    await expect(attempt).rejects.toMatchObject({ attempts: 5, code: "upload" });
    expect(storage.puts).toHaveLength(5);
    expect(sleep).toHaveBeenCalledTimes(4);
  });

  it("honours a smaller attempt budget", async () => {
    const storage = new MemoryStorage();
    const sleep = vi.fn(async (_ms: number) => undefined);
    const gateway = new UploadGateway(storage, { maxAttempts: 2, sleep, logger: silentLogger });
    storage.failNext("boom 1", "boom 2");

    await expect(gateway.uploadWithRetry(Buffer.from("x"), "lap.jpg", "image/jpeg")).rejects.toThrow(
      "Failed to upload after 2 attempts: Storage upload failed: boom 2",
    );
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000]);
  });

  it("logs each failed attempt", async () => {
    const { storage } = setup();
    const logger = { ...silentLogger, error: vi.fn() };
    const gateway = new UploadGateway(storage, { sleep: async () => undefined, logger });
    storage.failNext("boom 1");

    await gateway.uploadWithRetry(Buffer.from("x"), "lap.jpg", "image/jpeg");

    expect(logger.error).toHaveBeenCalledWith("Upload attempt 1 failed: Storage upload failed: boom 1");
  });
});

describe("UploadGateway.deleteByUrl", () => {
  it("deletes the object behind a public url", async () => {
    const { storage, gateway } = setup();
    const { publicUrl, key } = await gateway.uploadWithRetry(Buffer.from("x"), "lap.jpg", "image/jpeg");

    expect(await gateway.deleteByUrl(publicUrl)).toBe(true);
    expect(storage.objects.has(key)).toBe(false);
  });

  it("returns false for foreign urls and missing objects", async () => {
    const { gateway } = setup();
    expect(await gateway.deleteByUrl("https://elsewhere.test/2024/03/a.jpg")).toBe(false);
    expect(await gateway.deleteByUrl("https://media.test/2024/03/missing.jpg")).toBe(false);
  });
});
