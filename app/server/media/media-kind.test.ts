import { describe, expect, it } from "vitest";
import { ClassificationError } from "./errors";
import {
  classify,
  IMAGE_EXTENSIONS,
  kindForFilename,
  mimeForFilename,
  VIDEO_EXTENSIONS,
  withExtension,
} from "./media-kind";

describe("classify", () => {
  it("maps every recognised extension to exactly one kind", () => {
    for (const ext of IMAGE_EXTENSIONS) {
      expect(VIDEO_EXTENSIONS.has(ext)).toBe(false);
      expect(classify(`photo${ext}`)).toBe("image");
    }
    for (const ext of VIDEO_EXTENSIONS) {
      expect(classify(`clip${ext}`)).toBe("video");
    }
  });

  it("ignores case and gives the same answer on repeat calls", () => {
    expect(classify("Pit.HEIC")).toBe("image");
    expect(classify("Pit.HEIC")).toBe(classify("Pit.HEIC"));
    expect(classify("onboard.M4V")).toBe("video");
  });

  it("fails on unknown extensions", () => {
    expect(() => classify("telemetry.csv")).toThrow(ClassificationError);
    expect(() => classify("telemetry.csv")).toThrow("Unsupported file type: .csv");
    expect(() => classify("README")).toThrow("Unsupported file type: (none)");
    expect(kindForFilename("archive.zip")).toBeNull();
  });
});

describe("withExtension", () => {
  it("swaps the extension", () => {
    expect(withExtension("pit.heic", ".jpg")).toBe("pit.jpg");
    expect(withExtension("onboard.lap2.MOV", ".mp4")).toBe("onboard.lap2.mp4");
    expect(withExtension("noext", ".jpg")).toBe("noext.jpg");
  });
});

describe("mimeForFilename", () => {
  it("resolves known extensions and falls back otherwise", () => {
    expect(mimeForFilename("a.jpg")).toBe("image/jpeg");
    expect(mimeForFilename("a.mp4")).toBe("video/mp4");
    expect(mimeForFilename("a.mov")).toBe("video/quicktime");
    expect(mimeForFilename("a.xyz", "image/heic")).toBe("image/heic");
  });
});
