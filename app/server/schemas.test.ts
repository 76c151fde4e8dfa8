import { describe, expect, it } from "vitest";
import { ValidationError } from "./media/errors";
import { MIB } from "./media/size-policy";
import { createMediaUpload, createNoteSchema, parseWith } from "./schemas";

describe("createMediaUpload", () => {
  it("accepts a recognised file and trims its name", () => {
    const data = Buffer.from("jpeg-bytes");
    const upload = createMediaUpload({ filename: " lap.JPG ", contentType: "image/jpeg", data });
    expect(upload).toEqual({ filename: "lap.JPG", contentType: "image/jpeg", sizeBytes: 10, data });
  });

  it("rejects extensions outside the accepted set", () => {
    expect(() =>
      createMediaUpload({ filename: "setup.txt", contentType: "text/plain", data: Buffer.from("x") }),
    ).toThrow("filename: File type not supported. Allowed: .jpg, .jpeg, .png, .gif, .mp4, .mov, .avi");
  });

  it("rejects uploads over the global ceiling", () => {
    const attempt = () =>
      createMediaUpload({
        filename: "onboard.mp4",
        contentType: "video/mp4",
        data: Buffer.from("x"),
        sizeBytes: 101 * MIB,
      });
    expect(attempt).toThrow(ValidationError);
    expect(attempt).toThrow(/sizeBytes: File too large\. Maximum size: 100MB/);
  });

  it("rejects a declared size that differs from the payload", () => {
    expect(() =>
      createMediaUpload({ filename: "lap.png", contentType: "image/png", data: Buffer.from("abc"), sizeBytes: 4 }),
    ).toThrow("sizeBytes: Declared size does not match payload length");
  });
});

describe("createNoteSchema", () => {
  it("fills defaults and normalises tags", () => {
    const note = parseWith(createNoteSchema, { body: "  Loose on exit of T3  ", tags: [" Tires ", "FUEL"] });
    expect(note).toEqual({
      body: "Loose on exit of T3",
      shared: false,
      driverId: null,
      sessionId: null,
      category: "General",
      tags: ["tires", "fuel"],
    });
  });

  it("rejects an empty body", () => {
    expect(() => parseWith(createNoteSchema, { body: "   " })).toThrow(ValidationError);
  });
});
