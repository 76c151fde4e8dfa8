import { z } from "zod";
import type { MediaUpload } from "../shared/types";
import { ValidationError } from "./media/errors";
import { MAX_UPLOAD_BYTES, MIB } from "./media/size-policy";

export const ACCEPTED_UPLOAD_EXTENSIONS = [".jpg", ".jpeg", ".png", ".gif", ".mp4", ".mov", ".avi"] as const;

export const mediaUploadSchema = z
  .object({
    filename: z
      .string()
      .trim()
      .min(1)
      .max(255)
      .refine((value) => ACCEPTED_UPLOAD_EXTENSIONS.some((ext) => value.toLowerCase().endsWith(ext)), {
        message: `File type not supported. Allowed: ${ACCEPTED_UPLOAD_EXTENSIONS.join(", ")}`,
      }),
    contentType: z.string().min(1),
    sizeBytes: z
      .number()
      .int()
      .min(0)
      .max(MAX_UPLOAD_BYTES, { message: `File too large. Maximum size: ${MAX_UPLOAD_BYTES / MIB}MB` }),
    data: z.instanceof(Buffer),
  })
  .refine((value) => value.sizeBytes === value.data.length, {
    message: "Declared size does not match payload length",
    path: ["sizeBytes"],
  });

export const tagLabelSchema = z.string().trim().min(1).max(50).toLowerCase();

export const noteCategorySchema = z.enum(["General", "Track Specific", "Strategy", "Other"]);

export const createNoteSchema = z.object({
  body: z.string().trim().min(1).max(5000),
  shared: z.boolean().default(false),
  driverId: z.string().min(1).nullable().default(null),
  sessionId: z.string().min(1).nullable().default(null),
  category: noteCategorySchema.default("General"),
  tags: z.array(tagLabelSchema).max(30).default([]),
});

export type CreateNoteInput = z.input<typeof createNoteSchema>;
export type CreateNoteData = z.output<typeof createNoteSchema>;

export function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    );
  }
  return result.data;
}

export function createMediaUpload(input: {
  filename: string;
  contentType: string;
  data: Buffer;
  sizeBytes?: number;
}): MediaUpload {
  return parseWith(mediaUploadSchema, { ...input, sizeBytes: input.sizeBytes ?? input.data.length });
}
