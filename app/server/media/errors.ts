export type MediaErrorCode = "validation" | "classification" | "transcode" | "upload";

export class MediaError extends Error {
  code: MediaErrorCode;
  constructor(code: MediaErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type ValidationIssue = { path: string; message: string };

export class ValidationError extends MediaError {
  issues: ValidationIssue[];
  constructor(issues: ValidationIssue[]) {
    super("validation", formatIssues(issues));
    this.issues = issues;
  }
}

export class ClassificationError extends MediaError {
  extension: string;
  constructor(extension: string) {
    super("classification", `Unsupported file type: ${extension || "(none)"}`);
    this.extension = extension;
  }
}

export class TranscodeError extends MediaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transcode", message, options);
  }
}

export class UploadError extends MediaError {
  attempts: number;
  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super("upload", message, options);
    this.attempts = attempts;
  }
}

export function describeError(error: unknown) {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === "string" && error) return error;
  return "Processing failed";
}

export function errorCode(error: unknown) {
  return error instanceof MediaError ? error.code : "unknown";
}

function formatIssues(issues: ValidationIssue[]) {
  const messages = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message));
  return messages.join(", ") || "Validation error";
}
