export type MediaKind = "image" | "video";

export type NoteCategory = "General" | "Track Specific" | "Strategy" | "Other";

export type ProgressSink = (percent: number, message: string) => void;

export type BatchProgressSink = (index: number, total: number, message: string) => void;

export interface MediaUpload {
  filename: string;
  contentType: string;
  sizeBytes: number;
  data: Buffer;
}

export interface TranscodeResult {
  bytes: Buffer;
  filename: string;
}

export interface UploadRecord {
  publicUrl: string;
  sizeMb: number;
  filename: string;
}

export type BatchItemReport =
  | {
      filename: string;
      success: true;
      newFilename: string;
      publicUrl: string;
      sizeMb: number;
    }
  | {
      filename: string;
      success: false;
      error: string;
      errorCode: string;
    };

export interface NoteDoc {
  id: string;
  body: string;
  shared: boolean;
  driverId: string | null;
  sessionId: string | null;
  category: NoteCategory;
  tagIds: string[];
  createdAt: Date;
  updatedAt: Date;
}

export interface MediaRecord {
  id: string;
  noteId: string;
  fileUrl: string;
  type: MediaKind;
  sizeMb: number;
  filename: string;
  createdAt: Date;
}

export interface TagDoc {
  id: string;
  label: string;
  createdAt: Date;
}
