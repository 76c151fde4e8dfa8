import type {
  BatchItemReport,
  BatchProgressSink,
  MediaKind,
  MediaRecord,
  MediaUpload,
  NoteDoc,
  TagDoc,
} from "../shared/types";
import { ObjectId, type Collections, type NoteCollectionDoc } from "./db";
import { ValidationError } from "./media/errors";
import { classify, kindForFilename } from "./media/media-kind";
import type { MediaPipeline } from "./media/pipeline";
import type { Logger } from "./media/logger";
import { createNoteSchema, parseWith, tagLabelSchema, type CreateNoteData, type CreateNoteInput } from "./schemas";

export type NewNote = Omit<CreateNoteData, "tags"> & { tagIds: string[] };

export interface NoteRepository {
  createNote(input: NewNote): Promise<NoteDoc>;
  createMediaRecord(
    noteId: string,
    fileUrl: string,
    kind: MediaKind,
    sizeMb: number,
    filename: string,
  ): Promise<MediaRecord>;
  getOrCreateTag(label: string): Promise<TagDoc>;
}

export class MongoNoteRepository implements NoteRepository {
  constructor(private readonly collections: Collections) {}

  async createNote(input: NewNote): Promise<NoteDoc> {
    const now = new Date();
    const doc: NoteCollectionDoc = {
      _id: new ObjectId(),
      body: input.body,
      shared: input.shared,
      driverId: input.driverId,
      sessionId: input.sessionId,
      category: input.category,
      tagIds: input.tagIds.map((id) => toObjectId(id, "tagIds")),
      createdAt: now,
      updatedAt: now,
    };
    await this.collections.notes.insertOne(doc);
    return {
      id: doc._id.toString(),
      body: doc.body,
      shared: doc.shared,
      driverId: doc.driverId,
      sessionId: doc.sessionId,
      category: doc.category,
      tagIds: input.tagIds,
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    };
  }

  async createMediaRecord(noteId: string, fileUrl: string, kind: MediaKind, sizeMb: number, filename: string) {
    const doc = {
      _id: new ObjectId(),
      noteId: toObjectId(noteId, "noteId"),
      fileUrl: fileUrl.trim(),
      type: kind,
      sizeMb,
      filename: filename.trim(),
      createdAt: new Date(),
    };
    await this.collections.media.insertOne(doc);
    return {
      id: doc._id.toString(),
      noteId,
      fileUrl: doc.fileUrl,
      type: doc.type,
      sizeMb: doc.sizeMb,
      filename: doc.filename,
      createdAt: doc.createdAt,
    };
  }

  async getOrCreateTag(label: string): Promise<TagDoc> {
    const normalized = parseWith(tagLabelSchema, label);
    const tag = await this.collections.tags.findOneAndUpdate(
      { label: normalized },
      { $setOnInsert: { label: normalized, createdAt: new Date() } },
      { upsert: true, returnDocument: "after" },
    );
    if (!tag) throw new Error(`Failed to get or create tag ${normalized}`);
    return { id: tag._id.toString(), label: tag.label, createdAt: tag.createdAt };
  }
}

function toObjectId(value: string, field: string) {
  if (!ObjectId.isValid(value)) {
    throw new ValidationError([{ path: field, message: "Invalid id" }]);
  }
  return new ObjectId(value);
}

export type PublishNoteDeps = {
  notes: NoteRepository;
  pipeline: MediaPipeline;
  logger?: Logger;
};

export type PublishedNote = {
  note: NoteDoc;
  media: MediaRecord[];
  reports: BatchItemReport[];
};

/**
 * Uploads the attachments, then stores the note with its tags and links every
 * attachment that made it to storage. Failed attachments stay in `reports`.
 */
export async function publishNote(
  deps: PublishNoteDeps,
  input: CreateNoteInput & { media?: MediaUpload[] },
  onProgress?: BatchProgressSink,
): Promise<PublishedNote> {
  const { media: uploads = [], ...fields } = input;
  const { tags, ...noteFields } = parseWith(createNoteSchema, fields);
  const logger = deps.logger ?? console;

  const reports = await deps.pipeline.batchProcess(uploads, onProgress);

  const tagIds: string[] = [];
  for (const label of new Set(tags)) {
    const tag = await deps.notes.getOrCreateTag(label);
    if (!tagIds.includes(tag.id)) tagIds.push(tag.id);
  }

  const note = await deps.notes.createNote({ ...noteFields, tagIds });

  const media: MediaRecord[] = [];
  for (const report of reports) {
    if (!report.success) {
      logger.warn(`Skipping ${report.filename} for note ${note.id}: ${report.error}`);
      continue;
    }
    const kind = kindForFilename(report.newFilename) ?? classify(report.filename);
    media.push(await deps.notes.createMediaRecord(note.id, report.publicUrl, kind, report.sizeMb, report.newFilename));
  }

  return { note, media, reports };
}
