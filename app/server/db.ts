import { MongoClient, ObjectId, type Db } from "mongodb";
import type { MediaKind, NoteCategory } from "../shared/types";

type NoteCollectionDoc = {
  _id: ObjectId;
  body: string;
  shared: boolean;
  driverId: string | null;
  sessionId: string | null;
  category: NoteCategory;
  tagIds: ObjectId[];
  createdAt: Date;
  updatedAt: Date;
};

type MediaCollectionDoc = {
  _id: ObjectId;
  noteId: ObjectId;
  fileUrl: string;
  type: MediaKind;
  sizeMb: number;
  filename: string;
  createdAt: Date;
};

type TagCollectionDoc = {
  _id: ObjectId;
  label: string;
  createdAt: Date;
};

export type Collections = ReturnType<typeof getCollections>;

export type Database = {
  client: MongoClient;
  collections: Collections;
  close: () => Promise<void>;
};

export function getDbName(uri: string, fallback: string) {
  const parsed = new URL(uri);
  return parsed.pathname.replace(/^\//, "") || fallback;
}

export async function connectDatabase(uri: string, defaultDbName: string): Promise<Database> {
  const client = await new MongoClient(uri).connect();
  const db = client.db(getDbName(uri, defaultDbName));
  const collections = getCollections(db);
  await initialize(collections);
  return {
    client,
    collections,
    close: () => client.close(),
  };
}

export function getCollections(db: Db) {
  return {
    notes: db.collection<NoteCollectionDoc>("notes"),
    media: db.collection<MediaCollectionDoc>("media"),
    tags: db.collection<TagCollectionDoc>("tags"),
  };
}

async function initialize(collections: Collections) {
  const { notes, media, tags } = collections;
  await notes.createIndex({ createdAt: -1 });
  await notes.createIndex({ tagIds: 1 });
  await media.createIndex({ noteId: 1, createdAt: 1 });
  await tags.createIndex({ label: 1 }, { unique: true });
}

export { ObjectId };
export type { NoteCollectionDoc, MediaCollectionDoc, TagCollectionDoc };
