import mongoose, { Types, type FilterQuery } from "mongoose";
import Release, { toReleaseRecord, type IRelease, type ReleaseLean } from "@/models/Release";
import Note, { toNoteRecord, type INote, type NoteLean } from "@/models/Note";
import { copyVersion } from "@/lib/release-notes";
import type { NoteData, NoteRecord, ReleaseData, ReleaseRecord } from "@/lib/schemas";
import type {
  NoteFilter,
  RecordKind,
  ReleaseFilter,
  ReleaseNotesStore,
  SaveOptions,
  TimestampFilter,
} from "@/lib/store";

type StampedUpdate = {
  $set: Record<string, unknown>;
  $setOnInsert?: Record<string, unknown>;
};

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

type DateRange = { $lt?: Date; $gt?: Date };

function timestampConditions(filter: TimestampFilter): { created?: DateRange; modified?: DateRange } {
  const conditions: { created?: DateRange; modified?: DateRange } = {};
  if (filter.createdBefore || filter.createdAfter) {
    conditions.created = {
      ...(filter.createdBefore && { $lt: filter.createdBefore }),
      ...(filter.createdAfter && { $gt: filter.createdAfter }),
    };
  }
  if (filter.modifiedBefore || filter.modifiedAfter) {
    conditions.modified = {
      ...(filter.modifiedBefore && { $lt: filter.modifiedBefore }),
      ...(filter.modifiedAfter && { $gt: filter.modifiedAfter }),
    };
  }
  return conditions;
}

export function releaseQuery(filter: ReleaseFilter = {}): FilterQuery<IRelease> {
  const query: FilterQuery<IRelease> = { ...timestampConditions(filter) };
  if (filter.product) query.product = filter.product;
  if (filter.channel) query.channel = filter.channel;
  if (filter.isPublic !== undefined) query.isPublic = filter.isPublic;

  const version: FilterQuery<IRelease>[] = [];
  if (filter.version !== undefined) version.push({ version: filter.version });
  if (filter.versionPrefix !== undefined) version.push({ version: { $regex: `^${escapeRegExp(filter.versionPrefix)}` } });
  if (filter.versionSuffix !== undefined) version.push({ version: { $regex: `${escapeRegExp(filter.versionSuffix)}$` } });
  if (version.length === 1) Object.assign(query, version[0]);
  if (version.length > 1) query.$and = version;

  return query;
}

export function noteQuery(filter: NoteFilter = {}): FilterQuery<INote> {
  const query: FilterQuery<INote> = { ...timestampConditions(filter) };
  if (filter.releaseId !== undefined) query.releases = filter.releaseId;
  if (filter.tag !== undefined) query.tag = filter.tag;
  if (filter.isKnownIssue !== undefined) query.isKnownIssue = filter.isKnownIssue;
  if (filter.isPublic !== undefined) query.isPublic = filter.isPublic;
  return query;
}

/**
 * Update document for an upsert. With `keepModified` the supplied stamps are
 * written as-is and mongoose timestamps must be disabled for the call.
 */
export function stampedUpdate(
  fields: Record<string, unknown>,
  stamps: { created?: Date; modified?: Date },
  keepModified: boolean
): StampedUpdate {
  if (!keepModified) {
    return { $set: fields };
  }

  const now = new Date();
  const $set: Record<string, unknown> = { ...fields };
  const $setOnInsert: Record<string, unknown> = {};
  if (stamps.created) $set.created = stamps.created;
  else $setOnInsert.created = now;
  if (stamps.modified) $set.modified = stamps.modified;
  else $setOnInsert.modified = now;

  return { $set, $setOnInsert };
}

function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof mongoose.mongo.MongoServerError && error.code === 11000;
}

function isObjectId(id: string): boolean {
  return Types.ObjectId.isValid(id);
}

/**
 * ReleaseNotesStore over MongoDB. Callers connect first (see dbConnect).
 */
export class MongoReleaseNotesStore implements ReleaseNotesStore {
  async findReleases(filter: ReleaseFilter = {}): Promise<ReleaseRecord[]> {
    const docs = await Release.find(releaseQuery(filter))
      .sort({ product: 1, version: -1, channel: 1 })
      .lean<ReleaseLean[]>();
    return docs.map(toReleaseRecord);
  }

  async getRelease(id: string): Promise<ReleaseRecord | null> {
    if (!isObjectId(id)) return null;
    const doc = await Release.findById(id).lean<ReleaseLean>();
    return doc ? toReleaseRecord(doc) : null;
  }

  async saveRelease(data: ReleaseData, options: SaveOptions = {}): Promise<ReleaseRecord> {
    const { id, created, modified, ...fields } = data;
    const keepModified = options.modified === false;

    try {
      const doc = await Release.findOneAndUpdate(
        { _id: id ?? new Types.ObjectId() },
        stampedUpdate(fields, { created, modified }, keepModified),
        { upsert: true, new: true, runValidators: true, timestamps: !keepModified }
      ).lean<ReleaseLean>();
      if (!doc) {
        throw new Error(`Release ${fields.product} ${fields.version} could not be saved.`);
      }
      return toReleaseRecord(doc);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new Error(`A ${fields.product} release with version ${fields.version} already exists.`);
      }
      throw error;
    }
  }

  async findNotes(filter: NoteFilter = {}): Promise<NoteRecord[]> {
    if (filter.releaseId !== undefined && !isObjectId(filter.releaseId)) return [];
    const docs = await Note.find(noteQuery(filter)).sort({ sortNum: -1, _id: 1 }).lean<NoteLean[]>();
    return docs.map(toNoteRecord);
  }

  async getNote(id: string): Promise<NoteRecord | null> {
    if (!isObjectId(id)) return null;
    const doc = await Note.findById(id).lean<NoteLean>();
    return doc ? toNoteRecord(doc) : null;
  }

  async saveNote(data: NoteData, options: SaveOptions = {}): Promise<NoteRecord> {
    const { id, created, modified, ...fields } = data;
    const keepModified = options.modified === false;

    const doc = await Note.findOneAndUpdate(
      { _id: id ?? new Types.ObjectId() },
      stampedUpdate(fields, { created, modified }, keepModified),
      { upsert: true, new: true, runValidators: true, timestamps: !keepModified }
    ).lean<NoteLean>();
    if (!doc) {
      throw new Error(`Note ${id ?? "(new)"} could not be saved.`);
    }
    return toNoteRecord(doc);
  }

  async linkNote(noteId: string, releaseIds: string[]): Promise<NoteRecord | null> {
    if (!isObjectId(noteId)) return null;
    const doc = await Note.findByIdAndUpdate(
      noteId,
      { $addToSet: { releases: { $each: releaseIds.map((id) => new Types.ObjectId(id)) } } },
      { new: true }
    ).lean<NoteLean>();
    return doc ? toNoteRecord(doc) : null;
  }

  async unlinkNote(noteId: string, releaseIds: string[]): Promise<NoteRecord | null> {
    if (!isObjectId(noteId)) return null;
    const doc = await Note.findByIdAndUpdate(
      noteId,
      { $pull: { releases: { $in: releaseIds.map((id) => new Types.ObjectId(id)) } } },
      { new: true }
    ).lean<NoteLean>();
    return doc ? toNoteRecord(doc) : null;
  }

  async copyRelease(id: string): Promise<ReleaseRecord | null> {
    if (!isObjectId(id)) return null;

    let copy: ReleaseRecord | null = null;
    const session = await mongoose.startSession();
    try {
      await session.withTransaction(async () => {
        copy = null;
        const source = await Release.findById(id).session(session).lean<ReleaseLean>();
        if (!source) return;

        const copyCount = await Release.countDocuments(
          releaseQuery({ product: source.product, versionSuffix: source.version })
        ).session(session);

        const { _id, created, modified, ...fields } = source;
        const [doc] = await Release.create(
          [{ ...fields, version: copyVersion(source.version, copyCount), isPublic: false }],
          { session }
        );

        // timestamps refresh `modified` on every note that gains the link
        await Note.updateMany(
          { releases: _id },
          { $addToSet: { releases: doc._id } },
          { session }
        );

        copy = toReleaseRecord(doc);
      });
    } finally {
      await session.endSession();
    }
    return copy;
  }

  async latestModified(kind: RecordKind): Promise<Date | null> {
    const latest = kind === "release"
      ? await Release.findOne().sort({ modified: -1 }).select("modified").lean<{ modified: Date }>()
      : await Note.findOne().sort({ modified: -1 }).select("modified").lean<{ modified: Date }>();
    return latest?.modified ?? null;
  }
}

export const mongoStore = new MongoReleaseNotesStore();
