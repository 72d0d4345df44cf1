import mongoose, { Model, Schema, Types } from 'mongoose';
import { NOTE_TAGS, type NoteRecord, type NoteTag } from '@/lib/schemas';
import { isKnownIssueFor } from '@/lib/release-notes';

export interface INoteImage {
  path: string;
  width: number;
  height: number;
}

export interface INote {
  bug: number | null;
  note: string;
  releases: Types.ObjectId[];
  isKnownIssue: boolean;
  fixedInRelease: Types.ObjectId | null;
  tag: NoteTag | '';
  sortNum: number;              // higher sorts first
  isPublic: boolean;
  image: INoteImage | null;
  created: Date;
  modified: Date;
}

export interface INoteMethods {
  isKnownIssueFor(releaseId: string): boolean;
}

export type NoteModel = Model<INote, {}, INoteMethods>;

const NoteImageSchema = new Schema<INoteImage>({
  path: { type: String, required: true },
  width: { type: Number, required: true },
  height: { type: Number, required: true },
}, { _id: false });

const NoteSchema = new Schema<INote, NoteModel, INoteMethods>({
  bug: { type: Number, default: null },
  note: { type: String, default: '' },
  releases: [{ type: Schema.Types.ObjectId, ref: 'Release', index: true }],
  isKnownIssue: { type: Boolean, default: false },
  fixedInRelease: { type: Schema.Types.ObjectId, ref: 'Release', default: null },
  tag: { type: String, enum: ['', ...NOTE_TAGS], default: '' },
  sortNum: { type: Number, default: 0 },
  isPublic: { type: Boolean, default: true },
  image: { type: NoteImageSchema, default: null },
  created: { type: Date },
  modified: { type: Date, index: true },
}, {
  timestamps: { createdAt: 'created', updatedAt: 'modified' },
  methods: {
    isKnownIssueFor(releaseId: string) {
      return isKnownIssueFor(
        { isKnownIssue: this.isKnownIssue, fixedInRelease: this.fixedInRelease?.toString() ?? null },
        { id: releaseId }
      );
    },
  },
});

export type NoteLean = INote & { _id: Types.ObjectId };

export function toNoteRecord(doc: NoteLean): NoteRecord {
  return {
    id: doc._id.toString(),
    bug: doc.bug ?? null,
    note: doc.note,
    releases: doc.releases.map((id) => id.toString()),
    isKnownIssue: doc.isKnownIssue,
    fixedInRelease: doc.fixedInRelease ? doc.fixedInRelease.toString() : null,
    tag: doc.tag,
    sortNum: doc.sortNum,
    isPublic: doc.isPublic,
    image: doc.image ? { path: doc.image.path, width: doc.image.width, height: doc.image.height } : null,
    created: doc.created,
    modified: doc.modified,
  };
}

const Note = mongoose.model<INote, NoteModel>('Note', NoteSchema);

export default Note;
