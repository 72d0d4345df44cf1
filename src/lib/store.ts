import * as z from "zod";
import {
  CHANNELS,
  NOTE_TAGS,
  PRODUCTS,
  type Channel,
  type NoteData,
  type NoteRecord,
  type NoteTag,
  type Product,
  type ReleaseData,
  type ReleaseRecord,
} from "@/lib/schemas";

export interface TimestampFilter {
  createdBefore?: Date;
  createdAfter?: Date;
  modifiedBefore?: Date;
  modifiedAfter?: Date;
}

export interface ReleaseFilter extends TimestampFilter {
  product?: Product;
  channel?: Channel;
  version?: string;
  versionPrefix?: string;
  versionSuffix?: string;
  isPublic?: boolean;
}

export interface NoteFilter extends TimestampFilter {
  releaseId?: string;
  tag?: NoteTag | "";
  isKnownIssue?: boolean;
  isPublic?: boolean;
}

export interface SaveOptions {
  /** Pass false to keep the supplied `modified` stamp (used by sync). */
  modified?: boolean;
}

export type RecordKind = "release" | "note";

/**
 * Storage collaborator for releases and notes.
 *
 * `findReleases` returns the default listing order (product, version
 * descending, channel); `findNotes` returns notes by sortNum descending with
 * storage order for ties.
 */
export interface ReleaseNotesStore {
  findReleases(filter?: ReleaseFilter): Promise<ReleaseRecord[]>;
  getRelease(id: string): Promise<ReleaseRecord | null>;
  saveRelease(data: ReleaseData, options?: SaveOptions): Promise<ReleaseRecord>;

  findNotes(filter?: NoteFilter): Promise<NoteRecord[]>;
  getNote(id: string): Promise<NoteRecord | null>;
  saveNote(data: NoteData, options?: SaveOptions): Promise<NoteRecord>;
  linkNote(noteId: string, releaseIds: string[]): Promise<NoteRecord | null>;
  unlinkNote(noteId: string, releaseIds: string[]): Promise<NoteRecord | null>;

  /**
   * Duplicates a release and its note links as one unit. The copy is
   * unpublished and its version gets a "copy-" / "copyN-" prefix.
   */
  copyRelease(id: string): Promise<ReleaseRecord | null>;

  latestModified(kind: RecordKind): Promise<Date | null>;
}

const queryDate = z.string().datetime({ offset: true, message: "Must be an ISO 8601 timestamp." }).transform((v) => new Date(v));
const queryBool = z.enum(["true", "false", "True", "False", "1", "0"]).transform((v) => v === "true" || v === "True" || v === "1");

const timestampQuerySchema = z.object({
  created_before: queryDate.optional(),
  created_after: queryDate.optional(),
  modified_before: queryDate.optional(),
  modified_after: queryDate.optional(),
});

export const releaseQuerySchema = timestampQuerySchema.extend({
  product: z.enum(PRODUCTS).optional(),
  channel: z.enum(CHANNELS).optional(),
  version: z.string().optional(),
  is_public: queryBool.optional(),
});

export const noteQuerySchema = timestampQuerySchema.extend({
  release: z.string().optional(),
  tag: z.union([z.enum(NOTE_TAGS), z.literal("")]).optional(),
  is_known_issue: queryBool.optional(),
  is_public: queryBool.optional(),
});

/** Raw query-string parameters, validated by the parse functions below. */
export type ReleaseQuery = Record<string, string | undefined>;
export type NoteQuery = Record<string, string | undefined>;

function timestampFilter(query: z.output<typeof timestampQuerySchema>): TimestampFilter {
  return {
    createdBefore: query.created_before,
    createdAfter: query.created_after,
    modifiedBefore: query.modified_before,
    modifiedAfter: query.modified_after,
  };
}

/**
 * Turns REST-style query parameters into a release filter. Throws a ZodError
 * for malformed values.
 */
export function parseReleaseQuery(query: ReleaseQuery): ReleaseFilter {
  const parsed = releaseQuerySchema.parse(query);
  return {
    ...timestampFilter(parsed),
    product: parsed.product,
    channel: parsed.channel,
    version: parsed.version,
    isPublic: parsed.is_public,
  };
}

export function parseNoteQuery(query: NoteQuery): NoteFilter {
  const parsed = noteQuerySchema.parse(query);
  return {
    ...timestampFilter(parsed),
    releaseId: parsed.release,
    tag: parsed.tag,
    isKnownIssue: parsed.is_known_issue,
    isPublic: parsed.is_public,
  };
}

export function matchesTimestamps(record: { created: Date; modified: Date }, filter: TimestampFilter): boolean {
  const t = (d: Date) => d.getTime();
  if (filter.createdBefore && !(t(record.created) < t(filter.createdBefore))) return false;
  if (filter.createdAfter && !(t(record.created) > t(filter.createdAfter))) return false;
  if (filter.modifiedBefore && !(t(record.modified) < t(filter.modifiedBefore))) return false;
  if (filter.modifiedAfter && !(t(record.modified) > t(filter.modifiedAfter))) return false;
  return true;
}
