import * as z from "zod";

export const PRODUCTS = [
  "Firefox",
  "Firefox for Android",
  "Firefox Extended Support Release",
  "Firefox OS",
  "Thunderbird",
] as const;

export const CHANNELS = ["Nightly", "Aurora", "Beta", "Release", "ESR"] as const;

// Order matters: a tag's index is its display priority among new features.
export const NOTE_TAGS = ["New", "Changed", "HTML5", "Feature", "Language", "Developer", "Fixed"] as const;

export type Product = (typeof PRODUCTS)[number];
export type Channel = (typeof CHANNELS)[number];
export type NoteTag = (typeof NOTE_TAGS)[number];

export interface NoteImage {
  path: string;
  width: number;
  height: number;
}

export interface ReleaseRecord {
  id: string;
  product: Product;
  channel: Channel;
  version: string;
  releaseDate: Date;
  text: string;
  isPublic: boolean;
  bugList: string;
  bugSearchUrl: string;   // blank means "derive from the product template"
  systemRequirements: string;
  created: Date;
  modified: Date;
}

export interface NoteRecord {
  id: string;
  bug: number | null;
  note: string;
  releases: string[];     // ids of linked releases
  isKnownIssue: boolean;
  fixedInRelease: string | null;
  tag: NoteTag | "";
  sortNum: number;
  isPublic: boolean;
  image: NoteImage | null;
  created: Date;
  modified: Date;
}

// Dates arrive as Date objects or ISO 8601 strings; null is never a date.
const isoDate = z.union([
  z.date({ invalid_type_error: "Must be a valid date." }),
  z
    .string()
    .datetime({ offset: true, message: "Must be an ISO 8601 timestamp." })
    .transform((value) => new Date(value)),
]);

export const releaseInputSchema = z.object({
  id: z.string().min(1).optional(),
  product: z.enum(PRODUCTS, { required_error: "Product is required." }),
  channel: z.enum(CHANNELS, { required_error: "Channel is required." }),
  version: z.string().trim().min(1, "Version is required."),
  releaseDate: isoDate,
  text: z.string().default(""),
  isPublic: z.boolean().default(false),
  bugList: z.string().default(""),
  bugSearchUrl: z.string().max(2000).default(""),
  systemRequirements: z.string().default(""),
  created: isoDate.optional(),
  modified: isoDate.optional(),
});

export type ReleaseInput = z.input<typeof releaseInputSchema>;
export type ReleaseData = z.output<typeof releaseInputSchema>;

export const noteImageSchema = z.object({
  path: z.string().min(1),
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
});

export const noteInputSchema = z.object({
  id: z.string().min(1).optional(),
  bug: z.number().int().nullable().default(null),
  note: z.string().default(""),
  releases: z.array(z.string().min(1)).default([]),
  isKnownIssue: z.boolean().default(false),
  fixedInRelease: z.string().min(1).nullable().default(null),
  tag: z.union([z.enum(NOTE_TAGS), z.literal("")]).default(""),
  sortNum: z.number().int().default(0),
  isPublic: z.boolean().default(true),
  image: noteImageSchema.nullable().default(null),
  created: isoDate.optional(),
  modified: isoDate.optional(),
});

export type NoteInput = z.input<typeof noteInputSchema>;
export type NoteData = z.output<typeof noteInputSchema>;

// --- REST wire format (what an instance serves and what sync consumes) ---

const wireTimestamp = z
  .string()
  .datetime({ offset: true, message: "Invalid ISO 8601 timestamp." })
  .transform((value) => new Date(value));

export const wireReleaseSchema = z.object({
  url: z.string().url(),
  id: z.string().min(1),
  product: z.enum(PRODUCTS),
  channel: z.enum(CHANNELS),
  version: z.string().min(1),
  release_date: wireTimestamp,
  text: z.string(),
  is_public: z.boolean(),
  bug_list: z.string(),
  bug_search_url: z.string(),
  system_requirements: z.string(),
  created: wireTimestamp,
  modified: wireTimestamp,
});

export const wireNoteSchema = z.object({
  url: z.string().url(),
  id: z.string().min(1),
  bug: z.number().int().nullable(),
  note: z.string(),
  releases: z.array(z.string().url()),
  is_known_issue: z.boolean(),
  fixed_in_release: z.string().url().nullable(),
  tag: z.union([z.enum(NOTE_TAGS), z.literal("")]),
  sort_num: z.number().int(),
  is_public: z.boolean(),
  image: z
    .object({ url: z.string(), width: z.number().int(), height: z.number().int() })
    .nullable(),
  created: wireTimestamp,
  modified: wireTimestamp,
});

export type WireRelease = z.input<typeof wireReleaseSchema>;
export type WireNote = z.input<typeof wireNoteSchema>;
export type ParsedWireRelease = z.output<typeof wireReleaseSchema>;
export type ParsedWireNote = z.output<typeof wireNoteSchema>;
