import type { NoteRecord, ReleaseRecord } from "@/lib/schemas";

export const T0 = new Date("2024-03-01T12:00:00.000Z");

let counter = 0;

export function makeRelease(overrides: Partial<ReleaseRecord> = {}): ReleaseRecord {
  counter += 1;
  return {
    id: `r${counter}`,
    product: "Firefox",
    channel: "Release",
    version: "42.0",
    releaseDate: T0,
    text: "",
    isPublic: true,
    bugList: "",
    bugSearchUrl: "",
    systemRequirements: "",
    created: T0,
    modified: T0,
    ...overrides,
  };
}

export function makeNote(overrides: Partial<NoteRecord> = {}): NoteRecord {
  counter += 1;
  return {
    id: `n${counter}`,
    bug: null,
    note: "",
    releases: [],
    isKnownIssue: false,
    fixedInRelease: null,
    tag: "",
    sortNum: 0,
    isPublic: true,
    image: null,
    created: T0,
    modified: T0,
    ...overrides,
  };
}
