import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { matchesTimestamps, parseNoteQuery, parseReleaseQuery } from "../store";

describe("parseReleaseQuery", () => {
  it("maps REST parameters onto a release filter", () => {
    expect(
      parseReleaseQuery({
        product: "Firefox",
        channel: "Beta",
        version: "42.0b1",
        is_public: "true",
        modified_after: "2024-03-01T12:00:00.000Z",
      })
    ).toEqual({
      product: "Firefox",
      channel: "Beta",
      version: "42.0b1",
      isPublic: true,
      createdBefore: undefined,
      createdAfter: undefined,
      modifiedBefore: undefined,
      modifiedAfter: new Date("2024-03-01T12:00:00.000Z"),
    });
  });

  it("accepts timestamps with an offset", () => {
    const filter = parseReleaseQuery({ created_before: "2024-03-01T14:00:00+02:00" });
    expect(filter.createdBefore).toEqual(new Date("2024-03-01T12:00:00.000Z"));
  });

  it("rejects an unknown product", () => {
    expect(() => parseReleaseQuery({ product: "Netscape" })).toThrow(ZodError);
  });

  it("rejects an unparsable timestamp", () => {
    expect(() => parseReleaseQuery({ modified_after: "yesterday" })).toThrow("Must be an ISO 8601 timestamp.");
  });
});

describe("parseNoteQuery", () => {
  it("maps REST parameters onto a note filter", () => {
    expect(parseNoteQuery({ release: "r1", tag: "Fixed", is_known_issue: "0", is_public: "False" })).toEqual({
      releaseId: "r1",
      tag: "Fixed",
      isKnownIssue: false,
      isPublic: false,
      createdBefore: undefined,
      createdAfter: undefined,
      modifiedBefore: undefined,
      modifiedAfter: undefined,
    });
  });

  it("accepts an empty tag filter for untagged notes", () => {
    expect(parseNoteQuery({ tag: "" }).tag).toBe("");
  });
});

describe("matchesTimestamps", () => {
  const record = {
    created: new Date("2024-01-01T00:00:00.000Z"),
    modified: new Date("2024-02-01T00:00:00.000Z"),
  };

  it("matches when there are no bounds", () => {
    expect(matchesTimestamps(record, {})).toBe(true);
  });

  it("uses strict bounds", () => {
    expect(matchesTimestamps(record, { modifiedAfter: record.modified })).toBe(false);
    expect(matchesTimestamps(record, { modifiedBefore: record.modified })).toBe(false);
    expect(matchesTimestamps(record, { createdAfter: new Date("2023-12-31T00:00:00.000Z") })).toBe(true);
    expect(matchesTimestamps(record, { createdBefore: new Date("2024-01-02T00:00:00.000Z") })).toBe(true);
  });

  it("requires every bound to hold", () => {
    expect(
      matchesTimestamps(record, {
        createdAfter: new Date("2023-12-31T00:00:00.000Z"),
        modifiedBefore: new Date("2024-01-15T00:00:00.000Z"),
      })
    ).toBe(false);
  });
});
