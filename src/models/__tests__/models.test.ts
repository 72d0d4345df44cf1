import { describe, expect, it } from "vitest";
import { Types } from "mongoose";
import Release, { toReleaseRecord } from "../Release";
import Note, { toNoteRecord } from "../Note";

const releaseDate = new Date("2024-03-01T12:00:00.000Z");

describe("Release model", () => {
  it("exposes the release helpers as document methods", () => {
    const release = new Release({ product: "Thunderbird", channel: "Release", version: "31.2.0", releaseDate });

    expect(release.majorVersion()).toBe("31");
    expect(release.label()).toBe("Thunderbird 31.2.0 Release");
    expect(release.getBugSearchUrl()).toContain("target_milestone=Thunderbird%2031.0&product=Thunderbird");
  });

  it("applies field defaults", () => {
    const release = new Release({ product: "Firefox", channel: "Beta", version: "42.0b1", releaseDate });

    expect(release.isPublic).toBe(false);
    expect(release.text).toBe("");
    expect(release.bugSearchUrl).toBe("");
  });

  it("rejects unknown products and a missing version", () => {
    const release = new Release({ product: "Netscape", channel: "Release", releaseDate });
    const error = release.validateSync();

    expect(error?.errors.product?.kind).toBe("enum");
    expect(error?.errors.version?.message).toBe("Version is required.");
  });

  it("maps a lean document to a record", () => {
    const _id = new Types.ObjectId();
    const record = toReleaseRecord({
      _id,
      product: "Firefox",
      channel: "Release",
      version: "42.0",
      releaseDate,
      text: "",
      isPublic: true,
      bugList: "",
      bugSearchUrl: "",
      systemRequirements: "",
      created: releaseDate,
      modified: releaseDate,
    });

    expect(record.id).toBe(_id.toString());
    expect(record.version).toBe("42.0");
  });
});

describe("Note model", () => {
  it("defaults to a public untagged note", () => {
    const note = new Note({});

    expect(note.isPublic).toBe(true);
    expect(note.tag).toBe("");
    expect(note.sortNum).toBe(0);
    expect(note.fixedInRelease).toBeNull();
    expect(note.validateSync()).toBeFalsy();
  });

  it("rejects unknown tags", () => {
    expect(new Note({ tag: "Security" }).validateSync()?.errors.tag?.kind).toBe("enum");
  });

  it("is a known issue everywhere except the release that fixed it", () => {
    const fixedIn = new Types.ObjectId();
    const other = new Types.ObjectId();
    const note = new Note({ isKnownIssue: true, releases: [fixedIn, other], fixedInRelease: fixedIn });

    expect(note.isKnownIssueFor(other.toString())).toBe(true);
    expect(note.isKnownIssueFor(fixedIn.toString())).toBe(false);
  });

  it("maps related ids to strings", () => {
    const _id = new Types.ObjectId();
    const release = new Types.ObjectId();
    const record = toNoteRecord({
      _id,
      bug: null,
      note: "Crash fix",
      releases: [release],
      isKnownIssue: false,
      fixedInRelease: release,
      tag: "Fixed",
      sortNum: 2,
      isPublic: true,
      image: null,
      created: releaseDate,
      modified: releaseDate,
    });

    expect(record.releases).toEqual([release.toString()]);
    expect(record.fixedInRelease).toBe(release.toString());
  });
});
