import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getNoteAction, linkNoteAction, listNotesAction, saveNoteAction, unlinkNoteAction } from "../note-actions";
import type { NoteRecord, ReleaseRecord } from "@/lib/schemas";
import { MemoryStore } from "@/test/memory-store";
import { T0, makeNote, makeRelease } from "@/test/fixtures";

const STAFF = { isStaff: true };
const PUBLIC = { isStaff: false };
const LATER = new Date("2030-01-01T00:00:00.000Z");

describe("note actions", () => {
  let store: MemoryStore;

  const addRelease = (overrides: Partial<ReleaseRecord> = {}): ReleaseRecord => {
    const release = makeRelease(overrides);
    store.releases.set(release.id, release);
    return release;
  };

  const addNote = (overrides: Partial<NoteRecord> = {}): NoteRecord => {
    const note = makeNote(overrides);
    store.notes.set(note.id, note);
    return note;
  };

  beforeEach(() => {
    store = new MemoryStore();
    store.now = () => LATER;
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("listNotesAction", () => {
    it("filters by release and hides private notes from the public", async () => {
      const release = addRelease();
      const visible = addNote({ releases: [release.id], sortNum: 1 });
      const hidden = addNote({ releases: [release.id], isPublic: false, sortNum: 2 });
      addNote();

      const forPublic = await listNotesAction({ release: release.id }, PUBLIC, { store });
      const forStaff = await listNotesAction({ release: release.id }, STAFF, { store });

      expect(forPublic).toEqual({ success: true, message: "Found 1 note(s).", data: [visible] });
      expect(forStaff.success && forStaff.data).toEqual([hidden, visible]);
    });

    it("filters by tag and known-issue flag", async () => {
      addNote({ tag: "Fixed" });
      const issue = addNote({ tag: "Fixed", isKnownIssue: true });

      const result = await listNotesAction({ tag: "Fixed", is_known_issue: "true" }, STAFF, { store });

      expect(result.success && result.data).toEqual([issue]);
    });
  });

  describe("getNoteAction", () => {
    it("treats private notes as missing for the public", async () => {
      const note = addNote({ isPublic: false, note: "Secret" });

      expect(await getNoteAction(note.id, PUBLIC, { store })).toEqual({
        success: false,
        message: `Note ${note.id} not found.`,
      });
      expect(await getNoteAction(note.id, STAFF, { store })).toEqual({ success: true, message: "Secret", data: note });
    });
  });

  describe("saveNoteAction", () => {
    it("creates a note with defaults", async () => {
      const release = addRelease();

      const result = await saveNoteAction({ note: "Faster startup", releases: [release.id] }, {}, { store });

      expect(result).toEqual({
        success: true,
        message: "Saved note note-1.",
        data: {
          id: "note-1",
          bug: null,
          note: "Faster startup",
          releases: [release.id],
          isKnownIssue: false,
          fixedInRelease: null,
          tag: "",
          sortNum: 0,
          isPublic: true,
          image: null,
          created: LATER,
          modified: LATER,
        },
      });
    });

    it("keeps the created stamp when updating", async () => {
      const note = addNote({ note: "Old" });

      const result = await saveNoteAction({ id: note.id, note: "New text" }, {}, { store });

      expect(result.success && result.data.created).toEqual(T0);
      expect(result.success && result.data.modified).toEqual(LATER);
    });

    it("rejects links to unknown releases", async () => {
      const release = addRelease();

      const result = await saveNoteAction(
        { releases: [release.id, "gone"], isKnownIssue: true, fixedInRelease: "also-gone" },
        {},
        { store }
      );

      expect(result).toEqual({ success: false, message: "Unknown release(s): gone, also-gone." });
      expect(store.notes.size).toBe(0);
    });

    it("rejects a fractional sort number", async () => {
      const result = await saveNoteAction({ sortNum: 1.5 }, {}, { store });
      expect(result.success).toBe(false);
      expect(result.message).toMatch(/^Failed to save note: sortNum: /);
    });
  });

  describe("linking", () => {
    it("adds each release once", async () => {
      const a = addRelease({ version: "42.0" });
      const b = addRelease({ version: "43.0" });
      const note = addNote({ releases: [a.id] });

      const result = await linkNoteAction(note.id, [a.id, b.id], { store });

      expect(result.message).toBe(`Linked note ${note.id} to 2 release(s).`);
      expect(result.success && result.data.releases).toEqual([a.id, b.id]);
      expect(result.success && result.data.modified).toEqual(LATER);
    });

    it("refuses to link unknown releases", async () => {
      const note = addNote();
      expect(await linkNoteAction(note.id, ["gone"], { store })).toEqual({
        success: false,
        message: "Unknown release(s): gone.",
      });
    });

    it("removes release links", async () => {
      const a = addRelease({ version: "42.0" });
      const b = addRelease({ version: "43.0" });
      const note = addNote({ releases: [a.id, b.id] });

      const result = await unlinkNoteAction(note.id, [a.id], { store });

      expect(result.success && result.data.releases).toEqual([b.id]);
    });

    it("reports a missing note", async () => {
      expect(await unlinkNoteAction("nope", [], { store })).toEqual({ success: false, message: "Note nope not found." });
    });
  });
});
