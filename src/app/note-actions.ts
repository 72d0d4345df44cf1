import {
  ANONYMOUS,
  failure,
  resolveStore,
  type ActionContext,
  type ActionResult,
  type Viewer,
} from "@/app/action-utils";
import { noteInputSchema, type NoteInput, type NoteRecord } from "@/lib/schemas";
import { parseNoteQuery, type NoteQuery, type ReleaseNotesStore, type SaveOptions } from "@/lib/store";

async function missingReleases(store: ReleaseNotesStore, ids: string[]): Promise<string[]> {
  const found = await Promise.all(ids.map((id) => store.getRelease(id)));
  return ids.filter((_, index) => !found[index]);
}

export async function listNotesAction(
  query: NoteQuery = {},
  viewer: Viewer = ANONYMOUS,
  { store }: ActionContext = {}
): Promise<ActionResult<NoteRecord[]>> {
  try {
    const filter = parseNoteQuery(query);
    if (!viewer.isStaff) filter.isPublic = true;
    const notes = await (await resolveStore(store)).findNotes(filter);
    return { success: true, message: `Found ${notes.length} note(s).`, data: notes };
  } catch (error) {
    return failure("Failed to list notes", error);
  }
}

export async function getNoteAction(
  id: string,
  viewer: Viewer = ANONYMOUS,
  { store }: ActionContext = {}
): Promise<ActionResult<NoteRecord>> {
  try {
    const note = await (await resolveStore(store)).getNote(id);
    if (!note || (!note.isPublic && !viewer.isStaff)) {
      return { success: false, message: `Note ${id} not found.` };
    }
    return { success: true, message: note.note, data: note };
  } catch (error) {
    return failure(`Failed to get note ${id}`, error);
  }
}

/**
 * Creates or updates a note. Every referenced release must exist.
 */
export async function saveNoteAction(
  input: NoteInput,
  options: SaveOptions = {},
  { store }: ActionContext = {}
): Promise<ActionResult<NoteRecord>> {
  try {
    const data = noteInputSchema.parse(input);
    const resolved = await resolveStore(store);

    const referenced = data.fixedInRelease ? [...data.releases, data.fixedInRelease] : data.releases;
    const missing = await missingReleases(resolved, referenced);
    if (missing.length > 0) {
      return { success: false, message: `Unknown release(s): ${missing.join(", ")}.` };
    }

    const note = await resolved.saveNote(data, options);
    return { success: true, message: `Saved note ${note.id}.`, data: note };
  } catch (error) {
    return failure("Failed to save note", error);
  }
}

export async function linkNoteAction(
  noteId: string,
  releaseIds: string[],
  { store }: ActionContext = {}
): Promise<ActionResult<NoteRecord>> {
  try {
    const resolved = await resolveStore(store);
    const missing = await missingReleases(resolved, releaseIds);
    if (missing.length > 0) {
      return { success: false, message: `Unknown release(s): ${missing.join(", ")}.` };
    }
    const note = await resolved.linkNote(noteId, releaseIds);
    if (!note) {
      return { success: false, message: `Note ${noteId} not found.` };
    }
    return { success: true, message: `Linked note ${noteId} to ${releaseIds.length} release(s).`, data: note };
  } catch (error) {
    return failure(`Failed to link note ${noteId}`, error);
  }
}

export async function unlinkNoteAction(
  noteId: string,
  releaseIds: string[],
  { store }: ActionContext = {}
): Promise<ActionResult<NoteRecord>> {
  try {
    const note = await (await resolveStore(store)).unlinkNote(noteId, releaseIds);
    if (!note) {
      return { success: false, message: `Note ${noteId} not found.` };
    }
    return { success: true, message: `Unlinked note ${noteId} from ${releaseIds.length} release(s).`, data: note };
  } catch (error) {
    return failure(`Failed to unlink note ${noteId}`, error);
  }
}
