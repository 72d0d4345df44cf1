import {
  ANONYMOUS,
  failure,
  resolveStore,
  type ActionContext,
  type ActionResult,
  type Viewer,
} from "@/app/action-utils";
import { releaseLabel } from "@/lib/release-notes";
import type { WireNote, WireRelease } from "@/lib/schemas";
import { serializeNote, serializeRelease } from "@/lib/serializers";
import { parseNoteQuery, parseReleaseQuery, type NoteQuery, type ReleaseQuery } from "@/lib/store";

// REST representations served to other instances and the sync client.

export interface ResourceContext extends ActionContext {
  /** Public base URL of this instance's API, e.g. https://example.com/api */
  baseUrl: string;
  mediaUrl?: string;
}

export async function releaseResourcesAction(
  query: ReleaseQuery,
  viewer: Viewer = ANONYMOUS,
  { store, baseUrl }: ResourceContext
): Promise<ActionResult<WireRelease[]>> {
  try {
    const filter = parseReleaseQuery(query);
    if (!viewer.isStaff) filter.isPublic = true;
    const releases = await (await resolveStore(store)).findReleases(filter);
    return {
      success: true,
      message: `Found ${releases.length} release(s).`,
      data: releases.map((release) => serializeRelease(release, baseUrl)),
    };
  } catch (error) {
    return failure("Failed to list release resources", error);
  }
}

export async function noteResourcesAction(
  query: NoteQuery,
  viewer: Viewer = ANONYMOUS,
  { store, baseUrl, mediaUrl }: ResourceContext
): Promise<ActionResult<WireNote[]>> {
  try {
    const filter = parseNoteQuery(query);
    if (!viewer.isStaff) filter.isPublic = true;
    const notes = await (await resolveStore(store)).findNotes(filter);
    return {
      success: true,
      message: `Found ${notes.length} note(s).`,
      data: notes.map((note) => serializeNote(note, baseUrl, mediaUrl)),
    };
  } catch (error) {
    return failure("Failed to list note resources", error);
  }
}

/**
 * One release in wire form, the target of the URLs listed in a note's
 * `releases` and `fixed_in_release`.
 */
export async function releaseResourceAction(
  id: string,
  viewer: Viewer = ANONYMOUS,
  { store, baseUrl }: ResourceContext
): Promise<ActionResult<WireRelease>> {
  try {
    const release = await (await resolveStore(store)).getRelease(id);
    if (!release || (!release.isPublic && !viewer.isStaff)) {
      return { success: false, message: `Release ${id} not found.` };
    }
    return { success: true, message: releaseLabel(release), data: serializeRelease(release, baseUrl) };
  } catch (error) {
    return failure(`Failed to get release resource ${id}`, error);
  }
}

export async function noteResourceAction(
  id: string,
  viewer: Viewer = ANONYMOUS,
  { store, baseUrl, mediaUrl }: ResourceContext
): Promise<ActionResult<WireNote>> {
  try {
    const note = await (await resolveStore(store)).getNote(id);
    if (!note || (!note.isPublic && !viewer.isStaff)) {
      return { success: false, message: `Note ${id} not found.` };
    }
    return { success: true, message: `Note ${id}`, data: serializeNote(note, baseUrl, mediaUrl) };
  } catch (error) {
    return failure(`Failed to get note resource ${id}`, error);
  }
}
