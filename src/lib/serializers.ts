import type {
  NoteData,
  NoteRecord,
  ParsedWireNote,
  ParsedWireRelease,
  ReleaseData,
  ReleaseRecord,
  WireNote,
  WireRelease,
} from "@/lib/schemas";
import type { RecordKind } from "@/lib/store";

const RESOURCE_PATH: Record<RecordKind, string> = {
  release: "releases",
  note: "notes",
};

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function collectionUrl(baseUrl: string, kind: RecordKind): string {
  return `${trimSlash(baseUrl)}/${RESOURCE_PATH[kind]}/`;
}

export function resourceUrl(baseUrl: string, kind: RecordKind, id: string): string {
  return `${collectionUrl(baseUrl, kind)}${encodeURIComponent(id)}/`;
}

/**
 * Splits a resource URL such as `https://host/api/notes/42/` into the
 * collection URL and the record id.
 */
export function parseResourceUrl(url: string): { collection: string; id: string } {
  const trimmed = trimSlash(url);
  const slash = trimmed.lastIndexOf("/");
  const id = decodeURIComponent(trimmed.slice(slash + 1));
  if (slash === -1 || !id) {
    throw new Error(`Could not determine record id from URL: ${url}`);
  }
  return { collection: trimmed.slice(0, slash + 1), id };
}

export function serializeRelease(release: ReleaseRecord, baseUrl: string): WireRelease {
  return {
    url: resourceUrl(baseUrl, "release", release.id),
    id: release.id,
    product: release.product,
    channel: release.channel,
    version: release.version,
    release_date: release.releaseDate.toISOString(),
    text: release.text,
    is_public: release.isPublic,
    bug_list: release.bugList,
    bug_search_url: release.bugSearchUrl,
    system_requirements: release.systemRequirements,
    created: release.created.toISOString(),
    modified: release.modified.toISOString(),
  };
}

/**
 * @param mediaUrl base URL uploaded images are served from
 */
export function serializeNote(note: NoteRecord, baseUrl: string, mediaUrl: string = `${trimSlash(baseUrl)}/media`): WireNote {
  return {
    url: resourceUrl(baseUrl, "note", note.id),
    id: note.id,
    bug: note.bug,
    note: note.note,
    releases: note.releases.map((id) => resourceUrl(baseUrl, "release", id)),
    is_known_issue: note.isKnownIssue,
    fixed_in_release: note.fixedInRelease ? resourceUrl(baseUrl, "release", note.fixedInRelease) : null,
    tag: note.tag,
    sort_num: note.sortNum,
    is_public: note.isPublic,
    image: note.image
      ? { url: `${trimSlash(mediaUrl)}/${note.image.path}`, width: note.image.width, height: note.image.height }
      : null,
    created: note.created.toISOString(),
    modified: note.modified.toISOString(),
  };
}

export function restoreRelease(wire: ParsedWireRelease): ReleaseData {
  return {
    id: wire.id,
    product: wire.product,
    channel: wire.channel,
    version: wire.version,
    releaseDate: wire.release_date,
    text: wire.text,
    isPublic: wire.is_public,
    bugList: wire.bug_list,
    bugSearchUrl: wire.bug_search_url,
    systemRequirements: wire.system_requirements,
    created: wire.created,
    modified: wire.modified,
  };
}

/**
 * Maps a remote note onto local data. Related releases are given as the
 * local ids the caller resolved for each release URL.
 */
export function restoreNote(
  wire: ParsedWireNote,
  related: { releases: string[]; fixedInRelease: string | null },
  mediaUrl?: string
): NoteData {
  let image: NoteData["image"] = null;
  if (wire.image) {
    const prefix = mediaUrl ? `${trimSlash(mediaUrl)}/` : "";
    const path = prefix && wire.image.url.startsWith(prefix) ? wire.image.url.slice(prefix.length) : wire.image.url;
    image = { path, width: wire.image.width, height: wire.image.height };
  }

  return {
    id: wire.id,
    bug: wire.bug,
    note: wire.note,
    releases: related.releases,
    isKnownIssue: wire.is_known_issue,
    fixedInRelease: related.fixedInRelease,
    tag: wire.tag,
    sortNum: wire.sort_num,
    isPublic: wire.is_public,
    image,
    created: wire.created,
    modified: wire.modified,
  };
}
