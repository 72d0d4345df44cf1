import { NOTE_TAGS, type NoteRecord, type Product, type ReleaseRecord } from "@/lib/schemas";

/**
 * Display priority of each note tag. Blank or unknown tags share priority 0
 * with "New".
 */
export const TAG_PRIORITY: ReadonlyMap<string, number> = new Map(
  NOTE_TAGS.map((tag, index) => [tag, index] as const)
);

/**
 * Sibling product whose releases are cross-linked from a release page.
 */
export const EQUIVALENT_PRODUCT: Readonly<Partial<Record<Product, Product>>> = {
  Firefox: "Firefox for Android",
  "Firefox for Android": "Firefox",
};

type VersionedRelease = Pick<ReleaseRecord, "version">;

export interface ReleaseNotes {
  newFeatures: NoteRecord[];
  knownIssues: NoteRecord[];
}

/**
 * Everything before the first dot, or the whole version when it has none.
 */
export function majorVersion(version: string): string {
  const dot = version.indexOf(".");
  return dot === -1 ? version : version.slice(0, dot);
}

export function releaseLabel(release: Pick<ReleaseRecord, "product" | "version" | "channel">): string {
  return `${release.product} ${release.version} ${release.channel}`;
}

function stableSortBy<T>(items: readonly T[], key: (item: T) => number | string, descending = false): T[] {
  const direction = descending ? -1 : 1;
  return [...items].sort((a, b) => {
    const ka = key(a);
    const kb = key(b);
    if (ka === kb) return 0;
    return (ka < kb ? -1 : 1) * direction;
  });
}

export function isKnownIssueFor(note: Pick<NoteRecord, "isKnownIssue" | "fixedInRelease">, release: Pick<ReleaseRecord, "id">): boolean {
  return note.isKnownIssue && note.fixedInRelease !== release.id;
}

/**
 * A "Fixed" note whose text starts with this exact release version.
 */
export function isDotFix(note: Pick<NoteRecord, "tag" | "note">, release: VersionedRelease): boolean {
  return note.tag === "Fixed" && note.note.startsWith(release.version);
}

/**
 * Splits the notes linked to a release into new features and known issues.
 *
 * Both lists are ordered by sortNum, highest first. New features are then
 * re-sorted by tag priority, and finally dot fixes for this version are
 * pulled to the top. Each pass is a separate stable sort so that earlier
 * passes break the ties of later ones.
 */
export function projectReleaseNotes(
  release: Pick<ReleaseRecord, "id" | "version">,
  notes: readonly NoteRecord[],
  options: { publicOnly?: boolean } = {}
): ReleaseNotes {
  let ordered = stableSortBy(notes, (note) => note.sortNum, true);
  if (options.publicOnly) {
    ordered = ordered.filter((note) => note.isPublic);
  }

  const knownIssues = ordered.filter((note) => isKnownIssueFor(note, release));
  const remainder = ordered.filter((note) => !isKnownIssueFor(note, release));

  const byTag = stableSortBy(remainder, (note) => TAG_PRIORITY.get(note.tag) ?? 0);
  const newFeatures = stableSortBy(byTag, (note) => (isDotFix(note, release) ? 1 : 0), true);

  return { newFeatures, knownIssues };
}

/**
 * Picks the counterpart among candidate releases already narrowed to one
 * product, channel and major version. Returns null when there is none.
 *
 * More version segments win first, then the second segment compared as a
 * string decides, so 33.1 beats 33.0.3 and 42.0.1 beats 42.0. A version
 * without a second segment sorts lowest.
 */
export function selectEquivalentRelease<T extends VersionedRelease>(candidates: readonly T[]): T | null {
  if (candidates.length === 0) return null;

  const bySegments = stableSortBy(candidates, (release) => release.version.split(".").length, true);
  const byMinor = stableSortBy(bySegments, (release) => release.version.split(".")[1] ?? "", true);

  return byMinor[0] ?? null;
}

/**
 * Version for a copy of a release. `existingCount` counts the releases of the
 * same product whose version ends with the source version, the source
 * included.
 */
export function copyVersion(version: string, existingCount: number): string {
  return existingCount > 1 ? `copy${existingCount}-${version}` : `copy-${version}`;
}

/**
 * Default listing order: product, then version descending (plain string
 * comparison), then channel.
 */
export function compareReleases(
  a: Pick<ReleaseRecord, "product" | "version" | "channel">,
  b: Pick<ReleaseRecord, "product" | "version" | "channel">
): number {
  if (a.product !== b.product) return a.product < b.product ? -1 : 1;
  if (a.version !== b.version) return a.version < b.version ? 1 : -1;
  if (a.channel !== b.channel) return a.channel < b.channel ? -1 : 1;
  return 0;
}
