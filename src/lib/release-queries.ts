import {
  EQUIVALENT_PRODUCT,
  majorVersion,
  projectReleaseNotes,
  selectEquivalentRelease,
  type ReleaseNotes,
} from "@/lib/release-notes";
import type { Product, ReleaseRecord } from "@/lib/schemas";
import type { ReleaseNotesStore } from "@/lib/store";

export interface EquivalenceOptions {
  /** Development mode also considers unpublished releases. */
  developmentMode: boolean;
}

/**
 * The release of `product` on the same channel and major version with the
 * highest minor version, or null when there is none.
 */
export async function equivalentReleaseForProduct(
  store: ReleaseNotesStore,
  release: ReleaseRecord,
  product: Product,
  options: EquivalenceOptions
): Promise<ReleaseRecord | null> {
  const candidates = await store.findReleases({
    product,
    channel: release.channel,
    versionPrefix: `${majorVersion(release.version)}.`,
    ...(!options.developmentMode && { isPublic: true }),
  });
  return selectEquivalentRelease(candidates);
}

async function equivalentFor(
  from: Product,
  store: ReleaseNotesStore,
  release: ReleaseRecord,
  options: EquivalenceOptions
): Promise<ReleaseRecord | null> {
  const target = EQUIVALENT_PRODUCT[from];
  if (release.product !== from || !target) return null;
  return equivalentReleaseForProduct(store, release, target, options);
}

export function equivalentAndroidRelease(
  store: ReleaseNotesStore,
  release: ReleaseRecord,
  options: EquivalenceOptions
): Promise<ReleaseRecord | null> {
  return equivalentFor("Firefox", store, release, options);
}

export function equivalentDesktopRelease(
  store: ReleaseNotesStore,
  release: ReleaseRecord,
  options: EquivalenceOptions
): Promise<ReleaseRecord | null> {
  return equivalentFor("Firefox for Android", store, release, options);
}

/**
 * Loads the notes linked to a release and projects them into display order.
 */
export async function releaseNotes(
  store: ReleaseNotesStore,
  release: ReleaseRecord,
  options: { publicOnly?: boolean } = {}
): Promise<ReleaseNotes> {
  const notes = await store.findNotes({
    releaseId: release.id,
    ...(options.publicOnly && { isPublic: true }),
  });
  return projectReleaseNotes(release, notes, options);
}
