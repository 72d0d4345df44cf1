// src/app/release-actions.ts
import {
  ANONYMOUS,
  failure,
  resolveStore,
  type ActionContext,
  type ActionResult,
  type Viewer,
} from "@/app/action-utils";
import { getConfig } from "@/lib/config";
import { releaseLabel, type ReleaseNotes } from "@/lib/release-notes";
import { equivalentAndroidRelease, equivalentDesktopRelease, releaseNotes } from "@/lib/release-queries";
import { getBugSearchUrl, releasePageUrls } from "@/lib/release-urls";
import { releaseInputSchema, type ReleaseInput, type ReleaseRecord } from "@/lib/schemas";
import { parseReleaseQuery, type ReleaseQuery, type SaveOptions } from "@/lib/store";

export interface ReleasePage extends ReleaseNotes {
  release: ReleaseRecord;
  label: string;
  bugSearchUrl: string;
  equivalentAndroid: ReleaseRecord | null;
  equivalentDesktop: ReleaseRecord | null;
  links: { staging: string; public: string };
}

function visibleTo(release: ReleaseRecord, viewer: Viewer): boolean {
  return release.isPublic || viewer.isStaff;
}

/**
 * Lists releases in the default order. Non-staff viewers only see public ones.
 */
export async function listReleasesAction(
  query: ReleaseQuery = {},
  viewer: Viewer = ANONYMOUS,
  { store }: ActionContext = {}
): Promise<ActionResult<ReleaseRecord[]>> {
  try {
    const filter = parseReleaseQuery(query);
    if (!viewer.isStaff) filter.isPublic = true;
    const releases = await (await resolveStore(store)).findReleases(filter);
    return { success: true, message: `Found ${releases.length} release(s).`, data: releases };
  } catch (error) {
    return failure("Failed to list releases", error);
  }
}

export async function getReleaseAction(
  id: string,
  viewer: Viewer = ANONYMOUS,
  { store }: ActionContext = {}
): Promise<ActionResult<ReleaseRecord>> {
  try {
    const release = await (await resolveStore(store)).getRelease(id);
    if (!release || !visibleTo(release, viewer)) {
      return { success: false, message: `Release ${id} not found.` };
    }
    return { success: true, message: releaseLabel(release), data: release };
  } catch (error) {
    return failure(`Failed to get release ${id}`, error);
  }
}

/**
 * Everything a release-notes page shows: the release, its ordered notes and
 * the counterpart desktop/mobile releases.
 */
export async function getReleasePageAction(
  id: string,
  viewer: Viewer = ANONYMOUS,
  context: ActionContext = {}
): Promise<ActionResult<ReleasePage>> {
  try {
    const store = await resolveStore(context.store);
    const config = context.config ?? getConfig();
    const release = await store.getRelease(id);
    if (!release || !visibleTo(release, viewer)) {
      return { success: false, message: `Release ${id} not found.` };
    }

    const equivalence = { developmentMode: config.developmentMode };
    const [notes, equivalentAndroid, equivalentDesktop] = await Promise.all([
      releaseNotes(store, release, { publicOnly: !viewer.isStaff }),
      equivalentAndroidRelease(store, release, equivalence),
      equivalentDesktopRelease(store, release, equivalence),
    ]);

    return {
      success: true,
      message: releaseLabel(release),
      data: {
        release,
        label: releaseLabel(release),
        bugSearchUrl: getBugSearchUrl(release),
        newFeatures: notes.newFeatures,
        knownIssues: notes.knownIssues,
        equivalentAndroid,
        equivalentDesktop,
        links: releasePageUrls(release, config.site),
      },
    };
  } catch (error) {
    return failure(`Failed to load release page ${id}`, error);
  }
}

export async function saveReleaseAction(
  input: ReleaseInput,
  options: SaveOptions = {},
  { store }: ActionContext = {}
): Promise<ActionResult<ReleaseRecord>> {
  try {
    const data = releaseInputSchema.parse(input);
    const release = await (await resolveStore(store)).saveRelease(data, options);
    return { success: true, message: `Saved ${releaseLabel(release)}.`, data: release };
  } catch (error) {
    return failure("Failed to save release", error);
  }
}

/**
 * Copies each release with its note links into a new unpublished release,
 * typically to turn a beta into the next channel's draft for review.
 */
export async function copyReleasesAction(
  ids: string[],
  { store }: ActionContext = {}
): Promise<ActionResult<ReleaseRecord[]>> {
  if (ids.length === 0) {
    return { success: false, message: "No releases provided." };
  }

  const copies: ReleaseRecord[] = [];
  try {
    const resolved = await resolveStore(store);
    for (const id of ids) {
      const copy = await resolved.copyRelease(id);
      if (!copy) {
        return { success: false, message: `Release ${id} not found. Copied ${copies.length} of ${ids.length}.` };
      }
      copies.push(copy);
    }
  } catch (error) {
    return failure(`Copy failed after ${copies.length} of ${ids.length} release(s)`, error);
  }

  const message = copies.length === 1 ? "Copied Release" : `Copied ${copies.length} Releases`;
  console.log(message, copies.map((copy) => releaseLabel(copy)));
  return { success: true, message, data: copies };
}
