import type { AppConfig } from "@/lib/config";
import { majorVersion } from "@/lib/release-notes";
import type { ReleaseRecord } from "@/lib/schemas";

const BUGZILLA_SEARCH = "https://bugzilla.mozilla.org/buglist.cgi?";

/**
 * The release's own bug search URL when set, otherwise a Bugzilla query for
 * the fixed bugs of its major version.
 */
export function getBugSearchUrl(release: Pick<ReleaseRecord, "product" | "version" | "bugSearchUrl">): string {
  if (release.bugSearchUrl) {
    return release.bugSearchUrl;
  }

  const version = majorVersion(release.version);

  if (release.product === "Thunderbird") {
    return (
      BUGZILLA_SEARCH +
      "classification=Client%20Software&query_format=advanced&" +
      "bug_status=RESOLVED&bug_status=VERIFIED&bug_status=CLOSED&" +
      `target_milestone=Thunderbird%20${version}.0&product=Thunderbird` +
      "&resolution=FIXED"
    );
  }

  return (
    BUGZILLA_SEARCH +
    `j_top=OR&f1=target_milestone&o3=equals&v3=Firefox%20${version}&` +
    "o1=equals&resolution=FIXED&o2=anyexact&query_format=advanced&" +
    `f3=target_milestone&f2=cf_status_firefox${version}&` +
    "bug_status=RESOLVED&bug_status=VERIFIED&bug_status=CLOSED&" +
    `v1=mozilla${version}&v2=fixed%2Cverified&limit=0`
  );
}

const SITE_SECTION: Record<ReleaseRecord["product"], string> = {
  Firefox: "firefox",
  "Firefox Extended Support Release": "firefox",
  "Firefox for Android": "mobile",
  Thunderbird: "thunderbird",
  "Firefox OS": "firefox/os",
};

/**
 * Staging and public release-notes page links for a release.
 */
export function releasePageUrls(
  release: Pick<ReleaseRecord, "product" | "version">,
  site: AppConfig["site"]
): { staging: string; public: string } {
  // Firefox OS pages live under a different path shape.
  const path =
    release.product === "Firefox OS"
      ? `/firefox/os/notes/${release.version}/`
      : `/${SITE_SECTION[release.product]}/${release.version}/releasenotes/`;

  return { staging: site.stagingUrl + path, public: site.publicUrl + path };
}
