import * as z from "zod";
import type { QueryParams, RestModelClient } from "@/lib/rest-client";
import { wireNoteSchema, wireReleaseSchema, type NoteRecord, type ReleaseRecord } from "@/lib/schemas";
import { parseResourceUrl, restoreNote, restoreRelease } from "@/lib/serializers";
import type { RecordKind, ReleaseNotesStore } from "@/lib/store";

export interface SyncFailure {
  kind: RecordKind;
  url: string;
  error: string;
}

export interface SyncResult {
  releases: number;
  notes: number;
  failures: SyncFailure[];
}

const SYNC_ORDER: RecordKind[] = ["release", "note"];

/**
 * Query params per kind: only records modified after the newest local one,
 * or everything when the local store is empty.
 */
export async function syncParams(store: ReleaseNotesStore): Promise<Record<RecordKind, QueryParams>> {
  const params: Record<RecordKind, QueryParams> = { release: {}, note: {} };
  for (const kind of SYNC_ORDER) {
    const latest = await store.latestModified(kind);
    params[kind] = latest ? { modified_after: latest.toISOString() } : {};
  }
  return params;
}

function describeError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues.map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`).join("; ");
  }
  return error instanceof Error ? error.message : String(error);
}

function recordUrl(raw: unknown): string {
  if (typeof raw === "object" && raw !== null && "url" in raw && typeof raw.url === "string") {
    return raw.url;
  }
  return "<unknown>";
}

/**
 * Pulls releases and notes from a remote instance into the local store.
 * Records keep their remote `modified` stamps so the next run's cursor
 * stays aligned with the remote.
 */
export class Syncer {
  private readonly mediaUrl: string;

  constructor(
    private readonly store: ReleaseNotesStore,
    private readonly remote: RestModelClient,
    options: { mediaUrl?: string } = {}
  ) {
    this.mediaUrl = options.mediaUrl ?? `${remote.client.baseUrl.replace(/\/+$/, "")}/media`;
  }

  async run(): Promise<SyncResult> {
    const params = await syncParams(this.store);
    const result: SyncResult = { releases: 0, notes: 0, failures: [] };

    for (const kind of SYNC_ORDER) {
      const records = await this.remote.list(kind, params[kind]);
      console.log(`Fetched ${records.length} ${kind} record(s) from ${this.remote.client.baseUrl}.`);

      for (const raw of records) {
        try {
          if (kind === "release") {
            await this.saveRelease(raw);
            result.releases += 1;
          } else {
            await this.saveNote(raw);
            result.notes += 1;
          }
        } catch (error) {
          const failure = { kind, url: recordUrl(raw), error: describeError(error) };
          console.error(`Failed to sync ${kind} ${failure.url}: ${failure.error}`);
          result.failures.push(failure);
        }
      }
    }

    return result;
  }

  private async saveRelease(raw: unknown): Promise<ReleaseRecord> {
    const wire = wireReleaseSchema.parse(raw);
    return this.store.saveRelease(restoreRelease(wire), { modified: false });
  }

  private async saveNote(raw: unknown): Promise<NoteRecord> {
    const wire = wireNoteSchema.parse(raw);

    const releases: string[] = [];
    for (const url of wire.releases) {
      releases.push(await this.resolveRelease(url));
    }
    const fixedInRelease = wire.fixed_in_release ? await this.resolveRelease(wire.fixed_in_release) : null;

    return this.store.saveNote(restoreNote(wire, { releases, fixedInRelease }, this.mediaUrl), { modified: false });
  }

  /**
   * Local id for a remote release URL, fetching and storing the release
   * first when it is not here yet.
   */
  private async resolveRelease(url: string): Promise<string> {
    const { id } = parseResourceUrl(url);
    const local = await this.store.getRelease(id);
    if (local) return local.id;

    console.log(`Release ${url} is missing locally, fetching it.`);
    const saved = await this.saveRelease(await this.remote.retrieve(url));
    return saved.id;
  }
}
