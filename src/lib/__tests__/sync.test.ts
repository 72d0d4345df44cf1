import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RestClient, RestModelClient } from "../rest-client";
import { serializeNote, serializeRelease } from "../serializers";
import { Syncer, syncParams } from "../sync";
import { MemoryStore } from "@/test/memory-store";
import { T0, makeNote, makeRelease } from "@/test/fixtures";

const BASE = "https://remote.example.com/api";
const LATER = new Date("2030-01-01T00:00:00.000Z");

describe("syncParams", () => {
  it("asks for everything when the store is empty", async () => {
    expect(await syncParams(new MemoryStore())).toEqual({ release: {}, note: {} });
  });

  it("asks for records modified after the newest local one", async () => {
    const store = new MemoryStore();
    const older = makeRelease({ modified: T0 });
    const newer = makeRelease({ version: "43.0", modified: LATER });
    store.releases.set(older.id, older);
    store.releases.set(newer.id, newer);

    expect(await syncParams(store)).toEqual({
      release: { modified_after: "2030-01-01T00:00:00.000Z" },
      note: {},
    });
  });
});

describe("Syncer", () => {
  const fetchMock = vi.fn<typeof fetch>();
  let routes: Map<string, unknown>;
  let store: MemoryStore;

  beforeEach(() => {
    routes = new Map();
    store = new MemoryStore();
    store.now = () => LATER;

    fetchMock.mockReset();
    fetchMock.mockImplementation(async (input) => {
      const [path] = String(input).split("?");
      const body = routes.get(path);
      return body === undefined
        ? new Response("not found", { status: 404 })
        : new Response(JSON.stringify(body), { status: 200 });
    });
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  function syncer(): Syncer {
    return new Syncer(store, new RestModelClient(new RestClient({ baseUrl: BASE, token: "test-token" })));
  }

  it("copies releases and notes with their remote timestamps", async () => {
    const release = makeRelease({ id: "remote-42", version: "42.0" });
    const note = makeNote({ id: "remote-note", releases: ["remote-42"], tag: "New", note: "Faster tabs" });
    routes.set(`${BASE}/releases/`, [serializeRelease(release, BASE)]);
    routes.set(`${BASE}/notes/`, [serializeNote(note, BASE)]);

    const result = await syncer().run();

    expect(result).toEqual({ releases: 1, notes: 1, failures: [] });
    expect(store.releases.get("remote-42")?.modified).toEqual(T0);
    expect(store.notes.get("remote-note")).toEqual({ ...note, releases: ["remote-42"] });
  });

  it("fetches a linked release that is missing locally", async () => {
    const missing = makeRelease({ id: "remote-43", version: "43.0" });
    const note = makeNote({ id: "remote-note", releases: ["remote-43"], isKnownIssue: true, fixedInRelease: "remote-43" });
    routes.set(`${BASE}/releases/`, []);
    routes.set(`${BASE}/releases/remote-43/`, serializeRelease(missing, BASE));
    routes.set(`${BASE}/notes/`, [serializeNote(note, BASE)]);

    const result = await syncer().run();

    expect(result).toEqual({ releases: 0, notes: 1, failures: [] });
    expect(store.releases.get("remote-43")?.version).toBe("43.0");
    expect(store.notes.get("remote-note")?.fixedInRelease).toBe("remote-43");
    expect(fetchMock.mock.calls.filter(([url]) => url === `${BASE}/releases/remote-43/`)).toHaveLength(1);
  });

  it("records a malformed record as a failure and carries on", async () => {
    const good = makeRelease({ id: "remote-42", version: "42.0" });
    const bad = { ...serializeRelease(makeRelease({ id: "remote-bad", version: "44.0" }), BASE), modified: "yesterday" };
    routes.set(`${BASE}/releases/`, [bad, serializeRelease(good, BASE)]);
    routes.set(`${BASE}/notes/`, []);

    const result = await syncer().run();

    expect(result).toEqual({
      releases: 1,
      notes: 0,
      failures: [
        {
          kind: "release",
          url: `${BASE}/releases/remote-bad/`,
          error: "modified: Invalid ISO 8601 timestamp.",
        },
      ],
    });
    expect(store.releases.has("remote-bad")).toBe(false);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("only requests records changed since the last sync", async () => {
    const local = makeRelease({ id: "local-42", modified: T0 });
    store.releases.set(local.id, local);
    routes.set(`${BASE}/releases/`, []);
    routes.set(`${BASE}/notes/`, []);

    await syncer().run();

    expect(fetchMock.mock.calls[0][0]).toBe(
      `${BASE}/releases/?modified_after=2024-03-01T12%3A00%3A00.000Z`
    );
    expect(fetchMock.mock.calls[1][0]).toBe(`${BASE}/notes/`);
  });
});
