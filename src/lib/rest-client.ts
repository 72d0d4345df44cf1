// src/lib/rest-client.ts
import { collectionUrl } from "@/lib/serializers";
import type { RecordKind } from "@/lib/store";

export type QueryParams = Record<string, string>;

export interface RestClientOptions {
  baseUrl?: string;
  token?: string;
}

/**
 * Thin fetch wrapper for another instance's REST API. Successful GET and
 * OPTIONS responses are cached by URL for the lifetime of the client.
 */
export class RestClient {
  readonly baseUrl: string;
  readonly token?: string;
  readonly cache = new Map<string, unknown>();
  readonly optionsCache = new Map<string, unknown>();

  constructor({ baseUrl = "", token }: RestClientOptions = {}) {
    this.baseUrl = baseUrl;
    this.token = token;
  }

  /**
   * Issues a request. `url` is appended to the base URL unless it already
   * starts with it.
   */
  async request(method: string, url: string, init: RequestInit = {}): Promise<Response> {
    const target = url.startsWith(this.baseUrl) ? url : `${this.baseUrl}${url}`;
    const headers = new Headers(init.headers);
    if (this.token) {
      headers.set("Authorization", `Token ${this.token}`);
    }
    return fetch(target, { ...init, method: method.toUpperCase(), headers });
  }

  async get(url = "", params: QueryParams = {}): Promise<unknown> {
    const query = new URLSearchParams(params).toString();
    const key = query ? `${url}${url.includes("?") ? "&" : "?"}${query}` : url;

    if (this.cache.has(key)) {
      return this.cache.get(key);
    }

    const res = await this.request("get", key, { headers: { Accept: "application/json" } });
    if (!res.ok) {
      const errorText = await res.text();
      throw new Error(`GET ${key} failed. Status: ${res.status}. Response: ${errorText}`);
    }

    const data: unknown = await res.json();
    if (res.status === 200) {
      this.cache.set(key, data);
    }
    return data;
  }

  async options(url = ""): Promise<unknown> {
    if (this.optionsCache.has(url)) {
      return this.optionsCache.get(url);
    }
    const res = await this.request("options", url, { headers: { Accept: "application/json" } });
    if (!res.ok) {
      throw new Error(`OPTIONS ${url} failed. Status: ${res.status}`);
    }
    const data: unknown = await res.json();
    this.optionsCache.set(url, data);
    return data;
  }

  post(url: string, body: unknown): Promise<Response> {
    return this.send("post", url, body);
  }

  put(url: string, body: unknown): Promise<Response> {
    return this.send("put", url, body);
  }

  delete(url: string): Promise<Response> {
    return this.request("delete", url);
  }

  private send(method: string, url: string, body: unknown): Promise<Response> {
    return this.request(method, url, {
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }
}

/**
 * Reads release and note records from a remote instance.
 */
export class RestModelClient {
  constructor(readonly client: RestClient) {}

  /**
   * Lists records of one kind. Accepts either a bare array or a paginated
   * `{ results, next }` body and follows `next` links.
   */
  async list(kind: RecordKind, params: QueryParams = {}): Promise<unknown[]> {
    const records: unknown[] = [];
    let page: unknown = await this.client.get(collectionUrl(this.client.baseUrl, kind), params);

    for (;;) {
      if (Array.isArray(page)) {
        records.push(...page);
        return records;
      }
      if (!isPaginated(page)) {
        throw new Error(`Unexpected ${kind} listing from ${this.client.baseUrl}.`);
      }
      records.push(...page.results);
      if (!page.next) return records;
      page = await this.client.get(page.next);
    }
  }

  retrieve(url: string): Promise<unknown> {
    return this.client.get(url);
  }
}

function isPaginated(value: unknown): value is { results: unknown[]; next?: string | null } {
  return (
    typeof value === "object" &&
    value !== null &&
    "results" in value &&
    Array.isArray(value.results) &&
    (!("next" in value) || value.next === null || typeof value.next === "string")
  );
}
