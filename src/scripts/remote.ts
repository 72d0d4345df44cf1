import type { AppConfig } from "@/lib/config";

export interface SyncOptions {
  baseUrl?: string;
  token?: string;
}

/**
 * Remote to sync from: command-line flags win over RNA_BASE_URL / RNA_TOKEN.
 */
export function resolveRemote(options: SyncOptions, config: AppConfig): { baseUrl: string; token?: string } {
  const baseUrl = options.baseUrl ?? config.sync.baseUrl;
  if (!baseUrl) {
    throw new Error("No remote configured. Set RNA_BASE_URL or pass --base-url.");
  }

  const token = options.token ?? config.sync.token;
  if (!token) {
    console.warn(`No API token set (RNA_TOKEN or --token). Syncing from ${baseUrl} without authentication.`);
  }
  return { baseUrl, token };
}
