#!/usr/bin/env node

/**
 * Release notes CLI
 *
 * `sync` pulls releases and notes modified since the last run from another
 * instance's REST API into the local database.
 */

import { Command } from "commander";
import chalk from "chalk";
import { getConfig } from "@/lib/config";
import dbConnect, { dbDisconnect } from "@/lib/mongodb";
import { mongoStore } from "@/lib/mongo-store";
import { RestClient, RestModelClient } from "@/lib/rest-client";
import { Syncer } from "@/lib/sync";
import { resolveRemote, type SyncOptions } from "@/scripts/remote";
import { formatSummary } from "@/scripts/summary";

async function sync(options: SyncOptions & { mediaUrl?: string }): Promise<void> {
  const remote = resolveRemote(options, getConfig());

  await dbConnect();
  try {
    const client = new RestClient(remote);
    const syncer = new Syncer(mongoStore, new RestModelClient(client), { mediaUrl: options.mediaUrl });
    const result = await syncer.run();

    for (const line of formatSummary(result)) console.log(line);
    if (result.failures.length > 0) {
      process.exitCode = 1;
    }
  } finally {
    await dbDisconnect();
  }
}

const program = new Command();

program
  .name("release-notes")
  .description("Release notes service tools");

program
  .command("sync")
  .description("Sync releases and notes from a remote instance")
  .option("--base-url <url>", "Remote API base URL (defaults to RNA_BASE_URL)")
  .option("--token <token>", "API token (defaults to RNA_TOKEN)")
  .option("--media-url <url>", "Base URL the remote serves images from")
  .action(sync);

try {
  await program.parseAsync(process.argv);
} catch (error: unknown) {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(chalk.red("\n❌ Error:"), message);
  process.exit(1);
}
