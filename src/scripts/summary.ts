import chalk from "chalk";
import type { SyncResult } from "@/lib/sync";

export function formatSummary(result: SyncResult): string[] {
  const lines = [
    chalk.green(`✔ Synced ${result.releases} release(s) and ${result.notes} note(s).`),
  ];
  if (result.failures.length > 0) {
    lines.push(chalk.red(`✖ ${result.failures.length} record(s) failed:`));
    for (const failure of result.failures) {
      lines.push(chalk.gray(`  ${failure.kind} ${failure.url}: ${failure.error}`));
    }
  }
  return lines;
}
