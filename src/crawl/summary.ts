import { tryParseDocumentId } from "../ids";
import type { DocumentStore } from "../store";
import type { RunSummary } from "../types";

/** Counts stored documents per community prefix. Keys that are not document IDs are ignored. */
export async function countStoredByCommunity(store: DocumentStore): Promise<Record<string, number>> {
  const counts: Record<string, number> = {};
  for (const key of await store.list()) {
    const id = tryParseDocumentId(key);
    if (!id) {
      continue;
    }
    counts[id.community] = (counts[id.community] ?? 0) + 1;
  }

  return Object.fromEntries(Object.entries(counts).sort(([a], [b]) => a.localeCompare(b)));
}

export function formatRunSummary(summary: RunSummary): string {
  const lines = [
    summary.cancelled ? "Crawl cancelled." : "Crawl completed!",
    `Total maps downloaded: ${summary.totalProcessed}`,
    `Total failures: ${summary.totalFailed}`,
    "",
    "By community:",
  ];
  for (const [community, count] of Object.entries(summary.storedByCommunity)) {
    lines.push(`  ${community}-XX: ${count} maps`);
  }
  lines.push(`Total stored: ${summary.totalStored}`);
  return lines.join("\n");
}
