import { extractReferences } from "../extract";
import { formatDocumentId, type DocumentId } from "../ids";
import type { DiscoveryPhase } from "../types";
import { publishSafely } from "./events";
import type { DiscoveryDeps } from "./types";

/**
 * Reads a stored document and extracts its references. Unreadable or
 * malformed documents yield an empty list.
 */
export async function readReferences(deps: DiscoveryDeps, id: DocumentId, phase: DiscoveryPhase): Promise<string[]> {
  const { logger, metrics } = deps;
  const docId = formatDocumentId(id);
  const stopTimer = metrics.startTimer("extract_ms");

  let references: string[];
  try {
    const pages = await deps.textSource.readPages(docId);
    references = extractReferences(pages, id, deps.config.extraction);
  } catch (error) {
    const durationMs = stopTimer();
    metrics.incrementCounter("extracts_failed", 1);
    logger.warn("extract_references_failed", {
      docId,
      phase,
      durationMs,
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }

  const durationMs = stopTimer();
  metrics.incrementCounter("references_found", references.length);
  logger.info("extract_references_ok", { docId, phase, durationMs, references });

  if (references.length > 0) {
    const item = { sourceId: docId, references, phase, foundAt: new Date().toISOString() };
    await publishSafely(deps, "references", () => deps.sink.publishReferences([item]));
  }

  return references;
}
