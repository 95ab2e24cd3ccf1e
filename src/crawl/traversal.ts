import { formatDocumentId, parseDocumentId, type DocumentId } from "../ids";
import { isFetchSuccess, type TraversalResult } from "../types";
import { CrawlState } from "./crawlState";
import { publishSafely } from "./events";
import { readReferences } from "./references";
import type { DiscoveryDeps } from "./types";

/**
 * Breadth-first walk over the reference graph of one community, starting
 * at `startId`. Every ID is fetched at most once per run; failures are
 * final for the run.
 */
export async function traverseCommunity(deps: DiscoveryDeps, startId: DocumentId): Promise<TraversalResult> {
  const { gateway, logger, metrics, sink, throttle } = deps;
  const community = startId.community;
  const startKey = formatDocumentId(startId);
  const state = new CrawlState(community, startKey);
  let cancelled = false;

  logger.info("traversal_start", { community, docId: startKey });

  while (state.hasPending()) {
    if (deps.signal?.aborted) {
      cancelled = true;
      logger.warn("traversal_cancelled", { community, pending: state.pendingCount });
      break;
    }

    const current = state.next();
    if (current === undefined || state.isSettled(current)) {
      continue;
    }

    logger.info("traversal_step", {
      community,
      docId: current,
      processed: state.processedCount,
      queued: state.pendingCount,
    });

    const currentId = parseDocumentId(current);
    const outcome = await gateway.fetch(currentId);
    await publishSafely(deps, "fetch", () => sink.publishFetchResults([outcome]));
    if (outcome.status !== "skipped") {
      await throttle.pause();
    }

    if (!isFetchSuccess(outcome)) {
      state.markFailed(current);
      continue;
    }

    state.markProcessed(current);

    const references = await readReferences(deps, currentId, "traversal");
    for (const reference of references) {
      if (state.enqueue(reference)) {
        metrics.incrementCounter("references_enqueued", 1);
        logger.debug("traversal_enqueued", { community, docId: reference, source: current });
      }
    }
  }

  const result: TraversalResult = {
    community,
    startId: startKey,
    processed: state.processedKeys(),
    failed: state.failedKeys(),
    processedCount: state.processedCount,
    failedCount: state.failedCount,
    cancelled,
  };

  logger.info("traversal_complete", {
    community,
    processedCount: result.processedCount,
    failedCount: result.failedCount,
    cancelled,
  });
  if (result.failed.length > 0) {
    logger.warn("traversal_failed_ids", { community, failed: result.failed });
  }

  return result;
}
