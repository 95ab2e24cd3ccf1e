import { createDocumentId, formatDocumentId } from "../ids";
import { isFetchSuccess, type ProbeResult } from "../types";
import { publishSafely } from "./events";
import type { DiscoveryDeps } from "./types";

export interface ProbeOptions {
  maxAttempts: number;
  consecutiveFailureCutoff: number;
}

/**
 * Sweeps sequences `1..maxAttempts` of a community. Stored documents count
 * as discovered without a request. The sweep ends after
 * `consecutiveFailureCutoff` failed fetches in a row.
 */
export async function probeCommunity(
  deps: DiscoveryDeps,
  community: string,
  options?: Partial<ProbeOptions>,
): Promise<ProbeResult> {
  const { gateway, logger, metrics, sink, store, throttle } = deps;
  const maxAttempts = options?.maxAttempts ?? deps.config.maxProbeAttempts;
  const cutoff = Math.max(1, options?.consecutiveFailureCutoff ?? deps.config.consecutiveFailureCutoff);
  const discovered = new Set<string>();
  let consecutiveFailures = 0;
  let attempts = 0;
  let stoppedEarly = false;
  let cancelled = false;

  logger.info("probe_start", { community, maxAttempts, cutoff });

  for (let sequence = 1; sequence <= maxAttempts; sequence += 1) {
    if (deps.signal?.aborted) {
      cancelled = true;
      logger.warn("probe_cancelled", { community, sequence });
      break;
    }

    const id = createDocumentId(community, sequence);
    const docId = formatDocumentId(id);

    if (await store.has(docId)) {
      logger.debug("probe_existing", { community, docId });
      discovered.add(docId);
      consecutiveFailures = 0;
      continue;
    }

    attempts += 1;
    metrics.incrementCounter("probes_attempted", 1);
    logger.info("probe_attempt", { community, docId, attempt: attempts });

    const outcome = await gateway.fetch(id);
    await publishSafely(deps, "fetch", () => sink.publishFetchResults([outcome]));
    await throttle.pause();

    if (isFetchSuccess(outcome)) {
      discovered.add(docId);
      consecutiveFailures = 0;
      logger.info("probe_discovered", { community, docId });
      continue;
    }

    consecutiveFailures += 1;
    logger.debug("probe_miss", { community, docId, consecutiveFailures });
    if (consecutiveFailures >= cutoff) {
      stoppedEarly = true;
      logger.info("probe_stopped_cutoff", { community, docId, consecutiveFailures });
      break;
    }
  }

  const result: ProbeResult = {
    community,
    discovered: [...discovered].sort(),
    attempts,
    stoppedEarly,
    cancelled,
  };
  logger.info("probe_complete", { community, discoveredCount: result.discovered.length, attempts, stoppedEarly });
  return result;
}
