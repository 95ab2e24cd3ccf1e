import type { CommunitySeed } from "../config";
import { parseDocumentId } from "../ids";
import { isFetchSuccess, type CommunityTotals, type DiscoveryPhase } from "../types";
import { flushSink, publishSafely } from "./events";
import { probeCommunity } from "./prober";
import { readReferences } from "./references";
import { traverseCommunity } from "./traversal";
import type { DiscoveryDeps } from "./types";

async function reportPhase(
  deps: DiscoveryDeps,
  community: string,
  phase: DiscoveryPhase,
  event: "started" | "completed",
  counts?: Record<string, number>,
): Promise<void> {
  deps.logger.info(`phase_${event}`, { community, phase, ...(counts ?? {}) });
  const report = { community, phase, event, counts, reportedAt: new Date().toISOString() };
  await publishSafely(deps, "phase", () => deps.sink.publishPhases([report]));
  if (event === "completed") {
    await flushSink(deps);
  }
}

/**
 * Runs the four discovery phases for one community: reference traversal
 * from the seed, a sequential probe, a reference scan over everything the
 * probe found, and a fetch of the references that scan turned up.
 *
 * Totals add up across phases, so a document found by both traversal and
 * probing is counted twice in `processedTotal`.
 */
export async function crawlCommunity(deps: DiscoveryDeps, seed: CommunitySeed): Promise<CommunityTotals> {
  const { gateway, logger, sink, store, throttle } = deps;
  const community = seed.community;
  const startId = parseDocumentId(seed.startId);

  const totals: CommunityTotals = {
    community,
    label: seed.label,
    startId: seed.startId,
    traversal: { processed: 0, failed: 0 },
    probed: 0,
    additional: { stored: 0, failed: 0 },
    processedTotal: 0,
    failedTotal: 0,
    cancelled: false,
  };

  const finish = (): CommunityTotals => {
    totals.processedTotal = totals.traversal.processed + totals.probed + totals.additional.stored;
    totals.failedTotal = totals.traversal.failed + totals.additional.failed;
    totals.cancelled = Boolean(deps.signal?.aborted);
    logger.info("community_complete", {
      community,
      traversal: totals.traversal.processed,
      probed: totals.probed,
      additional: totals.additional.stored,
      processedTotal: totals.processedTotal,
      failedTotal: totals.failedTotal,
      cancelled: totals.cancelled,
    });
    return totals;
  };

  logger.info("community_start", { community, label: seed.label, docId: seed.startId });

  await reportPhase(deps, community, "traversal", "started");
  const traversal = await traverseCommunity(deps, startId);
  totals.traversal = { processed: traversal.processedCount, failed: traversal.failedCount };
  await reportPhase(deps, community, "traversal", "completed", { ...totals.traversal });
  if (deps.signal?.aborted) {
    return finish();
  }

  await reportPhase(deps, community, "probe", "started");
  const probe = await probeCommunity(deps, community);
  totals.probed = probe.discovered.length;
  await reportPhase(deps, community, "probe", "completed", { discovered: probe.discovered.length, attempts: probe.attempts });
  if (deps.signal?.aborted) {
    return finish();
  }

  await reportPhase(deps, community, "reference_scan", "started");
  const pending = new Set<string>();
  for (const docId of probe.discovered) {
    if (deps.signal?.aborted) {
      break;
    }
    const references = await readReferences(deps, parseDocumentId(docId), "reference_scan");
    for (const reference of references) {
      if (!reference.startsWith(`${community}-`) || pending.has(reference)) {
        continue;
      }
      if (!(await store.has(reference))) {
        pending.add(reference);
      }
    }
  }
  const additional = [...pending].sort();
  await reportPhase(deps, community, "reference_scan", "completed", { pending: additional.length });
  if (deps.signal?.aborted) {
    return finish();
  }

  await reportPhase(deps, community, "reference_fetch", "started");
  for (const docId of additional) {
    if (deps.signal?.aborted) {
      break;
    }
    logger.info("reference_fetch_item", { community, docId });
    const outcome = await gateway.fetch(parseDocumentId(docId));
    await publishSafely(deps, "fetch", () => sink.publishFetchResults([outcome]));
    if (outcome.status !== "skipped") {
      await throttle.pause();
    }
    if (isFetchSuccess(outcome)) {
      totals.additional.stored += 1;
    } else {
      totals.additional.failed += 1;
    }
  }
  await reportPhase(deps, community, "reference_fetch", "completed", { ...totals.additional });

  return finish();
}
