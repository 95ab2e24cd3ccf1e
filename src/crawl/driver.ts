import type { CommunitySeed } from "../config";
import type { CommunityTotals, RunSummary } from "../types";
import { crawlCommunity } from "./hybrid";
import { countStoredByCommunity } from "./summary";
import type { DiscoveryDeps } from "./types";

/**
 * Crawls every seeded community in order and summarises the store. The
 * store is initialised before the first request; if that fails the run
 * aborts.
 */
export async function crawlAllCommunities(deps: DiscoveryDeps, seeds: CommunitySeed[]): Promise<RunSummary> {
  const { logger, store } = deps;
  await store.init();

  logger.info("run_start", { communities: seeds.map((seed) => seed.community) });

  const communities: CommunityTotals[] = [];
  let totalProcessed = 0;
  let totalFailed = 0;

  for (const seed of seeds) {
    if (deps.signal?.aborted) {
      logger.warn("run_cancelled", { skippedFrom: seed.community });
      break;
    }

    const totals = await crawlCommunity(deps, seed);
    communities.push(totals);
    totalProcessed += totals.processedTotal;
    totalFailed += totals.failedTotal;
  }

  const storedByCommunity = await countStoredByCommunity(store);
  const summary: RunSummary = {
    communities,
    totalProcessed,
    totalFailed,
    storedByCommunity,
    totalStored: Object.values(storedByCommunity).reduce((acc, count) => acc + count, 0),
    cancelled: Boolean(deps.signal?.aborted),
  };

  logger.info("run_summary", {
    totalProcessed,
    totalFailed,
    totalStored: summary.totalStored,
    storedByCommunity,
    cancelled: summary.cancelled,
  });
  return summary;
}
