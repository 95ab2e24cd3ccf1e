import type { AppConfig } from "../config";
import {
  crawlAllCommunities,
  crawlCommunity,
  countStoredByCommunity,
  DelayThrottle,
  formatRunSummary,
  probeCommunity,
  traverseCommunity,
  type DiscoveryDeps,
} from "../crawl";
import { HttpFetchGateway, type FetchGateway } from "../download/fetchGateway";
import { extractReferences, PdfParseTextSource, type PageTextSource } from "../extract";
import { formatDocumentId, parseDocumentId } from "../ids";
import type { Logger, MetricsRegistry } from "../observability";
import type { Sink } from "../sink";
import type { DocumentStore } from "../store";
import type { CommunityTotals, ProbeResult, RunSummary, TraversalResult } from "../types";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: DocumentStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  signal?: AbortSignal;
  gateway?: FetchGateway;
  textSource?: PageTextSource;
  print?: (line: string) => void;
}

function buildDiscoveryDeps(ctx: CommandContext): DiscoveryDeps {
  return {
    config: ctx.config,
    store: ctx.store,
    gateway:
      ctx.gateway ??
      new HttpFetchGateway({
        config: ctx.config,
        store: ctx.store,
        logger: ctx.logger.child("fetch"),
        metrics: ctx.metrics,
      }),
    textSource: ctx.textSource ?? new PdfParseTextSource(ctx.store),
    throttle: new DelayThrottle(ctx.config.delayMs, ctx.signal),
    logger: ctx.logger,
    metrics: ctx.metrics,
    sink: ctx.sink,
    signal: ctx.signal,
  };
}

function print(ctx: CommandContext, line: string): void {
  (ctx.print ?? console.log)(line);
}

export async function runCrawlAll(ctx: CommandContext): Promise<RunSummary> {
  ctx.logger.info("crawl_all_start", { seeds: ctx.config.seeds.length, urlTemplate: ctx.config.urlTemplate });
  const summary = await crawlAllCommunities(buildDiscoveryDeps(ctx), ctx.config.seeds);
  print(ctx, formatRunSummary(summary));
  return summary;
}

export async function runCommunity(ctx: CommandContext, startIdText: string): Promise<CommunityTotals> {
  const startId = parseDocumentId(startIdText);
  await ctx.store.init();
  const totals = await crawlCommunity(buildDiscoveryDeps(ctx), {
    community: startId.community,
    startId: formatDocumentId(startId),
  });
  print(ctx, `${totals.community}-XX: ${totals.processedTotal} maps, ${totals.failedTotal} failed`);
  return totals;
}

export async function runTraverse(ctx: CommandContext, startIdText: string): Promise<TraversalResult> {
  const startId = parseDocumentId(startIdText);
  await ctx.store.init();
  const result = await traverseCommunity(buildDiscoveryDeps(ctx), startId);
  print(ctx, `${result.community}-XX: ${result.processedCount} processed, ${result.failedCount} failed`);
  return result;
}

export async function runProbe(ctx: CommandContext, community: string): Promise<ProbeResult> {
  if (!/^\d+$/.test(community)) {
    throw new Error(`Community prefix must be numeric: ${community}`);
  }
  await ctx.store.init();
  const result = await probeCommunity(buildDiscoveryDeps(ctx), community);
  print(ctx, `${community}-XX: ${result.discovered.length} discovered in ${result.attempts} attempts`);
  return result;
}

export async function runRefs(ctx: CommandContext, docIdText: string): Promise<string[]> {
  const id = parseDocumentId(docIdText);
  const deps = buildDiscoveryDeps(ctx);
  const docId = formatDocumentId(id);
  if (!(await ctx.store.has(docId))) {
    throw new Error(`Document ${docId} is not stored at ${ctx.store.locate(docId)}`);
  }

  const pages = await deps.textSource.readPages(docId);
  const references = extractReferences(pages, id, ctx.config.extraction);
  ctx.logger.info("refs_complete", { docId, references });
  print(ctx, references.join("\n"));
  return references;
}

export async function runSummary(ctx: CommandContext): Promise<Record<string, number>> {
  await ctx.store.init();
  const counts = await countStoredByCommunity(ctx.store);
  ctx.logger.info("summary_complete", { counts });
  for (const [community, count] of Object.entries(counts)) {
    print(ctx, `${community}-XX: ${count} maps`);
  }
  return counts;
}
