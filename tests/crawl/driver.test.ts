import { describe, expect, it } from "vitest";
import { countStoredByCommunity, crawlAllCommunities, formatRunSummary } from "../../src/crawl";
import { InMemoryDocumentStore, StoreInitializationError } from "../../src/store";
import { createHarness, FailingSink } from "../helpers";

const seeds = [
  { community: "001", startId: "001-01" },
  { community: "002", startId: "002-01" },
];

function harness(signal?: AbortSignal, sink?: FailingSink) {
  const h = createHarness({
    available: ["001-01", "001-02", "002-01"],
    pages: {
      "001-01": ["02 03 04"],
      "001-02": ["01 03 04"],
      "002-01": ["02 03 04"],
    },
    consecutiveFailureCutoff: 1,
    signal,
    sink,
  });
  return h;
}

describe("crawlAllCommunities", () => {
  it("crawls each seed and totals the results", async () => {
    const h = harness();
    await h.store.write("notes", Buffer.from("not a map"));

    const summary = await crawlAllCommunities(h.deps, seeds);

    expect(summary.communities.map((totals) => [totals.community, totals.processedTotal, totals.failedTotal])).toEqual([
      ["001", 4, 4],
      ["002", 2, 6],
    ]);
    expect(summary).toMatchObject({
      totalProcessed: 6,
      totalFailed: 10,
      storedByCommunity: { "001": 2, "002": 1 },
      totalStored: 3,
      cancelled: false,
    });
  });

  it("finishes every community when phase events cannot be published", async () => {
    const h = harness(undefined, new FailingSink(["phase"]));

    const summary = await crawlAllCommunities(h.deps, seeds);

    expect(summary).toMatchObject({ totalProcessed: 6, totalFailed: 10, totalStored: 3, cancelled: false });
    // eight phase boundaries per community
    expect(h.metrics.getCounters().sink_publish_failed).toBe(16);
    expect(h.sink.keys("phase")).toEqual([]);
    expect(h.sink.keys("fetch")).toContain("002-01");
  });

  it("carries seed labels into the totals", async () => {
    const h = harness();

    const summary = await crawlAllCommunities(h.deps, [
      { community: "001", startId: "001-01", label: "Goldfield" },
      { community: "002", startId: "002-01" },
    ]);

    expect(summary.communities.map((totals) => totals.label)).toEqual(["Goldfield", undefined]);
  });

  it("formats the run summary", async () => {
    const summary = await crawlAllCommunities(harness().deps, seeds);

    expect(formatRunSummary(summary)).toBe(
      [
        "Crawl completed!",
        "Total maps downloaded: 6",
        "Total failures: 10",
        "",
        "By community:",
        "  001-XX: 2 maps",
        "  002-XX: 1 maps",
        "Total stored: 3",
      ].join("\n"),
    );
  });

  it("aborts before any request when the store cannot be initialised", async () => {
    const h = harness();
    const failingStore = new (class extends InMemoryDocumentStore {
      async init(): Promise<void> {
        throw new StoreInitializationError("/read-only/maps", new Error("EACCES"));
      }
    })();

    await expect(crawlAllCommunities({ ...h.deps, store: failingStore }, seeds)).rejects.toBeInstanceOf(
      StoreInitializationError,
    );
    expect(h.gateway.requests).toEqual([]);
  });

  it("skips remaining communities once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const h = harness(controller.signal);

    const summary = await crawlAllCommunities(h.deps, seeds);

    expect(summary).toMatchObject({ communities: [], totalProcessed: 0, cancelled: true });
    expect(h.gateway.requests).toEqual([]);
  });
});

describe("countStoredByCommunity", () => {
  it("buckets canonical keys by prefix in prefix order", async () => {
    const store = new InMemoryDocumentStore({ "007-01": "", "001-03": "", "001-01": "", "draft-copy": "" });

    expect(await countStoredByCommunity(store)).toEqual({ "001": 2, "007": 1 });
    expect(Object.keys(await countStoredByCommunity(store))).toEqual(["001", "007"]);
  });
});
