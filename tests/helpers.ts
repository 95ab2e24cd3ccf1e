import { DEFAULT_CONFIG } from "../src/config";
import type { DiscoveryDeps, Throttle } from "../src/crawl";
import type { FetchGateway } from "../src/download/fetchGateway";
import type { PageTextSource } from "../src/extract";
import { formatDocumentId, type DocumentId } from "../src/ids";
import { Logger, MetricsRegistry } from "../src/observability";
import { BaseSink, type SinkEvent, type StageName } from "../src/sink";
import { InMemoryDocumentStore, type DocumentStore } from "../src/store";
import type { FetchOutcome } from "../src/types";

export function testLogger(): Logger {
  return new Logger({ component: "test", runId: "test-run", minLevel: "error" });
}

/** Origin stand-in: serves the listed IDs and records every request that reaches it. */
export class ScriptedGateway implements FetchGateway {
  readonly requests: string[] = [];
  private readonly store: DocumentStore;
  private readonly available: Set<string>;

  constructor(store: DocumentStore, available: Iterable<string>) {
    this.store = store;
    this.available = new Set(available);
  }

  async fetch(id: DocumentId): Promise<FetchOutcome> {
    const docId = formatDocumentId(id);
    const url = `https://maps.test/${docId}.pdf`;
    const fetchedAt = "2024-01-01T00:00:00.000Z";
    if (await this.store.has(docId)) {
      return { docId, url, status: "skipped", attempt: 0, fetchedAt };
    }

    this.requests.push(docId);
    if (!this.available.has(docId)) {
      return { docId, url, status: "failed", statusCode: 404, error: "HTTP 404", attempt: 1, fetchedAt };
    }

    const stored = await this.store.write(docId, Buffer.from(`pdf:${docId}`));
    return { docId, url, status: "stored", statusCode: 200, bytes: stored.bytes, attempt: 1, fetchedAt };
  }
}

/** Page text keyed by document ID; documents without an entry have one blank page. */
export class MapTextSource implements PageTextSource {
  readonly reads: string[] = [];
  private readonly pages: Record<string, string[]>;
  private readonly broken: Set<string>;

  constructor(pages: Record<string, string[]>, broken: Iterable<string> = []) {
    this.pages = pages;
    this.broken = new Set(broken);
  }

  async readPages(docId: string): Promise<string[]> {
    this.reads.push(docId);
    if (this.broken.has(docId)) {
      throw new Error(`cannot parse ${docId}`);
    }
    return this.pages[docId] ?? [""];
  }
}

export class CountingThrottle implements Throttle {
  pauses = 0;

  async pause(): Promise<void> {
    this.pauses += 1;
  }
}

/** Delivers every event as soon as it is published. */
export class RecordingSink extends BaseSink {
  readonly published: SinkEvent[] = [];

  constructor() {
    super({ maxBufferedEvents: 1 });
  }

  protected async deliver(events: SinkEvent[]): Promise<void> {
    this.published.push(...events);
  }

  keys(stage: StageName): string[] {
    return this.published.filter((entry) => entry.stage === stage).map((entry) => entry.key);
  }
}

/** A destination that rejects every delivery, for the stages listed. */
export class FailingSink extends RecordingSink {
  private readonly failing: Set<StageName>;

  constructor(failing: StageName[] = ["fetch", "references", "phase"]) {
    super();
    this.failing = new Set(failing);
  }

  protected async deliver(events: SinkEvent[]): Promise<void> {
    if (events.some((event) => this.failing.has(event.stage))) {
      throw new Error("sink unavailable");
    }
    await super.deliver(events);
  }
}

export interface TestHarness {
  deps: DiscoveryDeps;
  store: InMemoryDocumentStore;
  gateway: ScriptedGateway;
  textSource: MapTextSource;
  throttle: CountingThrottle;
  sink: RecordingSink;
  metrics: MetricsRegistry;
}

export function createHarness(options: {
  available: Iterable<string>;
  pages?: Record<string, string[]>;
  broken?: Iterable<string>;
  stored?: string[];
  maxProbeAttempts?: number;
  consecutiveFailureCutoff?: number;
  signal?: AbortSignal;
  sink?: RecordingSink;
}): TestHarness {
  const store = new InMemoryDocumentStore(
    Object.fromEntries((options.stored ?? []).map((docId) => [docId, `pdf:${docId}`])),
  );
  const gateway = new ScriptedGateway(store, options.available);
  const textSource = new MapTextSource(options.pages ?? {}, options.broken);
  const throttle = new CountingThrottle();
  const sink = options.sink ?? new RecordingSink();
  const metrics = new MetricsRegistry();

  return {
    deps: {
      config: {
        extraction: DEFAULT_CONFIG.extraction,
        maxProbeAttempts: options.maxProbeAttempts ?? 100,
        consecutiveFailureCutoff: options.consecutiveFailureCutoff ?? 10,
      },
      gateway,
      store,
      textSource,
      throttle,
      logger: testLogger(),
      metrics,
      sink,
      signal: options.signal,
    },
    store,
    gateway,
    textSource,
    throttle,
    sink,
    metrics,
  };
}

/** Canonical IDs `<community>-<from>` .. `<community>-<to>`. */
export function idRange(community: string, from: number, to: number): string[] {
  const ids: string[] = [];
  for (let sequence = from; sequence <= to; sequence += 1) {
    ids.push(`${community}-${String(sequence).padStart(2, "0")}`);
  }
  return ids;
}
