import type { FetchOutcome, PhaseReport, ReferenceFoundItem } from "../types";
import type { Sink, SinkEvent } from "./types";

export interface BaseSinkOptions {
  /** Buffered events that trigger a flush from inside `publish*`. */
  maxBufferedEvents?: number;
}

export abstract class BaseSink implements Sink {
  private buffer: SinkEvent[] = [];
  private readonly maxBufferedEvents: number;

  constructor(options: BaseSinkOptions = {}) {
    this.maxBufferedEvents = Math.max(1, options.maxBufferedEvents ?? 500);
  }

  get pendingCount(): number {
    return this.buffer.length;
  }

  async publishFetchResults(results: FetchOutcome[]): Promise<void> {
    await this.enqueue(results.map((payload) => ({ stage: "fetch", key: payload.docId, payload })));
  }

  async publishReferences(items: ReferenceFoundItem[]): Promise<void> {
    await this.enqueue(
      items.map((payload) => ({ stage: "references", key: `${payload.phase}:${payload.sourceId}`, payload })),
    );
  }

  async publishPhases(reports: PhaseReport[]): Promise<void> {
    await this.enqueue(
      reports.map((payload) => ({
        stage: "phase",
        key: `${payload.community}:${payload.phase}:${payload.event}`,
        payload,
      })),
    );
  }

  /** Hands every buffered event to the destination. A failed batch is dropped, not retried later. */
  async flush(): Promise<void> {
    if (this.buffer.length === 0) {
      return;
    }
    const events = this.buffer;
    this.buffer = [];
    await this.deliver(events);
  }

  async close(): Promise<void> {
    try {
      await this.flush();
    } finally {
      await this.disconnect();
    }
  }

  protected abstract deliver(events: SinkEvent[]): Promise<void>;

  protected async disconnect(): Promise<void> {
    return;
  }

  protected ensureConfigured(name: string, ready: boolean): void {
    if (!ready) {
      throw new Error(`${name} sink is not configured`);
    }
  }

  private async enqueue(events: SinkEvent[]): Promise<void> {
    this.buffer.push(...events);
    if (this.buffer.length >= this.maxBufferedEvents) {
      await this.flush();
    }
  }
}
