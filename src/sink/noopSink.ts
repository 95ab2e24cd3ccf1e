import type { SinkEvent } from "./types";
import { BaseSink } from "./baseSink";

export class NoopSink extends BaseSink {
  protected async deliver(_events: SinkEvent[]): Promise<void> {
    return;
  }
}
