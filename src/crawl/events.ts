import type { Logger, MetricsRegistry } from "../observability";
import type { Sink, StageName } from "../sink";

/**
 * Runs one sink operation. The sink only observes the crawl, so a publish
 * or flush error is logged and counted and the crawl carries on.
 */
export async function publishSafely(
  deps: { logger: Logger; metrics: MetricsRegistry },
  stage: StageName | "flush",
  publish: () => Promise<void>,
): Promise<boolean> {
  try {
    await publish();
    return true;
  } catch (error) {
    deps.metrics.incrementCounter("sink_publish_failed", 1);
    deps.logger.warn("sink_publish_failed", {
      stage,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

export function flushSink(deps: { logger: Logger; metrics: MetricsRegistry; sink: Sink }): Promise<boolean> {
  return publishSafely(deps, "flush", () => deps.sink.flush());
}
