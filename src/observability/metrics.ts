import type { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

function summarize(values: readonly number[]): TimerSummary {
  if (values.length === 0) {
    return { count: 0, min: 0, max: 0, avg: 0 };
  }
  const total = values.reduce((acc, value) => acc + value, 0);
  return {
    count: values.length,
    min: Math.min(...values),
    max: Math.max(...values),
    avg: Number((total / values.length).toFixed(2)),
  };
}

/** In-process counters and duration samples for one run, printed when the CLI exits. */
export class MetricsRegistry {
  private readonly counters: Record<MetricCounterName, number> = {
    fetch_requests: 0,
    fetches_ok: 0,
    fetches_failed: 0,
    fetches_skipped: 0,
    references_found: 0,
    references_enqueued: 0,
    extracts_failed: 0,
    probes_attempted: 0,
    sink_publish_failed: 0,
  };

  private readonly timers: Record<MetricTimerName, number[]> = {
    fetch_ms: [],
    extract_ms: [],
  };

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters[name] += value;
  }

  /** Starts a sample; the returned function records and returns the elapsed milliseconds. */
  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      this.timers[name].push(durationMs);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return { ...this.counters };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    return {
      fetch_ms: summarize(this.timers.fetch_ms),
      extract_ms: summarize(this.timers.extract_ms),
    };
  }

  printSummary(): void {
    console.log(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          counters: this.getCounters(),
          timers: this.getTimerSummaries(),
        },
        null,
        2,
      ),
    );
  }
}
