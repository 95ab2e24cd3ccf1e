export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  docId?: string;
  community?: string;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "fetch_requests"
  | "fetches_ok"
  | "fetches_failed"
  | "fetches_skipped"
  | "references_found"
  | "references_enqueued"
  | "extracts_failed"
  | "probes_attempted"
  | "sink_publish_failed";

export type MetricTimerName = "fetch_ms" | "extract_ms";
