import type { AppConfig } from "../config";
import type { FetchGateway } from "../download/fetchGateway";
import type { PageTextSource } from "../extract";
import type { Logger, MetricsRegistry } from "../observability";
import type { Sink } from "../sink";
import type { DocumentStore } from "../store";
import type { Throttle } from "./throttle";

export type DiscoveryConfig = Pick<AppConfig, "extraction" | "maxProbeAttempts" | "consecutiveFailureCutoff">;

export interface DiscoveryDeps {
  config: DiscoveryConfig;
  gateway: FetchGateway;
  store: DocumentStore;
  textSource: PageTextSource;
  throttle: Throttle;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  signal?: AbortSignal;
}
