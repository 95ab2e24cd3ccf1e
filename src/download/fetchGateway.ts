import crypto from "node:crypto";
import type { AppConfig } from "../config";
import { getFetchDispatcher, httpFetch, type FetchLike } from "../core/fetch";
import { formatDocumentId, type DocumentId } from "../ids";
import type { Logger, MetricsRegistry } from "../observability";
import type { DocumentStore } from "../store";
import type { FetchOutcome } from "../types";

export interface FetchGateway {
  fetch(id: DocumentId): Promise<FetchOutcome>;
}

interface HttpFetchGatewayDeps {
  config: Pick<AppConfig, "urlTemplate" | "userAgent" | "ignoreHttpsErrors" | "requestTimeoutMs" | "maxFetchAttempts">;
  store: DocumentStore;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

interface AttemptResult {
  statusCode: number;
  body?: Uint8Array;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetriableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function buildDocumentUrl(urlTemplate: string, docId: string): string {
  return urlTemplate.replace(/\{id\}/g, encodeURIComponent(docId));
}

export class HttpFetchGateway implements FetchGateway {
  private readonly config: HttpFetchGatewayDeps["config"];
  private readonly store: DocumentStore;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly fetchFn: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(deps: HttpFetchGatewayDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.fetchFn = deps.fetchFn ?? httpFetch;
    this.sleep = deps.sleep ?? sleep;
  }

  async fetch(id: DocumentId): Promise<FetchOutcome> {
    const docId = formatDocumentId(id);
    const url = buildDocumentUrl(this.config.urlTemplate, docId);

    if (await this.store.has(docId)) {
      this.metrics.incrementCounter("fetches_skipped", 1);
      this.logger.info("fetch_item_skipped_existing", { docId });
      return { docId, url, status: "skipped", attempt: 0, fetchedAt: new Date().toISOString() };
    }

    const maxAttempts = Math.max(1, this.config.maxFetchAttempts);
    let outcome: FetchOutcome | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const stopTimer = this.metrics.startTimer("fetch_ms");
      this.metrics.incrementCounter("fetch_requests", 1);
      this.logger.info("fetch_item_attempt_start", { docId, url, attempt });

      try {
        const result = await this.attempt(url);
        const durationMs = stopTimer();

        if (result.statusCode >= 400 || !result.body) {
          const retriable = result.statusCode !== 404 && isRetriableStatus(result.statusCode);
          if (!retriable || attempt >= maxAttempts) {
            outcome = {
              docId,
              url,
              status: "failed",
              statusCode: result.statusCode,
              error: `HTTP ${result.statusCode}`,
              attempt,
              fetchedAt: new Date().toISOString(),
            };
            this.logger.warn("fetch_item_failed_http", { docId, url, attempt, durationMs, statusCode: result.statusCode });
            break;
          }

          this.logger.warn("fetch_item_retry_http", { docId, url, attempt, durationMs, statusCode: result.statusCode });
          await this.sleep(Math.min(1000 * 2 ** (attempt - 1), 10_000));
          continue;
        }

        const stored = await this.store.write(docId, result.body);
        outcome = {
          docId,
          url,
          status: "stored",
          statusCode: result.statusCode,
          bytes: stored.bytes,
          sha256: crypto.createHash("sha256").update(result.body).digest("hex"),
          attempt,
          fetchedAt: new Date().toISOString(),
        };
        this.logger.info("fetch_item_ok", { docId, url, attempt, durationMs, bytes: stored.bytes });
        break;
      } catch (error) {
        const durationMs = stopTimer();
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn("fetch_item_error", { docId, url, attempt, durationMs, error: message });

        if (attempt >= maxAttempts) {
          outcome = { docId, url, status: "failed", error: message, attempt, fetchedAt: new Date().toISOString() };
          break;
        }
        await this.sleep(Math.min(1000 * 2 ** (attempt - 1), 10_000));
      }
    }

    if (!outcome) {
      outcome = {
        docId,
        url,
        status: "failed",
        error: "Unknown fetch failure",
        attempt: maxAttempts,
        fetchedAt: new Date().toISOString(),
      };
    }

    this.metrics.incrementCounter(outcome.status === "stored" ? "fetches_ok" : "fetches_failed", 1);
    return outcome;
  }

  private async attempt(url: string): Promise<AttemptResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);
    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.config.userAgent,
          accept: "application/pdf,*/*",
        },
        signal: controller.signal,
        dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
      });

      if (!response.ok) {
        return { statusCode: response.status };
      }

      const buffer = await response.arrayBuffer();
      return { statusCode: response.status, body: new Uint8Array(buffer) };
    } finally {
      clearTimeout(timeout);
    }
  }
}
