import crypto from "node:crypto";
import type { SinkEvent } from "./types";
import { BaseSink, type BaseSinkOptions } from "./baseSink";
import { chunk, withRetries } from "./retry";

interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal },
) => Promise<HttpResponseLike>;

export interface HttpSinkOptions extends BaseSinkOptions {
  endpoint?: string;
  token?: string;
  fetchFn?: FetchLike;
  timeoutMs?: number;
  batchSize?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

class PermanentHttpSinkError extends Error {}

function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/** Same batch, same key: the receiver can drop a batch it has already accepted. */
export function batchIdempotencyKey(events: SinkEvent[]): string {
  const hash = crypto.createHash("sha256");
  for (const event of events) {
    hash.update(`${event.stage}:${event.key}\n`);
  }
  return hash.digest("hex");
}

/** POSTs buffered events as JSON batches of `{ sentAt, events: [{ stage, key, payload }] }`. */
export class HttpSink extends BaseSink {
  private readonly endpoint?: string;
  private readonly token?: string;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly batchSize: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: HttpSinkOptions = {}) {
    super(options);
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.batchSize = Math.max(1, options.batchSize ?? 100);
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
  }

  protected async deliver(events: SinkEvent[]): Promise<void> {
    this.ensureConfigured("HTTP", Boolean(this.endpoint));
    for (const batch of chunk(events, this.batchSize)) {
      await this.post(this.endpoint ?? "", batch);
    }
  }

  private async post(endpoint: string, batch: SinkEvent[]): Promise<void> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": batchIdempotencyKey(batch),
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    const body = JSON.stringify({ sentAt: new Date().toISOString(), events: batch });

    await withRetries(
      { maxRetries: this.maxRetries, retryDelayMs: this.retryDelayMs },
      async () => {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
        try {
          const response = await this.fetchFn(endpoint, { method: "POST", headers, body, signal: controller.signal });
          if (response.ok) {
            return;
          }
          const responseText = await response.text();
          if (!isRetriableStatus(response.status)) {
            throw new PermanentHttpSinkError(`HTTP sink permanent error ${response.status}: ${responseText}`);
          }
          throw new Error(`HTTP sink error ${response.status}: ${responseText}`);
        } finally {
          clearTimeout(timeout);
        }
      },
      (error) => error instanceof PermanentHttpSinkError,
    );
  }
}
