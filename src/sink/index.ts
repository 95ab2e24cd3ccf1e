import type { AppConfig } from "../config";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { NoopSink } from "./noopSink";
import { RabbitSink } from "./rabbitSink";
import { SqsSink } from "./sqsSink";
import type { Sink } from "./types";

export function createSink(config: AppConfig, runId: string): Sink {
  switch (config.sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config.manifestsDir, runId);
    case "sqs":
      return new SqsSink({ queueUrl: process.env.SQS_QUEUE_URL });
    case "rabbit":
      return new RabbitSink({ connectionUrl: process.env.RABBIT_URL });
    case "http":
      return new HttpSink({ endpoint: process.env.HTTP_SINK_ENDPOINT, token: process.env.HTTP_SINK_TOKEN });
    case "none":
      return new NoopSink();
    default:
      throw new Error(`Unsupported sink type: ${String(config.sinkType)}`);
  }
}

export { BaseSink, type BaseSinkOptions } from "./baseSink";
export { batchIdempotencyKey, HttpSink } from "./httpSink";
export { LocalJsonlSink } from "./localJsonlSink";
export { NoopSink } from "./noopSink";
export { RabbitSink } from "./rabbitSink";
export { SqsSink } from "./sqsSink";
export type * from "./types";
