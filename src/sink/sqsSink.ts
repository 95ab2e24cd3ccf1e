import {
  SendMessageBatchCommand,
  SQSClient,
  type SendMessageBatchCommandOutput,
  type SendMessageBatchRequestEntry,
} from "@aws-sdk/client-sqs";
import type { SinkEvent } from "./types";
import { BaseSink, type BaseSinkOptions } from "./baseSink";
import { chunk, withRetries } from "./retry";

interface SqsClientLike {
  send(command: SendMessageBatchCommand): Promise<Pick<SendMessageBatchCommandOutput, "Failed">>;
  destroy?(): void;
}

export interface SqsSinkOptions extends BaseSinkOptions {
  queueUrl?: string;
  client?: SqsClientLike;
  fifo?: boolean;
  groupId?: string;
  maxRetries?: number;
  retryDelayMs?: number;
}

// SendMessageBatch takes at most ten entries.
const SQS_BATCH_LIMIT = 10;

function toEntry(event: SinkEvent, id: string, fifo: boolean, groupId: string): SendMessageBatchRequestEntry {
  const entry: SendMessageBatchRequestEntry = {
    Id: id,
    MessageBody: JSON.stringify({ ...event, sentAt: new Date().toISOString() }),
    MessageAttributes: { stage: { DataType: "String", StringValue: event.stage } },
  };
  if (fifo) {
    // Phase events of one community stay ordered; fetches spread across groups.
    entry.MessageGroupId = event.stage === "phase" ? `${groupId}-phase` : groupId;
    entry.MessageDeduplicationId = `${event.stage}:${event.key}`.replace(/[^A-Za-z0-9_:-]/g, "_").slice(0, 128);
  }
  return entry;
}

/** Sends buffered events in SendMessageBatch calls over one long-lived client. */
export class SqsSink extends BaseSink {
  private readonly queueUrl?: string;
  private readonly client: SqsClientLike;
  private readonly fifo: boolean;
  private readonly groupId: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: SqsSinkOptions = {}) {
    super(options);
    this.queueUrl = options.queueUrl;
    this.client = options.client ?? new SQSClient({});
    this.fifo = options.fifo ?? Boolean(this.queueUrl?.endsWith(".fifo"));
    this.groupId = options.groupId ?? "platmap-crawler";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 200;
  }

  protected async deliver(events: SinkEvent[]): Promise<void> {
    this.ensureConfigured("SQS", Boolean(this.queueUrl));
    const queueUrl = this.queueUrl ?? "";

    for (const batch of chunk(events, SQS_BATCH_LIMIT)) {
      let pending = batch.map((event, index) => toEntry(event, String(index), this.fifo, this.groupId));

      await withRetries({ maxRetries: this.maxRetries, retryDelayMs: this.retryDelayMs }, async () => {
        const response = await this.client.send(new SendMessageBatchCommand({ QueueUrl: queueUrl, Entries: pending }));
        const failed = new Set((response.Failed ?? []).flatMap((entry) => (entry.Id ? [entry.Id] : [])));
        pending = pending.filter((entry) => entry.Id !== undefined && failed.has(entry.Id));
        if (pending.length > 0) {
          throw new Error(`SQS rejected ${pending.length} of ${batch.length} entries`);
        }
      });
    }
  }

  protected async disconnect(): Promise<void> {
    this.client.destroy?.();
  }
}
