import { connect as amqpConnect } from "amqplib";
import type { Options } from "amqplib";
import type { SinkEvent } from "./types";
import { BaseSink, type BaseSinkOptions } from "./baseSink";
import { withRetries } from "./retry";

type ConnectFn = (url: string) => Promise<ConnectionLike>;

interface ConnectionLike {
  createConfirmChannel(): Promise<ChannelLike>;
  close(): Promise<void>;
}

interface ChannelLike {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
  waitForConfirms(): Promise<void>;
  close(): Promise<void>;
}

interface Session {
  connection: ConnectionLike;
  channel: ChannelLike;
}

export interface RabbitSinkOptions extends BaseSinkOptions {
  connectionUrl?: string;
  exchange?: string;
  routingKeyPrefix?: string;
  exchangeType?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  connectFn?: ConnectFn;
}

/**
 * Publishes buffered events to a topic exchange as `<prefix>.<stage>` over a
 * confirm channel that is opened on the first flush and kept until `close()`.
 */
export class RabbitSink extends BaseSink {
  private readonly connectionUrl?: string;
  private readonly exchange: string;
  private readonly routingKeyPrefix: string;
  private readonly exchangeType: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly connectFn: ConnectFn;
  private session?: Session;

  constructor(options: RabbitSinkOptions = {}) {
    super(options);
    this.connectionUrl = options.connectionUrl;
    this.exchange = options.exchange ?? "platmaps.crawler";
    this.routingKeyPrefix = options.routingKeyPrefix ?? "platmaps";
    this.exchangeType = options.exchangeType ?? "topic";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.connectFn = options.connectFn ?? ((url: string) => amqpConnect(url));
  }

  protected async deliver(events: SinkEvent[]): Promise<void> {
    this.ensureConfigured("RabbitMQ", Boolean(this.connectionUrl));

    await withRetries({ maxRetries: this.maxRetries, retryDelayMs: this.retryDelayMs }, async () => {
      try {
        const { channel } = await this.open();
        for (const event of events) {
          channel.publish(
            this.exchange,
            `${this.routingKeyPrefix}.${event.stage}`,
            Buffer.from(JSON.stringify({ ...event, sentAt: new Date().toISOString() })),
            {
              persistent: true,
              contentType: "application/json",
              messageId: `${event.stage}:${event.key}`,
            },
          );
        }
        await channel.waitForConfirms();
      } catch (error) {
        // A broken session is not reused; the next attempt reconnects.
        await this.disconnect();
        throw error;
      }
    });
  }

  protected async disconnect(): Promise<void> {
    const session = this.session;
    this.session = undefined;
    if (!session) {
      return;
    }
    await session.channel.close().catch(() => undefined);
    await session.connection.close().catch(() => undefined);
  }

  private async open(): Promise<Session> {
    if (this.session) {
      return this.session;
    }
    const connection = await this.connectFn(this.connectionUrl ?? "");
    try {
      const channel = await connection.createConfirmChannel();
      await channel.assertExchange(this.exchange, this.exchangeType, { durable: true });
      this.session = { connection, channel };
      return this.session;
    } catch (error) {
      await connection.close().catch(() => undefined);
      throw error;
    }
  }
}
