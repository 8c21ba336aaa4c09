import type { Options } from "amqplib";
import { connect as amqpConnect } from "amqplib";
import { BaseSink, DEFAULT_SINK_RETRY, SinkRetryPolicy } from "./baseSink";
import { SinkPayload, SinkStage } from "./types";

type ConnectFn = (url: string) => Promise<ConnectionLike>;

interface ConnectionLike {
  createConfirmChannel(): Promise<ChannelLike>;
  close(): Promise<void>;
}

interface ChannelLike {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
  waitForConfirms?(): Promise<void>;
  close(): Promise<void>;
}

export interface RabbitSinkOptions {
  connectionUrl?: string;
  runId: string;
  exchange?: string;
  exchangeType?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  connectFn?: ConnectFn;
}

/** Publishes each record on `<exchange>` with routing key `postgrab.<stage>`. */
export class RabbitSink extends BaseSink {
  private readonly connectionUrl?: string;
  private readonly exchange: string;
  private readonly exchangeType: string;
  private readonly policy: SinkRetryPolicy;
  private readonly connectFn: ConnectFn;

  constructor(options: RabbitSinkOptions) {
    super(options.runId);
    this.connectionUrl = options.connectionUrl;
    this.exchange = options.exchange ?? "postgrab.events";
    this.exchangeType = options.exchangeType ?? "topic";
    this.policy = {
      maxRetries: options.maxRetries ?? DEFAULT_SINK_RETRY.maxRetries,
      retryDelayMs: options.retryDelayMs ?? DEFAULT_SINK_RETRY.retryDelayMs,
    };
    this.connectFn = options.connectFn ?? ((url: string) => amqpConnect(url));
  }

  protected async publishStage<T extends SinkPayload>(stage: SinkStage, payloads: T[], getKey: (item: T) => string): Promise<void> {
    if (payloads.length === 0) {
      return;
    }

    const url = this.requireSetting("RabbitMQ", this.connectionUrl);
    await this.deliver(this.policy, () => this.publishOnce(url, stage, payloads, getKey));
  }

  private async publishOnce<T extends SinkPayload>(
    url: string,
    stage: SinkStage,
    payloads: T[],
    getKey: (item: T) => string,
  ): Promise<void> {
    const connection = await this.connectFn(url);
    let channel: ChannelLike | undefined;
    try {
      channel = await connection.createConfirmChannel();
      await channel.assertExchange(this.exchange, this.exchangeType, { durable: true });

      for (const payload of payloads) {
        const key = getKey(payload);
        channel.publish(this.exchange, `postgrab.${stage}`, Buffer.from(JSON.stringify(this.envelope(stage, key, payload))), {
          persistent: true,
          contentType: "application/json",
          headers: {
            "x-stage": stage,
            "x-run-id": this.runId,
            "x-idempotency-key": this.idempotencyKey(stage, key),
          },
        });
      }

      if (channel.waitForConfirms) {
        await channel.waitForConfirms();
      }
    } finally {
      await channel?.close().catch(() => undefined);
      await connection.close().catch(() => undefined);
    }
  }
}
