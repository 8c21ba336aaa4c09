import { SendMessageBatchCommand, SendMessageBatchRequestEntry, SQSClient } from "@aws-sdk/client-sqs";
import { BaseSink, DEFAULT_SINK_RETRY, SinkRetryPolicy } from "./baseSink";
import { SinkPayload, SinkStage } from "./types";

interface SqsClientLike {
  send(command: SendMessageBatchCommand): Promise<{ Failed?: Array<{ Id?: string; SenderFault?: boolean }> }>;
}

export interface SqsSinkOptions {
  queueUrl?: string;
  runId: string;
  client?: SqsClientLike;
  fifo?: boolean;
  groupId?: string;
  maxRetries?: number;
  retryDelayMs?: number;
}

const BATCH_LIMIT = 10;

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/** One SQS message per record; FIFO queues are grouped by run and deduplicated by record key. */
export class SqsSink extends BaseSink {
  private readonly queueUrl?: string;
  private readonly client: SqsClientLike;
  private readonly fifo: boolean;
  private readonly groupId: string;
  private readonly policy: SinkRetryPolicy;

  constructor(options: SqsSinkOptions) {
    super(options.runId);
    this.queueUrl = options.queueUrl;
    this.client = options.client ?? new SQSClient({});
    this.fifo = options.fifo ?? Boolean(this.queueUrl?.endsWith(".fifo"));
    this.groupId = options.groupId ?? options.runId;
    this.policy = {
      maxRetries: options.maxRetries ?? DEFAULT_SINK_RETRY.maxRetries,
      retryDelayMs: options.retryDelayMs ?? 200,
    };
  }

  protected async publishStage<T extends SinkPayload>(stage: SinkStage, payloads: T[], getKey: (item: T) => string): Promise<void> {
    if (payloads.length === 0) {
      return;
    }

    const queueUrl = this.requireSetting("SQS", this.queueUrl);
    const entries = payloads.map((payload, index): SendMessageBatchRequestEntry => {
      const key = getKey(payload);
      const entry: SendMessageBatchRequestEntry = {
        Id: String(index),
        MessageBody: JSON.stringify(this.envelope(stage, key, payload)),
      };
      if (this.fifo) {
        entry.MessageGroupId = this.groupId;
        entry.MessageDeduplicationId = this.idempotencyKey(stage, key);
      }
      return entry;
    });

    for (const batch of chunk(entries, BATCH_LIMIT)) {
      await this.sendBatch(queueUrl, batch);
    }
  }

  /** Only the entries SQS reports as failed are resent. */
  private async sendBatch(queueUrl: string, batch: SendMessageBatchRequestEntry[]): Promise<void> {
    let pending = batch;
    await this.deliver(this.policy, async () => {
      const response = await this.client.send(new SendMessageBatchCommand({ QueueUrl: queueUrl, Entries: pending }));
      const failedIds = new Set((response.Failed ?? []).map((failure) => failure.Id));
      pending = pending.filter((entry) => failedIds.has(entry.Id));
      if (pending.length > 0) {
        throw new Error(`SQS rejected ${pending.length} of ${batch.length} entries`);
      }
    });
  }
}
