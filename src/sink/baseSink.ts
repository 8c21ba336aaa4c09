import { sleep } from "../core/retry";
import { DownloadResultRecord, RunSummaryRecord, SubmittedTaskRecord } from "../types";
import { Sink, SinkPayload, SinkStage } from "./types";

export interface SinkEnvelope<T extends SinkPayload> {
  stage: SinkStage;
  runId: string;
  key: string;
  sentAt: string;
  payload: T;
}

export interface SinkRetryPolicy {
  maxRetries: number;
  retryDelayMs: number;
}

export const DEFAULT_SINK_RETRY: SinkRetryPolicy = {
  maxRetries: 3,
  retryDelayMs: 250,
};

/**
 * Shared stage plumbing for every sink. Subclasses only implement `publishStage`;
 * records are keyed `<postId>:<index>` so a replayed batch can be deduplicated
 * downstream.
 */
export abstract class BaseSink implements Sink {
  protected readonly runId: string;

  protected constructor(runId: string) {
    this.runId = runId;
  }

  async publishSubmitted(records: SubmittedTaskRecord[]): Promise<void> {
    await this.publishStage("submitted", records, (record) => `${record.postId}:${record.index}`);
  }

  async publishDownloadResults(records: DownloadResultRecord[]): Promise<void> {
    await this.publishStage("download", records, (record) => `${record.postId}:${record.index}`);
  }

  async publishSummary(record: RunSummaryRecord): Promise<void> {
    await this.publishStage("summary", [record], () => "summary");
  }

  protected abstract publishStage<T extends SinkPayload>(
    stage: SinkStage,
    payloads: T[],
    getKey: (item: T) => string,
  ): Promise<void>;

  protected requireSetting(name: string, value: string | undefined): string {
    if (!value) {
      throw new Error(`${name} sink is not configured`);
    }
    return value;
  }

  protected idempotencyKey(stage: SinkStage, key: string): string {
    return `${this.runId}:${stage}:${key}`;
  }

  protected envelope<T extends SinkPayload>(stage: SinkStage, key: string, payload: T): SinkEnvelope<T> {
    return { stage, runId: this.runId, key, sentAt: new Date().toISOString(), payload };
  }

  /** Runs `send` until it resolves, sleeping `retryDelayMs * attempt` in between. */
  protected async deliver(
    policy: SinkRetryPolicy,
    send: () => Promise<void>,
    isPermanent: (error: unknown) => boolean = () => false,
  ): Promise<void> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        await send();
        return;
      } catch (error) {
        if (isPermanent(error) || attempt > policy.maxRetries) {
          throw error;
        }
      }
      await sleep(policy.retryDelayMs * attempt);
    }
  }
}
