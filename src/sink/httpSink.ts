import { BaseSink, DEFAULT_SINK_RETRY, SinkRetryPolicy } from "./baseSink";
import { SinkPayload, SinkStage } from "./types";

interface HttpSinkResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

interface HttpSinkRequest {
  method: string;
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

export type HttpSinkFetch = (url: string, init: HttpSinkRequest) => Promise<HttpSinkResponse>;

export interface HttpSinkOptions {
  endpoint?: string;
  token?: string;
  runId: string;
  fetchFn?: HttpSinkFetch;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

export class HttpSinkStatusError extends Error {
  readonly status: number;

  constructor(status: number, responseText: string) {
    super(`HTTP sink received ${status}: ${responseText}`);
    this.name = "HttpSinkStatusError";
    this.status = status;
  }

  get retriable(): boolean {
    return this.status === 408 || this.status === 429 || this.status >= 500;
  }
}

/** POSTs one `{ stage, runId, sentAt, items }` document per batch. */
export class HttpSink extends BaseSink {
  private readonly endpoint?: string;
  private readonly token?: string;
  private readonly fetchFn: HttpSinkFetch;
  private readonly timeoutMs: number;
  private readonly policy: SinkRetryPolicy;

  constructor(options: HttpSinkOptions) {
    super(options.runId);
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.policy = {
      maxRetries: options.maxRetries ?? DEFAULT_SINK_RETRY.maxRetries,
      retryDelayMs: options.retryDelayMs ?? DEFAULT_SINK_RETRY.retryDelayMs,
    };
  }

  protected async publishStage<T extends SinkPayload>(stage: SinkStage, payloads: T[], getKey: (item: T) => string): Promise<void> {
    if (payloads.length === 0) {
      return;
    }

    const endpoint = this.requireSetting("HTTP", this.endpoint);
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": this.idempotencyKey(stage, payloads.map(getKey).join(",")),
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    const body = JSON.stringify({
      stage,
      runId: this.runId,
      sentAt: new Date().toISOString(),
      items: payloads,
    });

    await this.deliver(
      this.policy,
      () => this.post(endpoint, headers, body),
      (error) => error instanceof HttpSinkStatusError && !error.retriable,
    );
  }

  private async post(endpoint: string, headers: Record<string, string>, body: string): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchFn(endpoint, { method: "POST", headers, body, signal: controller.signal });
      if (!response.ok) {
        throw new HttpSinkStatusError(response.status, await response.text());
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}
