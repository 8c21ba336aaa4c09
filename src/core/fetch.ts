import { Agent, Dispatcher, fetch } from "undici";
import { TransientNetworkError } from "./errors";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface MetadataClient {
  getJson(url: string): Promise<unknown>;
}

export interface BinaryClient {
  getBytes(url: string): Promise<Uint8Array>;
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<HttpResponseLike>;

export interface HttpClientOptions {
  userAgent: string;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  ignoreHttpsErrors: boolean;
  fetchFn?: FetchLike;
}

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

/**
 * GET-only client for the metadata API and the attachment servers. Any transport
 * failure, timeout or non-2xx status is reported as a {@link TransientNetworkError};
 * retrying is left to the caller.
 */
export class HttpClient implements MetadataClient, BinaryClient {
  private readonly options: HttpClientOptions;
  private readonly fetchFn: FetchLike;

  constructor(options: HttpClientOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? defaultFetch;
  }

  async getJson(url: string): Promise<unknown> {
    return this.request(url, "application/json", this.options.requestTimeoutMs, (response) => response.json());
  }

  async getBytes(url: string): Promise<Uint8Array> {
    return this.request(url, "*/*", this.options.downloadTimeoutMs, async (response) => {
      return new Uint8Array(await response.arrayBuffer());
    });
  }

  private async request<T>(
    url: string,
    accept: string,
    timeoutMs: number,
    readBody: (response: HttpResponseLike) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      let response: HttpResponseLike;
      try {
        response = await this.fetchFn(url, {
          method: "GET",
          headers: {
            "user-agent": this.options.userAgent,
            accept,
          },
          dispatcher: getFetchDispatcher(this.options.ignoreHttpsErrors),
          signal: controller.signal,
        });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new TransientNetworkError(`GET ${url} failed: ${reason}`, { url, cause: error });
      }

      if (!response.ok) {
        throw new TransientNetworkError(`HTTP ${response.status} while fetching ${url}`, {
          url,
          status: response.status,
        });
      }

      try {
        return await readBody(response);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new TransientNetworkError(`Reading body of ${url} failed: ${reason}`, { url, cause: error });
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}
