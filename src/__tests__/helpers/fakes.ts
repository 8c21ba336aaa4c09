import { vi } from "vitest";
import { TransientNetworkError } from "../../core/errors";
import { BinaryClient, MetadataClient } from "../../core/fetch";
import { FileSystem } from "../../download";
import { Logger } from "../../observability";
import { Sink } from "../../sink";
import { DownloadResultRecord, RunSummaryRecord, SubmittedTaskRecord } from "../../types";

export const API_BASE = "https://api.test/v1";

export function createTestLogger(component = "test"): Logger {
  return new Logger({ component, runId: "run_test" });
}

function pause(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

type Scripted<T> = Array<T | Error>;

/**
 * Replays scripted results per URL; the last entry repeats. Unknown URLs fail
 * like a 404.
 */
class ScriptedClient<T> {
  readonly calls: string[] = [];
  private readonly scripts = new Map<string, Scripted<T>>();
  private readonly delayMs: number;

  constructor(delayMs = 0) {
    this.delayMs = delayMs;
  }

  respond(url: string, ...results: Scripted<T>): this {
    this.scripts.set(url, results);
    return this;
  }

  callCount(url: string): number {
    return this.calls.filter((call) => call === url).length;
  }

  protected async next(url: string): Promise<T> {
    this.calls.push(url);
    if (this.delayMs > 0) {
      await pause(this.delayMs);
    }
    const script = this.scripts.get(url);
    if (!script || script.length === 0) {
      throw new TransientNetworkError(`HTTP 404 while fetching ${url}`, { url, status: 404 });
    }
    const result = script.length > 1 ? script.shift() : script[0];
    if (result instanceof Error) {
      throw result;
    }
    if (result === undefined) {
      throw new Error(`No scripted result for ${url}`);
    }
    return result;
  }
}

export class FakeMetadataClient extends ScriptedClient<unknown> implements MetadataClient {
  getJson(url: string): Promise<unknown> {
    return this.next(url);
  }
}

export class FakeBinaryClient extends ScriptedClient<Uint8Array> implements BinaryClient {
  getBytes(url: string): Promise<Uint8Array> {
    return this.next(url);
  }
}

export function httpError(url: string, status: number): TransientNetworkError {
  return new TransientNetworkError(`HTTP ${status} while fetching ${url}`, { url, status });
}

export function bytes(size: number, fill = 1): Uint8Array {
  return new Uint8Array(size).fill(fill);
}

export class MemoryFileSystem implements FileSystem {
  readonly dirs = new Set<string>();
  readonly files = new Map<string, Uint8Array>();
  private writeFailures = 0;

  failNextWrites(count: number): this {
    this.writeFailures = count;
    return this;
  }

  async ensureDir(dir: string): Promise<void> {
    this.dirs.add(dir);
  }

  async writeFile(filePath: string, data: Uint8Array): Promise<void> {
    if (this.writeFailures > 0) {
      this.writeFailures -= 1;
      throw new Error("EACCES: permission denied");
    }
    this.files.set(filePath, data);
  }
}

export class RecordingSink implements Sink {
  readonly submitted: SubmittedTaskRecord[] = [];
  readonly results: DownloadResultRecord[] = [];
  readonly summaries: RunSummaryRecord[] = [];

  async publishSubmitted(records: SubmittedTaskRecord[]): Promise<void> {
    this.submitted.push(...records);
  }

  async publishDownloadResults(records: DownloadResultRecord[]): Promise<void> {
    this.results.push(...records);
  }

  async publishSummary(record: RunSummaryRecord): Promise<void> {
    this.summaries.push(record);
  }
}

export interface AttachmentJson {
  name: string;
  path: string;
  server: string;
}

export function attachmentJson(name: string, path: string, server = "https://n1.files.test"): AttachmentJson {
  return { name, path, server };
}

export function postPayload(options: {
  id: string;
  title: string;
  user: string;
  service: string;
  previews?: AttachmentJson[];
  attachments?: AttachmentJson[];
}): unknown {
  return {
    post: {
      id: options.id,
      title: options.title,
      user: options.user,
      service: options.service,
      published: "2024-01-01T00:00:00",
    },
    previews: options.previews ?? [],
    attachments: options.attachments ?? [],
  };
}

export function profilePayload(service: string, id: string, name: string): unknown {
  return { id, name, service, indexed: "2023-05-01T00:00:00" };
}

export function postUrl(service: string, creatorId: string, postId: string): string {
  return `${API_BASE}/${service}/user/${creatorId}/post/${postId}`;
}

export function profileUrl(service: string, creatorId: string): string {
  return `${API_BASE}/${service}/user/${creatorId}/profile`;
}

export interface ConsoleSpies {
  logLines(): Array<Record<string, unknown>>;
  errorLines(): Array<Record<string, unknown>>;
}

function parseLines(calls: unknown[][]): Array<Record<string, unknown>> {
  return calls.map((call) => {
    const parsed: unknown = JSON.parse(String(call[0]));
    return typeof parsed === "object" && parsed !== null ? Object.fromEntries(Object.entries(parsed)) : {};
  });
}

/** Swallows logger output and exposes it as parsed JSON objects. */
export function silenceConsole(): ConsoleSpies {
  const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
  const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
  return {
    logLines: () => parseLines(log.mock.calls),
    errorLines: () => parseLines(error.mock.calls),
  };
}
