import path from "node:path";
import { DownloadIOError } from "../core/errors";
import { BinaryClient } from "../core/fetch";
import { withRetry } from "../core/retry";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { Attachment } from "../types";
import { FileSystem, nodeFileSystem } from "./filesystem";

export interface DownloadedFile {
  localPath: string;
  bytes: number;
}

interface DownloaderDeps {
  client: BinaryClient;
  logger: Logger;
  metrics: MetricsRegistry;
  maxAttempts: number;
  retryDelayMs?: number;
  fs?: FileSystem;
}

export function attachmentUrl(attachment: Attachment): string {
  return `${attachment.remoteServer.replace(/\/+$/, "")}/data${attachment.remotePath}`;
}

export class AttachmentDownloader {
  private readonly client: BinaryClient;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly fs: FileSystem;

  constructor(deps: DownloaderDeps) {
    this.client = deps.client;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.maxAttempts = deps.maxAttempts;
    this.retryDelayMs = deps.retryDelayMs ?? 0;
    this.fs = deps.fs ?? nodeFileSystem;
  }

  /**
   * Fetches the attachment and writes it into its post folder, overwriting any file
   * already there. The whole fetch-and-write is retried as one attempt.
   */
  async download(attachment: Attachment): Promise<DownloadedFile> {
    const url = attachmentUrl(attachment);
    const localPath = path.join(attachment.destinationFolder, attachment.localFilename);
    const attemptDownload = withRetry(() => this.downloadAttempt(url, attachment.destinationFolder, localPath), {
      operationName: "download_attachment",
      logger: this.logger,
      maxAttempts: this.maxAttempts,
      retryDelayMs: this.retryDelayMs,
      fields: { postId: attachment.postId, url, localPath },
    });

    const stopTimer = this.metrics.startTimer("download_ms");
    try {
      const result = await attemptDownload();
      const durationMs = stopTimer();
      this.logger.info("download_ok", { postId: attachment.postId, url, localPath, bytes: result.bytes, durationMs });
      return result;
    } catch (error) {
      stopTimer();
      throw error;
    }
  }

  private async downloadAttempt(url: string, folder: string, localPath: string): Promise<DownloadedFile> {
    try {
      await this.fs.ensureDir(folder);
    } catch (error) {
      throw new DownloadIOError(`Cannot create ${folder}: ${errorMessage(error)}`, { path: folder, cause: error });
    }

    const body = await this.client.getBytes(url);

    try {
      await this.fs.writeFile(localPath, body);
    } catch (error) {
      throw new DownloadIOError(`Cannot write ${localPath}: ${errorMessage(error)}`, { path: localPath, cause: error });
    }

    return { localPath, bytes: body.byteLength };
  }
}
