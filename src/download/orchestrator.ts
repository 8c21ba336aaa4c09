import { mapWithConcurrency } from "../core/concurrency";
import { errorName, ExhaustedRetriesError } from "../core/errors";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { Attachment, DownloadOutcome, DownloadTask, Post } from "../types";
import { attachmentUrl, DownloadedFile } from "./downloader";

export const DEFAULT_CONCURRENCY = 5;

export interface AttachmentDownloaderLike {
  download(attachment: Attachment): Promise<DownloadedFile>;
}

export interface DownloadAllOptions {
  downloader: AttachmentDownloaderLike;
  logger: Logger;
  metrics?: MetricsRegistry;
  concurrency?: number;
}

/** Pictures before files within a post; posts keep their order. */
export function planDownloads(posts: readonly Post[]): DownloadTask[] {
  const attachments = posts.flatMap((post) => [...post.pictures, ...post.files]);
  return attachments.map((attachment, index) => ({ index, attachment, url: attachmentUrl(attachment) }));
}

/**
 * Downloads every attachment of `posts` on a bounded pool and resolves once every
 * task is terminal. Outcomes come back in submission order.
 */
export async function downloadAll(posts: readonly Post[], options: DownloadAllOptions): Promise<DownloadOutcome[]> {
  return runDownloadTasks(planDownloads(posts), options);
}

export async function runDownloadTasks(
  tasks: readonly DownloadTask[],
  options: DownloadAllOptions,
): Promise<DownloadOutcome[]> {
  const { downloader, logger, metrics } = options;
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  logger.info("download_batch_start", { tasks: tasks.length, concurrency });

  const outcomes = await mapWithConcurrency(tasks, concurrency, async (task): Promise<DownloadOutcome> => {
    try {
      const file = await downloader.download(task.attachment);
      metrics?.incrementCounter("downloads_ok", 1);
      metrics?.incrementCounter("bytes_downloaded", file.bytes);
      return { status: "succeeded", task, localPath: file.localPath, bytes: file.bytes };
    } catch (error) {
      const attempts = error instanceof ExhaustedRetriesError ? error.attempts : 1;
      metrics?.incrementCounter("downloads_failed", 1);
      logger.error("download_failed", {
        postId: task.attachment.postId,
        url: task.url,
        index: task.index,
        localFilename: task.attachment.localFilename,
        attempts,
        error: errorMessage(error),
      });
      return { status: "failed", task, error: errorMessage(error), errorName: errorName(error), attempts };
    }
  });

  logger.info("download_batch_complete", { tasks: tasks.length });
  return outcomes;
}
