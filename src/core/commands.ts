import path from "node:path";
import { AppConfig } from "../config";
import { AttachmentDownloader, FileSystem, planDownloads, runDownloadTasks, summarize } from "../download";
import { Logger, MetricsRegistry } from "../observability";
import { formatPostRef, MetadataResolver } from "../resolve";
import { Sink, toDownloadResultRecord, toRunSummaryRecord, toSubmittedRecord } from "../sink";
import { HistoryStats, HistoryStore } from "../store";
import { DownloadOutcome, Post, PostFailure, PostRef, PostResolution, RunReport } from "../types";
import { BinaryClient, MetadataClient } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: HistoryStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  metadataClient: MetadataClient;
  binaryClient: BinaryClient;
  fs?: FileSystem;
}

export interface FetchOptions {
  dryRun: boolean;
}

function createResolver(ctx: CommandContext): MetadataResolver {
  return new MetadataResolver({
    client: ctx.metadataClient,
    logger: ctx.logger.child("resolve"),
    metrics: ctx.metrics,
    options: {
      apiBaseUrl: ctx.config.apiBaseUrl,
      downloadsDir: ctx.config.downloadsDir,
      maxAttempts: ctx.config.maxAttempts,
      retryDelayMs: ctx.config.retryDelayMs,
    },
  });
}

async function resolvePosts(
  ctx: CommandContext,
  refs: readonly PostRef[],
): Promise<{ resolutions: PostResolution[]; posts: Post[]; failures: PostFailure[] }> {
  const resolver = createResolver(ctx);
  const resolutions = await resolver.resolveAll(refs, ctx.config.resolveConcurrency);
  const cacheStats = resolver.cache.stats();
  ctx.metrics.incrementCounter("creator_cache_hits", cacheStats.hits);
  ctx.logger.info("creator_cache_stats", { ...cacheStats });

  const posts: Post[] = [];
  const failures: PostFailure[] = [];
  for (const resolution of resolutions) {
    if (resolution.status === "resolved") {
      posts.push(resolution.post);
    } else {
      failures.push({ ref: resolution.ref, error: resolution.error, errorName: resolution.errorName });
    }
  }
  return { resolutions, posts, failures };
}

export async function runFetch(ctx: CommandContext, refs: readonly PostRef[], options: FetchOptions): Promise<RunReport> {
  const startedAt = new Date().toISOString();
  await ctx.store.startRun(ctx.runId, startedAt);
  ctx.logger.info("fetch_start", { posts: refs.length, dryRun: options.dryRun });

  try {
    const { posts, failures } = await resolvePosts(ctx, refs);
    const tasks = planDownloads(posts);

    let outcomes: DownloadOutcome[] = [];
    if (options.dryRun) {
      for (const task of tasks) {
        ctx.logger.info("download_planned", {
          postId: task.attachment.postId,
          url: task.url,
          index: task.index,
          localPath: path.join(task.attachment.destinationFolder, task.attachment.localFilename),
        });
      }
    } else {
      await ctx.sink.publishSubmitted(tasks.map((task) => toSubmittedRecord(task, startedAt)));
      const downloader = new AttachmentDownloader({
        client: ctx.binaryClient,
        logger: ctx.logger.child("download"),
        metrics: ctx.metrics,
        maxAttempts: ctx.config.maxAttempts,
        retryDelayMs: ctx.config.retryDelayMs,
        fs: ctx.fs,
      });
      outcomes = await runDownloadTasks(tasks, {
        downloader,
        logger: ctx.logger.child("download"),
        metrics: ctx.metrics,
        concurrency: ctx.config.downloadConcurrency,
      });

      const finishedAt = new Date().toISOString();
      await ctx.store.recordDownloads(ctx.runId, outcomes, finishedAt);
      await ctx.sink.publishDownloadResults(outcomes.map((outcome) => toDownloadResultRecord(outcome, finishedAt)));
    }

    const report: RunReport = {
      runId: ctx.runId,
      dryRun: options.dryRun,
      posts: {
        requested: refs.length,
        resolved: posts.length,
        failures,
      },
      downloads: summarize(outcomes),
    };

    const finishedAt = new Date().toISOString();
    if (!options.dryRun) {
      await ctx.sink.publishSummary(toRunSummaryRecord(report, finishedAt));
    }
    await ctx.store.finishRun(ctx.runId, "completed", finishedAt, report.downloads);

    ctx.logger.info("fetch_summary", {
      postsRequested: report.posts.requested,
      postsResolved: report.posts.resolved,
      postFailures: failures.map((failure) => ({ post: formatPostRef(failure.ref), error: failure.error })),
      plannedTasks: tasks.length,
      submittedCount: report.downloads.submittedCount,
      succeededCount: report.downloads.succeededCount,
      totalBytes: report.downloads.totalBytes,
      failures: report.downloads.failures,
    });
    return report;
  } catch (error) {
    await ctx.store.finishRun(ctx.runId, "failed", new Date().toISOString());
    throw error;
  }
}

export async function runInspect(ctx: CommandContext, refs: readonly PostRef[]): Promise<PostResolution[]> {
  ctx.logger.info("inspect_start", { posts: refs.length });
  const { resolutions } = await resolvePosts(ctx, refs);

  for (const resolution of resolutions) {
    if (resolution.status !== "resolved") {
      continue;
    }
    const { post } = resolution;
    ctx.logger.info("post_inspected", {
      postId: post.id,
      title: post.title,
      creator: { service: post.creator.service, id: post.creator.id, name: post.creator.name },
      destinationFolder: post.destinationFolder,
      pictures: post.pictures.map((attachment) => attachment.localFilename),
      files: post.files.map((attachment) => attachment.localFilename),
    });
  }

  ctx.logger.info("inspect_complete", {
    resolved: resolutions.filter((resolution) => resolution.status === "resolved").length,
    failed: resolutions.filter((resolution) => resolution.status === "failed").length,
  });
  return resolutions;
}

export async function runStatus(ctx: CommandContext): Promise<HistoryStats> {
  ctx.logger.info("status_start");
  const stats = await ctx.store.getStats();
  ctx.logger.info("status_complete", { stats });
  return stats;
}

export function isCleanRun(report: RunReport): boolean {
  return report.posts.failures.length === 0 && report.downloads.succeededCount === report.downloads.submittedCount;
}
