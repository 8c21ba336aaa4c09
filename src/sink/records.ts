import path from "node:path";
import { DownloadOutcome, DownloadResultRecord, DownloadTask, RunReport, RunSummaryRecord, SubmittedTaskRecord } from "../types";

export function toSubmittedRecord(task: DownloadTask, submittedAt: string): SubmittedTaskRecord {
  return {
    index: task.index,
    postId: task.attachment.postId,
    kind: task.attachment.kind,
    url: task.url,
    localPath: path.join(task.attachment.destinationFolder, task.attachment.localFilename),
    submittedAt,
  };
}

export function toDownloadResultRecord(outcome: DownloadOutcome, finishedAt: string): DownloadResultRecord {
  const base = {
    index: outcome.task.index,
    postId: outcome.task.attachment.postId,
    kind: outcome.task.attachment.kind,
    url: outcome.task.url,
    finishedAt,
  };
  if (outcome.status === "succeeded") {
    return { ...base, status: "downloaded_ok", localPath: outcome.localPath, bytes: outcome.bytes };
  }
  return { ...base, status: "download_failed", error: outcome.error, attempts: outcome.attempts };
}

export function toRunSummaryRecord(report: RunReport, finishedAt: string): RunSummaryRecord {
  return {
    dryRun: report.dryRun,
    postsRequested: report.posts.requested,
    postsResolved: report.posts.resolved,
    postsFailed: report.posts.failures.length,
    submittedCount: report.downloads.submittedCount,
    succeededCount: report.downloads.succeededCount,
    failedCount: report.downloads.submittedCount - report.downloads.succeededCount,
    totalBytes: report.downloads.totalBytes,
    finishedAt,
  };
}
