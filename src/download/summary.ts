import { DownloadFailure, DownloadOutcome, Summary } from "../types";

export function summarize(outcomes: readonly DownloadOutcome[]): Summary {
  const ordered = [...outcomes].sort((left, right) => left.task.index - right.task.index);
  let succeededCount = 0;
  let totalBytes = 0;
  const failures: DownloadFailure[] = [];

  for (const outcome of ordered) {
    if (outcome.status === "succeeded") {
      succeededCount += 1;
      totalBytes += outcome.bytes;
      continue;
    }
    failures.push({
      index: outcome.task.index,
      postId: outcome.task.attachment.postId,
      kind: outcome.task.attachment.kind,
      localFilename: outcome.task.attachment.localFilename,
      url: outcome.task.url,
      error: outcome.error,
      attempts: outcome.attempts,
    });
  }

  return {
    submittedCount: outcomes.length,
    succeededCount,
    totalBytes,
    failures,
  };
}
