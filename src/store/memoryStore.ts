import { DownloadOutcome, Summary } from "../types";
import { HistoryStats, HistoryStore, RunRecord, RunStatus } from "./types";

export class InMemoryStore implements HistoryStore {
  private readonly runs = new Map<string, RunRecord>();
  private readonly outcomes: Array<{ runId: string; outcome: DownloadOutcome }> = [];

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.runs.set(runId, { runId, startedAt, status: "running" });
  }

  async finishRun(runId: string, status: Exclude<RunStatus, "running">, finishedAt: string, summary?: Summary): Promise<void> {
    const run = this.runs.get(runId);
    if (!run) {
      return;
    }
    this.runs.set(runId, {
      ...run,
      status,
      finishedAt,
      submittedCount: summary?.submittedCount,
      succeededCount: summary?.succeededCount,
      totalBytes: summary?.totalBytes,
    });
  }

  async recordDownloads(runId: string, outcomes: readonly DownloadOutcome[], _recordedAt: string): Promise<void> {
    for (const outcome of outcomes) {
      this.outcomes.push({ runId, outcome });
    }
  }

  async getStats(): Promise<HistoryStats> {
    let downloadsOk = 0;
    let downloadsFailed = 0;
    let totalBytes = 0;
    for (const { outcome } of this.outcomes) {
      if (outcome.status === "succeeded") {
        downloadsOk += 1;
        totalBytes += outcome.bytes;
      } else {
        downloadsFailed += 1;
      }
    }

    const runs = [...this.runs.values()];
    return {
      totalRuns: runs.length,
      downloadsOk,
      downloadsFailed,
      totalBytes,
      lastRun: runs.at(-1),
    };
  }

  async close(): Promise<void> {
    return;
  }
}
