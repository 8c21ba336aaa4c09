import { DownloadOutcome, Summary } from "../types";

export type RunStatus = "running" | "completed" | "failed";

export interface RunRecord {
  runId: string;
  startedAt: string;
  finishedAt?: string;
  status: RunStatus;
  submittedCount?: number;
  succeededCount?: number;
  totalBytes?: number;
}

export interface HistoryStats {
  totalRuns: number;
  downloadsOk: number;
  downloadsFailed: number;
  totalBytes: number;
  lastRun?: RunRecord;
}

export interface HistoryStore {
  startRun(runId: string, startedAt: string): Promise<void>;
  finishRun(runId: string, status: Exclude<RunStatus, "running">, finishedAt: string, summary?: Summary): Promise<void>;
  recordDownloads(runId: string, outcomes: readonly DownloadOutcome[], recordedAt: string): Promise<void>;
  getStats(): Promise<HistoryStats>;
  close(): Promise<void>;
}
