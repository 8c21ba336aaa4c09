import { DownloadResultRecord, RunSummaryRecord, SubmittedTaskRecord } from "../types";

export interface Sink {
  publishSubmitted(records: SubmittedTaskRecord[]): Promise<void>;
  publishDownloadResults(records: DownloadResultRecord[]): Promise<void>;
  publishSummary(record: RunSummaryRecord): Promise<void>;
}

export type SinkStage = "submitted" | "download" | "summary";
export type SinkPayload = SubmittedTaskRecord | DownloadResultRecord | RunSummaryRecord;
