export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  postId?: string;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "posts_resolved"
  | "posts_failed"
  | "creator_fetches"
  | "creator_cache_hits"
  | "downloads_ok"
  | "downloads_failed"
  | "bytes_downloaded";

export type MetricTimerName = "metadata_fetch_ms" | "download_ms";
