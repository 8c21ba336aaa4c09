import { Logger } from "./logger";
import { MetricCounterName, MetricTimerName } from "./types";

export interface HistogramSummary {
  count: number;
  total: number;
  min: number;
  max: number;
  avg: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      posts_resolved: this.counter("posts_resolved"),
      posts_failed: this.counter("posts_failed"),
      creator_fetches: this.counter("creator_fetches"),
      creator_cache_hits: this.counter("creator_cache_hits"),
      downloads_ok: this.counter("downloads_ok"),
      downloads_failed: this.counter("downloads_failed"),
      bytes_downloaded: this.counter("bytes_downloaded"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      metadata_fetch_ms: this.summarize("metadata_fetch_ms"),
      download_ms: this.summarize("download_ms"),
    };
  }

  logSummary(logger: Logger): void {
    logger.info("metrics_summary", {
      counters: this.getCounters(),
      timers: this.getTimerSummaries(),
    });
  }

  private counter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, total: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      total,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
