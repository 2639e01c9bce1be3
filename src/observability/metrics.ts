import { MetricCounterName, MetricGaugeName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  total: number;
  min: number;
  max: number;
  avg: number;
  p95: number;
}

export interface MetricsSnapshot {
  counters: Record<MetricCounterName, number>;
  gauges: Partial<Record<MetricGaugeName, number>>;
  timers: Record<MetricTimerName, TimerSummary>;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly gauges = new Map<MetricGaugeName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, this.counter(name) + value);
  }

  setGauge(name: MetricGaugeName, value: number): void {
    this.gauges.set(name, value);
  }

  adjustGauge(name: MetricGaugeName, delta: number): void {
    this.gauges.set(name, (this.gauges.get(name) ?? 0) + delta);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = performance.now();
    return () => {
      const durationMs = Math.round(performance.now() - startedAt);
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  async time<T>(name: MetricTimerName, fn: () => Promise<T>): Promise<T> {
    const stop = this.startTimer(name);
    try {
      return await fn();
    } finally {
      stop();
    }
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      records_scanned: this.counter("records_scanned"),
      records_matched: this.counter("records_matched"),
      records_rejected: this.counter("records_rejected"),
      records_malformed: this.counter("records_malformed"),
      partitions_completed: this.counter("partitions_completed"),
      partitions_failed: this.counter("partitions_failed"),
      parts_written: this.counter("parts_written"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    return {
      partition_scan_ms: this.summarize("partition_scan_ms"),
      publish_ms: this.summarize("publish_ms"),
      source_request_ms: this.summarize("source_request_ms"),
    };
  }

  snapshot(): MetricsSnapshot {
    const gauges: Partial<Record<MetricGaugeName, number>> = {};
    for (const [name, value] of this.gauges) {
      gauges[name] = value;
    }

    return {
      counters: this.getCounters(),
      gauges,
      timers: this.getTimerSummaries(),
    };
  }

  printSummary(write: (line: string) => void = console.log): void {
    write(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          ...this.snapshot(),
        },
        null,
        2,
      ),
    );
  }

  private counter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  private summarize(name: MetricTimerName): TimerSummary {
    const values = [...(this.timers.get(name) ?? [])].sort((a, b) => a - b);
    if (values.length === 0) {
      return { count: 0, total: 0, min: 0, max: 0, avg: 0, p95: 0 };
    }

    const total = values.reduce((sum, value) => sum + value, 0);
    return {
      count: values.length,
      total,
      min: values[0],
      max: values[values.length - 1],
      avg: Number((total / values.length).toFixed(2)),
      p95: values[Math.min(values.length - 1, Math.ceil(values.length * 0.95) - 1)],
    };
  }
}
