import type { Logger } from "./logger";
import { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
  p95: number;
}

export interface MetricsSnapshot {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, TimerSummary>;
}

function zeroCounters(): Record<MetricCounterName, number> {
  return {
    tasks_submitted: 0,
    documents_extracted: 0,
    conversions_ok: 0,
    conversions_failed: 0,
    pages_rendered: 0,
    fetches_failed: 0,
  };
}

function summarizeDurations(values: readonly number[]): TimerSummary {
  if (values.length === 0) {
    return { count: 0, min: 0, max: 0, avg: 0, p95: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const total = sorted.reduce((sum, value) => sum + value, 0);
  const rank = Math.min(sorted.length - 1, Math.ceil(sorted.length * 0.95) - 1);
  return {
    count: sorted.length,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: Number((total / sorted.length).toFixed(2)),
    p95: sorted[rank],
  };
}

/** In-process counters and duration samples for one invocation. */
export class MetricsRegistry {
  private readonly counters = zeroCounters();
  private readonly durations: Record<MetricTimerName, number[]> = {
    fetch_ms: [],
    render_ms: [],
    assemble_ms: [],
  };

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters[name] += value;
  }

  recordDuration(name: MetricTimerName, durationMs: number): void {
    this.durations[name].push(durationMs);
  }

  /** Returns a stop function that records and returns the elapsed milliseconds. */
  startTimer(name: MetricTimerName): () => number {
    const startedAt = performance.now();
    return () => {
      const durationMs = Math.round(performance.now() - startedAt);
      this.recordDuration(name, durationMs);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return { ...this.counters };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    return {
      fetch_ms: summarizeDurations(this.durations.fetch_ms),
      render_ms: summarizeDurations(this.durations.render_ms),
      assemble_ms: summarizeDurations(this.durations.assemble_ms),
    };
  }

  snapshot(): MetricsSnapshot {
    return { counters: this.getCounters(), timers: this.getTimerSummaries() };
  }

  logSummary(logger: Logger): void {
    logger.info("metrics_summary", { ...this.snapshot() });
  }
}
