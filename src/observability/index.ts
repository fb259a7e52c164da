export { createSilentLogger, Logger } from "./logger";
export type { LoggerContext } from "./logger";
export { MetricsRegistry } from "./metrics";
export type { MetricsSnapshot, TimerSummary } from "./metrics";
export { createRunId } from "./runId";
export type { LogFields, LogLevel, LogThreshold, MetricCounterName, MetricTimerName } from "./types";
