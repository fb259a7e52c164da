export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogThreshold = LogLevel | "silent";

export interface LogFields {
  docId?: string;
  taskId?: string;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "tasks_submitted"
  | "documents_extracted"
  | "conversions_ok"
  | "conversions_failed"
  | "pages_rendered"
  | "fetches_failed";

export type MetricTimerName = "fetch_ms" | "render_ms" | "assemble_ms";
