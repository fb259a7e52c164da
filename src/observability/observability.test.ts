import assert from "node:assert/strict";
import { test } from "node:test";

import { Logger } from "./logger";
import { MetricsRegistry } from "./metrics";
import { createRunId } from "./runId";
import { LogLevel } from "./types";

function capturingLogger(level: "debug" | "info" | "warn" = "info") {
  const lines: Array<{ level: LogLevel; record: unknown }> = [];
  const logger = new Logger({
    component: "pipeline",
    runId: "conv-test",
    level,
    write: (lineLevel, line) => lines.push({ level: lineLevel, record: JSON.parse(line) }),
  });
  return { logger, lines };
}

test("Logger writes one JSON record per enabled call and filters below its level", () => {
  const { logger, lines } = capturingLogger("info");

  logger.debug("hidden");
  logger.child("worker").warn("render_slow", { docId: "doc_1" });

  assert.equal(lines.length, 1);
  assert.equal(lines[0].level, "warn");
  const record = lines[0].record;
  assert.ok(record !== null && typeof record === "object");
  assert.deepEqual(
    { ...record, ts: undefined },
    { ts: undefined, level: "warn", msg: "render_slow", component: "worker", runId: "conv-test", docId: "doc_1" },
  );
});

test("MetricsRegistry counts and summarizes recorded durations", () => {
  const metrics = new MetricsRegistry();
  metrics.incrementCounter("pages_rendered", 3);
  metrics.incrementCounter("pages_rendered");
  for (const duration of [40, 10, 30, 20]) {
    metrics.recordDuration("render_ms", duration);
  }

  const snapshot = metrics.snapshot();
  assert.equal(snapshot.counters.pages_rendered, 4);
  assert.equal(snapshot.counters.conversions_ok, 0);
  assert.deepEqual(snapshot.timers.render_ms, { count: 4, min: 10, max: 40, avg: 25, p95: 40 });
  assert.deepEqual(snapshot.timers.fetch_ms, { count: 0, min: 0, max: 0, avg: 0, p95: 0 });
});

test("logSummary emits the snapshot as one info record", () => {
  const { logger, lines } = capturingLogger();
  const metrics = new MetricsRegistry();
  metrics.incrementCounter("tasks_submitted", 2);

  metrics.logSummary(logger);

  assert.equal(lines.length, 1);
  const record = lines[0].record;
  assert.ok(record !== null && typeof record === "object" && "counters" in record && "msg" in record);
  assert.equal(record.msg, "metrics_summary");
  assert.deepEqual(record.counters, { ...metrics.getCounters() });
});

test("createRunId stamps the prefix and a path-safe UTC time", () => {
  assert.match(createRunId(new Date("2026-03-04T05:06:07.000Z")), /^conv_2026-03-04T05-06-07-000Z_[0-9a-z]*$/);
});
