import assert from "node:assert/strict";
import { test } from "node:test";

import { sleep } from "../core/timeout";
import { createSilentLogger, MetricsRegistry } from "../observability";
import { ConversionResult, ExtractionTask } from "../types";
import { effectiveConcurrency, runScheduler } from "./scheduler";

function tasks(count: number): ExtractionTask[] {
  return Array.from({ length: count }, (_, index): ExtractionTask => ({
    id: `doc_${index + 1}`,
    source: { kind: "inline-content", content: "JVBERi0=" },
    options: { dpi: 150 },
  }));
}

test("effectiveConcurrency is bounded by the request, the ceiling and the task count", () => {
  const limits = { maxConcurrency: 3, concurrencyCeiling: 5 };
  assert.equal(effectiveConcurrency(10, limits), 3);
  assert.equal(effectiveConcurrency(10, { ...limits, concurrency: 50 }), 5);
  assert.equal(effectiveConcurrency(2, limits), 2);
  assert.equal(effectiveConcurrency(0, limits), 1);
  assert.equal(effectiveConcurrency(4, { ...limits, concurrency: 0 }), 1);
});

test("runScheduler never runs more than the cap and returns one result per task", async () => {
  let inFlight = 0;
  let maxInFlight = 0;
  const metrics = new MetricsRegistry();

  const results = await runScheduler(tasks(8), {
    maxConcurrency: 3,
    concurrencyCeiling: 5,
    logger: createSilentLogger(),
    metrics,
    worker: async (task): Promise<ConversionResult[]> => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await sleep(5 + (Number(task.id.slice(4)) % 3) * 3);
      inFlight -= 1;
      return Number(task.id.slice(4)) % 2 === 0
        ? [{ id: task.id, status: "failure", error: { code: "conversion_failed", message: "odd page tree" } }]
        : [{ id: task.id, status: "success", pages: [] }];
    },
  });

  assert.equal(maxInFlight, 3);
  assert.equal(results.length, 8);
  assert.deepEqual(
    results.map((result) => result.id).sort(),
    ["doc_1", "doc_2", "doc_3", "doc_4", "doc_5", "doc_6", "doc_7", "doc_8"],
  );
  assert.deepEqual(
    { ...metrics.getCounters() },
    {
      tasks_submitted: 8,
      documents_extracted: 0,
      conversions_ok: 4,
      conversions_failed: 4,
      pages_rendered: 0,
      fetches_failed: 0,
    },
  );
});

test("a worker that rejects only fails its own task", async () => {
  const results = await runScheduler(tasks(3), {
    maxConcurrency: 3,
    concurrencyCeiling: 5,
    logger: createSilentLogger(),
    metrics: new MetricsRegistry(),
    worker: async (task): Promise<ConversionResult[]> => {
      if (task.id === "doc_2") {
        throw new Error("worker crashed");
      }
      return [{ id: task.id, status: "success", pages: [] }];
    },
  });

  const byId = new Map(results.map((result) => [result.id, result]));
  assert.equal(byId.get("doc_1")?.status, "success");
  assert.equal(byId.get("doc_3")?.status, "success");
  assert.deepEqual(byId.get("doc_2"), {
    id: "doc_2",
    status: "failure",
    error: { code: "conversion_failed", message: "worker crashed" },
  });
});

test("fanned-out results are flattened into the collection", async () => {
  const results = await runScheduler(tasks(2), {
    maxConcurrency: 3,
    concurrencyCeiling: 5,
    logger: createSilentLogger(),
    metrics: new MetricsRegistry(),
    worker: async (task): Promise<ConversionResult[]> => [
      { id: `${task.id}_part_1`, status: "success", pages: [] },
      { id: `${task.id}_part_2`, status: "success", pages: [] },
    ],
  });

  assert.deepEqual(
    results.map((result) => result.id).sort(),
    ["doc_1_part_1", "doc_1_part_2", "doc_2_part_1", "doc_2_part_2"],
  );
});
