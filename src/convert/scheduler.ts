import { Logger, MetricsRegistry } from "../observability";
import { ConversionResult, ExtractionTask } from "../types";
import { toFailure } from "./worker";

export interface SchedulerOptions {
  /** Requested cap; defaults to `maxConcurrency`. */
  concurrency?: number;
  maxConcurrency: number;
  /** Hard ceiling applied whatever the caller requests. */
  concurrencyCeiling: number;
  worker: (task: ExtractionTask) => Promise<ConversionResult[]>;
  logger: Logger;
  metrics: MetricsRegistry;
}

export function effectiveConcurrency(
  taskCount: number,
  options: Pick<SchedulerOptions, "concurrency" | "maxConcurrency" | "concurrencyCeiling">,
): number {
  const requested = options.concurrency ?? options.maxConcurrency;
  return Math.max(1, Math.min(requested, options.concurrencyCeiling, taskCount));
}

export async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let index = 0;
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current]);
    }
  });
  await Promise.all(slots);
}

/**
 * Runs every task through `worker` with at most the effective concurrency in
 * flight. Results are flattened in completion order; a task that fails never
 * affects the others.
 */
export async function runScheduler(tasks: ExtractionTask[], options: SchedulerOptions): Promise<ConversionResult[]> {
  const { logger, metrics } = options;
  const concurrency = effectiveConcurrency(tasks.length, options);
  const completed: ConversionResult[] = [];

  metrics.incrementCounter("tasks_submitted", tasks.length);
  logger.info("schedule_start", { tasks: tasks.length, concurrency });

  await processWithConcurrency(tasks, concurrency, async (task) => {
    let results: ConversionResult[];
    try {
      results = await options.worker(task);
    } catch (error) {
      logger.error("schedule_worker_rejected", { taskId: task.id, error: toFailure(error).message });
      results = [{ id: task.id, status: "failure", error: toFailure(error) }];
    }

    for (const result of results) {
      completed.push(result);
      if (result.status === "success") {
        metrics.incrementCounter("conversions_ok", 1);
      } else {
        metrics.incrementCounter("conversions_failed", 1);
      }
    }
    logger.debug("schedule_task_complete", { taskId: task.id, results: results.length });
  });

  const ok = completed.filter((result) => result.status === "success").length;
  logger.info("schedule_complete", { tasks: tasks.length, documents: completed.length, ok, failed: completed.length - ok });
  return completed;
}
