import { assembleArchive, AssembledArchive, CanvasJpegEncoder, ImageEncoder, SUMMARY_ENTRY } from "../archive";
import { AppConfig, NamingMode } from "../config";
import { convertTask, DocumentIdRegistry, PdfParseRasterizer, Rasterizer, runScheduler } from "../convert";
import { FetchFn } from "../download/fetcher";
import { normalizeRequest } from "../normalize";
import { Logger, MetricsRegistry } from "../observability";
import { withWorkspace } from "./workspace";

export interface PipelineContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  rasterizer?: Rasterizer;
  encoder?: ImageEncoder;
  fetchFn?: FetchFn;
  fetchRetryDelayMs?: (attempt: number) => number;
}

export interface ConversionOverrides {
  namingMode?: NamingMode;
  concurrency?: number;
  includeSummary?: boolean;
}

/**
 * One invocation: normalize the request, convert every task inside a scoped
 * working directory, then assemble the archive.
 *
 * @throws InvalidInputError before any work when the request is unusable
 * @throws EmptyArchiveError when every document failed
 */
export async function runConversion(
  request: unknown,
  ctx: PipelineContext,
  overrides: ConversionOverrides = {},
): Promise<AssembledArchive> {
  const { config, logger, metrics } = ctx;
  const tasks = normalizeRequest(request, config);
  logger.info("conversion_start", {
    tasks: tasks.length,
    sources: tasks.map((task) => task.source.kind),
  });

  const rasterizer = ctx.rasterizer ?? new PdfParseRasterizer();
  const documentIds = new DocumentIdRegistry([SUMMARY_ENTRY, ...tasks.map((task) => task.id)]);
  const results = await withWorkspace(config.workDir, ctx.runId, (workDir) =>
    runScheduler(tasks, {
      concurrency: overrides.concurrency,
      maxConcurrency: config.maxConcurrency,
      concurrencyCeiling: config.concurrencyCeiling,
      logger: logger.child("scheduler"),
      metrics,
      worker: (task) =>
        convertTask(task, {
          config,
          workDir,
          rasterizer,
          documentIds,
          logger: logger.child("worker"),
          metrics,
          fetchFn: ctx.fetchFn,
          fetchRetryDelayMs: ctx.fetchRetryDelayMs,
        }),
    }),
  );

  const stopTimer = metrics.startTimer("assemble_ms");
  const assembled = await assembleArchive(results, {
    namingMode: overrides.namingMode ?? config.namingMode,
    includeSummary: overrides.includeSummary ?? config.includeSummary,
    jpegQuality: config.jpegQuality,
    encoder: ctx.encoder ?? new CanvasJpegEncoder(),
  });
  const durationMs = stopTimer();

  logger.info("conversion_complete", {
    total: assembled.summary.total,
    succeeded: assembled.summary.succeeded,
    failed: assembled.summary.failed,
    pages: assembled.summary.pages,
    archiveBytes: assembled.archive.length,
    durationMs,
  });
  return assembled;
}
