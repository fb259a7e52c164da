import fs from "node:fs";
import { AppConfig } from "../config";
import { withTimeout } from "../core/timeout";
import { documentPath } from "../core/workspace";
import { fetchRemoteBytes, FetchFn } from "../download/fetcher";
import { decodeOuterPayload, extractPdfDocuments, resolvePdfDocuments } from "../extract";
import { Logger, MetricsRegistry } from "../observability";
import {
  ConversionFailure,
  ConversionFault,
  ConversionResult,
  errorMessage,
  ExtractedDocument,
  ExtractionTask,
  PipelineError,
} from "../types";
import { DocumentIdRegistry } from "./documentIds";
import { Rasterizer } from "./rasterizer";

export type WorkerConfig = Pick<
  AppConfig,
  "minBoundaryLength" | "renderTimeoutMs" | "userAgent" | "ignoreHttpsErrors" | "fetchTimeoutMs" | "maxFetchAttempts"
>;

export interface ConversionWorkerDeps {
  config: WorkerConfig;
  workDir: string;
  rasterizer: Rasterizer;
  /** Shared by every worker of the run so fan-out ids never collide with task ids. */
  documentIds: DocumentIdRegistry;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
  fetchRetryDelayMs?: (attempt: number) => number;
}

export function toFailure(error: unknown): ConversionFailure {
  if (error instanceof PipelineError) {
    const code = error.code;
    if (code !== "empty_archive") {
      return { code, message: error.message };
    }
  }
  return { code: "conversion_failed", message: errorMessage(error) };
}

export function subDocumentId(taskId: string, position: number): string {
  return `${taskId}_part_${position}`;
}

async function resolveDocuments(task: ExtractionTask, deps: ConversionWorkerDeps): Promise<ExtractedDocument[]> {
  const extractOptions = {
    minBoundaryLength: deps.config.minBoundaryLength,
    logger: deps.logger,
  };
  const source = task.source;

  switch (source.kind) {
    case "inline-content": {
      const bytes = typeof source.content === "string" ? decodeOuterPayload(source.content) : source.content;
      return resolvePdfDocuments(bytes, extractOptions);
    }
    case "inline-multipart-blob":
      return extractPdfDocuments(source.blob, extractOptions);
    case "remote-url": {
      const bytes = await fetchRemoteBytes(source.url, {
        config: deps.config,
        logger: deps.logger,
        metrics: deps.metrics,
        fetchFn: deps.fetchFn,
        retryDelayMs: deps.fetchRetryDelayMs,
      });
      return resolvePdfDocuments(bytes, extractOptions);
    }
  }
}

async function renderDocument(
  docId: string,
  document: ExtractedDocument,
  dpi: number,
  deps: ConversionWorkerDeps,
): Promise<ConversionResult> {
  const { logger, metrics } = deps;
  const filePath = documentPath(deps.workDir, docId);
  const stopTimer = metrics.startTimer("render_ms");

  try {
    await fs.promises.writeFile(filePath, document.bytes);
    const pages = await withTimeout(
      deps.rasterizer.rasterize(filePath, dpi).catch((error: unknown) => {
        throw new ConversionFault(`Rasterizer failed: ${errorMessage(error)}`, { cause: error });
      }),
      deps.config.renderTimeoutMs,
      "Rasterization",
    );
    const durationMs = stopTimer();
    metrics.incrementCounter("pages_rendered", pages.length);
    logger.info("convert_document_ok", { docId, dpi, pageCount: pages.length, durationMs, origin: document.origin });
    return { id: docId, status: "success", pages };
  } catch (error) {
    const durationMs = stopTimer();
    const failure = toFailure(error);
    logger.warn("convert_document_error", { docId, durationMs, code: failure.code, error: failure.message });
    return { id: docId, status: "failure", error: failure };
  } finally {
    await fs.promises.rm(filePath, { force: true }).catch((error: unknown) => {
      logger.warn("convert_cleanup_error", { docId, error: errorMessage(error) });
    });
  }
}

/**
 * Converts one task into one result per recovered document. Every fault ends
 * up as a failure result; the returned promise does not reject.
 */
export async function convertTask(task: ExtractionTask, deps: ConversionWorkerDeps): Promise<ConversionResult[]> {
  const { logger, metrics } = deps;

  let documents: ExtractedDocument[];
  try {
    documents = await resolveDocuments(task, deps);
  } catch (error) {
    const failure = toFailure(error);
    logger.warn("convert_task_unresolved", { taskId: task.id, source: task.source.kind, code: failure.code, error: failure.message });
    return [{ id: task.id, status: "failure", error: failure }];
  }

  metrics.incrementCounter("documents_extracted", documents.length);
  logger.debug("convert_task_resolved", { taskId: task.id, source: task.source.kind, documents: documents.length });

  const results: ConversionResult[] = [];
  for (const document of documents) {
    const docId = documents.length === 1 ? task.id : deps.documentIds.claim(subDocumentId(task.id, document.index + 1));
    results.push(await renderDocument(docId, document, task.options.dpi, deps));
  }
  return results;
}
