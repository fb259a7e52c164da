import { ConversionSummary, EmptyArchiveError, errorMessage, InvalidInputError } from "../types";
import { ConversionOverrides, PipelineContext, runConversion } from "./pipeline";

export interface InvocationEvent {
  body?: unknown;
  isBase64Encoded?: boolean;
}

export interface InvocationResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

const JSON_HEADERS = { "Content-Type": "application/json" };

function parseJsonText(text: string): { ok: true; value: unknown } | { ok: false } {
  const trimmed = text.trim();
  if (!trimmed.startsWith("{") && !trimmed.startsWith("[") && !trimmed.startsWith('"')) {
    return { ok: false };
  }
  try {
    const value: unknown = JSON.parse(trimmed);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Reads the request out of an invocation event: a JSON body when it parses,
 * otherwise the raw body as a bare payload.
 */
export function parseEventBody(event: InvocationEvent): unknown {
  const body = event.body;
  if (body === undefined || body === null) {
    throw new InvalidInputError("No body found in request");
  }
  if (typeof body !== "string") {
    return body;
  }

  if (event.isBase64Encoded) {
    const bytes = Buffer.from(body, "base64");
    const parsed = parseJsonText(bytes.toString("utf-8"));
    return parsed.ok ? parsed.value : bytes;
  }

  const parsed = parseJsonText(body);
  return parsed.ok ? parsed.value : body;
}

function failuresOf(summary: ConversionSummary): Array<{ id: string; code: string; message: string }> {
  return summary.documents.flatMap((doc) =>
    doc.error ? [{ id: doc.id, code: doc.error.code, message: doc.error.message }] : [],
  );
}

function jsonResponse(statusCode: number, payload: Record<string, unknown>): InvocationResponse {
  return { statusCode, headers: { ...JSON_HEADERS }, body: JSON.stringify(payload) };
}

/**
 * Adapts one invocation event to the conversion pipeline. Partial success is
 * a 200 carrying the failures; input errors are 400; zero converted
 * documents or an unexpected fault are 500.
 */
export async function handleEvent(
  event: InvocationEvent,
  ctx: PipelineContext,
  overrides: ConversionOverrides = {},
): Promise<InvocationResponse> {
  const { logger } = ctx;
  try {
    const request = parseEventBody(event);
    const { archive, entries, summary } = await runConversion(request, ctx, overrides);
    return jsonResponse(200, {
      status: "success",
      total: summary.total,
      succeeded: summary.succeeded,
      failed: summary.failed,
      pages: summary.pages,
      entries,
      failures: failuresOf(summary),
      archive: archive.toString("base64"),
    });
  } catch (error) {
    if (error instanceof InvalidInputError) {
      logger.warn("invocation_rejected", { error: error.message });
      return jsonResponse(400, { status: "error", error: error.message });
    }
    if (error instanceof EmptyArchiveError) {
      logger.error("invocation_empty_archive", { total: error.summary.total, failed: error.summary.failed });
      return jsonResponse(500, {
        status: "error",
        error: error.message,
        total: error.summary.total,
        succeeded: 0,
        failed: error.summary.failed,
        failures: failuresOf(error.summary),
      });
    }
    logger.error("invocation_failed", { error: errorMessage(error) });
    return jsonResponse(500, { status: "error", error: errorMessage(error) });
  }
}
