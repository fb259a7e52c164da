import { ConversionSummary, FailureCode } from "./models";

export abstract class PipelineError extends Error {
  abstract readonly code: FailureCode | "empty_archive";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or empty top-level request; rejected before any work starts. */
export class InvalidInputError extends PipelineError {
  readonly code = "invalid_input";
}

/** A payload produced zero recoverable PDF documents. */
export class ExtractionError extends PipelineError {
  readonly code = "extraction_failed";

  constructor(
    readonly payloadLength: number,
    readonly diagnosis: string,
  ) {
    super(`No PDF document recovered from ${payloadLength}-byte payload: ${diagnosis}`);
  }
}

export class ConversionFault extends PipelineError {
  readonly code = "conversion_failed";
}

export class FetchFault extends PipelineError {
  readonly code = "fetch_failed";

  constructor(
    message: string,
    readonly url: string,
    readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class TimeoutError extends PipelineError {
  readonly code = "timeout";

  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

/** Every document failed, so there is nothing to archive. */
export class EmptyArchiveError extends PipelineError {
  readonly code = "empty_archive";

  constructor(readonly summary: ConversionSummary) {
    super(`Failed to convert any PDFs (${summary.failed} of ${summary.total} documents failed)`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
