export type TaskSource =
  | { kind: "inline-content"; content: string | Buffer }
  | { kind: "inline-multipart-blob"; blob: string | Buffer }
  | { kind: "remote-url"; url: string };

export interface TaskOptions {
  dpi: number;
}

export interface ExtractionTask {
  id: string;
  source: TaskSource;
  options: TaskOptions;
}

export type DocumentOrigin = "direct" | "section-base64" | "section-raw" | "binary-scan";

export interface ExtractedDocument {
  bytes: Buffer;
  origin: DocumentOrigin;
  index: number;
}

export interface PageImage {
  pageNumber: number;
  data: Buffer;
  format: "png" | "jpeg";
  width?: number;
  height?: number;
}

export type FailureCode = "invalid_input" | "extraction_failed" | "conversion_failed" | "fetch_failed" | "timeout";

export interface ConversionFailure {
  code: FailureCode;
  message: string;
}

export type ConversionResult =
  | { id: string; status: "success"; pages: PageImage[] }
  | { id: string; status: "failure"; error: ConversionFailure };

export interface ArchiveEntry {
  path: string;
  data: Buffer;
}

export interface DocumentStatus {
  id: string;
  status: "success" | "failure";
  pages?: number;
  error?: ConversionFailure;
}

export interface ConversionSummary {
  total: number;
  succeeded: number;
  failed: number;
  pages: number;
  documents: DocumentStatus[];
}
