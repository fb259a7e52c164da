import { Logger } from "../observability";
import { ExtractedDocument, ExtractionError } from "../types";
import {
  decodeBase64Strict,
  decodeOuterPayload,
  hasPdfSignature,
  PDF_EOF_MARKER,
  PDF_SIGNATURE,
  trimBytes,
} from "./encoding";
import { CandidateSection, scanSections } from "./sectionScanner";

export interface ExtractOptions {
  /** Lines starting with `--` count as multipart boundaries only when longer than this. */
  minBoundaryLength: number;
  logger?: Logger;
}

export const DEFAULT_MIN_BOUNDARY_LENGTH = 10;

type SectionVerdict =
  | { accepted: true; document: Omit<ExtractedDocument, "index"> }
  | { accepted: false; reason: string };

function decodeSection(bytes: Buffer, section: CandidateSection): SectionVerdict {
  const joined = section.bodyLines
    .map((line) => line.text)
    .join("\n")
    .trim();
  if (joined.length === 0) {
    return { accepted: false, reason: "empty_body" };
  }

  const decoded = decodeBase64Strict(joined);
  if (decoded && hasPdfSignature(decoded)) {
    return { accepted: true, document: { bytes: decoded, origin: "section-base64" } };
  }

  const raw = trimBytes(bytes.subarray(section.bodyStart, section.bodyEnd));
  if (hasPdfSignature(raw)) {
    return { accepted: true, document: { bytes: Buffer.from(raw), origin: "section-raw" } };
  }

  return { accepted: false, reason: decoded ? "base64_without_signature" : "not_base64_without_signature" };
}

/**
 * Finds literal PDF spans in a buffer. A span starts at `%PDF` and runs to the
 * next `%%EOF` inclusive, else up to the next signature, else to the end of
 * the buffer.
 */
export function scanForPdfSpans(bytes: Buffer): Buffer[] {
  const spans: Buffer[] = [];
  let start = bytes.indexOf(PDF_SIGNATURE);

  while (start !== -1) {
    const next = bytes.indexOf(PDF_SIGNATURE, start + PDF_SIGNATURE.length);
    const limit = next === -1 ? bytes.length : next;
    const eof = bytes.indexOf(PDF_EOF_MARKER, start + PDF_SIGNATURE.length);
    const end = eof !== -1 && eof + PDF_EOF_MARKER.length <= limit ? eof + PDF_EOF_MARKER.length : limit;

    spans.push(Buffer.from(bytes.subarray(start, end)));
    start = next;
  }

  return spans;
}

/**
 * Recovers every PDF embedded in a multipart-like payload. Parts announced as
 * PDFs are tried first (base64 body, then raw body); when none of them yields
 * a signed document the decoded bytes are scanned for literal PDF spans.
 *
 * @throws ExtractionError when no document can be recovered
 */
export function extractPdfDocuments(blob: string | Uint8Array, options: ExtractOptions): ExtractedDocument[] {
  const bytes = decodeOuterPayload(blob);
  const logger = options.logger;
  const scan = scanSections(bytes, options.minBoundaryLength);

  logger?.debug("extract_scan_complete", {
    payloadBytes: bytes.length,
    charset: scan.charset,
    lineCount: scan.lineCount,
    sections: scan.sections.length,
    abandoned: scan.abandoned.length,
  });
  for (const section of scan.abandoned) {
    logger?.debug("extract_section_abandoned", { markerLine: section.markerLine, reason: section.reason });
  }

  const documents: ExtractedDocument[] = [];
  let rejected = 0;
  for (const section of scan.sections) {
    const verdict = decodeSection(bytes, section);
    if (verdict.accepted) {
      documents.push({ ...verdict.document, index: documents.length });
      logger?.debug("extract_section_accepted", {
        markerLine: section.markerLine,
        origin: verdict.document.origin,
        documentBytes: verdict.document.bytes.length,
      });
    } else {
      rejected += 1;
      logger?.debug("extract_section_rejected", {
        markerLine: section.markerLine,
        bodyBytes: section.bodyEnd - section.bodyStart,
        closedBy: section.closedBy,
        reason: verdict.reason,
      });
    }
  }

  if (documents.length > 0) {
    return documents;
  }

  const spans = scanForPdfSpans(bytes);
  logger?.debug("extract_binary_scan", { payloadBytes: bytes.length, spans: spans.length });
  if (spans.length > 0) {
    return spans.map((span, index): ExtractedDocument => ({ bytes: span, origin: "binary-scan", index }));
  }

  const diagnosis =
    scan.sections.length === 0
      ? `no PDF section markers found${scan.abandoned.length > 0 ? ` (${scan.abandoned.length} without a body)` : ""} and no %PDF signature in the payload`
      : `${rejected} PDF section(s) found but none decoded to a %PDF document, and no %PDF signature in the payload`;
  throw new ExtractionError(bytes.length, diagnosis);
}

/**
 * Bytes that already carry the PDF signature are a single document; anything
 * else is treated as an envelope and handed to the extractor.
 */
export function resolvePdfDocuments(bytes: Buffer, options: ExtractOptions): ExtractedDocument[] {
  if (hasPdfSignature(bytes)) {
    return [{ bytes, origin: "direct", index: 0 }];
  }
  return extractPdfDocuments(bytes, options);
}
