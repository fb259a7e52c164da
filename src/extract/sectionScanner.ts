import { decodeText, detectCharset, TextCharset } from "./encoding";

export type ScanState = "seeking-marker" | "in-headers" | "in-body";

export interface PayloadLine {
  index: number;
  text: string;
  /** Byte offset of the first byte of the line. */
  start: number;
  /** Byte offset just past the line, excluding the `\n` terminator. */
  end: number;
}

export interface CandidateSection {
  markerLine: number;
  bodyLines: PayloadLine[];
  /** Byte range of the body within the scanned buffer. */
  bodyStart: number;
  bodyEnd: number;
  closedBy: "boundary" | "end-of-input";
}

export interface AbandonedSection {
  markerLine: number;
  reason: "boundary-in-headers" | "no-body";
}

export interface ScanOutcome {
  charset: TextCharset;
  lineCount: number;
  sections: CandidateSection[];
  abandoned: AbandonedSection[];
}

const PDF_CONTENT_TYPE = /application\/pdf/i;
const PDF_FILENAME = /filename\*?=\s*(?:"[^"]*\.pdf"|'[^']*\.pdf'|[^\s;]*\.pdf)/i;

export function splitLines(bytes: Buffer, charset: TextCharset): PayloadLine[] {
  const lines: PayloadLine[] = [];
  let start = 0;
  while (start <= bytes.length) {
    const newline = bytes.indexOf(0x0a, start);
    const end = newline === -1 ? bytes.length : newline;
    lines.push({ index: lines.length, text: decodeText(bytes.subarray(start, end), charset), start, end });
    if (newline === -1) {
      break;
    }
    start = newline + 1;
  }
  return lines;
}

export function isSectionMarker(text: string): boolean {
  return PDF_CONTENT_TYPE.test(text) || PDF_FILENAME.test(text);
}

export function isBoundaryLine(text: string, minBoundaryLength: number): boolean {
  const trimmed = text.trimEnd();
  return trimmed.startsWith("--") && trimmed.length > minBoundaryLength;
}

function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

/**
 * Walks the payload line by line and collects the bodies of every part that
 * announces a PDF, either by content type or by a `.pdf` file name.
 *
 *   seeking-marker --marker--> in-headers --blank--> in-body --boundary--> seeking-marker
 *                              in-headers --boundary--> seeking-marker (abandoned)
 */
export function scanSections(bytes: Buffer, minBoundaryLength: number): ScanOutcome {
  const charset = detectCharset(bytes);
  const lines = splitLines(bytes, charset);
  const sections: CandidateSection[] = [];
  const abandoned: AbandonedSection[] = [];

  let state: ScanState = "seeking-marker";
  let markerLine = -1;
  let bodyLines: PayloadLine[] = [];

  const closeBody = (bodyEnd: number, closedBy: CandidateSection["closedBy"]): void => {
    const bodyStart = bodyLines.length > 0 ? bodyLines[0].start : bodyEnd;
    sections.push({ markerLine, bodyLines, bodyStart, bodyEnd, closedBy });
    bodyLines = [];
  };

  for (const line of lines) {
    switch (state) {
      case "seeking-marker":
        if (isSectionMarker(line.text)) {
          state = "in-headers";
          markerLine = line.index;
        }
        break;
      case "in-headers":
        if (isBlank(line.text)) {
          state = "in-body";
          bodyLines = [];
        } else if (isBoundaryLine(line.text, minBoundaryLength)) {
          abandoned.push({ markerLine, reason: "boundary-in-headers" });
          state = "seeking-marker";
        }
        break;
      case "in-body":
        if (isBoundaryLine(line.text, minBoundaryLength)) {
          closeBody(line.start, "boundary");
          state = "seeking-marker";
        } else {
          bodyLines.push(line);
        }
        break;
    }
  }

  if (state === "in-body") {
    closeBody(bytes.length, "end-of-input");
  } else if (state === "in-headers") {
    abandoned.push({ markerLine, reason: "no-body" });
  }

  return { charset, lineCount: lines.length, sections, abandoned };
}
