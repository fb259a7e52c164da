import JSZip from "jszip";
import { NamingMode } from "../config";
import { ArchiveEntry, ConversionResult, ConversionSummary, EmptyArchiveError, PageImage } from "../types";
import { ImageEncoder } from "./jpegEncoder";

export const SUMMARY_ENTRY = "summary.json";

export interface AssembleOptions {
  namingMode: NamingMode;
  jpegQuality: number;
  includeSummary: boolean;
  encoder: ImageEncoder;
}

export interface AssembledArchive {
  archive: Buffer;
  entries: string[];
  summary: ConversionSummary;
}

function compareIds(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function sortResults(results: ConversionResult[]): ConversionResult[] {
  return [...results].sort((a, b) => compareIds(a.id, b.id));
}

export function summarizeResults(results: ConversionResult[]): ConversionSummary {
  const sorted = sortResults(results);
  let succeeded = 0;
  let pages = 0;
  const documents = sorted.map((result) => {
    if (result.status === "success") {
      succeeded += 1;
      pages += result.pages.length;
      return { id: result.id, status: result.status, pages: result.pages.length };
    }
    return { id: result.id, status: result.status, error: result.error };
  });

  return {
    total: sorted.length,
    succeeded,
    failed: sorted.length - succeeded,
    pages,
    documents,
  };
}

/**
 * Archive path of one page. With a single document in scope the bare
 * `page_<n>.jpg` form is used whatever the mode.
 */
export function pageEntryPath(docId: string, pageNumber: number, namingMode: NamingMode, documentsInScope: number): string {
  if (documentsInScope <= 1) {
    return `page_${pageNumber}.jpg`;
  }
  if (namingMode === "grouped") {
    return `${docId}/page_${pageNumber}.jpg`;
  }
  return `${docId}_page_${pageNumber}.jpg`;
}

export async function buildArchiveEntries(
  results: ConversionResult[],
  options: AssembleOptions,
): Promise<ArchiveEntry[]> {
  const documentsInScope = results.length;
  const entries: ArchiveEntry[] = [];

  for (const result of sortResults(results)) {
    if (result.status !== "success") {
      continue;
    }
    const pages: PageImage[] = [...result.pages].sort((a, b) => a.pageNumber - b.pageNumber);
    for (const page of pages) {
      entries.push({
        path: pageEntryPath(result.id, page.pageNumber, options.namingMode, documentsInScope),
        data: await options.encoder.toJpeg(page, options.jpegQuality),
      });
    }
  }

  return entries;
}

/**
 * Packs every successfully converted page into a ZIP, documents ordered by id
 * and pages by number, plus `summary.json` when several documents ran.
 *
 * @throws EmptyArchiveError when no document succeeded
 */
export async function assembleArchive(results: ConversionResult[], options: AssembleOptions): Promise<AssembledArchive> {
  const summary = summarizeResults(results);
  if (summary.succeeded === 0) {
    throw new EmptyArchiveError(summary);
  }

  const entries = await buildArchiveEntries(results, options);
  const seen = new Set<string>();
  const zip = new JSZip();
  for (const entry of entries) {
    if (seen.has(entry.path)) {
      throw new Error(`Duplicate archive entry: ${entry.path}`);
    }
    seen.add(entry.path);
    zip.file(entry.path, entry.data, { binary: true });
  }

  const names = entries.map((entry) => entry.path);
  if (options.includeSummary && summary.total > 1) {
    zip.file(SUMMARY_ENTRY, JSON.stringify(summary, null, 2));
    names.push(SUMMARY_ENTRY);
  }

  const archive = await zip.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE",
    compressionOptions: { level: 6 },
  });

  return { archive, entries: names, summary };
}
