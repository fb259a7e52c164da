export {
  DEFAULT_MIN_BOUNDARY_LENGTH,
  extractPdfDocuments,
  resolvePdfDocuments,
  scanForPdfSpans,
} from "./payloadExtractor";
export type { ExtractOptions } from "./payloadExtractor";
export { decodeBase64Strict, decodeOuterPayload, hasPdfSignature } from "./encoding";
export { isBoundaryLine, isSectionMarker, scanSections } from "./sectionScanner";
export type { CandidateSection, ScanOutcome, ScanState } from "./sectionScanner";
