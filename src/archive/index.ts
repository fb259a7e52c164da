export {
  assembleArchive,
  buildArchiveEntries,
  pageEntryPath,
  sortResults,
  SUMMARY_ENTRY,
  summarizeResults,
} from "./assembler";
export type { AssembledArchive, AssembleOptions } from "./assembler";
export { CanvasJpegEncoder } from "./jpegEncoder";
export type { ImageEncoder } from "./jpegEncoder";
