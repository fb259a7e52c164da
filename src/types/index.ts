export type {
  ArchiveEntry,
  ConversionFailure,
  ConversionResult,
  ConversionSummary,
  DocumentOrigin,
  DocumentStatus,
  ExtractedDocument,
  ExtractionTask,
  FailureCode,
  PageImage,
  TaskOptions,
  TaskSource,
} from "./models";
export {
  ConversionFault,
  EmptyArchiveError,
  errorMessage,
  ExtractionError,
  FetchFault,
  InvalidInputError,
  PipelineError,
  TimeoutError,
} from "./errors";
