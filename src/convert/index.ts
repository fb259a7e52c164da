export { DocumentIdRegistry } from "./documentIds";
export { PdfParseRasterizer } from "./rasterizer";
export type { Rasterizer } from "./rasterizer";
export { effectiveConcurrency, processWithConcurrency, runScheduler } from "./scheduler";
export type { SchedulerOptions } from "./scheduler";
export { convertTask, subDocumentId, toFailure } from "./worker";
export type { ConversionWorkerDeps, WorkerConfig } from "./worker";
