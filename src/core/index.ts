export { readRequestFile, runConvert } from "./commands";
export type { CommandContext, ConvertCommandOptions } from "./commands";
export { closeFetchDispatchers, getFetchDispatcher } from "./fetch";
export type { DispatcherOptions } from "./fetch";
export { handleEvent, parseEventBody } from "./handler";
export type { InvocationEvent, InvocationResponse } from "./handler";
export { runConversion } from "./pipeline";
export type { ConversionOverrides, PipelineContext } from "./pipeline";
export { sleep, withTimeout } from "./timeout";
export { documentPath, withWorkspace } from "./workspace";
