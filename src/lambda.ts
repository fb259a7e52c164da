import { loadConfig } from "./config";
import { handleEvent, InvocationEvent, InvocationResponse } from "./core";
import { createRunId, Logger, MetricsRegistry } from "./observability";

/** Function-as-a-service entry point: one event in, one JSON response out. */
export async function handler(event: InvocationEvent): Promise<InvocationResponse> {
  const config = loadConfig(process.env.CONFIG_PATH);
  const runId = createRunId();
  const logger = new Logger({ component: "handler", runId, level: config.logLevel });
  const metrics = new MetricsRegistry();
  const response = await handleEvent(event, { runId, config, logger, metrics });
  logger.info("invocation_complete", { statusCode: response.statusCode });
  metrics.logSummary(logger);
  return response;
}
