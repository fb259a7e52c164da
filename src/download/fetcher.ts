import { fetch } from "undici";
import { AppConfig } from "../config";
import { getFetchDispatcher } from "../core/fetch";
import { sleep } from "../core/timeout";
import { Logger, MetricsRegistry } from "../observability";
import { errorMessage, FetchFault } from "../types";

export type FetchFn = typeof fetch;

export interface FetcherDeps {
  config: Pick<AppConfig, "userAgent" | "ignoreHttpsErrors" | "fetchTimeoutMs" | "maxFetchAttempts">;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
  retryDelayMs?: (attempt: number) => number;
}

function isRetriableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function defaultRetryDelay(attempt: number): number {
  return Math.min(1000 * 2 ** (attempt - 1), 10_000);
}

async function fetchAttempt(url: string, deps: FetcherDeps, fetchFn: FetchFn): Promise<{ statusCode: number; body?: Buffer }> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), deps.config.fetchTimeoutMs);
  try {
    const response = await fetchFn(url, {
      method: "GET",
      headers: {
        "user-agent": deps.config.userAgent,
        accept: "application/pdf,*/*",
      },
      dispatcher: getFetchDispatcher({
        ignoreHttpsErrors: deps.config.ignoreHttpsErrors,
        connectTimeoutMs: deps.config.fetchTimeoutMs,
      }),
      signal: controller.signal,
      redirect: "follow",
    });

    if (!response.ok) {
      await response.body?.cancel();
      return { statusCode: response.status };
    }

    const body = Buffer.from(await response.arrayBuffer());
    return { statusCode: response.status, body };
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Downloads a remote PDF into memory. Throttling (429) and server errors are
 * retried with exponential backoff; other 4xx responses fail at once.
 *
 * @throws FetchFault once the attempts are exhausted
 */
export async function fetchRemoteBytes(url: string, deps: FetcherDeps): Promise<Buffer> {
  const fetchFn = deps.fetchFn ?? fetch;
  const retryDelay = deps.retryDelayMs ?? defaultRetryDelay;
  const maxAttempts = Math.max(1, deps.config.maxFetchAttempts);
  const { logger, metrics } = deps;

  for (let attempt = 1; ; attempt += 1) {
    const stopTimer = metrics.startTimer("fetch_ms");
    logger.debug("fetch_attempt_start", { url, attempt });

    let outcome: { statusCode: number; body?: Buffer };
    try {
      outcome = await fetchAttempt(url, deps, fetchFn);
    } catch (error) {
      const durationMs = stopTimer();
      const aborted = error instanceof Error && error.name === "AbortError";
      const message = aborted ? `Fetch timed out after ${deps.config.fetchTimeoutMs}ms` : errorMessage(error);
      logger.warn("fetch_attempt_error", { url, attempt, durationMs, error: message });
      if (attempt >= maxAttempts) {
        metrics.incrementCounter("fetches_failed", 1);
        throw new FetchFault(message, url, undefined, { cause: error });
      }
      await sleep(retryDelay(attempt));
      continue;
    }

    const durationMs = stopTimer();
    if (outcome.body) {
      logger.info("fetch_ok", { url, attempt, durationMs, bytes: outcome.body.length });
      return outcome.body;
    }

    const statusCode = outcome.statusCode;
    if (!isRetriableStatus(statusCode) || attempt >= maxAttempts) {
      logger.warn("fetch_failed_http", { url, attempt, durationMs, statusCode });
      metrics.incrementCounter("fetches_failed", 1);
      throw new FetchFault(`HTTP ${statusCode}`, url, statusCode);
    }

    logger.warn("fetch_retry_http", { url, attempt, durationMs, statusCode });
    await sleep(retryDelay(attempt));
  }
}
