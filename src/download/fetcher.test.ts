import assert from "node:assert/strict";
import { after, test } from "node:test";
import { Headers, Response } from "undici";

import { closeFetchDispatchers } from "../core/fetch";
import { createSilentLogger, MetricsRegistry } from "../observability";
import { FetchFault } from "../types";
import { fetchRemoteBytes, FetchFn, FetcherDeps } from "./fetcher";

after(closeFetchDispatchers);

const URL_UNDER_TEST = "https://files.example.test/report.pdf";

function deps(fetchFn: FetchFn, maxFetchAttempts = 3): FetcherDeps & { metrics: MetricsRegistry } {
  return {
    config: { userAgent: "test-agent", ignoreHttpsErrors: false, fetchTimeoutMs: 1_000, maxFetchAttempts },
    logger: createSilentLogger(),
    metrics: new MetricsRegistry(),
    fetchFn,
    retryDelayMs: () => 0,
  };
}

test("fetchRemoteBytes returns the body of a successful response", async () => {
  const seen: Array<{ url: string; userAgent: string | null; method?: string }> = [];
  const fetchFn: FetchFn = async (input, init) => {
    seen.push({ url: String(input), userAgent: new Headers(init?.headers).get("user-agent"), method: init?.method });
    return new Response(Buffer.from("%PDF-1.4 body"), { status: 200 });
  };

  const bytes = await fetchRemoteBytes(URL_UNDER_TEST, deps(fetchFn));

  assert.equal(bytes.toString("latin1"), "%PDF-1.4 body");
  assert.deepEqual(seen, [{ url: URL_UNDER_TEST, userAgent: "test-agent", method: "GET" }]);
});

test("a 404 fails at once with FetchFault", async () => {
  let calls = 0;
  const fetchFn: FetchFn = async () => {
    calls += 1;
    return new Response("missing", { status: 404 });
  };
  const context = deps(fetchFn);

  await assert.rejects(
    fetchRemoteBytes(URL_UNDER_TEST, context),
    (error: unknown) => error instanceof FetchFault && error.statusCode === 404 && error.message === "HTTP 404",
  );
  assert.equal(calls, 1);
  assert.equal(context.metrics.getCounters().fetches_failed, 1);
});

test("server errors are retried until a response succeeds", async () => {
  const statuses = [503, 429, 200];
  const fetchFn: FetchFn = async () => {
    const status = statuses.shift() ?? 500;
    return new Response(status === 200 ? "%PDF-1.4" : "busy", { status });
  };

  const bytes = await fetchRemoteBytes(URL_UNDER_TEST, deps(fetchFn, 3));

  assert.equal(bytes.toString("latin1"), "%PDF-1.4");
  assert.deepEqual(statuses, []);
});

test("network errors become FetchFault once attempts run out", async () => {
  let calls = 0;
  const fetchFn: FetchFn = async () => {
    calls += 1;
    throw new TypeError("fetch failed");
  };

  await assert.rejects(
    fetchRemoteBytes(URL_UNDER_TEST, deps(fetchFn, 2)),
    (error: unknown) => error instanceof FetchFault && error.message === "fetch failed" && error.url === URL_UNDER_TEST,
  );
  assert.equal(calls, 2);
});
