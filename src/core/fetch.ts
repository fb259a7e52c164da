import { Agent } from "undici";

export interface DispatcherOptions {
  ignoreHttpsErrors: boolean;
  connectTimeoutMs: number;
}

const agents = new Map<string, Agent>();

/**
 * Shared undici agents, one per TLS/timeout combination, so concurrent
 * fetches of a run reuse connections. `closeFetchDispatchers` drains them.
 */
export function getFetchDispatcher(options: DispatcherOptions): Agent {
  const key = `${options.ignoreHttpsErrors ? "insecure" : "verified"}:${options.connectTimeoutMs}`;
  let agent = agents.get(key);
  if (!agent) {
    agent = new Agent({
      connect: {
        rejectUnauthorized: !options.ignoreHttpsErrors,
        timeout: options.connectTimeoutMs,
      },
    });
    agents.set(key, agent);
  }
  return agent;
}

export async function closeFetchDispatchers(): Promise<void> {
  const open = [...agents.values()];
  agents.clear();
  await Promise.all(open.map((agent) => agent.close()));
}
