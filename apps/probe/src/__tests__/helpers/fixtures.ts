import { buildMockProxy, type MockProxy, type MockProxyConfig } from "@maximize-probe/mock-proxy";
import { ProxyClient, type FetchLike } from "../../http/proxy-client.js";
import { ConsoleReporter } from "../../output/console-reporter.js";
import { MemorySink } from "./memory-sink.js";
import type { ProbeContext } from "../../checks/types.js";
import { injectFetch } from "./inject-fetch.js";

export const TEST_BASE_URL = "http://proxy.test";
export const TEST_API_KEY = "test-secret";

export interface ProbeHarness {
  mock: MockProxy;
  sink: MemorySink;
  ctx: ProbeContext;
}

export interface ContextOptions {
  fetch: FetchLike;
  apiKey?: string;
  signal?: AbortSignal;
  ruleWidth?: number;
}

/**
 * Probe context with colorless output captured in memory
 */
export function createContext(options: ContextOptions): { ctx: ProbeContext; sink: MemorySink } {
  const apiKey = options.apiKey ?? TEST_API_KEY;
  const sink = new MemorySink();

  return {
    sink,
    ctx: {
      client: new ProxyClient({
        baseUrl: TEST_BASE_URL,
        apiKey,
        fetch: options.fetch,
        signal: options.signal,
      }),
      reporter: new ConsoleReporter({ color: false, sink, ruleWidth: options.ruleWidth }),
      settings: {
        baseUrl: TEST_BASE_URL,
        apiKey,
        healthTimeoutMs: 1000,
        requestTimeoutMs: 1000,
      },
    },
  };
}

/**
 * Mock proxy plus a probe context wired to it through inject()
 */
export async function createProbeHarness(
  config: Partial<MockProxyConfig> = {},
  options: Omit<ContextOptions, "fetch"> = {}
): Promise<ProbeHarness> {
  const mock = await buildMockProxy({ config });
  const { ctx, sink } = createContext({ ...options, fetch: injectFetch(mock.app) });
  return { mock, sink, ctx };
}
