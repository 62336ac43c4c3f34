/**
 * Mock Maximize Proxy
 *
 * Speaks the proxy's HTTP surface without OAuth or an upstream API.
 * For local development and tests only.
 *
 * Endpoints:
 *   GET  /healthz          - Health check
 *   GET  /auth/status      - OAuth token status
 *   POST /v1/messages      - Messages API (nickname routing, SSE, thinking)
 *   GET  /__mock/config    - Current behavior
 *   POST /__mock/config    - Update behavior
 *   POST /__mock/reset     - Reset behavior and recorded requests
 *   GET  /__mock/requests  - Recorded requests
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import { MockConfigHolder, type MockProxyConfig } from "./config.js";
import { RequestStore } from "./store.js";
import type { MockProxyState } from "./state.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerMessageRoutes } from "./routes/messages.js";
import { registerControlRoutes } from "./routes/control.js";

export interface MockProxyOptions {
  logger?: FastifyServerOptions["logger"];
  config?: Partial<MockProxyConfig>;
}

export interface MockProxy {
  app: FastifyInstance;
  state: MockProxyState;
}

export async function buildMockProxy(options: MockProxyOptions = {}): Promise<MockProxy> {
  const app = Fastify({ logger: options.logger ?? false });

  const state: MockProxyState = {
    config: new MockConfigHolder(options.config),
    store: new RequestStore(),
  };

  await registerHealthRoutes(app, state);
  await registerMessageRoutes(app, state);
  await registerControlRoutes(app, state);

  return { app, state };
}

export { MODEL_MAP, resolveModel } from "./nicknames.js";
export { describeTokenStatus, type TokenStatus } from "./token-status.js";
export type { MockProxyConfig } from "./config.js";
export type { RecordedRequest, StoreStats } from "./store.js";
export type { MockProxyState } from "./state.js";
