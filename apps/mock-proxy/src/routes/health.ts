/**
 * Unauthenticated status endpoints
 */

import type { FastifyInstance } from "fastify";
import type { MockProxyState } from "../state.js";
import { describeTokenStatus } from "../token-status.js";

export async function registerHealthRoutes(
  app: FastifyInstance,
  state: MockProxyState
): Promise<void> {
  /**
   * GET /healthz - Liveness
   */
  app.get("/healthz", async (request, reply) => {
    if (!state.config.get().healthy) {
      return reply.status(503).send({ status: "unavailable" });
    }

    return reply.send({
      status: "ok",
      timestamp: Math.floor(Date.now() / 1000),
    });
  });

  /**
   * GET /auth/status - OAuth token state
   */
  app.get("/auth/status", async (request, reply) => {
    return reply.send(describeTokenStatus(state.config.get().tokenExpiresAt));
  });
}
