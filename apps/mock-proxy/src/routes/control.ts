/**
 * Control routes
 * Allows runtime behavior changes and request inspection during tests
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { MockProxyState } from "../state.js";

const configSchema = z
  .object({
    healthy: z.boolean(),
    apiKey: z.string().min(1).nullable(),
    tokenExpiresAt: z.number().int().nullable(),
    unavailableModels: z.array(z.string()),
    thinkingSupported: z.boolean(),
    upstreamAuthFailure: z.boolean(),
    responseText: z.string(),
    thinkingText: z.string(),
    streamChunkSize: z.number().int().min(1).max(4096),
  })
  .partial()
  .strict();

export async function registerControlRoutes(
  app: FastifyInstance,
  state: MockProxyState
): Promise<void> {
  /**
   * GET /__mock/config - Current behavior
   */
  app.get("/__mock/config", async (request, reply) => {
    return reply.send(state.config.get());
  });

  /**
   * POST /__mock/config - Update behavior
   */
  app.post("/__mock/config", async (request, reply) => {
    const result = configSchema.safeParse(request.body);
    if (!result.success) {
      return reply.status(400).send({
        error: "Invalid configuration",
        details: result.error.format(),
      });
    }

    const updated = state.config.update(result.data);
    request.log.info({ changes: Object.keys(result.data) }, "config updated");

    return reply.send(updated);
  });

  /**
   * POST /__mock/reset - Reset config and recorded requests
   */
  app.post("/__mock/reset", async (request, reply) => {
    state.store.reset();
    state.config.reset();

    return reply.send({
      success: true,
      message: "Store and config reset",
    });
  });

  /**
   * GET /__mock/requests - Recorded message requests
   */
  app.get("/__mock/requests", async (request, reply) => {
    return reply.send({
      stats: state.store.getStats(),
      requests: state.store.getAll(),
    });
  });
}
