/**
 * Mock Messages endpoint
 * Mimics the proxy's POST /v1/messages: API-key auth, nickname routing,
 * thinking budget handling and streamed or buffered responses
 */

import { Readable } from "node:stream";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type { MockProxyState } from "../state.js";
import { resolveModel } from "../nicknames.js";
import {
  buildMessage,
  buildStreamFrames,
  contentText,
  errorEnvelope,
  estimateTokens,
} from "../anthropic.js";

const DEFAULT_THINKING_BUDGET = 16000;
const MIN_RESPONSE_TOKENS = 1024;

const messageRequestSchema = z
  .object({
    model: z.string().min(1),
    max_tokens: z.number().int().positive(),
    messages: z
      .array(
        z.object({
          role: z.enum(["user", "assistant"]),
          content: z.union([z.string(), z.array(z.record(z.unknown()))]),
        })
      )
      .min(1),
    stream: z.boolean().default(false),
    thinking: z
      .object({
        type: z.enum(["enabled", "disabled"]),
        budget_tokens: z.number().int().positive().default(DEFAULT_THINKING_BUDGET),
      })
      .optional(),
  })
  .passthrough();

/**
 * Extract the caller's key from `Authorization` (Bearer or bare) or `x-api-key`
 */
export function extractApiKey(headers: FastifyRequest["headers"]): string | undefined {
  const raw = headers.authorization ?? headers["x-api-key"];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (value === undefined) return undefined;
  return value.startsWith("Bearer ") ? value.slice("Bearer ".length) : value;
}

function requireApiKey(state: MockProxyState) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const required = state.config.get().apiKey;
    if (required === null) return;

    const provided = extractApiKey(request.headers);
    if (provided === undefined) {
      request.log.warn("API request missing authorization header");
      return reply
        .status(401)
        .send(
          errorEnvelope(
            "authentication_error",
            "Missing API key. Provide via Authorization header."
          )
        );
    }

    if (provided !== required) {
      request.log.warn("API request with invalid API key");
      return reply.status(401).send(errorEnvelope("authentication_error", "Invalid API key"));
    }
  };
}

export async function registerMessageRoutes(
  app: FastifyInstance,
  state: MockProxyState
): Promise<void> {
  /**
   * POST /v1/messages - Create a message (buffered or SSE)
   */
  app.post("/v1/messages", { preHandler: requireApiKey(state) }, async (request, reply) => {
    const result = messageRequestSchema.safeParse(request.body);
    if (!result.success) {
      return reply
        .status(400)
        .send(errorEnvelope("invalid_request_error", result.error.issues[0]?.message ?? "Invalid request"));
    }

    const body = result.data;
    const config = state.config.get();
    const resolvedModel = resolveModel(body.model);
    const thinkingEnabled = body.thinking?.type === "enabled";

    let maxTokens = body.max_tokens;
    if (body.thinking && thinkingEnabled) {
      maxTokens = Math.max(maxTokens, body.thinking.budget_tokens + MIN_RESPONSE_TOKENS);
    }

    const id = state.store.generateId();
    const record = (status: number) =>
      state.store.add({
        id,
        model: body.model,
        resolvedModel,
        stream: body.stream,
        thinking: thinkingEnabled,
        maxTokens,
        status,
      });

    if (resolvedModel !== body.model) {
      request.log.debug({ nickname: body.model, model: resolvedModel }, "resolved model nickname");
    }

    if (config.tokenExpiresAt === null) {
      record(401);
      return reply
        .status(401)
        .send(errorEnvelope("authentication_error", "OAuth expired; please authenticate using the CLI"));
    }

    if (config.upstreamAuthFailure) {
      record(401);
      return reply
        .status(401)
        .send(errorEnvelope("authentication_error", "Invalid bearer token"));
    }

    if (
      config.unavailableModels.includes(body.model) ||
      config.unavailableModels.includes(resolvedModel)
    ) {
      record(404);
      return reply.status(404).send(errorEnvelope("not_found_error", `model: ${resolvedModel}`));
    }

    if (thinkingEnabled && !config.thinkingSupported) {
      record(400);
      return reply
        .status(400)
        .send(errorEnvelope("invalid_request_error", "thinking is not supported by this model"));
    }

    const prompt = body.messages.map((m) => contentText(m.content)).join(" ");
    const message = buildMessage({
      id,
      model: resolvedModel,
      text: config.responseText,
      thinking: thinkingEnabled ? config.thinkingText : undefined,
      inputTokens: estimateTokens(prompt),
    });

    record(200);

    if (body.stream) {
      return reply
        .status(200)
        .header("content-type", "text/event-stream")
        .header("cache-control", "no-cache")
        .send(Readable.from(buildStreamFrames(message, config.streamChunkSize)));
    }

    return reply.send(message);
  });
}
