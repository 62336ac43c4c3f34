import { z } from "zod";

// =============================================================================
// Requests
// =============================================================================

export interface MessageParam {
  role: "user" | "assistant";
  content: string;
}

export interface ThinkingParam {
  type: "enabled";
  budget_tokens: number;
}

export interface MessageRequest {
  /** Full model id or a proxy nickname such as "l" */
  model: string;
  max_tokens: number;
  messages: MessageParam[];
  thinking?: ThinkingParam;
  stream?: boolean;
}

export function userMessage(model: string, maxTokens: number, prompt: string): MessageRequest {
  return {
    model,
    max_tokens: maxTokens,
    messages: [{ role: "user", content: prompt }],
  };
}

// =============================================================================
// Responses
// =============================================================================

export const textBlockSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});

export const thinkingBlockSchema = z.object({
  type: z.literal("thinking"),
  thinking: z.string(),
});

export const redactedThinkingBlockSchema = z.object({
  type: z.literal("redacted_thinking"),
  data: z.string(),
});

export const toolUseBlockSchema = z.object({
  type: z.literal("tool_use"),
  id: z.string(),
  name: z.string(),
  input: z.unknown(),
});

// Block types this tool does not inspect are kept, untyped
const otherBlockSchema = z
  .object({ type: z.string() })
  .passthrough()
  .refine(
    (block) => !["text", "thinking", "redacted_thinking", "tool_use"].includes(block.type),
    { message: "malformed content block" }
  );

export const contentBlockSchema = z.union([
  textBlockSchema,
  thinkingBlockSchema,
  redactedThinkingBlockSchema,
  toolUseBlockSchema,
  otherBlockSchema,
]);

export const usageSchema = z
  .object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  })
  .passthrough();

export const messageSchema = z
  .object({
    id: z.string(),
    type: z.literal("message"),
    role: z.literal("assistant"),
    model: z.string(),
    content: z.array(contentBlockSchema),
    stop_reason: z.string().nullable().optional(),
    usage: usageSchema,
  })
  .passthrough();

export type TextBlock = z.infer<typeof textBlockSchema>;
export type ThinkingBlock = z.infer<typeof thinkingBlockSchema>;
export type ContentBlock = z.infer<typeof contentBlockSchema>;
export type Usage = z.infer<typeof usageSchema>;
export type Message = z.infer<typeof messageSchema>;

export function isTextBlock(block: ContentBlock): block is TextBlock {
  return block.type === "text" && "text" in block && typeof block.text === "string";
}

export function isThinkingBlock(block: ContentBlock): block is ThinkingBlock {
  return block.type === "thinking" && "thinking" in block && typeof block.thinking === "string";
}

// =============================================================================
// Streaming events
// =============================================================================

export const streamEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("content_block_delta"),
    index: z.number(),
    delta: z
      .object({ type: z.string(), text: z.string().optional() })
      .passthrough(),
  }),
  z.object({
    type: z.literal("error"),
    error: z.object({ type: z.string(), message: z.string() }).passthrough(),
  }),
]);

export type StreamEvent = z.infer<typeof streamEventSchema>;
