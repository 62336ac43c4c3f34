/**
 * Builders for Anthropic Messages API payloads: responses, SSE frames
 * and error envelopes.
 */

export type ContentBlock =
  | { type: "text"; text: string }
  | { type: "thinking"; thinking: string; signature: string };

export interface MessageResponse {
  id: string;
  type: "message";
  role: "assistant";
  model: string;
  content: ContentBlock[];
  stop_reason: "end_turn" | null;
  stop_sequence: null;
  usage: { input_tokens: number; output_tokens: number };
}

export interface ErrorEnvelope {
  type: "error";
  error: { type: string; message: string };
}

export function errorEnvelope(type: string, message: string): ErrorEnvelope {
  return { type: "error", error: { type, message } };
}

/**
 * Whitespace-separated word count, at least 1
 */
export function estimateTokens(text: string): number {
  const words = text.trim().split(/\s+/).filter(Boolean);
  return Math.max(1, words.length);
}

/**
 * Flatten string or block-array message content into plain text
 */
export function contentText(content: string | Array<Record<string, unknown>>): string {
  if (typeof content === "string") return content;
  return content
    .map((block) => (typeof block.text === "string" ? block.text : ""))
    .join(" ");
}

export function buildMessage(options: {
  id: string;
  model: string;
  text: string;
  thinking?: string;
  inputTokens: number;
}): MessageResponse {
  const content: ContentBlock[] = [];
  if (options.thinking !== undefined) {
    content.push({ type: "thinking", thinking: options.thinking, signature: "mock-signature" });
  }
  content.push({ type: "text", text: options.text });

  const outputText = content
    .map((block) => (block.type === "text" ? block.text : block.thinking))
    .join(" ");

  return {
    id: options.id,
    type: "message",
    role: "assistant",
    model: options.model,
    content,
    stop_reason: "end_turn",
    stop_sequence: null,
    usage: {
      input_tokens: options.inputTokens,
      output_tokens: estimateTokens(outputText),
    },
  };
}

export function chunkText(text: string, size: number): string[] {
  const chars = [...text];
  const chunks: string[] = [];
  for (let i = 0; i < chars.length; i += size) {
    chunks.push(chars.slice(i, i + size).join(""));
  }
  return chunks;
}

function frame(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

/**
 * Render a complete message as the SSE event sequence of a streamed response
 */
export function buildStreamFrames(message: MessageResponse, chunkSize: number): string[] {
  const frames: string[] = [
    frame("message_start", {
      type: "message_start",
      message: {
        ...message,
        content: [],
        stop_reason: null,
        usage: { input_tokens: message.usage.input_tokens, output_tokens: 1 },
      },
    }),
  ];

  message.content.forEach((block, index) => {
    if (block.type === "thinking") {
      frames.push(
        frame("content_block_start", {
          type: "content_block_start",
          index,
          content_block: { type: "thinking", thinking: "" },
        })
      );
      for (const chunk of chunkText(block.thinking, chunkSize)) {
        frames.push(
          frame("content_block_delta", {
            type: "content_block_delta",
            index,
            delta: { type: "thinking_delta", thinking: chunk },
          })
        );
      }
    } else {
      frames.push(
        frame("content_block_start", {
          type: "content_block_start",
          index,
          content_block: { type: "text", text: "" },
        })
      );
      for (const chunk of chunkText(block.text, chunkSize)) {
        frames.push(
          frame("content_block_delta", {
            type: "content_block_delta",
            index,
            delta: { type: "text_delta", text: chunk },
          })
        );
      }
    }
    frames.push(frame("content_block_stop", { type: "content_block_stop", index }));
  });

  frames.push(
    frame("message_delta", {
      type: "message_delta",
      delta: { stop_reason: "end_turn", stop_sequence: null },
      usage: { output_tokens: message.usage.output_tokens },
    })
  );
  frames.push(frame("message_stop", { type: "message_stop" }));

  return frames;
}
