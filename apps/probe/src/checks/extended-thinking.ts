import { describeError } from "../http/errors.js";
import { isTextBlock, isThinkingBlock, userMessage } from "../http/messages.js";
import { isThinkingUnavailable } from "../domain/error-hints.js";
import { characterCount } from "../domain/text.js";
import type { ProbeContext } from "./types.js";

export const THINKING_PROMPT = "What is 15 * 23? Think through it step by step.";
export const THINKING_BUDGET_TOKENS = 1024;

/**
 * Extended thinking on model "l". Missing or unsupported thinking is a
 * warning, not a failure.
 */
export async function checkExtendedThinking({ client, reporter, settings }: ProbeContext): Promise<boolean> {
  reporter.header("Test 7: Extended Thinking Mode");

  try {
    const message = await client.createMessage(
      {
        ...userMessage("l", 2000, THINKING_PROMPT),
        thinking: { type: "enabled", budget_tokens: THINKING_BUDGET_TOKENS },
      },
      { timeoutMs: settings.requestTimeoutMs }
    );

    if (!message.content.some(isThinkingBlock)) {
      reporter.warning("No thinking blocks found (feature might not be available)");
      return true;
    }

    reporter.success("Extended thinking mode is working");
    for (const block of message.content) {
      if (isThinkingBlock(block)) {
        reporter.info(`Thinking content length: ${characterCount(block.thinking)}`);
      } else if (isTextBlock(block)) {
        reporter.info(`Response: ${block.text}`);
      }
    }
    return true;
  } catch (error) {
    if (isThinkingUnavailable(error)) {
      reporter.warning(`Extended thinking not available: ${describeError(error)}`);
      return true;
    }
    reporter.error(`Extended thinking test failed: ${describeError(error)}`);
    return false;
  }
}
