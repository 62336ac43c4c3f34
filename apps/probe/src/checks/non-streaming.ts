import { describeError, ProxyResponseError } from "../http/errors.js";
import { isTextBlock, userMessage } from "../http/messages.js";
import { isUpstreamAuthError } from "../domain/error-hints.js";
import { previewText } from "../domain/text.js";
import type { CheckFn, ProbeContext } from "./types.js";

/**
 * Buffered Messages call; the first content block must be text
 */
export function checkNonStreaming(model: string, prompt: string): CheckFn {
  return async ({ client, reporter, settings }: ProbeContext) => {
    reporter.header(`Test 4: Non-Streaming Request - Model '${model}'`);
    reporter.info(`Prompt: ${prompt}`);

    try {
      const message = await client.createMessage(userMessage(model, 100, prompt), {
        timeoutMs: settings.requestTimeoutMs,
      });

      const first = message.content[0];
      if (first === undefined || !isTextBlock(first)) {
        throw new ProxyResponseError(
          `Expected a text block first, got ${first === undefined ? "no content" : first.type}`
        );
      }

      reporter.success("Non-streaming request succeeded");
      reporter.info(`Response: ${previewText(first.text)}`);
      reporter.info(`Input tokens: ${message.usage.input_tokens}`);
      reporter.info(`Output tokens: ${message.usage.output_tokens}`);
      return true;
    } catch (error) {
      reporter.error(`Non-streaming request failed: ${describeError(error)}`);
      if (isUpstreamAuthError(error)) {
        reporter.warning("This is an Anthropic authentication error, not a proxy error");
        reporter.warning("Your OAuth tokens might be invalid. See troubleshooting below.");
      }
      return false;
    }
  };
}
