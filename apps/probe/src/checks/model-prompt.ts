import { describeError, ProxyResponseError } from "../http/errors.js";
import { isTextBlock, userMessage } from "../http/messages.js";
import type { CheckFn, ProbeContext } from "./types.js";

/**
 * One prompt against one model, printed in the quick tool's plain format
 */
export function testModelPrompt(nickname: string, prompt: string): CheckFn {
  return async ({ client, reporter, settings }: ProbeContext) => {
    const rule = reporter.rule();
    reporter.blank();
    reporter.line(rule);
    reporter.line(`Testing model: ${nickname}`);
    reporter.line(`Prompt: ${prompt}`);
    reporter.line(rule);

    try {
      const message = await client.createMessage(userMessage(nickname, 100, prompt), {
        timeoutMs: settings.requestTimeoutMs,
      });

      const first = message.content[0];
      if (first === undefined || !isTextBlock(first)) {
        throw new ProxyResponseError("Response has no leading text block");
      }

      const { input_tokens, output_tokens } = message.usage;
      reporter.line("✅ SUCCESS");
      reporter.line(`Response: ${first.text}`);
      reporter.line(`Usage: input_tokens=${input_tokens}, output_tokens=${output_tokens}`);
      return true;
    } catch (error) {
      reporter.line(`❌ FAILED: ${describeError(error)}`);
      return false;
    }
  };
}
