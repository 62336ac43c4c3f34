import { describeError } from "../http/errors.js";
import { userMessage } from "../http/messages.js";
import { characterCount } from "../domain/text.js";
import type { CheckFn, ProbeContext } from "./types.js";

/**
 * Streamed Messages call, echoing chunks as they arrive
 */
export function checkStreaming(model: string, prompt: string): CheckFn {
  return async ({ client, reporter, settings }: ProbeContext) => {
    reporter.header(`Test 5: Streaming Request - Model '${model}'`);
    reporter.info(`Prompt: ${prompt}`);

    let started = false;
    let received = "";

    try {
      reporter.write(reporter.paint("ℹ️  Streaming response: ", "blue"));
      started = true;

      for await (const chunk of client.streamText(userMessage(model, 100, prompt), {
        timeoutMs: settings.requestTimeoutMs,
      })) {
        reporter.write(chunk);
        received += chunk;
      }
      reporter.blank();

      if (received.length === 0) {
        reporter.error("Streaming request returned empty response");
        return false;
      }

      reporter.success("Streaming request succeeded");
      reporter.info(`Total characters received: ${characterCount(received)}`);
      return true;
    } catch (error) {
      if (started) reporter.blank();
      reporter.error(`Streaming request failed: ${describeError(error)}`);
      return false;
    }
  };
}
