import { describeError } from "../http/errors.js";
import { userMessage } from "../http/messages.js";
import { MODEL_NICKNAMES } from "../domain/nicknames.js";
import { isModelUnavailable } from "../domain/error-hints.js";
import type { ProbeContext } from "./types.js";

/**
 * Every nickname gets a tiny request; passes when at least one resolves
 */
export async function checkModelNicknames({ client, reporter, settings }: ProbeContext): Promise<boolean> {
  reporter.header("Test 6: Model Nicknames Resolution");

  let resolved = 0;

  for (const nickname of MODEL_NICKNAMES) {
    reporter.info(`Testing nickname: ${nickname}`);
    try {
      await client.createMessage(userMessage(nickname, 10, "Hi"), {
        timeoutMs: settings.requestTimeoutMs,
      });
      reporter.success(`Nickname '${nickname}' resolved successfully`);
      resolved++;
    } catch (error) {
      if (isModelUnavailable(error)) {
        reporter.warning(`Nickname '${nickname}' - Model not available in your subscription`);
      } else {
        reporter.error(`Nickname '${nickname}' failed: ${describeError(error)}`);
      }
    }
  }

  if (resolved > 0) {
    reporter.success(`${resolved}/${MODEL_NICKNAMES.length} nicknames tested successfully`);
    return true;
  }

  reporter.error("No nicknames worked");
  return false;
}
