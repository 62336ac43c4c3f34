import { describeError } from "../http/errors.js";
import { userMessage } from "../http/messages.js";
import { maskApiKey } from "../domain/text.js";
import type { ProbeContext } from "./types.js";

/**
 * Detects whether the proxy enforces API-key auth, and if so that the
 * configured key gets through
 */
export async function checkApiKeyAuth({ client, reporter, settings }: ProbeContext): Promise<boolean> {
  reporter.header("Test 3: API Key Authentication");
  reporter.info(`Testing with API key: ${maskApiKey(settings.apiKey)}`);

  const probe = userMessage("l", 10, "test");

  try {
    const anonymous = await client.request("POST", "/v1/messages", {
      timeoutMs: settings.healthTimeoutMs,
      body: probe,
      authenticated: false,
    });

    if (anonymous.status !== 401) {
      reporter.info("API key authentication is DISABLED (request succeeded without key)");
      return true;
    }

    reporter.info("API key authentication is ENABLED (401 without key)");

    const withKey = await client.request("POST", "/v1/messages", {
      timeoutMs: settings.requestTimeoutMs,
      body: probe,
    });

    // A 401 here comes from the upstream token, not the proxy's key check
    if (withKey.status === 200 || withKey.status === 401) {
      reporter.success("API key authentication is working");
    } else {
      reporter.warning(`Unexpected status with API key: ${withKey.status}`);
    }
    return true;
  } catch (error) {
    reporter.error(`API key auth test failed: ${describeError(error)}`);
    return false;
  }
}
