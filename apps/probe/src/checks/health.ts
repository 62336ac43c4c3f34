import { describeError } from "../http/errors.js";
import type { ProbeContext } from "./types.js";

/**
 * GET /healthz answers 200
 */
export async function checkHealth({ client, reporter, settings }: ProbeContext): Promise<boolean> {
  reporter.header("Test 1: Health Check Endpoint");
  reporter.info(`Testing: GET ${client.url("/healthz")}`);

  try {
    const response = await client.request("GET", "/healthz", {
      timeoutMs: settings.healthTimeoutMs,
      authenticated: false,
    });

    if (response.status !== 200) {
      reporter.error(`Health check failed with status ${response.status}`);
      return false;
    }

    const data = response.json();
    reporter.success("Health check passed");
    reporter.info(`Response: ${JSON.stringify(data)}`);
    return true;
  } catch (error) {
    reporter.error(`Health check failed: ${describeError(error)}`);
    return false;
  }
}
