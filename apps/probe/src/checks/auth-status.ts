import { z } from "zod";
import { describeError, ProxyResponseError } from "../http/errors.js";
import { formatValue } from "../domain/text.js";
import type { ProbeContext } from "./types.js";

// Every field is optional: older proxies report a subset
const authStatusSchema = z
  .object({
    has_tokens: z.boolean().optional(),
    is_expired: z.boolean().optional(),
    expires_at: z.string().nullable().optional(),
    time_until_expiry: z.string().optional(),
    expires_in_seconds: z.number().nullable().optional(),
  })
  .passthrough();

export type AuthStatus = z.infer<typeof authStatusSchema>;

/**
 * GET /auth/status answers 200; reports token state and warns about
 * missing or expired tokens
 */
export async function checkAuthStatus({ client, reporter, settings }: ProbeContext): Promise<boolean> {
  reporter.header("Test 2: Auth Status Endpoint");
  reporter.info(`Testing: GET ${client.url("/auth/status")}`);

  try {
    const response = await client.request("GET", "/auth/status", {
      timeoutMs: settings.healthTimeoutMs,
      authenticated: false,
    });

    if (response.status !== 200) {
      reporter.error(`Auth status check failed with status ${response.status}`);
      return false;
    }

    const parsed = authStatusSchema.safeParse(response.json());
    if (!parsed.success) {
      throw new ProxyResponseError("Auth status response is not an object");
    }
    const data = parsed.data;

    reporter.success("Auth status check passed");
    reporter.info(`Has tokens: ${formatValue(data.has_tokens)}`);
    reporter.info(`Is expired: ${formatValue(data.is_expired)}`);
    if (data.expires_at) {
      reporter.info(`Expires at: ${data.expires_at}`);
    }
    reporter.info(`Time until expiry: ${formatValue(data.time_until_expiry)}`);

    if (!data.has_tokens) {
      reporter.warning("No tokens found! Set MAXIMIZE_ACCESS_TOKEN and MAXIMIZE_REFRESH_TOKEN");
    } else if (data.is_expired) {
      reporter.warning("Tokens are expired! They will be auto-refreshed on first API call");
    }

    return true;
  } catch (error) {
    reporter.error(`Auth status check failed: ${describeError(error)}`);
    return false;
  }
}
