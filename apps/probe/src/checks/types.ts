import type { ProxyClient } from "../http/proxy-client.js";
import type { ConsoleReporter } from "../output/console-reporter.js";

export interface ProbeSettings {
  baseUrl: string;
  apiKey: string;
  /** Health, auth status and unauthenticated calls */
  healthTimeoutMs: number;
  /** Authenticated Messages API calls */
  requestTimeoutMs: number;
}

export interface ProbeContext {
  client: ProxyClient;
  reporter: ConsoleReporter;
  settings: ProbeSettings;
}

/**
 * A check prints its own lines and reports pass/fail. It should not throw;
 * the runner still records a throw as a failure.
 */
export type CheckFn = (ctx: ProbeContext) => Promise<boolean>;

export interface ProbeCheck {
  name: string;
  run: CheckFn;
}
