/**
 * Shared setup for the CLI entrypoints.
 *
 * Each entrypoint imports "dotenv/config" first so `.env` is applied before
 * the config module parses the environment.
 */

import { config } from "../config.js";
import { log } from "../logger.js";
import { describeError } from "../http/errors.js";
import { ProxyClient } from "../http/proxy-client.js";
import { exitCodeForError, UsageError } from "./flags.js";
import { ConsoleReporter } from "../output/console-reporter.js";

export { config, log };

export { parseApiKeyFlag, parseFlags, parseTimeoutFlag, parseUrlFlag } from "./flags.js";

// =============================================================================
// Output & client
// =============================================================================

export function createReporter(options: { noColor?: boolean; ruleWidth?: number } = {}): ConsoleReporter {
  return new ConsoleReporter({
    color: config.PROBE_COLOR && !options.noColor,
    ruleWidth: options.ruleWidth,
  });
}

export function createClient(baseUrl: string, apiKey: string, signal?: AbortSignal): ProxyClient {
  return new ProxyClient({ baseUrl, apiKey, signal });
}

// =============================================================================
// Process lifecycle
// =============================================================================

/**
 * First SIGINT aborts the run (in-flight request included); a second one
 * exits immediately.
 */
export function createInterruptSignal(tool: string): AbortSignal {
  const controller = new AbortController();

  process.on("SIGINT", () => {
    if (controller.signal.aborted) {
      log.system.warn({ tool }, "second interrupt, forcing exit");
      process.exit(1);
    }
    log.system.info({ tool }, "interrupted");
    controller.abort();
  });

  return controller.signal;
}

/**
 * Run a tool's main function and exit with its code
 */
export function runMain(tool: string, main: () => Promise<number>): void {
  main()
    .then((code) => {
      process.exit(code);
    })
    .catch((error: unknown) => {
      if (error instanceof UsageError) {
        console.error(error.message);
      } else {
        log.system.error({ tool, error: describeError(error) }, "tool failed");
        console.error(`❌ ${describeError(error)}`);
      }
      process.exit(exitCodeForError(error));
    });
}
