import pino from "pino";
import { config } from "./config.js";

const isDev = config.NODE_ENV !== "production";
const isTest = config.NODE_ENV === "test";

// =============================================================================
// Structured Logger
// =============================================================================
//
// The reporter owns stdout; logs go to stderr so the two never interleave.
//
// Usage patterns:
//
// REQUESTS (debug):
//   log.http.debug({ method, url, status, latencyMs }, "request")
//
// CHECK CRASHES (error):
//   logFailure("suite", "check crashed", err, { check: name })
//
// =============================================================================

const baseConfig: pino.LoggerOptions = {
  level: isTest ? "silent" : config.LOG_LEVEL,

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  redact: {
    paths: ["headers.authorization", "headers['x-api-key']", "apiKey"],
    censor: "[REDACTED]",
  },
};

export const logger = isDev && !isTest
  ? pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: 2,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          messageFormat: "{component} | {msg}",
          singleLine: true,
        },
      },
    })
  : pino(baseConfig, pino.destination(2));

// =============================================================================
// Component Loggers
// =============================================================================

export const log = {
  // Outgoing HTTP requests to the proxy
  http: logger.child({ component: "http" }),

  // Individual checks
  check: logger.child({ component: "check" }),

  // Suite lifecycle (start, verdict, interruption)
  suite: logger.child({ component: "suite" }),

  // Run report files
  report: logger.child({ component: "report" }),

  // Process-level events
  system: logger.child({ component: "system" }),
};

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Log a failure with full context for debugging
 */
export function logFailure(
  component: keyof typeof log,
  event: string,
  error: unknown,
  context: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));

  log[component].error({
    ...context,
    error: err.message,
    errorName: err.name,
    ...(isDev && { stack: err.stack }),
  }, event);
}

/**
 * Create a timer for measuring operation duration
 */
export function createTimer(): () => number {
  const start = process.hrtime.bigint();
  return () => Number(process.hrtime.bigint() - start) / 1_000_000;
}

/**
 * Format a millisecond duration the way log lines show it
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms.toFixed(0)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

export default log;
