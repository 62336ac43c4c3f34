#!/usr/bin/env node
/**
 * Comprehensive proxy test suite (local or deployed).
 *
 * Usage: test-suite [--base-url <url>] [--api-key <key>] [--report <file>] [--no-color]
 */

import "dotenv/config";
import { parseArgs } from "node:util";
import { runComprehensiveSuite } from "../suites/full-suite.js";
import { buildSuiteReport, writeSuiteReport } from "../report/suite-report.js";
import {
  config,
  createClient,
  createInterruptSignal,
  createReporter,
  parseApiKeyFlag,
  parseFlags,
  parseUrlFlag,
  runMain,
} from "./shared.js";

runMain("test-suite", async () => {
  const { values } = parseFlags(() =>
    parseArgs({
      options: {
        "base-url": { type: "string" },
        "api-key": { type: "string" },
        report: { type: "string" },
        "no-color": { type: "boolean", default: false },
      },
    }),
  );

  const baseUrl = parseUrlFlag("base-url", values["base-url"]) ?? config.MAXIMIZE_BASE_URL;
  const apiKey = parseApiKeyFlag("api-key", values["api-key"]) ?? config.MAXIMIZE_API_KEY;

  const signal = createInterruptSignal("test-suite");
  const reporter = createReporter({ noColor: values["no-color"] });

  const outcome = await runComprehensiveSuite(
    {
      client: createClient(baseUrl, apiKey, signal),
      reporter,
      settings: {
        baseUrl,
        apiKey,
        healthTimeoutMs: config.PROBE_HEALTH_TIMEOUT_MS,
        requestTimeoutMs: config.PROBE_REQUEST_TIMEOUT_MS,
      },
    },
    { threshold: config.PROBE_PASS_THRESHOLD, signal }
  );

  if (values.report !== undefined) {
    const path = await writeSuiteReport(
      values.report,
      buildSuiteReport({ suite: "comprehensive", baseUrl, outcome })
    );
    reporter.blank();
    reporter.info(`Report written to ${path}`);
  }

  return outcome.exitCode;
});
