#!/usr/bin/env node
/**
 * Quick check that the local proxy is up.
 *
 * Usage: check-proxy [--url <url>] [--timeout <ms>]
 */

import "dotenv/config";
import { parseArgs } from "node:util";
import { checkProxyRunning } from "../suites/proxy-check.js";
import {
  config,
  createClient,
  createReporter,
  parseFlags,
  parseTimeoutFlag,
  parseUrlFlag,
  runMain,
} from "./shared.js";

runMain("check-proxy", async () => {
  const { values } = parseFlags(() =>
    parseArgs({
      options: {
        url: { type: "string" },
        timeout: { type: "string" },
      },
    }),
  );

  const baseUrl = parseUrlFlag("url", values.url) ?? config.MAXIMIZE_LOCAL_URL;
  const timeoutMs = parseTimeoutFlag("timeout", values.timeout) ?? config.PROBE_QUICK_HEALTH_TIMEOUT_MS;

  return checkProxyRunning({
    client: createClient(baseUrl, config.MAXIMIZE_API_KEY),
    reporter: createReporter(),
    timeoutMs,
  });
});
