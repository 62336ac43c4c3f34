#!/usr/bin/env node
/**
 * Quick prompt against models l, m and s on the local proxy.
 *
 * Usage: test-models [--base-url <url>]
 */

import "dotenv/config";
import { parseArgs } from "node:util";
import { runQuickModels } from "../suites/quick-models.js";
import {
  config,
  createClient,
  createInterruptSignal,
  createReporter,
  parseFlags,
  parseUrlFlag,
  runMain,
} from "./shared.js";

runMain("test-models", async () => {
  const { values } = parseFlags(() =>
    parseArgs({
      options: {
        "base-url": { type: "string" },
      },
    }),
  );

  const baseUrl = parseUrlFlag("base-url", values["base-url"]) ?? config.MAXIMIZE_LOCAL_URL;
  const signal = createInterruptSignal("test-models");

  return runQuickModels(
    {
      client: createClient(baseUrl, config.MAXIMIZE_API_KEY, signal),
      reporter: createReporter({ ruleWidth: 60 }),
      settings: {
        baseUrl,
        apiKey: config.MAXIMIZE_API_KEY,
        healthTimeoutMs: config.PROBE_HEALTH_TIMEOUT_MS,
        requestTimeoutMs: config.PROBE_REQUEST_TIMEOUT_MS,
      },
    },
    undefined,
    signal
  );
});
