import {
  checkApiKeyAuth,
  checkAuthStatus,
  checkExtendedThinking,
  checkHealth,
  checkModelNicknames,
  checkNonStreaming,
  checkStreaming,
  type ProbeCheck,
  type ProbeContext,
} from "../checks/index.js";
import {
  DEFAULT_PASS_THRESHOLD,
  decideVerdict,
  exitCodeFor,
  summarize,
  type TallySummary,
  type Verdict,
} from "../domain/tally.js";
import { maskApiKey } from "../domain/text.js";
import { createTimer, formatDuration, log } from "../logger.js";
import type { ConsoleReporter } from "../output/console-reporter.js";
import { runChecks, SuiteInterruptedError, type CheckResult } from "./runner.js";
import { printTroubleshooting } from "./troubleshooting.js";

export const COMPREHENSIVE_CHECKS: readonly ProbeCheck[] = [
  { name: "Health Check", run: checkHealth },
  { name: "Auth Status", run: checkAuthStatus },
  { name: "API Key Auth", run: checkApiKeyAuth },
  { name: "Non-Streaming", run: checkNonStreaming("l", "Say hello in 3 words") },
  { name: "Streaming", run: checkStreaming("m", "Count to 5") },
  { name: "Model Nicknames", run: checkModelNicknames },
  { name: "Extended Thinking", run: checkExtendedThinking },
];

export interface SuiteOptions {
  /** Defaults to the seven comprehensive checks */
  checks?: readonly ProbeCheck[];
  threshold?: number;
  signal?: AbortSignal;
}

export interface SuiteOutcome {
  results: CheckResult[];
  summary: TallySummary;
  verdict: Verdict;
  exitCode: 0 | 1;
  interrupted: boolean;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
}

export async function runComprehensiveSuite(
  ctx: ProbeContext,
  options: SuiteOptions = {}
): Promise<SuiteOutcome> {
  const { reporter, settings } = ctx;
  const threshold = options.threshold ?? DEFAULT_PASS_THRESHOLD;
  const startedAt = new Date();
  const timer = createTimer();

  reporter.banner(
    [
      "🚀 Maximize API Comprehensive Test Suite",
      reporter.rule(),
      `Base URL: ${settings.baseUrl}`,
      `API Key: ${maskApiKey(settings.apiKey)}`,
      reporter.rule(),
    ],
    "bold",
    "blue"
  );

  log.suite.info({ baseUrl: settings.baseUrl, threshold }, "suite started");

  let results: CheckResult[];
  try {
    results = await runChecks(options.checks ?? COMPREHENSIVE_CHECKS, ctx, options.signal);
  } catch (error) {
    if (!(error instanceof SuiteInterruptedError)) throw error;

    reporter.blank();
    reporter.error(error.message);
    log.suite.warn({ completed: error.completed.length }, "suite interrupted");

    const summary = summarize(error.completed);
    return {
      results: error.completed,
      summary,
      verdict: "failed",
      exitCode: 1,
      interrupted: true,
      startedAt,
      finishedAt: new Date(),
      durationMs: Math.round(timer()),
    };
  }

  const summary = summarize(results);
  const verdict = decideVerdict(summary, threshold);

  printSummary(reporter, results, summary);
  printTroubleshooting(reporter, results);
  printVerdict(reporter, verdict, summary);

  const durationMs = Math.round(timer());
  log.suite.info({ ...summary, verdict, duration: formatDuration(durationMs) }, "suite finished");

  return {
    results,
    summary,
    verdict,
    exitCode: exitCodeFor(verdict),
    interrupted: false,
    startedAt,
    finishedAt: new Date(),
    durationMs,
  };
}

function printSummary(reporter: ConsoleReporter, results: readonly CheckResult[], summary: TallySummary): void {
  reporter.header("📊 Test Summary");

  for (const result of results) {
    if (result.passed) {
      reporter.success(result.name);
    } else {
      reporter.error(result.name);
    }
  }

  reporter.blank();
  reporter.line(reporter.paint(`Results: ${summary.passed}/${summary.total} tests passed`, "bold"));
}

function printVerdict(reporter: ConsoleReporter, verdict: Verdict, summary: TallySummary): void {
  reporter.blank();
  switch (verdict) {
    case "all-passed":
      reporter.line(reporter.paint("🎉 All tests passed!", "green", "bold"));
      break;
    case "mostly-passed":
      reporter.line(reporter.paint(`⚠️  ${summary.failed} test(s) failed, but most passed`, "yellow", "bold"));
      break;
    case "failed":
      reporter.line(reporter.paint(`❌ ${summary.failed} test(s) failed`, "red", "bold"));
      break;
  }
}
