/**
 * Suite Report Writer
 *
 * Serializes a comprehensive-suite run to JSON for CI and later comparison.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { TallySummary, Verdict } from "../domain/tally.js";
import type { SuiteOutcome } from "../suites/full-suite.js";
import type { CheckResult } from "../suites/runner.js";
import { log } from "../logger.js";

// ============================================================================
// Schema
// ============================================================================

export interface SuiteReport {
  /** Schema version for forward compatibility */
  schemaVersion: "1.0";
  runId: string;
  suite: string;
  baseUrl: string;
  /** ISO timestamps */
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  summary: TallySummary;
  verdict: Verdict;
  exitCode: 0 | 1;
  interrupted: boolean;
  results: CheckResult[];
}

export interface ReportInput {
  suite: string;
  baseUrl: string;
  outcome: SuiteOutcome;
}

// ============================================================================
// Builder
// ============================================================================

/**
 * `<suite>-<date>-<hhmm>-<random>`, e.g. `comprehensive-2025-01-31-1405-k3x9`
 */
export function generateRunId(suite: string, at: Date, random: () => number = Math.random): string {
  const [date, time] = at.toISOString().split("T");
  const hhmm = (time ?? "").slice(0, 5).replace(":", "");
  const suffix = random().toString(36).slice(2, 6);
  return `${suite}-${date}-${hhmm}-${suffix}`;
}

export function buildSuiteReport({ suite, baseUrl, outcome }: ReportInput): SuiteReport {
  return {
    schemaVersion: "1.0",
    runId: generateRunId(suite, outcome.startedAt),
    suite,
    baseUrl,
    startedAt: outcome.startedAt.toISOString(),
    finishedAt: outcome.finishedAt.toISOString(),
    durationMs: outcome.durationMs,
    summary: outcome.summary,
    verdict: outcome.verdict,
    exitCode: outcome.exitCode,
    interrupted: outcome.interrupted,
    results: outcome.results,
  };
}

// ============================================================================
// Writer
// ============================================================================

/**
 * Write the report, creating parent directories. Returns the absolute path.
 */
export async function writeSuiteReport(file: string, report: SuiteReport): Promise<string> {
  const path = resolve(file);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(report, null, 2)}\n`, "utf-8");

  log.report.info({ path, runId: report.runId }, "report written");
  return path;
}
