import { testModelPrompt, type ProbeCheck, type ProbeContext } from "../checks/index.js";
import { exitCodeForAll, summarize } from "../domain/tally.js";
import { runChecks, SuiteInterruptedError, type CheckResult } from "./runner.js";

export interface ModelCase {
  nickname: string;
  prompt: string;
}

export const QUICK_MODEL_CASES: readonly ModelCase[] = [
  { nickname: "l", prompt: "Say 'Hello from Claude Sonnet 4' in exactly 5 words" },
  { nickname: "m", prompt: "What's 15 * 7? Answer with just the number." },
  { nickname: "s", prompt: "Name one color. One word only." },
];

/**
 * One prompt per model; exits 0 only when every model answered
 */
export async function runQuickModels(
  ctx: ProbeContext,
  cases: readonly ModelCase[] = QUICK_MODEL_CASES,
  signal?: AbortSignal
): Promise<0 | 1> {
  const { reporter } = ctx;

  reporter.line("🚀 Maximize API Test Suite");
  reporter.line(reporter.rule());

  const checks: ProbeCheck[] = cases.map(({ nickname, prompt }) => ({
    name: nickname,
    run: testModelPrompt(nickname, prompt),
  }));

  let results: CheckResult[];
  try {
    results = await runChecks(checks, ctx, signal);
  } catch (error) {
    if (!(error instanceof SuiteInterruptedError)) throw error;
    reporter.blank();
    reporter.line(`❌ ${error.message}`);
    return 1;
  }

  reporter.blank();
  reporter.line(reporter.rule());
  reporter.line("📊 Test Summary");
  reporter.line(reporter.rule());

  for (const result of results) {
    reporter.line(`${result.passed ? "✅ PASS" : "❌ FAIL"} - Model: ${result.name}`);
  }

  const summary = summarize(results);
  reporter.blank();
  reporter.line(`Results: ${summary.passed}/${summary.total} tests passed`);
  reporter.blank();

  const exitCode = exitCodeForAll(summary);
  reporter.line(exitCode === 0 ? "🎉 All tests passed!" : `⚠️ ${summary.failed} test(s) failed`);
  return exitCode;
}
