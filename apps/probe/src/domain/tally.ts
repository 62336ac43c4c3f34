// =============================================================================
// Pass/Fail Tally
// =============================================================================
// A run passes outright when every check passed, and still exits 0 when the
// pass rate reaches the threshold (70% by default).
// =============================================================================

export interface CheckOutcome {
  name: string;
  passed: boolean;
}

export interface TallySummary {
  passed: number;
  failed: number;
  total: number;
  /** 0..1; 1 for an empty run */
  passRate: number;
}

export type Verdict = "all-passed" | "mostly-passed" | "failed";

export const DEFAULT_PASS_THRESHOLD = 0.7;

export function summarize(results: readonly CheckOutcome[]): TallySummary {
  const total = results.length;
  const passed = results.filter((r) => r.passed).length;
  return {
    passed,
    failed: total - passed,
    total,
    passRate: total === 0 ? 1 : passed / total,
  };
}

export function decideVerdict(
  summary: TallySummary,
  threshold: number = DEFAULT_PASS_THRESHOLD
): Verdict {
  if (summary.passed === summary.total) return "all-passed";
  if (summary.passed >= summary.total * threshold) return "mostly-passed";
  return "failed";
}

export function exitCodeFor(verdict: Verdict): 0 | 1 {
  return verdict === "failed" ? 1 : 0;
}

/**
 * Strict variant for tools that tolerate no failures
 */
export function exitCodeForAll(summary: TallySummary): 0 | 1 {
  return summary.passed === summary.total ? 0 : 1;
}
