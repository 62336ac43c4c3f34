import { describeError } from "../http/errors.js";
import { createTimer, log, logFailure } from "../logger.js";
import type { CheckOutcome } from "../domain/tally.js";
import type { ProbeCheck, ProbeContext } from "../checks/types.js";

export interface CheckResult extends CheckOutcome {
  durationMs: number;
  /** Set when the check threw instead of returning */
  error?: string;
}

/**
 * Raised when the run's signal fires; carries the checks finished so far
 */
export class SuiteInterruptedError extends Error {
  constructor(readonly completed: CheckResult[]) {
    super("Test interrupted by user");
    this.name = "SuiteInterruptedError";
  }
}

/**
 * Run checks one after another. A throwing check counts as failed; an aborted
 * signal stops the run before the next check starts.
 */
export async function runChecks(
  checks: readonly ProbeCheck[],
  ctx: ProbeContext,
  signal?: AbortSignal
): Promise<CheckResult[]> {
  const results: CheckResult[] = [];

  for (const check of checks) {
    if (signal?.aborted) {
      throw new SuiteInterruptedError(results);
    }

    const timer = createTimer();
    let passed: boolean;
    let error: string | undefined;

    try {
      passed = await check.run(ctx);
    } catch (err) {
      if (signal?.aborted) {
        throw new SuiteInterruptedError(results);
      }
      passed = false;
      error = describeError(err);
      ctx.reporter.error(`Test '${check.name}' crashed: ${error}`);
      logFailure("suite", "check crashed", err, { check: check.name });
    }

    // The check may have swallowed the abort as an ordinary failure
    if (signal?.aborted) {
      throw new SuiteInterruptedError(results);
    }

    const durationMs = Math.round(timer());
    log.check.debug({ check: check.name, passed, durationMs }, "check finished");
    results.push({ name: check.name, passed, durationMs, ...(error !== undefined && { error }) });
  }

  return results;
}
