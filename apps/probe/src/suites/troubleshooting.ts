import type { ConsoleReporter } from "../output/console-reporter.js";
import type { CheckOutcome } from "../domain/tally.js";

/** Checks that fail for proxy reasons, never for upstream token reasons */
export const INFRASTRUCTURE_CHECKS: readonly string[] = ["Health Check", "Auth Status", "API Key Auth"];

/**
 * Token-refresh instructions, shown when a Messages API check failed
 */
export function printTroubleshooting(reporter: ConsoleReporter, results: readonly CheckOutcome[]): void {
  if (results.every((r) => r.passed)) return;

  reporter.blank();
  reporter.line(reporter.paint("💡 Troubleshooting Tips:", "yellow", "bold"));

  const upstreamFailures = results.filter((r) => !r.passed && !INFRASTRUCTURE_CHECKS.includes(r.name));
  if (upstreamFailures.length === 0) return;

  const command = (text: string) => `     ${reporter.paint(text, "cyan")}`;

  reporter.blank();
  reporter.line(reporter.paint("If seeing 'Invalid bearer token' errors:", "yellow"));
  reporter.line("  1. Your OAuth tokens might be invalid or expired");
  reporter.line("  2. Run maximize CLI locally to get valid tokens:");
  reporter.line(command("./maximize"));
  reporter.line("     Select option 2 (Login) and complete OAuth");
  reporter.line("  3. Then extract tokens and set environment variables:");
  reporter.line(command("cat ~/.maximize/tokens.json"));
  reporter.line(command('export MAXIMIZE_ACCESS_TOKEN="sk-ant-..."'));
  reporter.line(command('export MAXIMIZE_REFRESH_TOKEN="refresh-..."'));
  reporter.line("  4. Restart maximize server with valid tokens");
}
