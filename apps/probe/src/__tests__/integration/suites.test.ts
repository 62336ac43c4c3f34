import { describe, it, expect, afterEach } from "vitest";
import { runComprehensiveSuite } from "../../suites/full-suite.js";
import { runQuickModels } from "../../suites/quick-models.js";
import { checkProxyRunning } from "../../suites/proxy-check.js";
import { buildSuiteReport } from "../../report/suite-report.js";
import { createContext, createProbeHarness, type ProbeHarness } from "../helpers/fixtures.js";
import { hangingFetch, refusedFetch } from "../helpers/inject-fetch.js";

const TIPS = [
  "",
  "💡 Troubleshooting Tips:",
  "",
  "If seeing 'Invalid bearer token' errors:",
  "  1. Your OAuth tokens might be invalid or expired",
  "  2. Run maximize CLI locally to get valid tokens:",
  "     ./maximize",
  "     Select option 2 (Login) and complete OAuth",
  "  3. Then extract tokens and set environment variables:",
  "     cat ~/.maximize/tokens.json",
  '     export MAXIMIZE_ACCESS_TOKEN="sk-ant-..."',
  '     export MAXIMIZE_REFRESH_TOKEN="refresh-..."',
  "  4. Restart maximize server with valid tokens",
];

describe("suites against the mock proxy", () => {
  let harness: ProbeHarness | undefined;

  async function setup(...args: Parameters<typeof createProbeHarness>): Promise<ProbeHarness> {
    harness = await createProbeHarness(...args);
    return harness;
  }

  afterEach(async () => {
    await harness?.mock.app.close();
    harness = undefined;
  });

  describe("comprehensive suite", () => {
    it("should pass every check against a healthy proxy", async () => {
      const { ctx, sink } = await setup();

      const outcome = await runComprehensiveSuite(ctx);

      expect(outcome.verdict).toBe("all-passed");
      expect(outcome.exitCode).toBe(0);
      expect(outcome.interrupted).toBe(false);
      expect(outcome.summary).toEqual({ passed: 7, failed: 0, total: 7, passRate: 1 });

      const lines = sink.lines();
      expect(lines.slice(0, 6)).toEqual([
        "",
        "🚀 Maximize API Comprehensive Test Suite",
        "=".repeat(70),
        "Base URL: http://proxy.test",
        "API Key: *******cret",
        "=".repeat(70),
      ]);
      expect(lines.slice(-13)).toEqual([
        "📊 Test Summary",
        "=".repeat(70),
        "✅ Health Check",
        "✅ Auth Status",
        "✅ API Key Auth",
        "✅ Non-Streaming",
        "✅ Streaming",
        "✅ Model Nicknames",
        "✅ Extended Thinking",
        "",
        "Results: 7/7 tests passed",
        "",
        "🎉 All tests passed!",
      ]);
    });

    it("should exit 0 when most checks pass", async () => {
      const { ctx, sink } = await setup({ unavailableModels: ["m"] });

      const outcome = await runComprehensiveSuite(ctx);

      expect(outcome.results.filter((r) => !r.passed).map((r) => r.name)).toEqual(["Streaming"]);
      expect(outcome.verdict).toBe("mostly-passed");
      expect(outcome.exitCode).toBe(0);

      const lines = sink.lines();
      expect(lines.slice(-(TIPS.length + 2))).toEqual([...TIPS, "", "⚠️  1 test(s) failed, but most passed"]);
    });

    it("should exit 1 when upstream tokens are rejected", async () => {
      const { ctx, sink } = await setup({ upstreamAuthFailure: true });

      const outcome = await runComprehensiveSuite(ctx);

      expect(outcome.results.map((r) => [r.name, r.passed])).toEqual([
        ["Health Check", true],
        ["Auth Status", true],
        ["API Key Auth", true],
        ["Non-Streaming", false],
        ["Streaming", false],
        ["Model Nicknames", false],
        ["Extended Thinking", false],
      ]);
      expect(outcome.verdict).toBe("failed");
      expect(outcome.exitCode).toBe(1);
      expect(sink.lines()).toContain("Results: 3/7 tests passed");
      expect(sink.lines().at(-1)).toBe("❌ 4 test(s) failed");
    });

    it("should show tips without the token steps when only infrastructure checks fail", async () => {
      const { ctx, sink } = await setup({ healthy: false });

      const outcome = await runComprehensiveSuite(ctx);

      expect(outcome.summary.failed).toBe(1);
      expect(sink.lines().slice(-4)).toEqual([
        "",
        "💡 Troubleshooting Tips:",
        "",
        "⚠️  1 test(s) failed, but most passed",
      ]);
    });

    it("should stop and exit 1 when interrupted", async () => {
      const controller = new AbortController();
      controller.abort();
      const { ctx, sink } = await setup({}, { signal: controller.signal });

      const outcome = await runComprehensiveSuite(ctx, { signal: controller.signal });

      expect(outcome.interrupted).toBe(true);
      expect(outcome.exitCode).toBe(1);
      expect(outcome.results).toEqual([]);
      expect(sink.lines().slice(-2)).toEqual(["", "❌ Test interrupted by user"]);
    });

    it("should build an interrupted report from an aborted run", async () => {
      const controller = new AbortController();
      controller.abort();
      const { ctx } = await setup({}, { signal: controller.signal });

      const outcome = await runComprehensiveSuite(ctx, { signal: controller.signal });
      const report = buildSuiteReport({ suite: "comprehensive", baseUrl: ctx.settings.baseUrl, outcome });

      expect(report.interrupted).toBe(true);
      expect(report.exitCode).toBe(1);
      expect(report.verdict).toBe("failed");
      expect(report.results).toEqual([]);
    });

    it("should apply a stricter threshold", async () => {
      const { ctx } = await setup({ unavailableModels: ["m"] });

      const outcome = await runComprehensiveSuite(ctx, { threshold: 1 });

      expect(outcome.verdict).toBe("failed");
      expect(outcome.exitCode).toBe(1);
    });
  });

  describe("quick models", () => {
    it("should exit 0 when every model answers", async () => {
      const { ctx, sink } = await setup({}, { ruleWidth: 60 });

      expect(await runQuickModels(ctx)).toBe(0);
      expect(sink.lines().slice(0, 2)).toEqual(["🚀 Maximize API Test Suite", "=".repeat(60)]);
      expect(sink.lines().slice(-11)).toEqual([
        "",
        "=".repeat(60),
        "📊 Test Summary",
        "=".repeat(60),
        "✅ PASS - Model: l",
        "✅ PASS - Model: m",
        "✅ PASS - Model: s",
        "",
        "Results: 3/3 tests passed",
        "",
        "🎉 All tests passed!",
      ]);
    });

    it("should exit 1 when any model fails", async () => {
      const { ctx, sink } = await setup({ unavailableModels: ["s"] }, { ruleWidth: 60 });

      expect(await runQuickModels(ctx)).toBe(1);
      expect(sink.lines()).toContain("❌ FAIL - Model: s");
      expect(sink.lines().slice(-3)).toEqual(["Results: 2/3 tests passed", "", "⚠️ 1 test(s) failed"]);
    });
  });

  describe("proxy check", () => {
    it("should exit 0 when the proxy answers", async () => {
      const { ctx, sink } = await setup();

      expect(await checkProxyRunning({ client: ctx.client, reporter: ctx.reporter, timeoutMs: 2000 })).toBe(0);
      expect(sink.lines()[0]).toBe("✅ Proxy is running!");
      expect(sink.lines()[1]).toMatch(/^Response: \{"status":"ok","timestamp":\d+\}$/);
    });

    it("should exit 1 on an unhealthy status", async () => {
      const { ctx, sink } = await setup({ healthy: false });

      expect(await checkProxyRunning({ client: ctx.client, reporter: ctx.reporter, timeoutMs: 2000 })).toBe(1);
      expect(sink.lines()).toEqual(["⚠️ Proxy responded but with status 503"]);
    });

    it("should print start instructions when nothing is listening", async () => {
      const { ctx, sink } = createContext({ fetch: refusedFetch() });

      expect(await checkProxyRunning({ client: ctx.client, reporter: ctx.reporter, timeoutMs: 2000 })).toBe(1);
      expect(sink.lines().slice(0, 3)).toEqual(["❌ Proxy is NOT running!", "", "To start it:"]);
    });

    it("should report other errors", async () => {
      const { ctx, sink } = createContext({ fetch: hangingFetch() });

      expect(await checkProxyRunning({ client: ctx.client, reporter: ctx.reporter, timeoutMs: 20 })).toBe(1);
      expect(sink.lines()).toEqual([
        "❌ Error checking proxy: Request timed out after 20ms (http://proxy.test/healthz)",
      ]);
    });
  });
});
