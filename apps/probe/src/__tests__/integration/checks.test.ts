import { describe, it, expect, afterEach } from "vitest";
import { checkHealth } from "../../checks/health.js";
import { checkAuthStatus } from "../../checks/auth-status.js";
import { checkApiKeyAuth } from "../../checks/api-key-auth.js";
import { checkNonStreaming } from "../../checks/non-streaming.js";
import { checkStreaming } from "../../checks/streaming.js";
import { checkModelNicknames } from "../../checks/nicknames.js";
import { checkExtendedThinking } from "../../checks/extended-thinking.js";
import { testModelPrompt } from "../../checks/model-prompt.js";
import { createContext, createProbeHarness, type ProbeHarness } from "../helpers/fixtures.js";
import { hangingFetch, refusedFetch, staticFetch } from "../helpers/inject-fetch.js";

const UPSTREAM_401 =
  'Error code: 401 - {"type":"error","error":{"type":"authentication_error","message":"Invalid bearer token"}}';

describe("checks against the mock proxy", () => {
  let harness: ProbeHarness | undefined;

  async function setup(...args: Parameters<typeof createProbeHarness>): Promise<ProbeHarness> {
    harness = await createProbeHarness(...args);
    return harness;
  }

  afterEach(async () => {
    await harness?.mock.app.close();
    harness = undefined;
  });

  describe("Health Check", () => {
    it("should pass and print the body", async () => {
      const { ctx, sink } = await setup();

      expect(await checkHealth(ctx)).toBe(true);

      const lines = sink.lines();
      expect(lines.slice(0, 4)).toEqual(["", "=".repeat(70), "Test 1: Health Check Endpoint", "=".repeat(70)]);
      expect(lines[4]).toBe("ℹ️  Testing: GET http://proxy.test/healthz");
      expect(lines[5]).toBe("✅ Health check passed");
      expect(lines[6]).toMatch(/^ℹ️ {2}Response: \{"status":"ok","timestamp":\d+\}$/);
    });

    it("should fail on a non-200 status", async () => {
      const { ctx, sink } = await setup({ healthy: false });

      expect(await checkHealth(ctx)).toBe(false);
      expect(sink.lines()).toContain("❌ Health check failed with status 503");
    });

    it("should fail when the proxy is unreachable", async () => {
      const { ctx, sink } = createContext({ fetch: refusedFetch() });

      expect(await checkHealth(ctx)).toBe(false);
      expect(sink.lines()).toContain(
        "❌ Health check failed: Connection error: connect ECONNREFUSED 127.0.0.1:8081 (http://proxy.test/healthz)"
      );
    });
  });

  describe("Auth Status", () => {
    it("should print the token state", async () => {
      const expiresAt = Math.floor(Date.now() / 1000) + 2 * 3600 + 30 * 60 + 30;
      const { ctx, sink } = await setup({ tokenExpiresAt: expiresAt });

      expect(await checkAuthStatus(ctx)).toBe(true);
      expect(sink.lines().slice(5)).toEqual([
        "✅ Auth status check passed",
        "ℹ️  Has tokens: true",
        "ℹ️  Is expired: false",
        `ℹ️  Expires at: ${new Date(expiresAt * 1000).toISOString()}`,
        "ℹ️  Time until expiry: 2h 30m",
      ]);
    });

    it("should warn when there are no tokens", async () => {
      const { ctx, sink } = await setup({ tokenExpiresAt: null });

      expect(await checkAuthStatus(ctx)).toBe(true);
      expect(sink.lines()).not.toContain("ℹ️  Expires at: null");
      expect(sink.lines().at(-1)).toBe("⚠️  No tokens found! Set MAXIMIZE_ACCESS_TOKEN and MAXIMIZE_REFRESH_TOKEN");
    });

    it("should warn when the tokens are expired", async () => {
      const { ctx, sink } = await setup({ tokenExpiresAt: Math.floor(Date.now() / 1000) - 600 });

      expect(await checkAuthStatus(ctx)).toBe(true);
      expect(sink.lines().at(-1)).toBe("⚠️  Tokens are expired! They will be auto-refreshed on first API call");
    });
  });

  describe("API Key Auth", () => {
    it("should report key auth as disabled when the anonymous call succeeds", async () => {
      const { ctx, sink } = await setup();

      expect(await checkApiKeyAuth(ctx)).toBe(true);
      expect(sink.lines().slice(4)).toEqual([
        "ℹ️  Testing with API key: *******cret",
        "ℹ️  API key authentication is DISABLED (request succeeded without key)",
      ]);
    });

    it("should retry with the key when the proxy demands one", async () => {
      const { ctx, sink, mock } = await setup({ apiKey: "test-secret" });

      expect(await checkApiKeyAuth(ctx)).toBe(true);
      expect(sink.lines().slice(5)).toEqual([
        "ℹ️  API key authentication is ENABLED (401 without key)",
        "✅ API key authentication is working",
      ]);
      expect(mock.state.store.getAll()).toHaveLength(1);
    });

    it("should warn but pass on an unexpected status with the key", async () => {
      const { ctx, sink } = await setup({ apiKey: "test-secret", unavailableModels: ["l"] });

      expect(await checkApiKeyAuth(ctx)).toBe(true);
      expect(sink.lines().at(-1)).toBe("⚠️  Unexpected status with API key: 404");
    });

    it("should fail when the call itself fails", async () => {
      const { ctx, sink } = createContext({ fetch: hangingFetch() });

      expect(await checkApiKeyAuth(ctx)).toBe(false);
      expect(sink.lines().at(-1)).toBe(
        "❌ API key auth test failed: Request timed out after 1000ms (http://proxy.test/v1/messages)"
      );
    });
  });

  describe("Non-Streaming", () => {
    const check = checkNonStreaming("l", "Say hello in 3 words");

    it("should print the response and usage", async () => {
      const { ctx, sink } = await setup();

      expect(await check(ctx)).toBe(true);
      expect(sink.lines().slice(2)).toEqual([
        "Test 4: Non-Streaming Request - Model 'l'",
        "=".repeat(70),
        "ℹ️  Prompt: Say hello in 3 words",
        "✅ Non-streaming request succeeded",
        "ℹ️  Response: Hello from the mock proxy.",
        "ℹ️  Input tokens: 5",
        "ℹ️  Output tokens: 5",
      ]);
    });

    it("should add hints for upstream token failures", async () => {
      const { ctx, sink } = await setup({ upstreamAuthFailure: true });

      expect(await check(ctx)).toBe(false);
      expect(sink.lines().slice(-3)).toEqual([
        `❌ Non-streaming request failed: ${UPSTREAM_401}`,
        "⚠️  This is an Anthropic authentication error, not a proxy error",
        "⚠️  Your OAuth tokens might be invalid. See troubleshooting below.",
      ]);
    });

    it("should fail when the proxy has no tokens", async () => {
      const { ctx, sink } = await setup({ tokenExpiresAt: null });

      expect(await check(ctx)).toBe(false);
      expect(sink.lines().at(-3)).toBe(
        '❌ Non-streaming request failed: Error code: 401 - {"type":"error","error":{"type":"authentication_error","message":"OAuth expired; please authenticate using the CLI"}}'
      );
    });

    it("should fail when the first block is not text", async () => {
      const body = JSON.stringify({
        id: "msg_test",
        type: "message",
        role: "assistant",
        model: "claude-sonnet-4-20250514",
        content: [{ type: "thinking", thinking: "hm" }],
        usage: { input_tokens: 1, output_tokens: 1 },
      });
      const { ctx, sink } = createContext({ fetch: staticFetch(200, body) });

      expect(await check(ctx)).toBe(false);
      expect(sink.lines().at(-1)).toBe(
        "❌ Non-streaming request failed: Expected a text block first, got thinking"
      );
    });
  });

  describe("Streaming", () => {
    const check = checkStreaming("m", "Count to 5");

    it("should echo the stream and count characters", async () => {
      const { ctx, sink } = await setup();

      expect(await check(ctx)).toBe(true);
      expect(sink.lines().slice(5)).toEqual([
        "ℹ️  Streaming response: Hello from the mock proxy.",
        "✅ Streaming request succeeded",
        "ℹ️  Total characters received: 26",
      ]);
    });

    it("should fail on an empty stream", async () => {
      const { ctx, sink } = await setup({ responseText: "" });

      expect(await check(ctx)).toBe(false);
      expect(sink.lines().slice(-2)).toEqual([
        "ℹ️  Streaming response: ",
        "❌ Streaming request returned empty response",
      ]);
    });

    it("should end the partial line before reporting a failure", async () => {
      const { ctx, sink } = await setup({ unavailableModels: ["m"] });

      expect(await check(ctx)).toBe(false);
      expect(sink.lines().slice(-2)).toEqual([
        "ℹ️  Streaming response: ",
        '❌ Streaming request failed: Error code: 404 - {"type":"error","error":{"type":"not_found_error","message":"model: claude-3-7-sonnet-20250219"}}',
      ]);
    });
  });

  describe("Model Nicknames", () => {
    it("should resolve every nickname", async () => {
      const { ctx, sink } = await setup();

      expect(await checkModelNicknames(ctx)).toBe(true);
      expect(sink.lines().at(-1)).toBe("✅ 6/6 nicknames tested successfully");
    });

    it("should warn about models outside the subscription", async () => {
      const { ctx, sink } = await setup({ unavailableModels: ["xl", "xxl"] });

      expect(await checkModelNicknames(ctx)).toBe(true);
      expect(sink.lines()).toContain("⚠️  Nickname 'xl' - Model not available in your subscription");
      expect(sink.lines()).toContain("⚠️  Nickname 'xxl' - Model not available in your subscription");
      expect(sink.lines().at(-1)).toBe("✅ 4/6 nicknames tested successfully");
    });

    it("should fail when no nickname works", async () => {
      const { ctx, sink } = await setup({ upstreamAuthFailure: true });

      expect(await checkModelNicknames(ctx)).toBe(false);
      expect(sink.lines()).toContain(`❌ Nickname 'xs' failed: ${UPSTREAM_401}`);
      expect(sink.lines().at(-1)).toBe("❌ No nicknames worked");
    });
  });

  describe("Extended Thinking", () => {
    it("should report thinking length and the answer", async () => {
      const { ctx, sink } = await setup();

      expect(await checkExtendedThinking(ctx)).toBe(true);
      expect(sink.lines().slice(4)).toEqual([
        "✅ Extended thinking mode is working",
        "ℹ️  Thinking content length: 44",
        "ℹ️  Response: Hello from the mock proxy.",
      ]);
    });

    it("should warn and pass when thinking is unsupported", async () => {
      const { ctx, sink } = await setup({ thinkingSupported: false });

      expect(await checkExtendedThinking(ctx)).toBe(true);
      expect(sink.lines().at(-1)).toBe(
        '⚠️  Extended thinking not available: Error code: 400 - {"type":"error","error":{"type":"invalid_request_error","message":"thinking is not supported by this model"}}'
      );
    });

    it("should fail on other errors", async () => {
      const { ctx, sink } = await setup({ upstreamAuthFailure: true });

      expect(await checkExtendedThinking(ctx)).toBe(false);
      expect(sink.lines().at(-1)).toBe(`❌ Extended thinking test failed: ${UPSTREAM_401}`);
    });
  });

  describe("quick model prompt", () => {
    it("should print the plain success block", async () => {
      const { ctx, sink } = await setup({}, { ruleWidth: 60 });

      expect(await testModelPrompt("s", "Name one color. One word only.")(ctx)).toBe(true);
      expect(sink.lines()).toEqual([
        "",
        "=".repeat(60),
        "Testing model: s",
        "Prompt: Name one color. One word only.",
        "=".repeat(60),
        "✅ SUCCESS",
        "Response: Hello from the mock proxy.",
        "Usage: input_tokens=6, output_tokens=5",
      ]);
    });

    it("should print the failure", async () => {
      const { ctx, sink } = await setup({ unavailableModels: ["s"] });

      expect(await testModelPrompt("s", "Name one color.")(ctx)).toBe(false);
      expect(sink.lines().at(-1)).toBe(
        '❌ FAILED: Error code: 404 - {"type":"error","error":{"type":"not_found_error","message":"model: claude-3-5-sonnet-20241022"}}'
      );
    });
  });
});
