import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse string booleans from environment variables.
 * z.coerce.boolean() treats any non-empty string as true, including "false"
 */
export const stringBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return val.toLowerCase() === "true";
  });

/**
 * Absolute http(s) URL. z.string().url() alone accepts "localhost:8081",
 * reading "localhost:" as the scheme.
 */
export const httpUrl = z
  .string()
  .url()
  .regex(/^https?:\/\//i, { message: "Must be an http:// or https:// URL" });

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z.object({
  // ===========================================================================
  // Environment
  // ===========================================================================
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),

  // ===========================================================================
  // Proxy Under Test
  // ===========================================================================
  /** Base URL used by the comprehensive suite (local or deployed proxy) */
  MAXIMIZE_BASE_URL: httpUrl.default("http://localhost:8081"),
  /** Sent as `Authorization: Bearer <key>`; the proxy ignores it when key auth is off */
  MAXIMIZE_API_KEY: z.string().min(1).default("dummy"),
  /** Base URL used by the quick tools (proxy check, quick model test) */
  MAXIMIZE_LOCAL_URL: httpUrl.default("http://localhost:8081"),

  // ===========================================================================
  // Timeouts (ms)
  // ===========================================================================
  PROBE_QUICK_HEALTH_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  PROBE_HEALTH_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  PROBE_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // ===========================================================================
  // Verdict & Output
  // ===========================================================================
  /** Fraction of passing checks that still counts as a successful run */
  PROBE_PASS_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  PROBE_COLOR: stringBoolean.default(true),
});

// =============================================================================
// Config Loading
// =============================================================================

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function parseConfig(env: Record<string, string | undefined>) {
  return configSchema.safeParse(env);
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const result = parseConfig(env);

  if (!result.success) {
    console.error("Missing or invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  const config = result.data;
  cachedConfig = config;
  return config;
}

/** For testing: reset cached config */
export function resetConfig(): void {
  cachedConfig = null;
}
