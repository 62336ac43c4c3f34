/**
 * Mock proxy server entrypoint
 * Run with: npx tsx apps/mock-proxy/src/index.ts
 */

import { buildMockProxy } from "./app.js";

const PORT = parseInt(process.env.PORT || "8081");
const HOST = process.env.HOST || "127.0.0.1";
const API_KEY = process.env.MOCK_PROXY_API_KEY || null;
const TOKEN_TTL_SECONDS = parseInt(process.env.MOCK_TOKEN_TTL_SECONDS || "28800");

async function main() {
  const isDev = process.env.NODE_ENV !== "production";

  const { app } = await buildMockProxy({
    logger: isDev
      ? {
          level: "info",
          transport: {
            target: "pino-pretty",
            options: { colorize: true },
          },
        }
      : { level: "info" },
    config: {
      apiKey: API_KEY,
      tokenExpiresAt: Math.floor(Date.now() / 1000) + TOKEN_TTL_SECONDS,
    },
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log("\n[SHUTDOWN] Stopping...");
    app
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await app.listen({ port: PORT, host: HOST });

  console.log(`
========================================
  Mock Maximize Proxy
========================================
  http://${HOST}:${PORT}

  Config:
    API key auth: ${API_KEY ? "ENABLED" : "DISABLED"}
    Token TTL: ${TOKEN_TTL_SECONDS}s

  Endpoints:
    GET  /healthz         - Health check
    GET  /auth/status     - Token status
    POST /v1/messages     - Messages API
    POST /__mock/config   - Update behavior
    POST /__mock/reset    - Reset all
========================================
`);
}

main().catch((err) => {
  console.error("Failed to start mock proxy:", err);
  process.exit(1);
});
