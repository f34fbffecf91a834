/**
 * Service Entry Point - MCP + REST server
 *
 * Modes:
 *   - MODE=mcp   - MCP server only (stdio)
 *   - MODE=http  - REST HTTP server only
 *   - MODE=both  - MCP on stdio and HTTP (default)
 *
 * See config.ts for the remaining environment variables.
 */
import { loadConfig } from "./config.js";
import { RateLimiter } from "./core/rate-limit.js";
import { startHttpServer } from "./server/http-server.js";
import { startMcpHost } from "./server/server.js";

async function main() {
  const config = loadConfig();
  console.error(`Starting in ${config.MODE} mode...`);

  if (config.MODE === "http" || config.MODE === "both") {
    await startHttpServer({
      port: config.PORT,
      maxSourceLength: config.MAX_SOURCE_LENGTH,
      limiter: new RateLimiter({ rate: config.RATE_LIMIT_RPS, burst: config.RATE_LIMIT_BURST })
    });
  }

  if (config.MODE === "mcp" || config.MODE === "both") {
    await startMcpHost({ maxSourceLength: config.MAX_SOURCE_LENGTH });
  }

  console.error("\nServer ready. Press Ctrl+C to stop.");
}

// Graceful shutdown
process.on("SIGINT", () => {
  console.error("\nShutting down...");
  process.exit(0);
});

process.on("SIGTERM", () => {
  console.error("\nShutting down...");
  process.exit(0);
});

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
