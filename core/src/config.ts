import { z } from "zod";
import { DEFAULT_MAX_SOURCE_LENGTH } from "./core/schema.js";

export const VERSION = "0.1.0";

/**
 * Environment:
 *   - MODE              - mcp | http | both (default: both)
 *   - PORT              - HTTP server port (default: 3001)
 *   - MAX_SOURCE_LENGTH - largest accepted source, in characters (default: 100000)
 *   - RATE_LIMIT_RPS    - requests per second per client (default: 5)
 *   - RATE_LIMIT_BURST  - burst size per client (default: 10)
 */
export const Config = z.object({
  MODE: z.enum(["mcp", "http", "both"]).default("both"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3001),
  MAX_SOURCE_LENGTH: z.coerce.number().int().positive().default(DEFAULT_MAX_SOURCE_LENGTH),
  RATE_LIMIT_RPS: z.coerce.number().positive().default(5),
  RATE_LIMIT_BURST: z.coerce.number().int().positive().default(10)
});

export type ConfigT = z.infer<typeof Config>;

export function loadConfig(env: Record<string, string | undefined> = process.env): ConfigT {
  const parsed = Config.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }
  return parsed.data;
}
