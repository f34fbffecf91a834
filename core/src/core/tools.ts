import type { FastMCP } from "fastmcp";
import { z } from "zod";
import { ParseOptions } from "./schema.js";
import { parse, tokenize } from "./handlers.js";

export interface ToolOptions {
  maxSourceLength?: number;
}

const TokenizeParams = z.object({
  source: z.string().describe("Pebble source text")
});

const ParseParams = z.object({
  source: z.string().describe("Pebble source text"),
  options: ParseOptions.optional().describe("Custom precedence table, duplicate parameter policy, output format")
});

/**
 * MCP tools are thin wrappers around core handlers - no business logic here
 */
export const tokenizeTool = (opts: ToolOptions = {}) => ({
  name: "pebble.tokenize",
  description: "Split Pebble source into tokens with their line and column",
  parameters: TokenizeParams,
  execute: async (params: z.infer<typeof TokenizeParams>) =>
    JSON.stringify(tokenize(params, { maxSourceLength: opts.maxSourceLength }), null, 2)
});

export const parseTool = (opts: ToolOptions = {}) => ({
  name: "pebble.parse",
  description: "Parse Pebble source into function definitions, reporting syntax errors as diagnostics",
  parameters: ParseParams,
  execute: async (params: z.infer<typeof ParseParams>) =>
    JSON.stringify(parse(params, { maxSourceLength: opts.maxSourceLength }), null, 2)
});

/**
 * Register all tools with the MCP server
 *
 * @param server The FastMCP server instance
 */
export function registerTools(server: FastMCP, opts: ToolOptions = {}) {
  server.addTool(tokenizeTool(opts));
  server.addTool(parseTool(opts));
}
