/**
 * MCP Server - thin adapter over core handlers
 * Wires tools and resources to the FastMCP host
 */
import { FastMCP } from "fastmcp";
import { VERSION } from "../config.js";
import { registerResources } from "../core/resources.js";
import { registerTools, type ToolOptions } from "../core/tools.js";

/**
 * Create the MCP server with every tool and resource registered
 */
export function createMcpServer(opts: ToolOptions = {}): FastMCP {
  const server = new FastMCP({
    name: "Pebble MCP Server",
    version: VERSION
  });

  registerResources(server);
  registerTools(server, opts);
  return server;
}

/**
 * Start the MCP server on stdio
 */
export async function startMcpHost(opts: ToolOptions = {}): Promise<FastMCP> {
  try {
    const server = createMcpServer(opts);
    await server.start({ transportType: "stdio" });
    console.error("[mcp] Pebble MCP server running on stdio");
    return server;
  } catch (error) {
    console.error("[mcp] Failed to initialize MCP server:", error);
    throw error;
  }
}
