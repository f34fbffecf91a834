import type { FastMCP } from "fastmcp";
import { DEFAULT_PRECEDENCE, tableToRecord } from "@pebble/runtime";

export const precedenceResource = {
  uri: "pebble://precedence",
  name: "Pebble operator precedence",
  mimeType: "application/json",
  description: "Binary operators and their binding power; higher binds tighter",
  async load() {
    return {
      text: JSON.stringify(tableToRecord(DEFAULT_PRECEDENCE), null, 2)
    };
  }
};

/**
 * Register all resources with the MCP server
 *
 * @param server The FastMCP server instance
 */
export function registerResources(server: FastMCP) {
  server.addResource(precedenceResource);
}
