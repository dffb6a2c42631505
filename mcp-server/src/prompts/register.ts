/**
 * Registers all MCP prompt definitions with the server.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { registerDiagnosePrompt } from "./definitions/diagnose";

/**
 * Registers every prompt with the MCP server instance.
 */
export function registerPrompts(server: McpServer): void {
  registerDiagnosePrompt(server);
}
