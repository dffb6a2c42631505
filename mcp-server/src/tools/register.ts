/**
 * Registers all MCP tool definitions with the server.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { registerCheckAllEmbeddableActivatedTool } from "./definitions/check-all-embeddable-activated";
import { registerCheckClientAccessPluginTool } from "./definitions/check-client-access-plugin";
import { registerCheckCorsRuleTool } from "./definitions/check-cors-rule";
import { registerCheckEmbeddableActivatedTool } from "./definitions/check-embeddable-activated";
import { registerCheckEmbeddablesEnabledTool } from "./definitions/check-embeddables-enabled";
import { registerCheckEmbeddablesPluginTool } from "./definitions/check-embeddables-plugin";
import { registerConnectToInstanceTool } from "./definitions/connect-to-instance";
import { registerRunAllChecksTool } from "./definitions/run-all-checks";

/**
 * Registers every tool with the MCP server instance.
 */
export function registerTools(server: McpServer): void {
  registerCheckAllEmbeddableActivatedTool(server);
  registerCheckClientAccessPluginTool(server);
  registerCheckCorsRuleTool(server);
  registerCheckEmbeddableActivatedTool(server);
  registerCheckEmbeddablesEnabledTool(server);
  registerCheckEmbeddablesPluginTool(server);
  registerConnectToInstanceTool(server);
  registerRunAllChecksTool(server);
}
