/**
 * Tool definition: reports whether the client access security plugin
 * is active.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { PLUGIN_IDS } from "@lib/constants";
import { checkClientAccessPlugin } from "@lib/diagnostics";
import {
  guardedToolCall,
  type InstanceToolParams,
} from "@tools/guarded-tool-call";
import { instanceInputSchema } from "@tools/schemas";

/**
 * Registers the check_client_access_plugin tool with the MCP server.
 */
export function registerCheckClientAccessPluginTool(server: McpServer): void {
  server.registerTool(
    "check_client_access_plugin",
    {
      annotations: {
        destructiveHint: false,
        openWorldHint: true,
        readOnlyHint: true,
      },
      description: `Checks whether the ${PLUGIN_IDS.CLIENT_ACCESS} plugin is active. Embedded components cannot authenticate cross-origin without it.`,
      inputSchema: instanceInputSchema,
      title: "Check Client Access Plugin",
    },
    guardedToolCall<InstanceToolParams>({
      handler: async ({ instance_url }, { credentials, progress }) =>
        checkClientAccessPlugin(instance_url, { credentials, progress }),
    })
  );
}
