/**
 * Tool definition: lists every embeddable macroponent and counts the
 * active ones.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { checkAllEmbeddableActivated } from "@lib/diagnostics";
import {
  guardedToolCall,
  type InstanceToolParams,
} from "@tools/guarded-tool-call";
import { instanceInputSchema } from "@tools/schemas";

/**
 * Registers the check_all_embeddable_activated tool with the MCP server.
 */
export function registerCheckAllEmbeddableActivatedTool(
  server: McpServer
): void {
  server.registerTool(
    "check_all_embeddable_activated",
    {
      annotations: {
        destructiveHint: false,
        openWorldHint: true,
        readOnlyHint: true,
      },
      description:
        "Check for all records in 'sys_ux_embeddable_macroponent' table and their activation status.",
      inputSchema: instanceInputSchema,
      title: "Check All Embeddables Activated",
    },
    guardedToolCall<InstanceToolParams>({
      handler: async ({ instance_url }, { credentials, progress }) =>
        checkAllEmbeddableActivated(instance_url, { credentials, progress }),
    })
  );
}
