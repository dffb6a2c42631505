/**
 * Tool definition: reports whether the embeddables UX plugin is active.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { PLUGIN_IDS } from "@lib/constants";
import { checkEmbeddablesPlugin } from "@lib/diagnostics";
import {
  guardedToolCall,
  type InstanceToolParams,
} from "@tools/guarded-tool-call";
import { instanceInputSchema } from "@tools/schemas";

export function registerCheckEmbeddablesPluginTool(server: McpServer): void {
  server.registerTool(
    "check_embeddables_plugin",
    {
      annotations: {
        destructiveHint: false,
        openWorldHint: true,
        readOnlyHint: true,
      },
      description: `Checks whether the ${PLUGIN_IDS.EMBEDDABLES} plugin is active.`,
      inputSchema: instanceInputSchema,
      title: "Check Embeddables Plugin",
    },
    guardedToolCall<InstanceToolParams>({
      handler: async ({ instance_url }, { credentials, progress }) =>
        checkEmbeddablesPlugin(instance_url, { credentials, progress }),
    })
  );
}
