/**
 * Tool definition: reads the system property that switches embeddable
 * UI components on.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { EMBEDDABLES_PROPERTY } from "@lib/constants";
import { checkEmbeddablesEnabled } from "@lib/diagnostics";
import {
  guardedToolCall,
  type InstanceToolParams,
} from "@tools/guarded-tool-call";
import { instanceInputSchema } from "@tools/schemas";

/**
 * Registers the check_embeddables_enabled tool with the MCP server.
 */
export function registerCheckEmbeddablesEnabledTool(server: McpServer): void {
  server.registerTool(
    "check_embeddables_enabled",
    {
      annotations: {
        destructiveHint: false,
        openWorldHint: true,
        readOnlyHint: true,
      },
      description: `Checks whether the ${EMBEDDABLES_PROPERTY} system property is set to true. A missing property is reported as enabled: false.`,
      inputSchema: instanceInputSchema,
      title: "Check Embeddables Enabled",
    },
    guardedToolCall<InstanceToolParams>({
      handler: async ({ instance_url }, { credentials, progress }) =>
        checkEmbeddablesEnabled(instance_url, { credentials, progress }),
    })
  );
}
