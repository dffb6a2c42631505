/**
 * Tool definition: runs every embedding check and returns one report.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { runAllChecks } from "@lib/diagnostics";
import {
  guardedToolCall,
  type InstanceToolParams,
} from "@tools/guarded-tool-call";
import { domainSchema, instanceInputSchema } from "@tools/schemas";

interface RunAllChecksParams extends InstanceToolParams {
  domain?: string;
}

/**
 * Registers the run_all_checks tool with the MCP server.
 */
export function registerRunAllChecksTool(server: McpServer): void {
  server.registerTool(
    "run_all_checks",
    {
      annotations: {
        destructiveHint: false,
        openWorldHint: true,
        readOnlyHint: true,
      },
      description:
        "Runs all checks and returns a report keyed by embeddables_enabled, embeddables_plugin, client_access_plugin, cors_rule and embeddable_activation. A failing check does not stop the others; inspect each entry's success field.",
      inputSchema: {
        ...instanceInputSchema,
        domain: domainSchema,
      },
      title: "Run All Checks",
    },
    guardedToolCall<RunAllChecksParams>({
      handler: async ({ domain, instance_url }, { credentials, progress }) =>
        runAllChecks(instance_url, { credentials, domain, progress }),
    })
  );
}
