/**
 * Tool definition: probes an instance to confirm it is reachable and
 * the credentials are accepted.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { connectToInstance } from "@lib/diagnostics";
import {
  guardedToolCall,
  type InstanceToolParams,
} from "@tools/guarded-tool-call";
import { instanceInputSchema } from "@tools/schemas";

/**
 * Registers the connect_to_instance tool with the MCP server.
 */
export function registerConnectToInstanceTool(server: McpServer): void {
  server.registerTool(
    "connect_to_instance",
    {
      annotations: {
        destructiveHint: false,
        openWorldHint: true,
        readOnlyHint: true,
      },
      description:
        "Checks that the instance is reachable and the credentials are accepted by reading one row of sys_properties. Every other check runs this probe first.",
      inputSchema: instanceInputSchema,
      title: "Connect to Instance",
    },
    guardedToolCall<InstanceToolParams>({
      handler: async ({ instance_url }, { credentials, progress }) =>
        connectToInstance(instance_url, { credentials, progress }),
    })
  );
}
