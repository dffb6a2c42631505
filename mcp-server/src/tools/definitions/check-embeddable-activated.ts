/**
 * Tool definition: checks the activation state of embeddables whose
 * macroponent name starts with a given prefix.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { checkEmbeddableActivated } from "@lib/diagnostics";
import {
  guardedToolCall,
  type InstanceToolParams,
} from "@tools/guarded-tool-call";
import { instanceInputSchema, queryValue } from "@tools/schemas";
import { z } from "zod";

interface CheckEmbeddableActivatedParams extends InstanceToolParams {
  macroponent_name: string;
}

/**
 * Registers the check_embeddable_activated tool with the MCP server.
 */
export function registerCheckEmbeddableActivatedTool(server: McpServer): void {
  server.registerTool(
    "check_embeddable_activated",
    {
      annotations: {
        destructiveHint: false,
        openWorldHint: true,
        readOnlyHint: true,
      },
      description:
        "Check for a specific macroponent by name and its activation status. Matches every embeddable whose macroponent name starts with macroponent_name; all_active is false when nothing matches.",
      inputSchema: {
        ...instanceInputSchema,
        macroponent_name: queryValue(z.string().min(1)).describe(
          "Macroponent name or name prefix to look up."
        ),
      },
      title: "Check Embeddable Activated",
    },
    guardedToolCall<CheckEmbeddableActivatedParams>({
      handler: async (
        { instance_url, macroponent_name },
        { credentials, progress }
      ) =>
        checkEmbeddableActivated(instance_url, macroponent_name, {
          credentials,
          progress,
        }),
    })
  );
}
