/**
 * Tool definition: looks up CORS rules that allow the embedding page's
 * domain.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { checkCorsRule } from "@lib/diagnostics";
import {
  guardedToolCall,
  type InstanceToolParams,
} from "@tools/guarded-tool-call";
import { domainSchema, instanceInputSchema } from "@tools/schemas";

interface CheckCorsRuleParams extends InstanceToolParams {
  domain?: string;
}

/**
 * Registers the check_cors_rule tool with the MCP server.
 */
export function registerCheckCorsRuleTool(server: McpServer): void {
  server.registerTool(
    "check_cors_rule",
    {
      annotations: {
        destructiveHint: false,
        openWorldHint: true,
        readOnlyHint: true,
      },
      description:
        "Checks sys_cors_rule for rules matching a domain. A domain without a scheme matches its https://, http:// and bare forms. Reports whether any rule exists and whether any matching rule is active.",
      inputSchema: {
        ...instanceInputSchema,
        domain: domainSchema,
      },
      title: "Check CORS Rule",
    },
    guardedToolCall<CheckCorsRuleParams>({
      handler: async ({ domain, instance_url }, { credentials, progress }) =>
        checkCorsRule(instance_url, domain, { credentials, progress }),
    })
  );
}
