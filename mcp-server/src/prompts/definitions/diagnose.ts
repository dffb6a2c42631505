/**
 * Prompt definition: runs the full embedding health check for one
 * instance.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { buildPromptResult, diagnoseInstructions } from "@prompts/content";
import { z } from "zod";

/**
 * Registers the embeddables:diagnose prompt with the MCP server.
 */
export function registerDiagnosePrompt(server: McpServer): void {
  server.registerPrompt(
    "embeddables:diagnose",
    {
      argsSchema: {
        domain: z
          .string()
          .optional()
          .describe("Domain of the page that embeds the components."),
        instance_url: z.string().describe("The instance to diagnose."),
      },
      description:
        "Check every setting that embeddable UI components depend on and report what is misconfigured.",
      title: "Diagnose Embedding",
    },
    ({ domain, instance_url }) =>
      buildPromptResult(diagnoseInstructions(instance_url, domain))
  );
}
