/**
 * Shared prompt content — persona preamble, task instructions, and
 * builder used by the prompt definitions.
 *
 * Prompts use a single "user" role message that combines the persona
 * context with the task instructions.
 */

import type { GetPromptResult } from "@modelcontextprotocol/sdk/types.js";

/**
 * Persona preamble prepended to every prompt's instructions.
 */
export const PERSONA =
  "You are an expert on embedding platform UI components into external web pages. You have MCP tools available to inspect the user's instance.";

/**
 * Builds the health-check instructions for one instance and, when
 * given, the domain of the page that embeds the components.
 */
export function diagnoseInstructions(
  instanceUrl: string,
  domain?: string
): string {
  const domainArg = domain ? `, domain: "${domain}"` : "";

  return `Do not list your tools. Do not ask what the user wants. Begin the embedding health check immediately by calling tools.

Step 1: Call \`run_all_checks\` with instance_url: "${instanceUrl}"${domainArg}.
Step 2: If any entry in the report has success: false, stop and tell the user the error. "HTTP 401" means the credentials were rejected; "HTTP 403" means the user lacks read access to that table.
Step 3: For every embeddable in \`embeddable_activation\` with active: false, call \`check_embeddable_activated\` with its name to confirm.

Evaluate:
- Is \`glide.uxf.lib.embeddables.enabled\` set to true?
- Is the **com.glide.ux.embeddables** plugin active?
- Is the **com.glide.security.client_access** plugin active?
- Does an active CORS rule exist for the embedding domain?
- Are the embeddable components the page uses active?

Summarize findings by severity (critical → warning → info). For each issue, state what is misconfigured, the effect on the embedding page, and the specific fix.`;
}

/**
 * Constructs an MCP prompt result as a single user-role message
 * combining the persona preamble with the task instructions.
 */
export function buildPromptResult(
  taskInstructions: string,
  description?: string
): GetPromptResult {
  return {
    description,
    messages: [
      {
        content: {
          text: `${PERSONA}\n\n${taskInstructions}`,
          type: "text",
        },
        role: "user",
      },
    ],
  };
}
