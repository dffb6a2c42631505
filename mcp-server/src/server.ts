/**
 * Builds an McpServer with every tool and prompt registered.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { SERVER_INFO } from "./lib/constants";
import { registerPrompts } from "./prompts/register";
import { registerTools } from "./tools/register";

export function createMcpServer(): McpServer {
  const server = new McpServer(
    {
      name: SERVER_INFO.NAME,
      version: SERVER_INFO.VERSION,
    },
    {
      capabilities: { logging: {} },
      instructions:
        "Diagnoses why embeddable UI components fail to load from an instance. Start with run_all_checks.",
    }
  );

  registerTools(server);
  registerPrompts(server);

  return server;
}
