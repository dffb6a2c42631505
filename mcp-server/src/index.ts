/**
 * MCP server entry point — loads configuration, then serves tools and
 * prompts over stdio or Streamable HTTP.
 */

import "dotenv/config";

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { startHttpServer } from "./http";
import { loadConfig } from "./lib/config";
import { errorMessage } from "./lib/constants";
import { createProgressLogger } from "./lib/progress";
import { setServerReady } from "./lib/server-state";
import { createMcpServer } from "./server";

const progress = createProgressLogger("server");

async function main(): Promise<void> {
  const config = loadConfig();

  if (config.transport === "http") {
    await startHttpServer(config);
    setServerReady();
    progress({
      data: `MCP server listening on http://${config.host}:${String(config.port)}${config.path}`,
      level: "info",
    });
    return;
  }

  const server = createMcpServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  setServerReady();

  server
    .sendLoggingMessage({
      data: "embeddables-diagnostics MCP server running on stdio",
      level: "info",
      logger: "server",
    })
    .catch((error: unknown) => {
      progress({
        data: `Could not announce over MCP logging: ${errorMessage(error)}`,
        level: "warn",
      });
    });
}

try {
  await main();
} catch (error: unknown) {
  const message = errorMessage(error);
  console.error(`[fatal] ✗ ${message}`);
  process.exit(1);
}
