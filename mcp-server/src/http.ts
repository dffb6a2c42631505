/**
 * Stateless Streamable HTTP surface — one McpServer and transport per
 * request, behind a readiness gate. Inbound `username` / `password`
 * headers reach tool handlers through the transport's request info.
 */

import type { Server } from "node:http";

import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";

import type { ServerConfig } from "./lib/config";

import { errorMessage } from "./lib/constants";
import { createProgressLogger } from "./lib/progress";
import { isServerReady } from "./lib/server-state";
import { createMcpServer } from "./server";

/**
 * OAuth discovery endpoints some MCP clients probe before connecting.
 * The server takes Basic credentials, so these answer 204.
 */
export const OAUTH_DISCOVERY_PATHS = [
  "/.well-known/oauth-authorization-server",
  "/.well-known/oauth-protected-resource",
] as const;

const progress = createProgressLogger("http");

function readinessGate(_req: Request, res: Response, next: NextFunction): void {
  if (!isServerReady()) {
    progress({
      data: "Received request before initialization was complete",
      level: "warn",
    });
    res.status(503).json({ error: "Server not yet ready" });
    return;
  }
  next();
}

function noContent(_req: Request, res: Response): void {
  res.status(204).end();
}

function methodNotAllowed(_req: Request, res: Response): void {
  res.status(405).json({
    error: { code: -32_000, message: "Method not allowed." },
    id: null,
    jsonrpc: "2.0",
  });
}

async function handleMcpRequest(req: Request, res: Response): Promise<void> {
  const server = createMcpServer();
  const transport = new StreamableHTTPServerTransport({
    enableJsonResponse: true,
    sessionIdGenerator: undefined,
  });

  res.on("close", () => {
    server.close().catch((error: unknown) => {
      progress({
        data: `Failed to close MCP server: ${errorMessage(error)}`,
        level: "warn",
      });
    });
  });

  try {
    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);
  } catch (error: unknown) {
    progress({
      data: `MCP request failed: ${errorMessage(error)}`,
      level: "error",
    });
    if (!res.headersSent) {
      res.status(500).json({
        error: { code: -32_603, message: "Internal server error" },
        id: null,
        jsonrpc: "2.0",
      });
    }
  }
}

/**
 * Creates the express app serving MCP at `path`.
 */
export function createHttpApp(path: string): Express {
  const app = express();

  app.use(readinessGate);
  app.use(express.json());

  for (const discoveryPath of OAUTH_DISCOVERY_PATHS) {
    app.get(discoveryPath, noContent);
    app.options(discoveryPath, noContent);
  }

  app.post(path, handleMcpRequest);
  app.get(path, methodNotAllowed);
  app.delete(path, methodNotAllowed);

  return app;
}

/**
 * Starts listening and resolves once the port is bound.
 */
export async function startHttpServer(config: ServerConfig): Promise<Server> {
  const app = createHttpApp(config.path);

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host, (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(server);
    });
  });
}
