/**
 * Environment configuration for the server process, validated with zod.
 */

import { z } from "zod";

const configSchema = z.object({
  HOST: z.string().min(1).default("0.0.0.0"),
  MCP_PATH: z
    .string()
    .startsWith("/", { message: "must start with /" })
    .default("/mcp"),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8005),
});

/**
 * Resolved server configuration.
 */
export interface ServerConfig {
  host: string;
  path: string;
  port: number;
  transport: "http" | "stdio";
}

/**
 * Parses server configuration from environment variables. Throws with
 * every offending variable named when validation fails.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ServerConfig {
  const parsed = configSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return {
    host: parsed.data.HOST,
    path: parsed.data.MCP_PATH,
    port: parsed.data.PORT,
    transport: parsed.data.MCP_TRANSPORT,
  };
}
