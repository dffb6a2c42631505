/**
 * Tool execution wrapper — resolves credentials from arguments and
 * request headers, runs the handler, and catches errors so every tool
 * returns a structured MCP response.
 */

import { errorMessage } from "@lib/constants";
import { type Credentials, resolveCredentials } from "@lib/credentials";
import { createProgressLogger, type ProgressCallback } from "@lib/progress";

import { getRequestHeaders } from "./schemas";

/**
 * Arguments every diagnostics tool receives.
 */
export interface InstanceToolParams {
  instance_url: string;
  password?: string;
  username?: string;
}

interface ToolContext {
  requestInfo?: {
    headers?: Record<string, string | string[] | undefined>;
  };
}

interface ToolContent {
  text: string;
  type: "text";
}

interface ToolResult {
  [key: string]: unknown;
  content: ToolContent[];
  isError?: boolean;
}

/**
 * What a handler receives besides its own arguments.
 */
export interface ToolInvocation {
  credentials: Credentials;
  progress: ProgressCallback;
}

interface GuardedToolCallConfig<TParams extends InstanceToolParams> {
  handler: (params: TParams, invocation: ToolInvocation) => Promise<unknown>;
}

const toolProgress = createProgressLogger("tools");

/**
 * Serializes a diagnostic result as pretty-printed JSON text content.
 */
export function jsonResult(value: unknown): ToolResult {
  return {
    content: [{ text: JSON.stringify(value, null, 2), type: "text" as const }],
  };
}

/**
 * Wraps a tool handler with credential resolution, JSON serialization
 * of the result, and top-level error catching.
 */
export function guardedToolCall<TParams extends InstanceToolParams>(
  config: GuardedToolCallConfig<TParams>
): (params: TParams, context: ToolContext) => Promise<ToolResult> {
  return async (params: TParams, context: ToolContext): Promise<ToolResult> => {
    try {
      const credentials = resolveCredentials(
        { password: params.password, username: params.username },
        getRequestHeaders(context?.requestInfo)
      );

      const result = await config.handler(params, {
        credentials,
        progress: toolProgress,
      });
      return jsonResult(result);
    } catch (error: unknown) {
      const message = errorMessage(error);
      return {
        content: [{ text: `Error: ${message}`, type: "text" as const }],
        isError: true,
      };
    }
  };
}
