/**
 * Shared Zod schemas for tool input validation and inbound header
 * extraction.
 */

import type { RequestHeaders } from "@lib/credentials";

import { z } from "zod";

/**
 * Reusable Zod schema fragments for the instance and credential fields
 * every tool accepts.
 */
export const commonSchemas = {
  instanceUrl: z
    .string()
    .describe(
      "The instance to diagnose, e.g. dev12345.service-now.com or https://dev12345.service-now.com"
    ),
  password: z
    .string()
    .optional()
    .describe(
      "Password for Basic auth. Falls back to the `password` request header."
    ),
  username: z
    .string()
    .optional()
    .describe(
      "Username for Basic auth. Falls back to the `username` request header."
    ),
};

/**
 * Input shape shared by every diagnostics tool.
 */
export const instanceInputSchema = {
  instance_url: commonSchemas.instanceUrl,
  password: commonSchemas.password,
  username: commonSchemas.username,
};

/**
 * Restricts a string interpolated into an encoded Table API query.
 * `^` joins conditions there, so it is rejected.
 */
export function queryValue(
  schema: z.ZodString
): z.ZodEffects<z.ZodString> {
  return schema.refine((value) => !value.includes("^"), {
    message: "must not contain ^",
  });
}

/**
 * Optional domain filter for CORS rule lookups.
 */
export const domainSchema = queryValue(z.string())
  .optional()
  .describe(
    "Domain the embedding page is served from, e.g. portal.example.com. Omit to list every CORS rule."
  );

interface RequestInfo {
  headers?: RequestHeaders;
}

/**
 * Returns the inbound request headers of an MCP call, if any.
 */
export function getRequestHeaders(
  requestInfo?: RequestInfo
): RequestHeaders | undefined {
  return requestInfo?.headers;
}
