/**
 * Credential resolution for Table API calls.
 */

/**
 * Basic-auth pair; either half may be missing.
 */
export interface Credentials {
  password?: string;
  username?: string;
}

/**
 * Inbound request headers as the MCP SDK exposes them.
 */
export type RequestHeaders = Record<string, string | string[] | undefined>;

function headerValue(
  headers: RequestHeaders | undefined,
  name: string
): string | undefined {
  const value = headers?.[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first || undefined;
}

/**
 * Resolves each credential field from the explicit argument first,
 * then the inbound `username` / `password` headers. Empty strings
 * count as absent.
 */
export function resolveCredentials(
  explicit: Credentials,
  headers?: RequestHeaders
): Credentials {
  return {
    password: explicit.password || headerValue(headers, "password"),
    username: explicit.username || headerValue(headers, "username"),
  };
}

/**
 * Builds the Basic `Authorization` header value, or undefined when
 * neither half is present.
 */
export function basicAuthHeader(credentials: Credentials): string | undefined {
  if (!credentials.username && !credentials.password) {
    return undefined;
  }
  const pair = `${credentials.username ?? ""}:${credentials.password ?? ""}`;
  return `Basic ${Buffer.from(pair, "utf8").toString("base64")}`;
}
