/**
 * Centralized configuration — Table API paths, record identifiers and
 * field lists shared across the MCP server.
 */

/**
 * Server identity advertised during the MCP handshake.
 */
export const SERVER_INFO = {
  NAME: "embeddables-diagnostics",
  VERSION: "0.1.0",
} as const;

/**
 * Path prefix of the remote Table REST API.
 */
export const TABLE_API_PATH = "/api/now/table";

/**
 * Remote tables queried by the diagnostics.
 */
export const TABLES = {
  CORS_RULE: "sys_cors_rule",
  EMBEDDABLE_MACROPONENT: "sys_ux_embeddable_macroponent",
  PLUGIN: "v_plugin",
  PROPERTIES: "sys_properties",
} as const;

/**
 * System property that switches embeddable UI components on.
 */
export const EMBEDDABLES_PROPERTY = "glide.uxf.lib.embeddables.enabled";

/**
 * Plugin identifiers the embedding feature depends on.
 */
export const PLUGIN_IDS = {
  CLIENT_ACCESS: "com.glide.security.client_access",
  EMBEDDABLES: "com.glide.ux.embeddables",
} as const;

/**
 * Field lists requested from each table.
 */
export const FIELDS = {
  CORS_RULE: ["domain", "active"],
  EMBEDDABLE: ["tag_name", "active", "sys_id"],
  PLUGIN: ["id", "active", "name"],
  PROPERTY: ["name", "value"],
} as const;

/**
 * Literal markers the Table API uses in place of booleans.
 */
export const ACTIVE_MARKERS = {
  PLUGIN: "active",
  RECORD: "true",
} as const;

/**
 * Extracts a human-readable message from an unknown caught value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
