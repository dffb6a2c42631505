/**
 * Authenticated HTTP client for the remote Table REST API with Basic
 * auth and zod-validated row results.
 */

import { TABLE_API_PATH } from "@lib/constants";
import { basicAuthHeader, type Credentials } from "@lib/credentials";
import { z } from "zod";

/**
 * Structured error for Table API responses other than 200, carrying
 * the HTTP status code.
 */
export class TableApiError extends Error {
  readonly status: number;

  constructor(status: number) {
    super(`HTTP ${String(status)}`);
    this.name = "TableApiError";
    this.status = status;
  }
}

/**
 * A single table row. Values arrive as strings, but the schema does
 * not insist on it.
 */
export type TableRow = Record<string, unknown>;

const tableResponseSchema = z.object({
  result: z.array(z.record(z.string(), z.unknown())).default([]),
});

/**
 * Query options for a single table read.
 */
export interface TableQuery {
  fields?: readonly string[];
  limit?: number;
  query?: string;
}

/**
 * Builds the full request URL for a table read. Empty queries are left
 * out so the remote returns every row.
 */
export function buildTableUrl(
  instanceUrl: string,
  table: string,
  options: TableQuery = {}
): string {
  const params = new URLSearchParams();

  if (options.query) {
    params.set("sysparm_query", options.query);
  }
  if (options.fields && options.fields.length > 0) {
    params.set("sysparm_fields", options.fields.join(","));
  }
  if (options.limit !== undefined) {
    params.set("sysparm_limit", String(options.limit));
  }

  const search = params.toString();
  const base = `${instanceUrl}${TABLE_API_PATH}/${table}`;
  return search ? `${base}?${search}` : base;
}

/**
 * Issues an authenticated GET against a table and returns the response
 * body as text. The body is read before the status check so the
 * connection can be reused. Throws TableApiError for any status other
 * than 200.
 */
export async function tableRequest(
  instanceUrl: string,
  table: string,
  options: TableQuery & { credentials: Credentials }
): Promise<string> {
  const headers: Record<string, string> = {
    Accept: "application/json",
    "Content-Type": "application/json",
  };

  const authorization = basicAuthHeader(options.credentials);
  if (authorization) {
    headers.Authorization = authorization;
  }

  const response = await fetch(buildTableUrl(instanceUrl, table, options), {
    headers,
    method: "GET",
  });

  const text = await response.text();

  if (response.status !== 200) {
    throw new TableApiError(response.status);
  }

  return text;
}

/**
 * Reads rows from a table. A body without a `result` array reads as
 * no rows; a body that is not an object of rows throws.
 */
export async function tableFetch(
  instanceUrl: string,
  table: string,
  options: TableQuery & { credentials: Credentials }
): Promise<TableRow[]> {
  const text = await tableRequest(instanceUrl, table, options);
  const json: unknown = JSON.parse(text);
  return tableResponseSchema.parse(json).result;
}
