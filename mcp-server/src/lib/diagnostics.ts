/**
 * Embedding diagnostics — one connectivity probe plus read-only checks
 * against the remote tables that gate embeddable UI components. Every
 * check resolves to a DiagnosticResult and never rejects.
 */

import type { Credentials } from "@lib/credentials";
import type { ProgressCallback } from "@lib/progress";

import { tableFetch, tableRequest, type TableRow } from "@lib/api/table";
import {
  ACTIVE_MARKERS,
  EMBEDDABLES_PROPERTY,
  errorMessage,
  FIELDS,
  PLUGIN_IDS,
  TABLES,
} from "@lib/constants";
import {
  hasScheme,
  normalizeInstanceUrl,
  stripTrailingSlashes,
} from "@lib/instance";

export interface DiagnosticFailure {
  error: string;
  success: false;
}

/**
 * Outcome of a single check: its fields on success, an error message
 * otherwise.
 */
export type DiagnosticResult<T extends object> =
  | DiagnosticFailure
  | (T & { success: true });

export type ConnectResult = DiagnosticResult<{ message: string }>;
export type EmbeddablesEnabledResult = DiagnosticResult<{ enabled: boolean }>;
export type PluginStatusResult = DiagnosticResult<{ active: boolean }>;
export type CorsRuleResult = DiagnosticResult<{
  active: boolean;
  exists: boolean;
}>;

export interface EmbeddableSummary {
  active: boolean;
  name: string | null;
  sys_id: string | null;
}

export interface EmbeddableDetail extends EmbeddableSummary {
  /** The record's own `name`, as opposed to its `tag_name`. */
  internal_name: string | null;
}

export type AllEmbeddablesResult = DiagnosticResult<{
  active_count: number;
  embeddables: EmbeddableSummary[];
  total_count: number;
}>;

export type EmbeddableActivationResult = DiagnosticResult<{
  all_active: boolean;
  count: number;
  embeddables: EmbeddableDetail[];
  found: boolean;
}>;

/**
 * Composite report produced by runAllChecks, keyed in execution order.
 */
export interface DiagnosticReport {
  embeddables_enabled: EmbeddablesEnabledResult;
  embeddables_plugin: PluginStatusResult;
  client_access_plugin: PluginStatusResult;
  cors_rule: CorsRuleResult;
  embeddable_activation: AllEmbeddablesResult;
}

/**
 * Options shared by every check.
 */
export interface DiagnosticOptions {
  credentials?: Credentials;
  progress?: ProgressCallback;
}

function failureMessage(error: unknown): string {
  const message = errorMessage(error);
  if (error instanceof Error && error.cause instanceof Error) {
    return `${message}: ${error.cause.message}`;
  }
  return message;
}

function stringField(row: TableRow, field: string): string | null {
  const value = row[field];
  return typeof value === "string" ? value : null;
}

function firstRow(rows: TableRow[]): TableRow {
  return rows.at(0) ?? {};
}

function isRecordActive(row: TableRow): boolean {
  return row.active === ACTIVE_MARKERS.RECORD;
}

function toSummary(row: TableRow): EmbeddableSummary {
  return {
    active: isRecordActive(row),
    name: stringField(row, "tag_name"),
    sys_id: stringField(row, "sys_id"),
  };
}

/**
 * Probes the instance with a one-row read of the properties table. Only
 * the status counts; the body is read and discarded.
 */
export async function connectToInstance(
  instanceUrl: string,
  options: DiagnosticOptions = {}
): Promise<ConnectResult> {
  const baseUrl = normalizeInstanceUrl(instanceUrl);
  options.progress?.({ data: `Connecting to: ${baseUrl}`, level: "info" });

  try {
    await tableRequest(baseUrl, TABLES.PROPERTIES, {
      credentials: options.credentials ?? {},
      limit: 1,
    });
    options.progress?.({ data: `Connected to ${baseUrl}`, level: "info" });
    return { message: "Connected", success: true };
  } catch (error: unknown) {
    const message = failureMessage(error);
    options.progress?.({
      data: `Connection to ${baseUrl} failed: ${message}`,
      level: "warn",
    });
    return { error: message, success: false };
  }
}

/**
 * Runs `probe` after a successful connect, returning connect's failure
 * verbatim and turning anything `probe` throws into a failure result.
 */
async function runCheck<T extends object>(
  instanceUrl: string,
  options: DiagnosticOptions,
  probe: (baseUrl: string, credentials: Credentials) => Promise<T>
): Promise<DiagnosticResult<T>> {
  const connected = await connectToInstance(instanceUrl, options);
  if (!connected.success) {
    return connected;
  }

  try {
    const fields = await probe(
      normalizeInstanceUrl(instanceUrl),
      options.credentials ?? {}
    );
    return { ...fields, success: true as const };
  } catch (error: unknown) {
    return { error: failureMessage(error), success: false };
  }
}

/**
 * Reads the embeddables system property. A missing property reads as
 * disabled.
 */
export async function checkEmbeddablesEnabled(
  instanceUrl: string,
  options: DiagnosticOptions = {}
): Promise<EmbeddablesEnabledResult> {
  return runCheck(instanceUrl, options, async (baseUrl, credentials) => {
    const rows = await tableFetch(baseUrl, TABLES.PROPERTIES, {
      credentials,
      fields: FIELDS.PROPERTY,
      query: `name=${EMBEDDABLES_PROPERTY}`,
    });
    return { enabled: firstRow(rows).value === ACTIVE_MARKERS.RECORD };
  });
}

/**
 * Reads a plugin's activation state. An unknown plugin reads as
 * inactive.
 */
export async function checkPluginStatus(
  instanceUrl: string,
  pluginId: string,
  options: DiagnosticOptions = {}
): Promise<PluginStatusResult> {
  return runCheck(instanceUrl, options, async (baseUrl, credentials) => {
    const rows = await tableFetch(baseUrl, TABLES.PLUGIN, {
      credentials,
      fields: FIELDS.PLUGIN,
      query: `id=${pluginId}`,
    });
    return { active: firstRow(rows).active === ACTIVE_MARKERS.PLUGIN };
  });
}

export async function checkEmbeddablesPlugin(
  instanceUrl: string,
  options: DiagnosticOptions = {}
): Promise<PluginStatusResult> {
  return checkPluginStatus(instanceUrl, PLUGIN_IDS.EMBEDDABLES, options);
}

export async function checkClientAccessPlugin(
  instanceUrl: string,
  options: DiagnosticOptions = {}
): Promise<PluginStatusResult> {
  return checkPluginStatus(instanceUrl, PLUGIN_IDS.CLIENT_ACCESS, options);
}

/**
 * Builds the CORS rule filter. A bare domain matches under https,
 * http and without a scheme; a domain with a scheme matches exactly;
 * an empty domain matches every rule.
 */
export function buildCorsRuleQuery(domain = ""): string {
  if (!domain) {
    return "";
  }

  if (hasScheme(domain)) {
    return `domain=${domain}`;
  }

  const bare = stripTrailingSlashes(domain);
  return [`https://${bare}`, `http://${bare}`, bare]
    .map((candidate) => `domain=${candidate}`)
    .join("^OR");
}

/**
 * Looks up CORS rules for a domain (or all rules when none is given).
 */
export async function checkCorsRule(
  instanceUrl: string,
  domain?: string,
  options: DiagnosticOptions = {}
): Promise<CorsRuleResult> {
  return runCheck(instanceUrl, options, async (baseUrl, credentials) => {
    const rows = await tableFetch(baseUrl, TABLES.CORS_RULE, {
      credentials,
      fields: FIELDS.CORS_RULE,
      query: buildCorsRuleQuery(domain),
    });
    return { active: rows.some(isRecordActive), exists: rows.length > 0 };
  });
}

/**
 * Lists every embeddable macroponent with its activation state.
 */
export async function checkAllEmbeddableActivated(
  instanceUrl: string,
  options: DiagnosticOptions = {}
): Promise<AllEmbeddablesResult> {
  return runCheck(instanceUrl, options, async (baseUrl, credentials) => {
    const rows = await tableFetch(baseUrl, TABLES.EMBEDDABLE_MACROPONENT, {
      credentials,
      fields: FIELDS.EMBEDDABLE,
    });
    const embeddables = rows.map(toSummary);
    return {
      active_count: embeddables.filter((e) => e.active).length,
      embeddables,
      total_count: embeddables.length,
    };
  });
}

/**
 * Finds embeddables whose macroponent name starts with
 * `macroponentName`. `all_active` is false when nothing matches.
 */
export async function checkEmbeddableActivated(
  instanceUrl: string,
  macroponentName: string,
  options: DiagnosticOptions = {}
): Promise<EmbeddableActivationResult> {
  return runCheck(instanceUrl, options, async (baseUrl, credentials) => {
    const rows = await tableFetch(baseUrl, TABLES.EMBEDDABLE_MACROPONENT, {
      credentials,
      fields: FIELDS.EMBEDDABLE,
      query: `macroponent.nameSTARTSWITH${macroponentName}`,
    });
    const embeddables = rows.map((row) => ({
      ...toSummary(row),
      internal_name: stringField(row, "name"),
    }));
    return {
      all_active:
        embeddables.length > 0 && embeddables.every((e) => e.active),
      count: embeddables.length,
      embeddables,
      found: embeddables.length > 0,
    };
  });
}

/**
 * Runs the five report checks in order. A failing check does not stop
 * the ones after it.
 */
export async function runAllChecks(
  instanceUrl: string,
  options: DiagnosticOptions & { domain?: string } = {}
): Promise<DiagnosticReport> {
  const { domain, ...shared } = options;

  const embeddablesEnabled = await checkEmbeddablesEnabled(instanceUrl, shared);
  const embeddablesPlugin = await checkEmbeddablesPlugin(instanceUrl, shared);
  const clientAccessPlugin = await checkClientAccessPlugin(instanceUrl, shared);
  const corsRule = await checkCorsRule(instanceUrl, domain, shared);
  const embeddableActivation = await checkAllEmbeddableActivated(
    instanceUrl,
    shared
  );

  return {
    embeddables_enabled: embeddablesEnabled,
    embeddables_plugin: embeddablesPlugin,
    client_access_plugin: clientAccessPlugin,
    cors_rule: corsRule,
    embeddable_activation: embeddableActivation,
  };
}
