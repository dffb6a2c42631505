/**
 * Instance URL normalization.
 */

const SCHEME_PATTERN = /^[a-z][a-z\d+.-]*:\/\//i;

/**
 * Returns true when the value starts with a `scheme://` prefix.
 */
export function hasScheme(value: string): boolean {
  return SCHEME_PATTERN.test(value);
}

/**
 * Strips every trailing slash, leaving a bare `scheme://` intact.
 */
export function stripTrailingSlashes(value: string): string {
  return value.replace(/(?<![:/])\/+$/, "");
}

/**
 * Normalizes user input into an instance base URL: trimmed, without
 * trailing slashes, and with `https://` when no scheme was given.
 *
 * @example
 * normalizeInstanceUrl("dev12345.service-now.com/") // "https://dev12345.service-now.com"
 */
export function normalizeInstanceUrl(raw: string): string {
  const trimmed = stripTrailingSlashes(raw.trim());
  return hasScheme(trimmed) ? trimmed : `https://${trimmed}`;
}
