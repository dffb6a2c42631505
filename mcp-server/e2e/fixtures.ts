/**
 * E2E test fixtures — all environment-specific values live here.
 *
 * The suite runs against a live instance named by environment variables
 * and is skipped when E2E_INSTANCE_URL is unset:
 *
 *   E2E_INSTANCE_URL=dev12345.service-now.com \
 *   E2E_USERNAME=admin E2E_PASSWORD=... npm run test:e2e
 */

import type { Credentials } from "@lib/credentials";

/** Instance under test, or undefined to skip the suite. */
export const INSTANCE_URL = process.env.E2E_INSTANCE_URL;

export const CREDENTIALS: Credentials = {
  password: process.env.E2E_PASSWORD,
  username: process.env.E2E_USERNAME,
};

/** Domain to look up CORS rules for. */
export const EMBEDDING_DOMAIN = process.env.E2E_DOMAIN ?? "";

/**
 * Macroponent name prefix expected to match at least one embeddable on
 * an instance with the embeddables plugin installed.
 */
export const MACROPONENT_PREFIX = process.env.E2E_MACROPONENT ?? "now";
