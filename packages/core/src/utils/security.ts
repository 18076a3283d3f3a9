// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Environment and secret helpers shared by the executors, API and CLI. */

import { ConfigurationError } from "../exceptions.js";

/**
 * Mask a secret for display. Keeps a short prefix.
 *
 * @example
 *   maskKey("test-secret-value") → "test-***"
 */
export function maskKey(key: string | undefined): string {
  if (!key) return "(not set)";
  const prefixLen = Math.min(8, Math.floor(key.length / 3));
  return `${key.slice(0, prefixLen)}***`;
}

/** Trimmed environment variable, or undefined when unset or blank. */
export function envVar(name: string): string | undefined {
  const val = process.env[name];
  return val && val.trim().length > 0 ? val.trim() : undefined;
}

export function requireEnvVar(name: string): string {
  const val = envVar(name);
  if (!val) {
    throw new ConfigurationError(`Required environment variable '${name}' is not set`);
  }
  return val;
}
