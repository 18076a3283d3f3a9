// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Tandem public API.
 * Import from this module when using Tandem as a library.
 */

export { VERSION } from "./version.js";
export * from "./types.js";
export {
  TandemError,
  ConfigurationError,
  InvalidTaskError,
  ExecutorError,
  ExecutorUnavailableError,
  ExecutionTimeoutError,
} from "./exceptions.js";
export { loadConfig, parseConfig, defaultConfig, MAX_TIMER_MS } from "./config/config.js";
export { createLogger, pinoOptions, logger, type Logger, type LoggerSettings } from "./logger.js";
export { maskKey, envVar, requireEnvVar } from "./utils/security.js";
export { withTimeout } from "./utils/timeout.js";
export * from "./router/index.js";
export * from "./distributor/index.js";
export * from "./cache/index.js";
export * from "./executors/index.js";
export { createRuntime, type RuntimeOverrides, type TandemRuntime } from "./runtime.js";
