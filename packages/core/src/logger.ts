// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Structured logging via pino.
 * Components accept a Logger in their options and fall back to the shared one.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

import type { LogLevel } from "./types.js";

export type { Logger };

const PINO_LEVELS: Record<LogLevel, string> = {
  DEBUG: "debug",
  INFO: "info",
  WARNING: "warn",
  ERROR: "error",
  SILENT: "silent",
};

export interface LoggerSettings {
  level?: LogLevel;
  /** Human-readable output via pino-pretty. */
  pretty?: boolean;
  name?: string;
}

export function pinoOptions(settings: LoggerSettings = {}): LoggerOptions {
  const options: LoggerOptions = {
    name: settings.name ?? "tandem",
    level: PINO_LEVELS[settings.level ?? "INFO"],
  };
  if (settings.pretty) {
    options.transport = {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname" },
    };
  }
  return options;
}

export function createLogger(settings: LoggerSettings = {}): Logger {
  return pino(pinoOptions(settings));
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(PINO_LEVELS, value);
}

const envLevel = process.env["TANDEM_LOG_LEVEL"]?.toUpperCase();

export const logger: Logger = createLogger({ level: isLogLevel(envLevel) ? envLevel : "INFO" });
