// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Configuration loader for Tandem.
 * Reads tandem.yaml from the project directory or ~/.tandem/config.yaml.
 * Validates with Zod and provides typed defaults.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

import yaml from "js-yaml";
import { z } from "zod";

import { ConfigurationError } from "../exceptions.js";
import { TASK_CATEGORIES, type ResourceCategory, type TandemConfig } from "../types.js";

// ── Zod schema ───────────────────────────────────────────────────────────────

/** Largest delay setTimeout honours; anything above fires after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

const ContextSchema = z.object({
  hostedCeiling: z.number().positive().default(200_000),
  localCeiling: z.number().positive().default(120_000),
});

const DelegationSchema = z
  .object({
    pressureThreshold: z.number().min(0).max(1).default(0.5),
    bulkTokenThreshold: z.number().int().positive().default(20_000),
    hybridTokenThreshold: z.number().int().positive().default(100_000),
    escalationTokenThreshold: z.number().int().positive().default(50_000),
    healthTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS).default(3_000),
    executionTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS).default(120_000),
    maxParallel: z.number().int().positive().default(4),
    historySize: z.number().int().nonnegative().default(100),
  })
  .refine((d) => d.bulkTokenThreshold < d.hybridTokenThreshold, {
    message: "bulkTokenThreshold must be lower than hybridTokenThreshold",
    path: ["bulkTokenThreshold"],
  });

const ResourceCapsSchema = z.object({
  memoryOperations: z.number().int().positive().default(3),
  analysis: z.number().int().positive().default(3),
  optimization: z.number().int().positive().default(3),
});

const DistributorSchema = z.object({
  localEnabled: z.boolean().default(true),
  importanceThreshold: z.number().min(0).max(1).default(0.3),
  localTaskTypes: z
    .array(z.enum(TASK_CATEGORIES))
    .default(["documentation", "formatting", "simple_analysis", "data_transformation"]),
  maxConcurrentLocal: z.number().int().positive().default(8),
  resourceCaps: ResourceCapsSchema.default({}),
});

const LocalExecutorSchema = z.object({
  baseUrl: z.string().url().default("http://localhost:1234/v1"),
  model: z.string().default("qwen2.5-coder:14b"),
  tools: z.array(z.string()).default(["file_operations", "bash", "mcp_server"]),
  temperature: z.number().min(0).max(2).default(0.3),
  maxTokens: z.number().int().positive().default(4096),
});

const HostedExecutorSchema = z.object({
  model: z.string().default("claude-sonnet-4-20250514"),
  tools: z.array(z.string()).default(["file_operations", "bash", "mcp_server", "web_search"]),
  maxTokens: z.number().int().positive().default(4096),
});

/** "~/x" → "<home>/x". */
function expandHome(path: string): string {
  return path === "~" || path.startsWith("~/") ? join(homedir(), path.slice(1)) : path;
}

const CacheSchema = z.object({
  ttlHours: z.number().positive().default(24),
  backend: z.enum(["sqlite", "memory"]).default("sqlite"),
  path: z.string().default(join(homedir(), ".tandem", "cache.db")).transform(expandHome),
});

const LoggingSchema = z.object({
  level: z.enum(["DEBUG", "INFO", "WARNING", "ERROR", "SILENT"]).default("INFO"),
  pretty: z.boolean().default(false),
});

const ConfigSchema = z.object({
  context: ContextSchema.default({}),
  delegation: DelegationSchema.default({}),
  distributor: DistributorSchema.default({}),
  executors: z
    .object({
      local: LocalExecutorSchema.default({}),
      hosted: HostedExecutorSchema.default({}),
    })
    .default({}),
  cache: CacheSchema.default({}),
  logging: LoggingSchema.default({}),
});

type ParsedConfig = z.infer<typeof ConfigSchema>;

/** Resource caps are camelCase in YAML-land but keyed by category in the core. */
function toTandemConfig(parsed: ParsedConfig): TandemConfig {
  const caps = parsed.distributor.resourceCaps;
  const resourceCaps = {
    memory_operations: caps.memoryOperations,
    analysis: caps.analysis,
    optimization: caps.optimization,
  } satisfies Record<ResourceCategory, number>;

  return {
    ...parsed,
    distributor: { ...parsed.distributor, resourceCaps },
  };
}

// ── YAML key → camelCase mapping ─────────────────────────────────────────────

/** Convert snake_case YAML keys to camelCase for the Zod schema. */
function toCamel(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(toCamel);
  if (obj !== null && typeof obj === "object") {
    return Object.fromEntries(
      Object.entries(obj).map(([k, v]) => [
        k.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase()),
        toCamel(v),
      ]),
    );
  }
  return obj;
}

/** Validate an already-parsed object (camelCase or snake_case keys). */
export function parseConfig(raw: unknown, source = "<inline>"): TandemConfig {
  const result = ConfigSchema.safeParse(toCamel(raw ?? {}));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new ConfigurationError(`Invalid configuration in '${source}':\n${issues}`);
  }
  return toTandemConfig(result.data);
}

// ── Loader ───────────────────────────────────────────────────────────────────

const SEARCH_PATHS = [
  "tandem.yaml",
  "config/tandem.yaml",
  join(homedir(), ".tandem", "config.yaml"),
];

export function loadConfig(configPath?: string): TandemConfig {
  const paths = configPath ? [configPath] : SEARCH_PATHS;
  const found = paths.find((p) => existsSync(p));

  if (!found) {
    if (configPath) {
      throw new ConfigurationError(`Config file '${configPath}' does not exist`);
    }
    // No config file — use all defaults
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(found, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Failed to read config at '${found}': ${String(err)}`);
  }

  return parseConfig(raw, found);
}

export const defaultConfig: TandemConfig = parseConfig({});
