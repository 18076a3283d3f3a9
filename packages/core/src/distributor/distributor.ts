// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * TaskDistributor — gate for the local/background channel.
 *
 * Independent of the delegation engine: classifies free text by keyword, scores it
 * from a fixed importance table, then admits it to a bounded set of local slots.
 * A full pool routes to "main"; nothing ever waits for a slot.
 */

import { randomUUID } from "crypto";

import { InvalidTaskError } from "../exceptions.js";
import { logger as sharedLogger, type Logger } from "../logger.js";
import type {
  DistributionContext,
  Processor,
  ResourceCategory,
  TandemConfig,
  TaskCategory,
  TaskDistribution,
} from "../types.js";
import { ResourcePool, type ResourceUsage } from "./resource-pool.js";

export type DistributorSettings = TandemConfig["distributor"];

export interface TaskDistributorOptions {
  settings: DistributorSettings;
  /** Shared pool; built from settings.resourceCaps when omitted. */
  resources?: ResourcePool;
  logger?: Logger;
  now?: () => Date;
}

export interface DistributorStatus {
  mode: "enabled" | "disabled";
  importanceThreshold: number;
  activeLocalTasks: number;
  activeTaskIds: string[];
  maxConcurrentLocal: number;
  localTaskTypes: TaskCategory[];
  localSlots: string;
  resources: Record<ResourceCategory, ResourceUsage>;
}

/** First match wins; no match is "general". */
export const CATEGORY_RULES: readonly { pattern: RegExp; category: TaskCategory }[] = [
  { pattern: /doc|readme|changelog/, category: "documentation" },
  { pattern: /format|lint|indent/, category: "formatting" },
  { pattern: /analy[sz]e|analysis|review/, category: "simple_analysis" },
  { pattern: /transform|convert/, category: "data_transformation" },
  { pattern: /optimi[sz]|performance/, category: "optimization" },
  { pattern: /security|vulnerab/, category: "security" },
];

export const BASE_IMPORTANCE: Record<TaskCategory, number> = {
  security: 0.9,
  optimization: 0.7,
  simple_analysis: 0.4,
  documentation: 0.2,
  formatting: 0.2,
  data_transformation: 0.3,
  general: 0.5,
};

export function classifyTaskText(text: string): TaskCategory {
  const lower = text.toLowerCase();
  return CATEGORY_RULES.find((rule) => rule.pattern.test(lower))?.category ?? "general";
}

/** Base importance adjusted by context flags, clamped to [0, 1], rounded to 2 decimals. */
export function calculateImportance(category: TaskCategory, context: DistributionContext = {}): number {
  let importance = BASE_IMPORTANCE[category];
  if (context.urgent) importance = Math.min(1, importance + 0.3);
  if (context.userRequested) importance = Math.min(1, importance + 0.2);
  if (context.automated) importance = Math.max(0, importance - 0.2);
  return Math.round(importance * 100) / 100;
}

/** floor((chars × 0.5 + words × 1.3) / 2) */
export function estimateTokens(text: string): number {
  const words = text.split(/\s+/).filter((w) => w.length > 0).length;
  return Math.floor((text.length * 0.5 + words * 1.3) / 2);
}

const pad = (n: number): string => String(n).padStart(2, "0");

/** task_<yyyyMMdd_HHmmss>_<8 hex>, local time. */
export function generateTaskId(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `task_${date}_${time}_${randomUUID().slice(0, 8)}`;
}

export class TaskDistributor {
  readonly resources: ResourcePool;
  private readonly settings: DistributorSettings;
  private readonly active = new Set<string>();
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: TaskDistributorOptions) {
    this.settings = options.settings;
    this.resources = options.resources ?? new ResourcePool(options.settings.resourceCaps);
    this.log = (options.logger ?? sharedLogger).child({ component: "distributor" });
    this.now = options.now ?? (() => new Date());
  }

  /** Synchronous: the slot check and the slot grab cannot interleave with another evaluation. */
  evaluateTask(taskText: string, context: DistributionContext = {}): TaskDistribution {
    const { localEnabled, importanceThreshold, localTaskTypes, maxConcurrentLocal } = this.settings;
    const timestamp = this.now();
    const taskId = context.taskId ?? generateTaskId(timestamp);
    const category = classifyTaskText(taskText);
    const importance = calculateImportance(category, context);
    const estimatedTokens = estimateTokens(taskText);

    const distribution = (processor: Processor, reason: string): TaskDistribution => ({
      taskId,
      sendToLocal: processor === "local",
      reason,
      priority: importance,
      estimatedTokens,
      assignedProcessor: processor,
      metadata: {
        category,
        localMode: localEnabled ? "enabled" : "disabled",
        activeLocalCount: this.active.size,
        maxConcurrentLocal,
        timestamp: timestamp.toISOString(),
      },
    });

    if (!localEnabled) return distribution("main", "local processing disabled");

    if (taskText.trim().length === 0) {
      throw new InvalidTaskError("task text must be non-empty", taskId);
    }

    let result: TaskDistribution;
    if (importance >= importanceThreshold) {
      result = distribution("main", `importance ${importance.toFixed(2)} >= threshold ${importanceThreshold}`);
    } else if (!localTaskTypes.includes(category)) {
      result = distribution("main", `task type '${category}' is not suited to local processing`);
    } else if (this.active.has(taskId)) {
      result = distribution("main", `task '${taskId}' already holds a local slot`);
    } else if (this.active.size >= maxConcurrentLocal) {
      result = distribution("main", `local task slots full (${this.active.size}/${maxConcurrentLocal})`);
    } else {
      this.active.add(taskId);
      result = distribution(
        "local",
        `low importance (${importance.toFixed(2)}) and local capacity available (${this.active.size}/${maxConcurrentLocal})`,
      );
    }

    this.log.info({ taskId, category, importance, processor: result.assignedProcessor }, result.reason);
    return result;
  }

  /** Idempotent. Returns whether a slot was actually freed. */
  releaseTask(taskId: string): boolean {
    const released = this.active.delete(taskId);
    if (released) this.log.debug({ taskId }, "local slot released");
    return released;
  }

  /** Run `fn` in the slot held by `distribution`, releasing it however `fn` ends. */
  async runLocal<T>(distribution: TaskDistribution, fn: () => Promise<T>): Promise<T> {
    if (!distribution.sendToLocal) {
      throw new InvalidTaskError(`task '${distribution.taskId}' was routed to main, not local`, distribution.taskId);
    }
    try {
      return await fn();
    } finally {
      this.releaseTask(distribution.taskId);
    }
  }

  getStatus(): DistributorStatus {
    const { localEnabled, importanceThreshold, maxConcurrentLocal, localTaskTypes } = this.settings;
    return {
      mode: localEnabled ? "enabled" : "disabled",
      importanceThreshold,
      activeLocalTasks: this.active.size,
      activeTaskIds: [...this.active],
      maxConcurrentLocal,
      localTaskTypes: [...localTaskTypes],
      localSlots: `${this.active.size}/${maxConcurrentLocal}`,
      resources: this.resources.usage(),
    };
  }

  /** Drop every held slot and resource unit. */
  reset(): void {
    this.active.clear();
    this.resources.reset();
  }
}
