// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Core shared types for Tandem.
 * The classifier, delegation engine, distributor, executors and API all operate on these.
 */

// ── Complexity ───────────────────────────────────────────────────────────────

export const ComplexityClass = {
  MECHANICAL: "MECHANICAL",
  ANALYTICAL: "ANALYTICAL",
  CREATIVE: "CREATIVE",
  STRATEGIC: "STRATEGIC",
} as const;

export type ComplexityClass = (typeof ComplexityClass)[keyof typeof ComplexityClass];

/** Ascending order. Index = rank. */
export const COMPLEXITY_ORDER: readonly ComplexityClass[] = [
  ComplexityClass.MECHANICAL,
  ComplexityClass.ANALYTICAL,
  ComplexityClass.CREATIVE,
  ComplexityClass.STRATEGIC,
];

export function complexityRank(complexity: ComplexityClass): number {
  return COMPLEXITY_ORDER.indexOf(complexity);
}

// ── Executors ────────────────────────────────────────────────────────────────

export const ExecutorType = {
  LOCAL: "local",
  HOSTED: "hosted",
  HYBRID: "hybrid",
} as const;

export type ExecutorType = (typeof ExecutorType)[keyof typeof ExecutorType];

/** Executors that actually run work. HYBRID is a plan over both. */
export type ConcreteExecutorType = Exclude<ExecutorType, "hybrid">;

// ── Tasks ────────────────────────────────────────────────────────────────────

export type TaskPriority = "low" | "normal" | "high";

export interface TaskRequest {
  readonly id: string;
  /** Free-form category, e.g. "file_search" or "architecture_design". */
  readonly type: string;
  readonly description: string;
  /** Caller-supplied estimate; integer ≥ 0. */
  readonly estimatedTokens: number;
  /** Capability tags the task needs, e.g. "file_operations", "mcp_server". */
  readonly requiredTools: readonly string[];
  /** Pre-assigned class. When absent the classifier derives one. */
  readonly complexity?: ComplexityClass;
  readonly priority?: TaskPriority;
  readonly context?: Readonly<Record<string, unknown>>;
}

export interface FallbackRecord {
  from: ConcreteExecutorType;
  to: ConcreteExecutorType;
  reason: string;
}

/** Normalised response returned by every executor. */
export interface TaskResponse {
  taskId: string;
  /** The executor that actually ran the task (after any fallback). */
  executor: ExecutorType;
  result: unknown;
  tokensUsed: number;
  /** Wall-clock seconds. */
  duration: number;
  confidence: number;
  /** Empty on success. */
  errors: string[];
  metadata: {
    fallback?: FallbackRecord;
    [key: string]: unknown;
  };
}

// ── Decisions ────────────────────────────────────────────────────────────────

export type DecisionFactor =
  | "complexity"
  | "pressure"
  | "token_volume"
  | "tool_availability"
  | "forced";

/** Sub-work for a HYBRID decision: local bulk extraction, hosted synthesis. */
export interface TaskDecomposition {
  localTasks: TaskRequest[];
  hostedTasks: TaskRequest[];
  /** When true the hosted result is the final answer; otherwise both are combined. */
  hostedLeads: boolean;
}

export interface Decision {
  readonly executor: ExecutorType;
  readonly reason: string;
  /** In (0, 1]. */
  readonly confidence: number;
  readonly complexity: ComplexityClass;
  readonly factor: DecisionFactor;
  /** Context pressure observed when the decision was made. */
  readonly pressure: number;
  readonly decomposition?: TaskDecomposition;
}

export interface ExecutionResult {
  decision: Decision;
  response: TaskResponse;
}

// ── Stats ────────────────────────────────────────────────────────────────────

export interface ContextSnapshot {
  hostedUsage: number;
  hostedCeiling: number;
  localUsage: number;
  localCeiling: number;
  pressure: number;
  localPressure: number;
}

export interface ExecutionStats {
  totalTasks: number;
  /** By the executor that actually ran: a local→hosted fallback counts as hosted. */
  byExecutor: Record<ExecutorType, number>;
  byComplexity: Record<ComplexityClass, number>;
  tokens: Record<ConcreteExecutorType, number>;
  fallbacks: number;
  failures: number;
  context: ContextSnapshot;
}

// ── Distribution ─────────────────────────────────────────────────────────────

export const TASK_CATEGORIES = [
  "documentation",
  "formatting",
  "simple_analysis",
  "data_transformation",
  "optimization",
  "security",
  "general",
] as const;

export type TaskCategory = (typeof TASK_CATEGORIES)[number];

export type Processor = "main" | "local";

export interface DistributionContext {
  taskId?: string;
  urgent?: boolean;
  userRequested?: boolean;
  automated?: boolean;
}

export interface TaskDistribution {
  taskId: string;
  sendToLocal: boolean;
  reason: string;
  /** Importance in [0, 1]. */
  priority: number;
  estimatedTokens: number;
  assignedProcessor: Processor;
  metadata: {
    category: TaskCategory;
    localMode: "enabled" | "disabled";
    activeLocalCount: number;
    maxConcurrentLocal: number;
    timestamp: string;
  };
}

export const RESOURCE_CATEGORIES = ["memory_operations", "analysis", "optimization"] as const;

export type ResourceCategory = (typeof RESOURCE_CATEGORIES)[number];

// ── Configuration ────────────────────────────────────────────────────────────

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR" | "SILENT";

/** Full configuration schema — loaded from tandem.yaml */
export interface TandemConfig {
  context: {
    hostedCeiling: number;
    localCeiling: number;
  };
  delegation: {
    pressureThreshold: number;
    bulkTokenThreshold: number;
    hybridTokenThreshold: number;
    escalationTokenThreshold: number;
    healthTimeoutMs: number;
    executionTimeoutMs: number;
    /** Max tasks run at once by executeAll() and by the local half of a hybrid run. */
    maxParallel: number;
    historySize: number;
  };
  distributor: {
    localEnabled: boolean;
    importanceThreshold: number;
    localTaskTypes: TaskCategory[];
    maxConcurrentLocal: number;
    resourceCaps: Record<ResourceCategory, number>;
  };
  executors: {
    local: {
      baseUrl: string;
      model: string;
      tools: string[];
      temperature: number;
      maxTokens: number;
    };
    hosted: {
      model: string;
      tools: string[];
      maxTokens: number;
    };
  };
  cache: {
    ttlHours: number;
    backend: "sqlite" | "memory";
    path: string;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
}
