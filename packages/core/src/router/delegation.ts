// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * DelegationEngine — decides which executor runs a task, then runs it.
 *
 * Decision pipeline (first rule that applies wins):
 *   0. Validate        — malformed task → InvalidTaskError
 *   1. Forced          — caller pinned an executor (must have the tools)
 *   2. Tool gating     — neither executor alone has every tool → HYBRID
 *   3. Token volume    — huge ANALYTICAL/STRATEGIC work → HYBRID
 *   4. MECHANICAL      → LOCAL
 *   5. ANALYTICAL      → LOCAL under bulk or pressure, else HOSTED
 *   6. CREATIVE/STRATEGIC → HOSTED
 *
 * Execution never throws for executor failures: they land in TaskResponse.errors.
 */

import pLimit from "p-limit";

import { ConfigurationError, ExecutionTimeoutError, InvalidTaskError } from "../exceptions.js";
import { AvailabilityMonitor, type AvailabilityStatus } from "../executors/availability.js";
import type { BaseExecutor } from "../executors/base.js";
import { logger as sharedLogger, type Logger } from "../logger.js";
import {
  COMPLEXITY_ORDER,
  ComplexityClass,
  ExecutorType,
  complexityRank,
  type ConcreteExecutorType,
  type Decision,
  type DecisionFactor,
  type ExecutionResult,
  type ExecutionStats,
  type FallbackRecord,
  type TaskDecomposition,
  type TaskRequest,
  type TaskResponse,
  type TandemConfig,
} from "../types.js";
import { withTimeout } from "../utils/timeout.js";
import { ComplexityClassifier } from "./classifier.js";
import { ContextState } from "./context.js";

export type DelegationSettings = TandemConfig["delegation"];

export interface DelegationEngineOptions {
  local: BaseExecutor;
  hosted: BaseExecutor;
  settings: DelegationSettings;
  /** Shared usage state. Built from `ceilings` when omitted. */
  context?: ContextState;
  ceilings?: TandemConfig["context"];
  classifier?: ComplexityClassifier;
  monitor?: AvailabilityMonitor;
  logger?: Logger;
}

export interface DecideOptions {
  force?: ConcreteExecutorType;
}

export interface ExecuteTaskOptions extends DecideOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface DelegationRecord {
  taskId: string;
  decision: Decision;
  timestamp: string;
}

export interface Contribution {
  taskId: string;
  result: unknown;
  confidence: number;
}

/** Result payload of a HYBRID execution. */
export interface HybridSynthesis {
  mode: "hybrid";
  taskId: string;
  taskType: string;
  localContributions: Contribution[];
  hostedContributions: Contribution[];
  finalResult: unknown;
}

type Counters = Omit<ExecutionStats, "context">;

const MIN_CONFIDENCE = 0.05;
const HYBRID_CONFIDENCE = 0.85;

function emptyCounters(): Counters {
  return {
    totalTasks: 0,
    byExecutor: { local: 0, hosted: 0, hybrid: 0 },
    byComplexity: { MECHANICAL: 0, ANALYTICAL: 0, CREATIVE: 0, STRATEGIC: 0 },
    tokens: { local: 0, hosted: 0 },
    fallbacks: 0,
    failures: 0,
  };
}

function clampConfidence(value: number): number {
  return Math.max(MIN_CONFIDENCE, Math.min(1, value));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function nonEmpty(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/** Throws InvalidTaskError for a malformed request. */
export function validateTask(task: TaskRequest): void {
  if (!nonEmpty(task.id)) throw new InvalidTaskError("task id must be a non-empty string");
  if (!nonEmpty(task.type)) throw new InvalidTaskError("task type must be a non-empty string", task.id);
  if (!nonEmpty(task.description)) {
    throw new InvalidTaskError("task description must be a non-empty string", task.id);
  }
  if (!Number.isInteger(task.estimatedTokens) || task.estimatedTokens < 0) {
    throw new InvalidTaskError(
      `estimatedTokens must be a non-negative integer, got ${task.estimatedTokens}`,
      task.id,
    );
  }
  if (!Array.isArray(task.requiredTools) || !task.requiredTools.every(nonEmpty)) {
    throw new InvalidTaskError("requiredTools must be a list of non-empty strings", task.id);
  }
  if (task.complexity !== undefined && !COMPLEXITY_ORDER.includes(task.complexity)) {
    throw new InvalidTaskError(`unknown complexity '${String(task.complexity)}'`, task.id);
  }
}

function subTask(
  parent: TaskRequest,
  suffix: string,
  type: string,
  description: string,
  estimatedTokens: number,
  requiredTools: string[],
  complexity: ComplexityClass,
): TaskRequest {
  return {
    id: `${parent.id}_${suffix}`,
    type,
    description,
    estimatedTokens: Math.floor(estimatedTokens),
    requiredTools,
    complexity,
    ...(parent.priority !== undefined && { priority: parent.priority }),
    ...(parent.context !== undefined && { context: parent.context }),
  };
}

export class DelegationEngine {
  readonly context: ContextState;
  private readonly local: BaseExecutor;
  private readonly hosted: BaseExecutor;
  private readonly settings: DelegationSettings;
  private readonly classifier: ComplexityClassifier;
  private readonly monitor: AvailabilityMonitor;
  private readonly log: Logger;
  private counters: Counters = emptyCounters();
  private history: DelegationRecord[] = [];

  constructor(options: DelegationEngineOptions) {
    const s = options.settings;
    if (!(s.pressureThreshold >= 0 && s.pressureThreshold <= 1)) {
      throw new ConfigurationError(`pressureThreshold must be within [0, 1], got ${s.pressureThreshold}`);
    }
    if (s.bulkTokenThreshold >= s.hybridTokenThreshold) {
      throw new ConfigurationError(
        `bulkTokenThreshold (${s.bulkTokenThreshold}) must be lower than hybridTokenThreshold (${s.hybridTokenThreshold})`,
      );
    }
    if (options.context) {
      this.context = options.context;
    } else if (options.ceilings) {
      this.context = new ContextState(options.ceilings);
    } else {
      throw new ConfigurationError("DelegationEngine needs either a ContextState or context ceilings");
    }

    this.settings = s;
    this.local = options.local;
    this.hosted = options.hosted;
    this.classifier =
      options.classifier ??
      new ComplexityClassifier({ escalationTokenThreshold: s.escalationTokenThreshold });
    this.monitor = options.monitor ?? new AvailabilityMonitor(s.healthTimeoutMs);
    this.log = (options.logger ?? sharedLogger).child({ component: "delegation" });
  }

  // ── Decision ───────────────────────────────────────────────────────────────

  decideDelegation(task: TaskRequest, options: DecideOptions = {}): Decision {
    validateTask(task);

    const complexity = this.classifier.classify(task);
    const pressure = this.context.pressure;
    const tokens = task.estimatedTokens;
    const localMissing = this.local.missingTools(task.requiredTools);
    const hostedMissing = this.hosted.missingTools(task.requiredTools);
    const canLocal = localMissing.length === 0;
    const canHosted = hostedMissing.length === 0;

    const decide = (
      executor: ExecutorType,
      reason: string,
      confidence: number,
      factor: DecisionFactor,
      decomposition?: TaskDecomposition,
    ): Decision => {
      const decision: Decision = {
        executor,
        reason,
        confidence: clampConfidence(confidence),
        complexity,
        factor,
        pressure,
        ...(decomposition && { decomposition }),
      };
      this.log.debug({ taskId: task.id, ...decision, decomposition: undefined }, "delegation decided");
      return decision;
    };

    // 1. Forced
    if (options.force) {
      const missing = options.force === ExecutorType.LOCAL ? localMissing : hostedMissing;
      if (missing.length > 0) {
        throw new InvalidTaskError(
          `cannot force ${options.force}: it lacks required tools ${missing.join(", ")}`,
          task.id,
        );
      }
      return decide(options.force, `forced to ${options.force} by caller`, 1.0, "forced");
    }

    // 2. Tool gating
    if (!canLocal && !canHosted) {
      const uncovered = localMissing.filter((tool) => hostedMissing.includes(tool));
      if (uncovered.length > 0) {
        throw new InvalidTaskError(`no executor provides required tools: ${uncovered.join(", ")}`, task.id);
      }
      const hostedLeads = complexityRank(complexity) >= complexityRank(ComplexityClass.CREATIVE);
      return decide(
        ExecutorType.HYBRID,
        `no single executor has every tool (local lacks ${localMissing.join(", ")}; hosted lacks ${hostedMissing.join(", ")})`,
        0.6,
        "tool_availability",
        this.gatherThenReason(task, complexity, hostedLeads),
      );
    }

    // 3. Token volume
    const { hybridTokenThreshold, bulkTokenThreshold, pressureThreshold } = this.settings;
    if (
      tokens > hybridTokenThreshold &&
      (complexity === ComplexityClass.ANALYTICAL || complexity === ComplexityClass.STRATEGIC)
    ) {
      const strategic = complexity === ComplexityClass.STRATEGIC;
      return decide(
        ExecutorType.HYBRID,
        `${tokens} tokens exceeds ${hybridTokenThreshold}; local extracts, hosted ${strategic ? "leads" : "reasons over the results"}`,
        0.9,
        "token_volume",
        strategic
          ? this.heavyComplex(task, complexity)
          : this.gatherThenReason(task, complexity, false),
      );
    }

    switch (complexity) {
      // 4. Mechanical
      case ComplexityClass.MECHANICAL:
        if (!canLocal) {
          return decide(
            ExecutorType.HOSTED,
            `mechanical work, but local executor lacks ${localMissing.join(", ")}`,
            0.6,
            "tool_availability",
          );
        }
        return decide(ExecutorType.LOCAL, "mechanical work runs locally", 0.95, "complexity");

      // 5. Analytical
      case ComplexityClass.ANALYTICAL: {
        if (!canLocal) {
          return decide(
            ExecutorType.HOSTED,
            `local executor lacks ${localMissing.join(", ")}`,
            0.6,
            "tool_availability",
          );
        }
        if (!canHosted) {
          return decide(
            ExecutorType.LOCAL,
            `hosted executor lacks ${hostedMissing.join(", ")}`,
            0.6,
            "tool_availability",
          );
        }
        if (tokens > bulkTokenThreshold) {
          return decide(
            ExecutorType.LOCAL,
            `${tokens} tokens exceeds bulk threshold ${bulkTokenThreshold}; processed locally`,
            0.9,
            "token_volume",
          );
        }
        if (pressure >= pressureThreshold) {
          const span = 1 - pressureThreshold;
          const lean = span > 0 ? (pressure - pressureThreshold) / span : 0;
          return decide(
            ExecutorType.LOCAL,
            `context pressure ${pressure.toFixed(2)} >= ${pressureThreshold}; offloading analysis to local`,
            0.7 + 0.25 * lean,
            "pressure",
          );
        }
        return decide(
          ExecutorType.HOSTED,
          `context pressure ${pressure.toFixed(2)} below ${pressureThreshold}; hosted handles analysis`,
          0.85 - (0.3 * pressure) / pressureThreshold,
          "pressure",
        );
      }

      // 6. Creative / strategic
      default:
        if (!canHosted) {
          return decide(
            ExecutorType.HYBRID,
            `${complexity.toLowerCase()} work needs hosted, which lacks ${hostedMissing.join(", ")}; local supplies the tool work`,
            0.55,
            "tool_availability",
            this.gatherThenReason(task, complexity, true),
          );
        }
        return decide(
          ExecutorType.HOSTED,
          `${complexity.toLowerCase()} work stays on hosted`,
          0.95,
          "complexity",
        );
    }
  }

  /** Split required tools: local takes what it can, hosted the rest. */
  private splitTools(task: TaskRequest): { localTools: string[]; hostedTools: string[] } {
    return {
      localTools: task.requiredTools.filter((t) => this.local.tools.has(t)),
      hostedTools: task.requiredTools.filter((t) => !this.local.tools.has(t)),
    };
  }

  /** Heavy and complex: local gathers and organises, hosted leads. */
  private heavyComplex(task: TaskRequest, complexity: ComplexityClass): TaskDecomposition {
    const { localTools, hostedTools } = this.splitTools(task);
    const t = task.estimatedTokens;
    return {
      localTasks: [
        subTask(
          task,
          "local_1",
          "data_gathering",
          `Gather all relevant data for: ${task.description}`,
          t / 2,
          localTools,
          ComplexityClass.MECHANICAL,
        ),
        subTask(
          task,
          "local_2",
          "initial_analysis",
          "Process and organize collected data",
          t / 5,
          [],
          ComplexityClass.ANALYTICAL,
        ),
      ],
      hostedTasks: [
        subTask(
          task,
          "hosted_1",
          "synthesis",
          `Analyze and decide: ${task.description}`,
          (t * 3) / 10,
          hostedTools,
          complexity,
        ),
      ],
      hostedLeads: true,
    };
  }

  /** Local collects facts, hosted reasons over them. */
  private gatherThenReason(
    task: TaskRequest,
    complexity: ComplexityClass,
    hostedLeads: boolean,
  ): TaskDecomposition {
    const { localTools, hostedTools } = this.splitTools(task);
    const t = task.estimatedTokens;
    return {
      localTasks: [
        subTask(
          task,
          "facts",
          "fact_gathering",
          `Collect facts and evidence for: ${task.description}`,
          (t * 3) / 5,
          localTools,
          ComplexityClass.ANALYTICAL,
        ),
      ],
      hostedTasks: [
        subTask(
          task,
          "reasoning",
          "reasoning",
          `Reason about: ${task.description} (based on gathered facts)`,
          (t * 2) / 5,
          hostedTools,
          complexity,
        ),
      ],
      hostedLeads,
    };
  }

  // ── Execution ──────────────────────────────────────────────────────────────

  async executeTask(
    task: TaskRequest,
    decision?: Decision,
    options: ExecuteTaskOptions = {},
  ): Promise<ExecutionResult> {
    validateTask(task);
    const chosen = decision ?? this.decideDelegation(task, options);
    const timeoutMs = options.timeoutMs ?? this.settings.executionTimeoutMs;
    const run: RunContext = { timeoutMs, signal: options.signal };

    this.log.info(
      { taskId: task.id, executor: chosen.executor, complexity: chosen.complexity, factor: chosen.factor },
      chosen.reason,
    );

    let response: TaskResponse;
    switch (chosen.executor) {
      case ExecutorType.LOCAL: {
        const health = await this.monitor.probe(this.local, this.settings.healthTimeoutMs);
        response = await this.runLocalOrFallback(task, chosen.complexity, health, run);
        break;
      }
      case ExecutorType.HOSTED:
        response = await this.dispatch(this.hosted, task, chosen.complexity, run);
        break;
      case ExecutorType.HYBRID:
        response = await this.runHybrid(
          task,
          chosen.decomposition ?? this.gatherThenReason(task, chosen.complexity, true),
          chosen.complexity,
          run,
        );
        break;
    }

    this.record(task, chosen, response);
    return { decision: chosen, response };
  }

  /**
   * Run many tasks, at most `maxParallel` at once. Every task is decided before any runs,
   * so an undeliverable task rejects the batch with nothing started. Settles only after
   * every task has finished.
   */
  async executeAll(tasks: readonly TaskRequest[], options: ExecuteTaskOptions = {}): Promise<ExecutionResult[]> {
    const decisions = tasks.map((task) => this.decideDelegation(task, options));
    const limit = pLimit(this.settings.maxParallel);
    const settled = await Promise.allSettled(
      tasks.map((task, i) => limit(() => this.executeTask(task, decisions[i], options))),
    );

    const results: ExecutionResult[] = [];
    for (const outcome of settled) {
      if (outcome.status === "rejected") throw outcome.reason;
      results.push(outcome.value);
    }
    return results;
  }

  private async dispatch(
    executor: BaseExecutor,
    task: TaskRequest,
    complexity: ComplexityClass,
    run: RunContext,
  ): Promise<TaskResponse> {
    const start = Date.now();
    try {
      const output = await withTimeout(
        (signal) => executor.execute(task, { signal, complexity: task.complexity ?? complexity }),
        run.timeoutMs,
        () => new ExecutionTimeoutError(executor.kind, run.timeoutMs),
        run.signal,
      );
      this.account(executor.kind, output.tokensUsed);
      return {
        taskId: task.id,
        executor: executor.kind,
        result: output.result,
        tokensUsed: output.tokensUsed,
        duration: (Date.now() - start) / 1000,
        confidence: output.confidence,
        errors: [],
        metadata: {},
      };
    } catch (err) {
      const message = errorMessage(err);
      this.log.warn({ taskId: task.id, executor: executor.kind, err: message }, "execution failed");
      return {
        taskId: task.id,
        executor: executor.kind,
        result: null,
        tokensUsed: 0,
        duration: (Date.now() - start) / 1000,
        confidence: 0,
        errors: [message],
        metadata: {},
      };
    }
  }

  private async runLocalOrFallback(
    task: TaskRequest,
    complexity: ComplexityClass,
    health: AvailabilityStatus,
    run: RunContext,
  ): Promise<TaskResponse> {
    if (health.available) return this.dispatch(this.local, task, complexity, run);

    const reason = `local executor unavailable: ${health.error ?? "health check failed"}`;
    const hostedMissing = this.hosted.missingTools(task.requiredTools);
    if (hostedMissing.length > 0) {
      this.log.warn({ taskId: task.id, reason, hostedMissing }, "no fallback possible");
      return {
        taskId: task.id,
        executor: ExecutorType.LOCAL,
        result: null,
        tokensUsed: 0,
        duration: 0,
        confidence: 0,
        errors: [`${reason}; hosted executor lacks ${hostedMissing.join(", ")}`],
        metadata: {},
      };
    }

    this.log.warn({ taskId: task.id, reason }, "falling back to hosted");
    const fallback: FallbackRecord = { from: ExecutorType.LOCAL, to: ExecutorType.HOSTED, reason };
    this.counters.fallbacks += 1;
    const response = await this.dispatch(this.hosted, task, complexity, run);
    return { ...response, metadata: { ...response.metadata, fallback } };
  }

  private async runHybrid(
    task: TaskRequest,
    plan: TaskDecomposition,
    complexity: ComplexityClass,
    run: RunContext,
  ): Promise<TaskResponse> {
    const start = Date.now();
    const health = await this.monitor.probe(this.local, this.settings.healthTimeoutMs);

    const limit = pLimit(this.settings.maxParallel);
    const localResponses = await Promise.all(
      plan.localTasks.map((sub) => limit(() => this.runLocalOrFallback(sub, complexity, health, run))),
    );

    const localResults = localResponses.filter((r) => r.errors.length === 0).map((r) => r.result);
    const hostedResponses: TaskResponse[] = [];
    for (const sub of plan.hostedTasks) {
      const withContext: TaskRequest = { ...sub, context: { ...sub.context, localResults } };
      hostedResponses.push(await this.dispatch(this.hosted, withContext, complexity, run));
    }

    const all = [...localResponses, ...hostedResponses];
    const errors = all.flatMap((r) => r.errors.map((e) => `${r.taskId}: ${e}`));
    const fallback = localResponses.find((r) => r.metadata.fallback)?.metadata.fallback;

    const result: HybridSynthesis = {
      mode: "hybrid",
      taskId: task.id,
      taskType: task.type,
      localContributions: this.contributions(localResponses),
      hostedContributions: this.contributions(hostedResponses),
      finalResult: plan.hostedLeads
        ? (hostedResponses.at(-1)?.result ?? null)
        : { data: localResponses.at(-1)?.result ?? null, analysis: hostedResponses.at(-1)?.result ?? null },
    };

    return {
      taskId: task.id,
      executor: ExecutorType.HYBRID,
      result,
      tokensUsed: all.reduce((sum, r) => sum + r.tokensUsed, 0),
      duration: (Date.now() - start) / 1000,
      confidence: errors.length === 0 ? HYBRID_CONFIDENCE : Math.min(...all.map((r) => r.confidence)),
      errors,
      metadata: { subtasks: all.length, ...(fallback && { fallback }) },
    };
  }

  private contributions(responses: TaskResponse[]): Contribution[] {
    return responses
      .filter((r) => r.result !== null && r.result !== undefined)
      .map((r) => ({ taskId: r.taskId, result: r.result, confidence: r.confidence }));
  }

  // ── Accounting ─────────────────────────────────────────────────────────────

  private account(kind: ConcreteExecutorType, tokens: number): void {
    if (kind === ExecutorType.HOSTED) this.context.recordHostedUsage(tokens);
    else this.context.recordLocalUsage(tokens);
    this.counters.tokens[kind] += tokens;
  }

  private record(task: TaskRequest, decision: Decision, response: TaskResponse): void {
    this.counters.totalTasks += 1;
    this.counters.byExecutor[response.executor] += 1;
    this.counters.byComplexity[decision.complexity] += 1;
    if (response.errors.length > 0) this.counters.failures += 1;

    if (this.settings.historySize > 0) {
      this.history.push({ taskId: task.id, decision, timestamp: new Date().toISOString() });
      if (this.history.length > this.settings.historySize) {
        this.history.splice(0, this.history.length - this.settings.historySize);
      }
    }
  }

  getDelegationStats(): ExecutionStats {
    return {
      ...this.counters,
      byExecutor: { ...this.counters.byExecutor },
      byComplexity: { ...this.counters.byComplexity },
      tokens: { ...this.counters.tokens },
      context: this.context.snapshot(),
    };
  }

  /** Most recent decisions, oldest first. */
  getHistory(): DelegationRecord[] {
    return [...this.history];
  }

  /** Zero counters, history and context usage. */
  resetStats(): void {
    this.counters = emptyCounters();
    this.history = [];
    this.context.reset();
  }

  availability(): AvailabilityStatus[] {
    return this.monitor.snapshot();
  }

  async checkHealth(): Promise<AvailabilityStatus[]> {
    return Promise.all([
      this.monitor.probe(this.local, this.settings.healthTimeoutMs),
      this.monitor.probe(this.hosted, this.settings.healthTimeoutMs),
    ]);
  }
}

interface RunContext {
  timeoutMs: number;
  signal?: AbortSignal;
}
