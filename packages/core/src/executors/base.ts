// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * BaseExecutor — abstract contract for anything that can run a task.
 * The delegation engine only ever talks to executors through this class.
 */

import type { ComplexityClass, ConcreteExecutorType, TaskRequest } from "../types.js";

export interface ExecuteOptions {
  /** Aborted when the engine's timeout fires or the caller cancels. */
  signal?: AbortSignal;
  /** Class the engine assigned; used by confidence heuristics. */
  complexity?: ComplexityClass;
}

/** What an executor hands back. The engine adds timing, errors and fallback metadata. */
export interface ExecutorOutput {
  result: unknown;
  tokensUsed: number;
  confidence: number;
}

export abstract class BaseExecutor {
  /** Display name used in logs and health output. */
  abstract readonly name: string;

  abstract readonly kind: ConcreteExecutorType;

  /** Capability tags this executor can satisfy. */
  abstract readonly tools: ReadonlySet<string>;

  /** Open connections, warm caches. Default: nothing to do. */
  async initialize(): Promise<void> {}

  /**
   * Returns true if the executor is reachable.
   * Must resolve false rather than throw when the backend is down.
   */
  abstract checkHealth(signal?: AbortSignal): Promise<boolean>;

  /** Run one task. Failures throw an ExecutorError. */
  abstract execute(task: TaskRequest, options?: ExecuteOptions): Promise<ExecutorOutput>;

  async cleanup(): Promise<void> {}

  /** Tools from `required` this executor does not provide. */
  missingTools(required: readonly string[]): string[] {
    return required.filter((tool) => !this.tools.has(tool));
  }

  supportsTools(required: readonly string[]): boolean {
    return this.missingTools(required).length === 0;
  }
}
