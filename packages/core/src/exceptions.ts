// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Typed error hierarchy for Tandem.
 * Routing a task away from its preferred executor is a Decision, never one of these.
 */

export class TandemError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TandemError";
  }
}

export class ConfigurationError extends TandemError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class InvalidTaskError extends TandemError {
  constructor(
    message: string,
    public readonly taskId?: string,
  ) {
    super(message);
    this.name = "InvalidTaskError";
  }
}

export class ExecutorError extends TandemError {
  constructor(
    message: string,
    public readonly executor: string,
  ) {
    super(message);
    this.name = "ExecutorError";
  }
}

export class ExecutorUnavailableError extends ExecutorError {
  constructor(executor: string, cause?: string) {
    super(`Executor '${executor}' is unavailable${cause ? `: ${cause}` : ""}`, executor);
    this.name = "ExecutorUnavailableError";
  }
}

export class ExecutionTimeoutError extends ExecutorError {
  constructor(
    executor: string,
    public readonly timeoutMs: number,
  ) {
    super(`Execution on '${executor}' timed out after ${timeoutMs}ms`, executor);
    this.name = "ExecutionTimeoutError";
  }
}
