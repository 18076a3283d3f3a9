// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * AvailabilityMonitor — bounded health probes.
 * A probe that times out or throws counts as "unavailable"; it never rejects.
 */

import { ExecutionTimeoutError } from "../exceptions.js";
import { withTimeout } from "../utils/timeout.js";
import type { BaseExecutor } from "./base.js";

export interface AvailabilityStatus {
  executor: string;
  available: boolean;
  checkedAt: string;
  latencyMs: number;
  error?: string;
}

export class AvailabilityMonitor {
  private readonly last = new Map<string, AvailabilityStatus>();

  constructor(private readonly defaultTimeoutMs = 3000) {}

  async probe(executor: BaseExecutor, timeoutMs = this.defaultTimeoutMs): Promise<AvailabilityStatus> {
    const start = Date.now();
    let available = false;
    let error: string | undefined;

    try {
      available = await withTimeout(
        (signal) => executor.checkHealth(signal),
        timeoutMs,
        () => new ExecutionTimeoutError(executor.kind, timeoutMs),
      );
      if (!available) error = "health check failed";
    } catch (err) {
      error = err instanceof Error ? err.message : String(err);
    }

    const status: AvailabilityStatus = {
      executor: executor.name,
      available,
      checkedAt: new Date().toISOString(),
      latencyMs: Date.now() - start,
      ...(error !== undefined && { error }),
    };
    this.last.set(executor.name, status);
    return status;
  }

  /** Last known status per executor name. */
  snapshot(): AvailabilityStatus[] {
    return [...this.last.values()];
  }

  lastStatus(name: string): AvailabilityStatus | undefined {
    return this.last.get(name);
  }
}
