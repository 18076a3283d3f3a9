// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * ContextState — token consumption of the hosted assistant and the local model.
 *
 * Owned explicitly and handed to the DelegationEngine; never a module-level singleton.
 * Every mutation is a synchronous method, so it runs to completion on the event loop
 * before any concurrent decision can read pressure.
 */

import { ConfigurationError } from "../exceptions.js";
import type { ContextSnapshot } from "../types.js";

export interface ContextCeilings {
  hostedCeiling: number;
  localCeiling: number;
}

function clamp(value: number, min = 0, max = 1): number {
  return Math.max(min, Math.min(max, value));
}

function assertTokens(tokens: number, label: string): void {
  if (!Number.isFinite(tokens) || tokens < 0) {
    throw new RangeError(`${label} must be a non-negative number, got ${tokens}`);
  }
}

export class ContextState {
  private hostedUsage = 0;
  private localUsage = 0;
  readonly hostedCeiling: number;
  readonly localCeiling: number;

  constructor(ceilings: ContextCeilings) {
    if (!(ceilings.hostedCeiling > 0)) {
      throw new ConfigurationError(`hostedCeiling must be > 0, got ${ceilings.hostedCeiling}`);
    }
    if (!(ceilings.localCeiling > 0)) {
      throw new ConfigurationError(`localCeiling must be > 0, got ${ceilings.localCeiling}`);
    }
    this.hostedCeiling = ceilings.hostedCeiling;
    this.localCeiling = ceilings.localCeiling;
  }

  /** Hosted context pressure in [0, 1]. */
  get pressure(): number {
    return clamp(this.hostedUsage / this.hostedCeiling);
  }

  get localPressure(): number {
    return clamp(this.localUsage / this.localCeiling);
  }

  recordHostedUsage(tokens: number): void {
    assertTokens(tokens, "hosted tokens");
    this.hostedUsage += tokens;
  }

  recordLocalUsage(tokens: number): void {
    assertTokens(tokens, "local tokens");
    this.localUsage += tokens;
  }

  /** The only way usage ever goes down. */
  reset(): void {
    this.hostedUsage = 0;
    this.localUsage = 0;
  }

  snapshot(): ContextSnapshot {
    return {
      hostedUsage: this.hostedUsage,
      hostedCeiling: this.hostedCeiling,
      localUsage: this.localUsage,
      localCeiling: this.localCeiling,
      pressure: this.pressure,
      localPressure: this.localPressure,
    };
  }
}
