// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * ResourcePool — per-category counters, each with its own cap.
 * Finer-grained throttling than the distributor's single local slot count.
 * Never queues: acquire() at the cap returns false.
 */

import { ConfigurationError } from "../exceptions.js";
import { RESOURCE_CATEGORIES, type ResourceCategory } from "../types.js";

export interface ResourceUsage {
  inUse: number;
  cap: number;
}

export class ResourcePool {
  private readonly caps: Record<ResourceCategory, number>;
  private readonly counts: Record<ResourceCategory, number> = {
    memory_operations: 0,
    analysis: 0,
    optimization: 0,
  };

  constructor(caps: Record<ResourceCategory, number>) {
    for (const category of RESOURCE_CATEGORIES) {
      const cap = caps[category];
      if (!Number.isInteger(cap) || cap <= 0) {
        throw new ConfigurationError(`resource cap for '${category}' must be a positive integer, got ${cap}`);
      }
    }
    this.caps = { ...caps };
  }

  acquire(category: ResourceCategory): boolean {
    if (this.counts[category] >= this.caps[category]) return false;
    this.counts[category] += 1;
    return true;
  }

  /** Never drops below zero. */
  release(category: ResourceCategory): void {
    if (this.counts[category] > 0) this.counts[category] -= 1;
  }

  /**
   * Run `fn` holding one unit of `category`.
   * Resolves to `{ ran: false }` without calling `fn` when the category is at its cap.
   */
  async use<T>(category: ResourceCategory, fn: () => Promise<T>): Promise<{ ran: true; value: T } | { ran: false }> {
    if (!this.acquire(category)) return { ran: false };
    try {
      return { ran: true, value: await fn() };
    } finally {
      this.release(category);
    }
  }

  usage(): Record<ResourceCategory, ResourceUsage> {
    return {
      memory_operations: { inUse: this.counts.memory_operations, cap: this.caps.memory_operations },
      analysis: { inUse: this.counts.analysis, cap: this.caps.analysis },
      optimization: { inUse: this.counts.optimization, cap: this.caps.optimization },
    };
  }

  reset(): void {
    for (const category of RESOURCE_CATEGORIES) this.counts[category] = 0;
  }
}
