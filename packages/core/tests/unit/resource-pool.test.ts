// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, it, expect } from "vitest";
import { ResourcePool } from "../../src/distributor/resource-pool.js";
import { ConfigurationError } from "../../src/exceptions.js";

const caps = { memory_operations: 3, analysis: 3, optimization: 1 };

describe("ResourcePool", () => {
  it("grants up to the cap, then refuses", () => {
    const pool = new ResourcePool(caps);
    expect([1, 2, 3, 4].map(() => pool.acquire("memory_operations"))).toEqual([true, true, true, false]);
    expect(pool.usage().memory_operations).toEqual({ inUse: 3, cap: 3 });
  });

  it("keeps categories independent", () => {
    const pool = new ResourcePool(caps);
    expect(pool.acquire("optimization")).toBe(true);
    expect(pool.acquire("optimization")).toBe(false);
    expect(pool.acquire("analysis")).toBe(true);
  });

  it("never releases below zero", () => {
    const pool = new ResourcePool(caps);
    pool.release("analysis");
    pool.release("analysis");
    expect(pool.usage().analysis.inUse).toBe(0);
    expect(pool.acquire("analysis")).toBe(true);
    expect(pool.usage().analysis.inUse).toBe(1);
  });

  it("use() runs the work and gives the unit back", async () => {
    const pool = new ResourcePool(caps);
    await expect(pool.use("optimization", async () => "done")).resolves.toEqual({ ran: true, value: "done" });
    expect(pool.usage().optimization.inUse).toBe(0);
  });

  it("use() skips the work at the cap", async () => {
    const pool = new ResourcePool(caps);
    pool.acquire("optimization");
    let called = false;
    const outcome = await pool.use("optimization", async () => {
      called = true;
    });
    expect(outcome).toEqual({ ran: false });
    expect(called).toBe(false);
  });

  it("use() releases when the work throws", async () => {
    const pool = new ResourcePool(caps);
    await expect(
      pool.use("analysis", async () => {
        throw new Error("nope");
      }),
    ).rejects.toThrow("nope");
    expect(pool.usage().analysis.inUse).toBe(0);
  });

  it("rejects non-positive caps", () => {
    expect(() => new ResourcePool({ ...caps, analysis: 0 })).toThrow(ConfigurationError);
  });
});
