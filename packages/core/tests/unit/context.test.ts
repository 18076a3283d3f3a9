// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../../src/exceptions.js";
import { ContextState } from "../../src/router/context.js";

const make = () => new ContextState({ hostedCeiling: 200_000, localCeiling: 120_000 });

describe("ContextState", () => {
  it("starts empty", () => {
    expect(make().snapshot()).toEqual({
      hostedUsage: 0,
      hostedCeiling: 200_000,
      localUsage: 0,
      localCeiling: 120_000,
      pressure: 0,
      localPressure: 0,
    });
  });

  it("computes pressure from hosted usage only", () => {
    const ctx = make();
    ctx.recordHostedUsage(50_000);
    ctx.recordLocalUsage(60_000);
    expect(ctx.pressure).toBeCloseTo(0.25);
    expect(ctx.localPressure).toBeCloseTo(0.5);
  });

  it("clamps pressure at 1", () => {
    const ctx = make();
    ctx.recordHostedUsage(500_000);
    expect(ctx.pressure).toBe(1);
    expect(ctx.snapshot().hostedUsage).toBe(500_000);
  });

  it("rejects negative usage", () => {
    expect(() => make().recordHostedUsage(-1)).toThrow(RangeError);
    expect(() => make().recordLocalUsage(Number.NaN)).toThrow(RangeError);
  });

  it("reset() zeroes both channels", () => {
    const ctx = make();
    ctx.recordHostedUsage(10);
    ctx.recordLocalUsage(10);
    ctx.reset();
    expect(ctx.pressure).toBe(0);
    expect(ctx.snapshot().localUsage).toBe(0);
  });

  it("rejects a ceiling ≤ 0", () => {
    expect(() => new ContextState({ hostedCeiling: 0, localCeiling: 1 })).toThrow(ConfigurationError);
    expect(() => new ContextState({ hostedCeiling: 1, localCeiling: -5 })).toThrow(ConfigurationError);
  });
});
