// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, it, expect } from "vitest";
import { defaultConfig } from "../../src/config/config.js";
import {
  TaskDistributor,
  calculateImportance,
  classifyTaskText,
  estimateTokens,
  generateTaskId,
  type DistributorSettings,
} from "../../src/distributor/distributor.js";
import { InvalidTaskError } from "../../src/exceptions.js";
import { silentLogger } from "../helpers/fakes.js";

const makeDistributor = (settings: Partial<DistributorSettings> = {}) =>
  new TaskDistributor({ settings: { ...defaultConfig.distributor, ...settings }, logger: silentLogger });

describe("classifyTaskText()", () => {
  it.each([
    ["Update the README install section", "documentation"],
    ["Run the linter over src/", "formatting"],
    ["Review this diff", "simple_analysis"],
    ["Convert the CSV export to JSON", "data_transformation"],
    ["Improve query performance", "optimization"],
    ["Patch the security hole in login", "security"],
    ["Say hello", "general"],
  ])("%s → %s", (text, category) => {
    expect(classifyTaskText(text)).toBe(category);
  });

  it("takes the first matching category", () => {
    expect(classifyTaskText("Document the security model")).toBe("documentation");
  });
});

describe("calculateImportance()", () => {
  it("uses the base table", () => {
    expect(calculateImportance("security")).toBe(0.9);
    expect(calculateImportance("general")).toBe(0.5);
  });

  it("adds urgency and user requests", () => {
    expect(calculateImportance("documentation", { urgent: true, userRequested: true })).toBe(0.7);
  });

  it("caps at 1 and floors at 0", () => {
    expect(calculateImportance("security", { urgent: true })).toBe(1);
    expect(calculateImportance("formatting", { automated: true })).toBe(0);
  });

  it("applies the cap before the automated discount", () => {
    expect(calculateImportance("optimization", { urgent: true, automated: true })).toBe(0.8);
  });
});

describe("estimateTokens()", () => {
  it("blends characters and words", () => {
    expect(estimateTokens("hello world")).toBe(4);
    expect(estimateTokens("")).toBe(0);
  });
});

describe("generateTaskId()", () => {
  it("stamps local time and a short random suffix", () => {
    const id = generateTaskId(new Date(2026, 0, 2, 3, 4, 5));
    expect(id).toMatch(/^task_20260102_030405_[0-9a-f]{8}$/);
  });
});

describe("TaskDistributor.evaluateTask()", () => {
  it("routes everything to main when local processing is disabled", () => {
    const distributor = makeDistributor({ localEnabled: false });
    for (const text of ["Update the README", "Patch the security hole", ""]) {
      const d = distributor.evaluateTask(text);
      expect(d.assignedProcessor).toBe("main");
      expect(d.sendToLocal).toBe(false);
      expect(d.reason).toBe("local processing disabled");
      expect(d.metadata.localMode).toBe("disabled");
    }
  });

  it("sends low-importance documentation to local and takes a slot", () => {
    const distributor = makeDistributor();
    const d = distributor.evaluateTask("Update the README section", { taskId: "doc-1" });
    expect(d).toMatchObject({
      taskId: "doc-1",
      sendToLocal: true,
      assignedProcessor: "local",
      priority: 0.2,
      reason: "low importance (0.20) and local capacity available (1/8)",
    });
    expect(d.metadata.activeLocalCount).toBe(1);
    expect(distributor.getStatus().activeTaskIds).toEqual(["doc-1"]);
  });

  it("keeps security work on main regardless of free slots", () => {
    const d = makeDistributor().evaluateTask("Patch the security hole in login");
    expect(d.assignedProcessor).toBe("main");
    expect(d.priority).toBe(0.9);
    expect(d.reason).toBe("importance 0.90 >= threshold 0.3");
  });

  it("treats the threshold as inclusive for main", () => {
    const d = makeDistributor().evaluateTask("Convert the CSV export to JSON");
    expect(d.priority).toBe(0.3);
    expect(d.assignedProcessor).toBe("main");
  });

  it("lets automated work drop below the threshold", () => {
    const d = makeDistributor().evaluateTask("Review this diff", { automated: true });
    expect(d.priority).toBe(0.2);
    expect(d.assignedProcessor).toBe("local");
  });

  it("routes types outside the whitelist to main", () => {
    const d = makeDistributor({ localTaskTypes: ["documentation"] }).evaluateTask("Format this file");
    expect(d.assignedProcessor).toBe("main");
    expect(d.reason).toBe("task type 'formatting' is not suited to local processing");
  });

  it("never exceeds the slot limit and reports current/max when full", () => {
    const distributor = makeDistributor({ maxConcurrentLocal: 2 });
    const results = ["a", "b", "c"].map((taskId) => distributor.evaluateTask("Write docs", { taskId }));

    expect(results.map((d) => d.assignedProcessor)).toEqual(["local", "local", "main"]);
    expect(results[2]?.reason).toBe("local task slots full (2/2)");
    expect(distributor.getStatus().activeLocalTasks).toBe(2);

    distributor.releaseTask("a");
    expect(distributor.evaluateTask("Write docs", { taskId: "d" }).assignedProcessor).toBe("local");
  });

  it("does not hand a second slot to an id that already holds one", () => {
    const distributor = makeDistributor();
    distributor.evaluateTask("Write docs", { taskId: "same" });
    const again = distributor.evaluateTask("Write docs", { taskId: "same" });
    expect(again.assignedProcessor).toBe("main");
    expect(distributor.getStatus().activeLocalTasks).toBe(1);
  });

  it("rejects empty text while enabled", () => {
    expect(() => makeDistributor().evaluateTask("   ")).toThrow(InvalidTaskError);
  });

  it("generates an id when none is given", () => {
    const distributor = new TaskDistributor({
      settings: defaultConfig.distributor,
      logger: silentLogger,
      now: () => new Date(2026, 4, 6, 7, 8, 9),
    });
    const d = distributor.evaluateTask("Write docs");
    expect(d.taskId.startsWith("task_20260506_070809_")).toBe(true);
  });
});

describe("TaskDistributor slots", () => {
  it("releaseTask() is idempotent", () => {
    const distributor = makeDistributor();
    distributor.evaluateTask("Write docs", { taskId: "x" });
    expect(distributor.releaseTask("x")).toBe(true);
    expect(distributor.releaseTask("x")).toBe(false);
    expect(distributor.releaseTask("never-seen")).toBe(false);
    expect(distributor.getStatus().activeLocalTasks).toBe(0);
  });

  it("runLocal() releases the slot even when the work throws", async () => {
    const distributor = makeDistributor();
    const d = distributor.evaluateTask("Write docs", { taskId: "boom" });
    await expect(
      distributor.runLocal(d, async () => {
        throw new Error("work failed");
      }),
    ).rejects.toThrow("work failed");
    expect(distributor.getStatus().activeLocalTasks).toBe(0);
  });

  it("runLocal() returns the work's value", async () => {
    const distributor = makeDistributor();
    const d = distributor.evaluateTask("Write docs");
    await expect(distributor.runLocal(d, async () => 42)).resolves.toBe(42);
  });

  it("runLocal() refuses a distribution routed to main", async () => {
    const distributor = makeDistributor();
    const d = distributor.evaluateTask("Patch the security hole");
    await expect(distributor.runLocal(d, async () => 1)).rejects.toBeInstanceOf(InvalidTaskError);
  });

  it("getStatus() reports slots and resource usage", () => {
    const distributor = makeDistributor({ maxConcurrentLocal: 4 });
    distributor.evaluateTask("Write docs", { taskId: "s1" });
    distributor.resources.acquire("analysis");

    const status = distributor.getStatus();
    expect(status.mode).toBe("enabled");
    expect(status.localSlots).toBe("1/4");
    expect(status.resources.analysis).toEqual({ inUse: 1, cap: 3 });

    distributor.reset();
    expect(distributor.getStatus().activeLocalTasks).toBe(0);
    expect(distributor.getStatus().resources.analysis.inUse).toBe(0);
  });
});
