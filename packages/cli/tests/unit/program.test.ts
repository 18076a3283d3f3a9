// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { InvalidTaskError } from "@tandem/core";

import { parseForce } from "../../src/decide.js";
import { buildProgram } from "../../src/program.js";
import { parseTimeout } from "../../src/run.js";
import { readTask } from "../../src/shared.js";

const dir = join(tmpdir(), "tandem-test", `cli-${process.pid}`);

const stripAnsi = (s: string): string => s.replace(/\u001b\[[0-9;]*m/g, "");

beforeEach(() => {
    mkdirSync(dir, { recursive: true });
});

afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
});

describe("buildProgram()", () => {
    it("registers every command", () => {
        expect(buildProgram().commands.map((c) => c.name())).toEqual([
            "decide",
            "run",
            "distribute",
            "cache",
            "health",
            "serve",
        ]);
    });

    it("nests the cache subcommands", () => {
        const cache = buildProgram().commands.find((c) => c.name() === "cache");
        expect(cache?.commands.map((c) => c.name())).toEqual(["stats", "clear-expired"]);
    });

    it("decide prints the decision", async () => {
        const configPath = join(dir, "tandem.yaml");
        writeFileSync(configPath, "cache:\n  backend: memory\nlogging:\n  level: SILENT\n", "utf8");
        const lines: string[] = [];
        vi.spyOn(console, "log").mockImplementation((line: unknown) => {
            lines.push(stripAnsi(String(line)));
        });

        await buildProgram().parseAsync(
            ["--config", configPath, "decide", "--type", "file_search", "--description", "Find the configs"],
            { from: "user" },
        );

        expect(lines[0]).toBe("cli-task → local");
        expect(lines[1]).toBe("  reason:     mechanical work runs locally");
        expect(lines[2]).toBe("  complexity: MECHANICAL");
    });
});

describe("readTask()", () => {
    it("builds a task from flags", () => {
        expect(
            readTask({
                id: "t9",
                type: "code_review",
                description: "Review the parser",
                tokens: "2500",
                tools: "bash, file_operations,",
                complexity: "analytical",
            }),
        ).toEqual({
            id: "t9",
            type: "code_review",
            description: "Review the parser",
            estimatedTokens: 2500,
            requiredTools: ["bash", "file_operations"],
            complexity: "ANALYTICAL",
        });
    });

    it("reads a JSON file", () => {
        const path = join(dir, "task.json");
        writeFileSync(
            path,
            JSON.stringify({ id: "f1", type: "file_search", description: "List files", estimatedTokens: 10 }),
            "utf8",
        );
        expect(readTask({ file: path })).toEqual({
            id: "f1",
            type: "file_search",
            description: "List files",
            estimatedTokens: 10,
            requiredTools: [],
        });
    });

    it("rejects a task without a description", () => {
        expect(() => readTask({ type: "file_search" })).toThrow(InvalidTaskError);
    });

    it("rejects a non-numeric token count", () => {
        expect(() => readTask({ type: "file_search", description: "x", tokens: "lots" })).toThrow(
            /estimatedTokens/,
        );
    });
});

describe("parseForce()", () => {
    it("accepts local and hosted only", () => {
        expect(parseForce("local")).toBe("local");
        expect(parseForce(undefined)).toBeUndefined();
        expect(() => parseForce("hybrid")).toThrow("--force must be 'local' or 'hosted', got 'hybrid'");
    });
});

describe("parseTimeout()", () => {
    it("accepts whole milliseconds within the timer range", () => {
        expect(parseTimeout("5000")).toBe(5000);
        expect(parseTimeout(undefined)).toBeUndefined();
    });

    it("rejects non-numbers, zero and values past the timer limit", () => {
        expect(() => parseTimeout("abc")).toThrow("--timeout must be a whole number of milliseconds");
        expect(() => parseTimeout("0")).toThrow("--timeout");
        expect(() => parseTimeout("2147483648")).toThrow("--timeout");
    });
});
