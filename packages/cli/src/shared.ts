// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/cli/src/shared.ts
// Runtime bootstrap, task parsing and printers shared by the commands.

import { readFileSync } from "fs";
import type { Command } from "commander";
import chalk from "chalk";
import {
    InvalidTaskError,
    createLogger,
    createRuntime,
    loadConfig,
    type Decision,
    type TandemRuntime,
    type TaskRequest,
    type TaskResponse,
} from "@tandem/core";
import { TaskSchema, parseBody } from "@tandem/api";

export type GlobalOptions = {
    config?: string;
    verbose?: boolean;
};

export type TaskOptions = {
    file?: string;
    id?: string;
    type?: string;
    description?: string;
    tokens?: string;
    tools?: string;
    complexity?: string;
    priority?: string;
};

/** Adds the flags that describe a task, shared by `decide` and `run`. */
export function withTaskOptions(command: Command): Command {
    return command
        .option("-f, --file <path>", "Read the task from a JSON file")
        .option("--id <id>", "Task id", "cli-task")
        .option("-t, --type <type>", "Task type, e.g. file_search or architecture_design")
        .option("-d, --description <text>", "What the task should do")
        .option("--tokens <n>", "Estimated tokens", "1000")
        .option("--tools <list>", "Comma-separated required tools", "")
        .option("--complexity <class>", "Pre-assigned class (MECHANICAL|ANALYTICAL|CREATIVE|STRATEGIC)")
        .option("--priority <level>", "low | normal | high");
}

/** Build a TaskRequest from flags or a JSON file. Invalid input throws InvalidTaskError. */
export function readTask(options: TaskOptions): TaskRequest {
    if (options.file) {
        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(options.file, "utf8"));
        } catch (err) {
            throw new InvalidTaskError(`Cannot read task file '${options.file}': ${String(err)}`);
        }
        return parseBody(TaskSchema, raw);
    }

    const tokens = Number(options.tokens ?? "1000");
    return parseBody(TaskSchema, {
        id: options.id ?? "cli-task",
        type: options.type,
        description: options.description,
        estimatedTokens: tokens,
        requiredTools: (options.tools ?? "")
            .split(",")
            .map((t) => t.trim())
            .filter((t) => t.length > 0),
        ...(options.complexity !== undefined && { complexity: options.complexity.toUpperCase() }),
        ...(options.priority !== undefined && { priority: options.priority }),
    });
}

/** Load config and wire a runtime. Logs stay at WARNING unless --verbose. */
export async function openRuntime(command: Command): Promise<TandemRuntime> {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const config = loadConfig(globals.config);
    const logger = createLogger({ ...config.logging, level: globals.verbose ? "DEBUG" : "WARNING" });
    return createRuntime(config, { logger });
}

/** Run `fn` against a runtime and always close it. */
export async function withRuntime<T>(command: Command, fn: (runtime: TandemRuntime) => Promise<T>): Promise<T> {
    const runtime = await openRuntime(command);
    try {
        return await fn(runtime);
    } finally {
        await runtime.close();
    }
}

const EXECUTOR_COLOR = {
    local: chalk.green,
    hosted: chalk.blue,
    hybrid: chalk.magenta,
} as const;

export function printDecision(taskId: string, decision: Decision): void {
    const color = EXECUTOR_COLOR[decision.executor];
    console.log(`${chalk.bold(taskId)} → ${color(decision.executor)}`);
    console.log(`  reason:     ${decision.reason}`);
    console.log(`  complexity: ${decision.complexity}`);
    console.log(`  factor:     ${decision.factor}`);
    console.log(`  confidence: ${decision.confidence.toFixed(2)}`);
    console.log(`  pressure:   ${decision.pressure.toFixed(2)}`);

    const plan = decision.decomposition;
    if (plan) {
        console.log(chalk.dim(`  plan (${plan.hostedLeads ? "hosted leads" : "combined"}):`));
        for (const sub of plan.localTasks) {
            console.log(`    ${chalk.green("local ")} ${sub.id}  ${sub.type}  ${sub.estimatedTokens} tokens`);
        }
        for (const sub of plan.hostedTasks) {
            console.log(`    ${chalk.blue("hosted")} ${sub.id}  ${sub.type}  ${sub.estimatedTokens} tokens`);
        }
    }
}

/** Prints the outcome; failures go to stderr. Returns false when the response carries errors. */
export function printResponse(response: TaskResponse): boolean {
    const fallback = response.metadata.fallback;
    if (fallback) {
        console.log(chalk.yellow(`  fallback:   ${fallback.from} → ${fallback.to} (${fallback.reason})`));
    }
    console.log(`  ran on:     ${response.executor}`);
    console.log(`  tokens:     ${response.tokensUsed}`);
    console.log(`  duration:   ${response.duration.toFixed(2)}s`);

    if (response.errors.length > 0) {
        console.error(chalk.red(`\n  ${response.errors.length} error(s):`));
        for (const err of response.errors) console.error(chalk.red(`    - ${err}`));
        return false;
    }

    console.log(`\n${JSON.stringify(response.result, null, 2)}`);
    return true;
}
