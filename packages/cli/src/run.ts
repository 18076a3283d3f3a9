// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";
import { MAX_TIMER_MS } from "@tandem/core";

import { parseForce } from "./decide.js";
import { printDecision, printResponse, readTask, withRuntime, withTaskOptions, type TaskOptions } from "./shared.js";

type RunOptions = TaskOptions & { force?: string; timeout?: string };

export function runCommand(): Command {
    return withTaskOptions(new Command("run"))
        .description("Decide where a task runs and run it")
        .option("--force <executor>", "Force local or hosted")
        .option("--timeout <ms>", "Per-executor timeout in milliseconds")
        .action(async (options: RunOptions, command: Command) => {
            const task = readTask(options);
            const force = parseForce(options.force);
            const timeoutMs = parseTimeout(options.timeout);

            await withRuntime(command, async (runtime) => {
                console.log(chalk.dim(`Running ${task.id}...`));
                const { decision, response } = await runtime.engine.executeTask(task, undefined, {
                    force,
                    timeoutMs,
                });
                printDecision(task.id, decision);
                if (!printResponse(response)) process.exitCode = 1;
            });
        });
}

export function parseTimeout(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const ms = Number(value);
    if (!Number.isInteger(ms) || ms <= 0 || ms > MAX_TIMER_MS) {
        throw new Error(`--timeout must be a whole number of milliseconds between 1 and ${MAX_TIMER_MS}, got '${value}'`);
    }
    return ms;
}
