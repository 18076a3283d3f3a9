// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";

import { printDecision, readTask, withRuntime, withTaskOptions, type TaskOptions } from "./shared.js";

type DecideOptions = TaskOptions & { force?: string };

export function decideCommand(): Command {
    return withTaskOptions(new Command("decide"))
        .description("Show where a task would run and why, without running it")
        .option("--force <executor>", "Force local or hosted")
        .action(async (options: DecideOptions, command: Command) => {
            const task = readTask(options);
            const force = parseForce(options.force);
            await withRuntime(command, async (runtime) => {
                printDecision(task.id, runtime.engine.decideDelegation(task, { force }));
            });
        });
}

export function parseForce(value: string | undefined): "local" | "hosted" | undefined {
    if (value === undefined) return undefined;
    if (value === "local" || value === "hosted") return value;
    throw new Error(`--force must be 'local' or 'hosted', got '${value}'`);
}
