// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";

import { withRuntime } from "./shared.js";

export function healthCommand(): Command {
    return new Command("health")
        .description("Probe the local and hosted executors")
        .action(async (_options: object, command: Command) => {
            await withRuntime(command, async (runtime) => {
                const statuses = await runtime.engine.checkHealth();
                for (const status of statuses) {
                    const mark = status.available ? chalk.green("✓") : chalk.red("✗");
                    const detail = status.error ? chalk.dim(` (${status.error})`) : "";
                    console.log(`${mark} ${status.executor}  ${status.latencyMs}ms${detail}`);
                }
                if (!statuses.some((s) => s.available)) process.exitCode = 1;
            });
        });
}
