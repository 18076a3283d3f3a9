// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";

import { withRuntime } from "./shared.js";

type DistributeOptions = {
    taskId?: string;
    urgent?: boolean;
    userRequested?: boolean;
    automated?: boolean;
};

export function distributeCommand(): Command {
    return new Command("distribute")
        .description("Score a task description and show whether it would go to the local processor")
        .argument("<text...>", "Task description")
        .option("--task-id <id>", "Use this id instead of a generated one")
        .option("--urgent", "Raise importance by 0.3")
        .option("--user-requested", "Raise importance by 0.2")
        .option("--automated", "Lower importance by 0.2")
        .action(async (words: string[], options: DistributeOptions, command: Command) => {
            await withRuntime(command, async (runtime) => {
                const result = runtime.distributor.evaluateTask(words.join(" "), options);
                const target = result.sendToLocal ? chalk.green("local") : chalk.blue("main");
                console.log(`${chalk.bold(result.taskId)} → ${target}`);
                console.log(`  reason:     ${result.reason}`);
                console.log(`  category:   ${result.metadata.category}`);
                console.log(`  importance: ${result.priority.toFixed(2)}`);
                console.log(`  tokens:     ${result.estimatedTokens}`);
                console.log(`  slots:      ${result.metadata.activeLocalCount}/${result.metadata.maxConcurrentLocal}`);
            });
        });
}
