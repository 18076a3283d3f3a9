// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";

import { withRuntime } from "./shared.js";

function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function cacheCommand(): Command {
    const cache = new Command("cache").description("Inspect and maintain the result cache");

    cache
        .command("stats")
        .description("Entry counts, size and hit rate")
        .action(async (_options: object, command: Command) => {
            await withRuntime(command, async (runtime) => {
                const stats = runtime.cache.getStats();
                console.log(chalk.bold("Result cache"));
                console.log(`  entries:  ${stats.totalEntries} (${stats.activeEntries} active, ${stats.expiredEntries} expired)`);
                console.log(`  size:     ${formatBytes(stats.sizeBytes)}`);
                console.log(`  ttl:      ${stats.ttlHours}h`);
                for (const [type, count] of Object.entries(stats.byType)) {
                    console.log(`  ${chalk.dim(type)}: ${count}`);
                }
            });
        });

    cache
        .command("clear-expired")
        .description("Remove entries older than the TTL")
        .action(async (_options: object, command: Command) => {
            await withRuntime(command, async (runtime) => {
                const removed = runtime.cache.clearExpired();
                console.log(chalk.green(`Removed ${removed} expired entr${removed === 1 ? "y" : "ies"}.`));
            });
        });

    return cache;
}
