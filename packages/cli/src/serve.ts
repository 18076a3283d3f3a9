// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";
import { envVar } from "@tandem/core";
import { DEFAULT_HOST, DEFAULT_PORT, startServer } from "@tandem/api";

import { openRuntime } from "./shared.js";

type ServeOptions = {
    port: string;
    host: string;
    apiKey?: string;
    swagger: boolean;
};

export function serveCommand(): Command {
    return new Command("serve")
        .description("Start the Tandem REST API")
        .option("-p, --port <number>", "Port to bind to", String(DEFAULT_PORT))
        .option("--host <host>", "Interface to bind to", DEFAULT_HOST)
        .option("--api-key <key>", "Require this key on every request (default: $TANDEM_API_KEY)")
        .option("--no-swagger", "Disable the Swagger UI at /docs")
        .action(async (options: ServeOptions, command: Command) => {
            const port = Number.parseInt(options.port, 10);
            if (!Number.isInteger(port) || port <= 0) {
                throw new Error(`--port must be a positive integer, got '${options.port}'`);
            }
            const runtime = await openRuntime(command);
            let host: string;
            try {
                ({ host } = await startServer({
                    runtime,
                    port,
                    host: options.host,
                    apiKey: options.apiKey ?? envVar("TANDEM_API_KEY"),
                    swagger: options.swagger,
                }));
            } catch (err) {
                await runtime.close();
                throw err;
            }
            console.log(
                `\n  Tandem API\n` +
                `  Listening  → http://${host}:${port}/v1\n` +
                (options.swagger ? `  Swagger UI → http://${host}:${port}/docs\n` : ""),
            );
            console.log(chalk.dim("  Ctrl+C to stop"));
        });
}
