// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import { VERSION } from "@tandem/core";

import { cacheCommand } from "./cache.js";
import { decideCommand } from "./decide.js";
import { distributeCommand } from "./distribute.js";
import { healthCommand } from "./health.js";
import { runCommand } from "./run.js";
import { serveCommand } from "./serve.js";

export function buildProgram(): Command {
    const program = new Command();

    program
        .name("tandem")
        .description("Route coding-assistant work between a local model and a hosted assistant")
        .version(VERSION)
        .option("-c, --config <path>", "Config file (default: tandem.yaml, config/tandem.yaml, ~/.tandem/config.yaml)")
        .option("-v, --verbose", "Debug logging");

    program.addCommand(decideCommand());
    program.addCommand(runCommand());
    program.addCommand(distributeCommand());
    program.addCommand(cacheCommand());
    program.addCommand(healthCommand());
    program.addCommand(serveCommand());

    return program;
}
