#!/usr/bin/env node
// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import chalk from "chalk";

import { buildProgram } from "./program.js";

buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
        console.error(chalk.red(`\nFatal error: ${err instanceof Error ? err.message : String(err)}`));
        process.exit(1);
    });
