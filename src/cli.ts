#!/usr/bin/env node
/**
 * CLI entry point for distroscope.
 */

import { runCli } from "./program.js";

process.exitCode = await runCli(process.argv.slice(2));
