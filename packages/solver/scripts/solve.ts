#!/usr/bin/env node
/**
 * N-Queens Solve Script
 *
 * Usage:
 *   npm run solve -- [options]
 *
 * Run with --help for the option list.
 */

import { runCli } from "../src/cli";

process.exitCode = runCli(process.argv.slice(2));
