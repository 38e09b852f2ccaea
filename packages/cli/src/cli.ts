#!/usr/bin/env node

/**
 * wrinkle-list CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv);
