#!/usr/bin/env node

/**
 * docpath CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv);
