#!/usr/bin/env node

/**
 * homeindex CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv);
