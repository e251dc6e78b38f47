#!/usr/bin/env node
/**
 * CLI entry point for the mat binary.
 */
process.title = "mat";

import { main } from "./main.js";

await main(process.argv.slice(2));
