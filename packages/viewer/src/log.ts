import { appendFileSync } from "node:fs";
import chalk from "chalk";
import { APP_NAME } from "./config.js";

let debugLogBroken = false;

function timestamp(): string {
	return new Date().toISOString();
}

export function logWarning(message: string): void {
	console.error(chalk.yellow(`Warning: ${message}`));
}

export function logError(message: string): void {
	console.error(chalk.red(`${APP_NAME}: ${message}`));
}

/**
 * Append a line to the file named by MAT_DEBUG_LOG. Silent when the variable is unset.
 * Used for failures the viewer absorbs (follow polls, syntax coloring, theme detection).
 */
export function logDebug(message: string): void {
	const logPath = process.env.MAT_DEBUG_LOG;
	if (!logPath || debugLogBroken) return;
	try {
		appendFileSync(logPath, `[${timestamp()}] ${message}\n`);
	} catch {
		// The screen may belong to the pager, so give up on the log instead of printing
		debugLogBroken = true;
	}
}
