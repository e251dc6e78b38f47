import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

// =============================================================================
// Package Detection
// =============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// =============================================================================
// Package Asset Paths (shipped with executable)
// =============================================================================

/**
 * Get the base directory for resolving package assets (themes, language table, package.json).
 * Walks up from this module until a package.json is found, so it works from
 * both src/ (tsx, vitest) and dist/ (built binary).
 */
export function getPackageDir(): string {
	// Allow override via environment variable
	const envDir = process.env.MAT_PACKAGE_DIR;
	if (envDir) {
		if (envDir === "~") return homedir();
		if (envDir.startsWith("~/")) return homedir() + envDir.slice(1);
		return envDir;
	}

	let dir = __dirname;
	while (dir !== dirname(dir)) {
		if (existsSync(join(dir, "package.json"))) {
			return dir;
		}
		dir = dirname(dir);
	}
	return __dirname;
}

/** Directory holding the bundled theme set and language table */
export function getAssetsDir(): string {
	return join(getPackageDir(), "assets");
}

export function getThemesDir(): string {
	return join(getAssetsDir(), "themes");
}

// =============================================================================
// App Config (from package.json)
// =============================================================================

function readPackageJson(): { name: string; version: string } {
	const parsed: unknown = JSON.parse(readFileSync(join(getPackageDir(), "package.json"), "utf-8"));
	if (typeof parsed !== "object" || parsed === null) {
		return { name: "mat", version: "0.0.0" };
	}
	const name = "name" in parsed && typeof parsed.name === "string" ? parsed.name : "mat";
	const version = "version" in parsed && typeof parsed.version === "string" ? parsed.version : "0.0.0";
	return { name, version };
}

const pkg = readPackageJson();

export const APP_NAME: string = pkg.name;
export const VERSION: string = pkg.version;

/** Default tab stop used when expanding tabs on input */
export const TAB_WIDTH = 4;

/** Default value of --max-width for truncate mode */
export const DEFAULT_MAX_WIDTH = 200;

/** Interval between follow-mode polls */
export const FOLLOW_POLL_INTERVAL_MS = 100;
