import type { RgbColor } from "mat-tui";
import { errorMessage } from "../errors.js";
import { logDebug } from "../log.js";
import { type Color, rgb } from "../core/style.js";

export type ThemeMode = "light" | "dark";

/** Colors the viewer draws with outside of syntax coloring */
export interface ThemeColors {
	lineNumber: Color;
	statusBg: Color;
	statusFg: Color;
	searchBg: Color;
	searchFg: Color;
	matchLineBg: Color;
	contextFg: Color;
	separator: Color;
	error: Color;
}

const LIGHT_PALETTE: ThemeColors = {
	lineNumber: "darkGray",
	statusBg: rgb(200, 200, 200),
	statusFg: "black",
	searchBg: "yellow",
	searchFg: "black",
	matchLineBg: rgb(255, 255, 200),
	contextFg: "darkGray",
	separator: "darkGray",
	error: "red",
};

const DARK_PALETTE: ThemeColors = {
	lineNumber: "darkGray",
	statusBg: "darkGray",
	statusFg: "white",
	searchBg: "yellow",
	searchFg: "black",
	matchLineBg: rgb(50, 50, 30),
	contextFg: "darkGray",
	separator: "darkGray",
	error: "red",
};

export function getPalette(mode: ThemeMode): ThemeColors {
	return mode === "light" ? LIGHT_PALETTE : DARK_PALETTE;
}

/** Case-insensitive "light" or "dark"; anything else is undefined */
export function parseThemeMode(name: string): ThemeMode | undefined {
	const lower = name.toLowerCase();
	if (lower === "light" || lower === "dark") {
		return lower;
	}
	return undefined;
}

export function isLightBackground(color: RgbColor): boolean {
	const luminance = 0.2126 * color.r + 0.7152 * color.g + 0.0722 * color.b;
	return luminance > 0.5;
}

/**
 * COLORFGBG is "fg;bg" (some terminals add a middle field); a background
 * index below 8 is one of the dark ANSI colors.
 */
export function themeFromColorFgBg(value: string | undefined): ThemeMode | undefined {
	if (!value) {
		return undefined;
	}
	const parts = value.split(";");
	if (parts.length < 2) {
		return undefined;
	}
	const bg = Number.parseInt(parts[parts.length - 1] ?? "", 10);
	if (Number.isNaN(bg)) {
		return undefined;
	}
	return bg < 8 ? "dark" : "light";
}

export interface ThemeDetectionOptions {
	/** Asks the terminal for its background; omitted when there is no terminal to ask */
	queryBackground?: () => Promise<RgbColor | undefined>;
	env?: NodeJS.ProcessEnv;
}

/**
 * Pick the theme: an explicit choice wins, then the terminal's reported
 * background, then COLORFGBG, then dark.
 */
export async function resolveTheme(explicit: ThemeMode | undefined, options: ThemeDetectionOptions = {}): Promise<ThemeMode> {
	if (explicit) {
		return explicit;
	}

	if (options.queryBackground) {
		try {
			const color = await options.queryBackground();
			if (color) {
				return isLightBackground(color) ? "light" : "dark";
			}
		} catch (error) {
			logDebug(`Background color query failed: ${errorMessage(error)}`);
		}
	}

	const env = options.env ?? process.env;
	return themeFromColorFgBg(env.COLORFGBG) ?? "dark";
}
