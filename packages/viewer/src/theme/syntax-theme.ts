import * as fs from "node:fs";
import * as path from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { TypeCompiler } from "@sinclair/typebox/compiler";
import { getThemesDir } from "../config.js";
import { errorMessage } from "../errors.js";
import { type Color, type RgbValue, rgb, type SpanStyle } from "../core/style.js";
import type { ThemeMode } from "./theme.js";

// ============================================================================
// Types & Schema
// ============================================================================

const HexColorSchema = Type.String({ pattern: "^#[0-9a-fA-F]{6}$" });

const ScopeStyleSchema = Type.Object({
	color: Type.Optional(HexColorSchema),
	bold: Type.Optional(Type.Boolean()),
	italic: Type.Optional(Type.Boolean()),
	underline: Type.Optional(Type.Boolean()),
});

const SyntaxThemeJsonSchema = Type.Object({
	$schema: Type.Optional(Type.String()),
	name: Type.String(),
	foreground: HexColorSchema,
	// Keyed by highlight.js scope, e.g. "keyword", "title.function", "meta.string"
	scopes: Type.Record(Type.String(), ScopeStyleSchema),
});

type ScopeStyleJson = Static<typeof ScopeStyleSchema>;
type SyntaxThemeJson = Static<typeof SyntaxThemeJsonSchema>;

const validateSyntaxThemeJson = TypeCompiler.Compile(SyntaxThemeJsonSchema);

// ============================================================================
// Loading
// ============================================================================

export const SYNTAX_THEME_FILES: Record<ThemeMode, string> = {
	dark: "dark.json",
	light: "light.json",
};

function parseSyntaxThemeJson(label: string, json: unknown): SyntaxThemeJson {
	if (!validateSyntaxThemeJson.Check(json)) {
		const errors = Array.from(validateSyntaxThemeJson.Errors(json));
		const details = errors.map((e) => `  - ${e.path || "/"}: ${e.message}`).join("\n");
		throw new Error(`Invalid syntax theme "${label}":\n${details}`);
	}
	return json;
}

export function parseSyntaxThemeContent(label: string, content: string): SyntaxThemeJson {
	let json: unknown;
	try {
		json = JSON.parse(content);
	} catch (error) {
		throw new Error(`Failed to parse syntax theme ${label}: ${errorMessage(error)}`);
	}
	return parseSyntaxThemeJson(label, json);
}

function hexToRgb(hex: string): RgbValue {
	const value = Number.parseInt(hex.slice(1), 16);
	return rgb((value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff);
}

function toSpanStyle(scope: ScopeStyleJson): SpanStyle {
	const style: { fg?: Color; bold?: boolean; italic?: boolean; underline?: boolean } = {};
	if (scope.color) style.fg = hexToRgb(scope.color);
	if (scope.bold) style.bold = true;
	if (scope.italic) style.italic = true;
	if (scope.underline) style.underline = true;
	return style;
}

/**
 * A theme from the bundled theme set, resolved to span styles.
 */
export class SyntaxTheme {
	readonly name: string;
	readonly base: SpanStyle;
	private scopes: Map<string, SpanStyle>;

	constructor(json: SyntaxThemeJson) {
		this.name = json.name;
		this.base = { fg: hexToRgb(json.foreground) };
		this.scopes = new Map(Object.entries(json.scopes).map(([scope, style]) => [scope, toSpanStyle(style)]));
	}

	/**
	 * Style for a highlight.js class attribute such as "hljs-title function_".
	 * The most specific scope the theme defines wins ("title.function" before "title").
	 * Undefined when the class names no scope the theme knows.
	 */
	styleForClass(className: string): SpanStyle | undefined {
		const [first, ...modifiers] = className.split(/\s+/).filter((name) => name.length > 0);
		if (!first?.startsWith("hljs-")) {
			return undefined;
		}
		const parts = [first.slice("hljs-".length), ...modifiers.map((m) => m.replace(/_+$/, ""))];
		for (let count = parts.length; count > 0; count--) {
			const style = this.scopes.get(parts.slice(0, count).join("."));
			if (style) {
				return style;
			}
		}
		return undefined;
	}
}

const themeCache = new Map<ThemeMode, SyntaxTheme>();

/** Load (once per process) the syntax theme for a mode from the assets directory */
export function loadSyntaxTheme(mode: ThemeMode): SyntaxTheme {
	const cached = themeCache.get(mode);
	if (cached) {
		return cached;
	}
	const themePath = path.join(getThemesDir(), SYNTAX_THEME_FILES[mode]);
	const content = fs.readFileSync(themePath, "utf-8");
	const theme = new SyntaxTheme(parseSyntaxThemeContent(themePath, content));
	themeCache.set(mode, theme);
	return theme;
}
