import { Chalk, type ChalkInstance } from "chalk";
import type { StyledSpan } from "../../core/document.js";
import { type Color, isPlainStyle, type NamedColor, type SpanStyle } from "../../core/style.js";

// The pager owns a full-screen terminal, so it always emits 24-bit color
const chalk = new Chalk({ level: 3 });

const FOREGROUND: Record<NamedColor, (c: ChalkInstance) => ChalkInstance> = {
	black: (c) => c.black,
	red: (c) => c.red,
	green: (c) => c.green,
	yellow: (c) => c.yellow,
	blue: (c) => c.blue,
	magenta: (c) => c.magenta,
	cyan: (c) => c.cyan,
	white: (c) => c.white,
	darkGray: (c) => c.gray,
};

const BACKGROUND: Record<NamedColor, (c: ChalkInstance) => ChalkInstance> = {
	black: (c) => c.bgBlack,
	red: (c) => c.bgRed,
	green: (c) => c.bgGreen,
	yellow: (c) => c.bgYellow,
	blue: (c) => c.bgBlue,
	magenta: (c) => c.bgMagenta,
	cyan: (c) => c.bgCyan,
	white: (c) => c.bgWhite,
	darkGray: (c) => c.bgGray,
};

function withForeground(c: ChalkInstance, color: Color): ChalkInstance {
	return typeof color === "string" ? FOREGROUND[color](c) : c.rgb(color.r, color.g, color.b);
}

function withBackground(c: ChalkInstance, color: Color): ChalkInstance {
	return typeof color === "string" ? BACKGROUND[color](c) : c.bgRgb(color.r, color.g, color.b);
}

/** Wrap text in the SGR sequences for a span style */
export function paint(text: string, style: SpanStyle): string {
	if (text.length === 0 || isPlainStyle(style)) {
		return text;
	}
	let c: ChalkInstance = chalk;
	if (style.fg !== undefined) c = withForeground(c, style.fg);
	if (style.bg !== undefined) c = withBackground(c, style.bg);
	if (style.bold) c = c.bold;
	if (style.italic) c = c.italic;
	if (style.underline) c = c.underline;
	return c(text);
}

export function paintSpans(spans: readonly StyledSpan[]): string {
	let out = "";
	for (const span of spans) {
		out += paint(span.text, span.style);
	}
	return out;
}
