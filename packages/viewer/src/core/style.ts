/**
 * Span styles: optional foreground and background colors plus three attributes.
 */

/** The eight ANSI colors plus bright black, which terminals show as dark gray */
export type NamedColor = "black" | "red" | "green" | "yellow" | "blue" | "magenta" | "cyan" | "white" | "darkGray";

/** 24-bit color, each channel 0..255 */
export interface RgbValue {
	readonly r: number;
	readonly g: number;
	readonly b: number;
}

export type Color = NamedColor | RgbValue;

export interface SpanStyle {
	readonly fg?: Color;
	readonly bg?: Color;
	readonly bold?: boolean;
	readonly italic?: boolean;
	readonly underline?: boolean;
}

export const PLAIN: SpanStyle = {};

export function rgb(r: number, g: number, b: number): RgbValue {
	return { r, g, b };
}

export function colorsEqual(a: Color | undefined, b: Color | undefined): boolean {
	if (a === undefined || b === undefined) {
		return a === b;
	}
	if (typeof a === "string" || typeof b === "string") {
		return a === b;
	}
	return a.r === b.r && a.g === b.g && a.b === b.b;
}

export function stylesEqual(a: SpanStyle, b: SpanStyle): boolean {
	return (
		colorsEqual(a.fg, b.fg) &&
		colorsEqual(a.bg, b.bg) &&
		(a.bold ?? false) === (b.bold ?? false) &&
		(a.italic ?? false) === (b.italic ?? false) &&
		(a.underline ?? false) === (b.underline ?? false)
	);
}

/** A style is plain when it sets no color and no attribute */
export function isPlainStyle(style: SpanStyle): boolean {
	return style.fg === undefined && style.bg === undefined && !style.bold && !style.italic && !style.underline;
}

/**
 * Compose a child style onto its parent: colors set on the child win,
 * attributes accumulate.
 */
export function mergeStyle(parent: SpanStyle, child: SpanStyle): SpanStyle {
	const merged: {
		fg?: Color;
		bg?: Color;
		bold?: boolean;
		italic?: boolean;
		underline?: boolean;
	} = {};
	const fg = child.fg ?? parent.fg;
	const bg = child.bg ?? parent.bg;
	if (fg !== undefined) merged.fg = fg;
	if (bg !== undefined) merged.bg = bg;
	if (parent.bold || child.bold) merged.bold = true;
	if (parent.italic || child.italic) merged.italic = true;
	if (parent.underline || child.underline) merged.underline = true;
	return merged;
}
