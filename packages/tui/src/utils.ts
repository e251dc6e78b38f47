import { eastAsianWidth } from "get-east-asian-width";

// Combining marks, joiners, variation selectors and control characters occupy no cell
const zeroWidthRegex = /^[\p{Default_Ignorable_Code_Point}\p{Control}\p{Mark}]$/u;

// SGR and other CSI sequences, plus OSC strings terminated by BEL or ST
const ansiRegex = /\x1b\[[0-9;?]*[A-Za-z]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/g;

// Cache for non-ASCII strings
const WIDTH_CACHE_SIZE = 512;
const widthCache = new Map<string, number>();

/**
 * Display width of a single character (one code point) in terminal cells.
 * East Asian ambiguous characters count as one cell.
 */
export function charWidth(char: string): number {
	const cp = char.codePointAt(0);
	if (cp === undefined) {
		return 0;
	}
	if (cp < 0x7f) {
		return cp < 0x20 ? 0 : 1;
	}
	if (zeroWidthRegex.test(char)) {
		return 0;
	}
	return eastAsianWidth(cp);
}

/**
 * Display width of plain text (no escape sequences), summed per character.
 */
export function textWidth(text: string): number {
	let isPureAscii = true;
	for (let i = 0; i < text.length; i++) {
		const code = text.charCodeAt(i);
		if (code < 0x20 || code > 0x7e) {
			isPureAscii = false;
			break;
		}
	}
	if (isPureAscii) {
		return text.length;
	}

	const cached = widthCache.get(text);
	if (cached !== undefined) {
		return cached;
	}

	let width = 0;
	for (const char of text) {
		width += charWidth(char);
	}

	if (widthCache.size >= WIDTH_CACHE_SIZE) {
		const firstKey = widthCache.keys().next().value;
		if (firstKey !== undefined) {
			widthCache.delete(firstKey);
		}
	}
	widthCache.set(text, width);
	return width;
}

/**
 * Remove terminal escape sequences from a rendered string.
 */
export function stripAnsi(str: string): string {
	return str.includes("\x1b") ? str.replace(ansiRegex, "") : str;
}

/**
 * Calculate the visible width of a rendered string in terminal columns.
 */
export function visibleWidth(str: string): number {
	if (str.length === 0) {
		return 0;
	}
	return textWidth(stripAnsi(str));
}

/**
 * Take characters from the start of plain text while they fit in `maxWidth` columns.
 * A wide character that would cross the limit is left out entirely.
 */
export function takeWidth(text: string, maxWidth: number): { text: string; width: number } {
	let result = "";
	let width = 0;
	for (const char of text) {
		const w = charWidth(char);
		if (width + w > maxWidth) {
			break;
		}
		result += char;
		width += w;
	}
	return { text: result, width };
}

/**
 * Cut plain text to `maxWidth` columns, then pad it with spaces to exactly that width.
 */
export function fitToWidth(text: string, maxWidth: number): string {
	const taken = takeWidth(text, maxWidth);
	return taken.text + " ".repeat(Math.max(0, maxWidth - taken.width));
}
