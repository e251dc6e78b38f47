import { errorMessage, ViewerError } from "../errors.js";

export interface PatternOptions {
	ignoreCase: boolean;
	fixedStrings: boolean;
	wordRegexp: boolean;
	lineRegexp: boolean;
}

export const DEFAULT_PATTERN_OPTIONS: PatternOptions = {
	ignoreCase: false,
	fixedStrings: false,
	wordRegexp: false,
	lineRegexp: false,
};

export function escapeRegex(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Unicode word characters: letters, marks, decimal digits, connector punctuation
const WORD = "[\\p{Alphabetic}\\p{M}\\p{Nd}\\p{Pc}\\p{Join_Control}]";
const WORD_BOUNDARY = `(?:(?<=${WORD})(?!${WORD})|(?<!${WORD})(?=${WORD}))`;
const NOT_WORD_BOUNDARY = `(?:(?<=${WORD})(?=${WORD})|(?<!${WORD})(?!${WORD}))`;
const WORD_START = `(?<!${WORD})(?=${WORD})`;
const WORD_END = `(?<=${WORD})(?!${WORD})`;

// Characters a `u`-flag RegExp accepts after a backslash as themselves
const SYNTAX_CHARACTERS = new Set("^$\\.*+?()[]{}|/");

function isAsciiPunctuation(ch: string): boolean {
	return /^[!-/:-@[-`{-~]$/.test(ch);
}

/**
 * Rewrite escapes the `u` flag rejects or reads differently. `\b`, `\B`,
 * `\<` and `\>` become Unicode-aware assertions; other escaped ASCII
 * punctuation such as `\-` or `\:` becomes the bare character. Inside a
 * class only `\-` keeps its backslash.
 */
function normalizeEscapes(source: string): string {
	let result = "";
	let inClass = false;
	for (let i = 0; i < source.length; i++) {
		const ch = source.charAt(i);
		if (ch === "\\" && i + 1 < source.length) {
			const next = source.charAt(++i);
			if (!inClass && next === "b") {
				result += WORD_BOUNDARY;
			} else if (!inClass && next === "B") {
				result += NOT_WORD_BOUNDARY;
			} else if (!inClass && next === "<") {
				result += WORD_START;
			} else if (!inClass && next === ">") {
				result += WORD_END;
			} else if (isAsciiPunctuation(next) && !SYNTAX_CHARACTERS.has(next) && !(inClass && next === "-")) {
				result += next;
			} else {
				result += ch + next;
			}
			continue;
		}
		if (ch === "[" && !inClass) {
			inClass = true;
		} else if (ch === "]" && inClass) {
			inClass = false;
		}
		result += ch;
	}
	return result;
}

/**
 * Compile a user pattern. Transformations apply in a fixed order: quote
 * metacharacters, wrap in word boundaries, anchor to the whole line, then
 * make the match case-insensitive.
 */
export function buildPattern(pattern: string, options: PatternOptions): RegExp {
	if (pattern.length === 0) {
		throw new ViewerError({ kind: "emptyPattern" });
	}

	let source = normalizeEscapes(options.fixedStrings ? escapeRegex(pattern) : pattern);
	if (options.wordRegexp) {
		source = `${WORD_BOUNDARY}${source}${WORD_BOUNDARY}`;
	}
	if (options.lineRegexp) {
		source = `^${source}$`;
	}
	const flags = options.ignoreCase ? "giu" : "gu";

	try {
		return new RegExp(source, flags);
	} catch (error) {
		throw new ViewerError({ kind: "invalidRegex", pattern, cause: errorMessage(error) });
	}
}

/** Whether the pattern matches anywhere in the text. Ignores and keeps `lastIndex`. */
export function matchesText(pattern: RegExp, text: string): boolean {
	return text.search(pattern) !== -1;
}

/** Non-overlapping matches as UTF-16 index ranges, empty matches included */
export function matchRanges(pattern: RegExp, text: string): Array<[start: number, end: number]> {
	const ranges: Array<[number, number]> = [];
	for (const match of text.matchAll(pattern)) {
		ranges.push([match.index, match.index + match[0].length]);
	}
	return ranges;
}
