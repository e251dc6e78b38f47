import type { ThemeColors } from "../theme/theme.js";
import { type Document, type Line, lineText, styledSpan } from "./document.js";
import { matchesText } from "./pattern.js";

export interface GrepOptions {
	pattern: RegExp;
	before: number;
	after: number;
}

/** Half-open range of line indices */
export interface LineWindow {
	start: number;
	end: number;
}

/** Context counts from -A, -B and -C; a -C value sets both sides */
export function resolveContext(after: number | undefined, before: number | undefined, context: number | undefined): { before: number; after: number } {
	if (context !== undefined) {
		return { before: context, after: context };
	}
	return { before: before ?? 0, after: after ?? 0 };
}

/** Sort windows and merge those that overlap or touch */
export function mergeWindows(windows: readonly LineWindow[]): LineWindow[] {
	const sorted = [...windows].sort((a, b) => a.start - b.start || a.end - b.end);
	const merged: LineWindow[] = [];
	for (const window of sorted) {
		const last = merged[merged.length - 1];
		if (last && window.start <= last.end) {
			last.end = Math.max(last.end, window.end);
		} else {
			merged.push({ start: window.start, end: window.end });
		}
	}
	return merged;
}

/**
 * Keep matching lines plus their context. Disjoint windows are separated by a
 * "--" row numbered 0. Context rows are redrawn as a single dim span.
 */
export function grepDocument(document: Document, options: GrepOptions, palette: Pick<ThemeColors, "contextFg" | "separator">): Document {
	const total = document.lines.length;
	const matched = new Set<number>();
	const windows: LineWindow[] = [];
	document.lines.forEach((line, index) => {
		if (matchesText(options.pattern, lineText(line))) {
			matched.add(index);
			windows.push({ start: Math.max(0, index - options.before), end: Math.min(total, index + options.after + 1) });
		}
	});

	if (matched.size === 0) {
		return document.withLines([]);
	}

	const lines: Line[] = [];
	for (const [i, window] of mergeWindows(windows).entries()) {
		if (i > 0) {
			lines.push({ number: 0, spans: [styledSpan("--", { fg: palette.separator })], isMatch: false, isContext: false });
		}
		for (let index = window.start; index < window.end; index++) {
			const line = document.lines[index];
			if (!line) continue;
			if (matched.has(index)) {
				lines.push({ ...line, spans: [...line.spans], isMatch: true, isContext: false });
			} else {
				const text = lineText(line);
				lines.push({
					number: line.number,
					spans: text.length > 0 ? [styledSpan(text, { fg: palette.contextFg })] : [],
					isMatch: false,
					isContext: true,
				});
			}
		}
	}
	return document.withLines(lines);
}
