import type { ThemeColors } from "../theme/theme.js";
import { type Document, type Line, lineText, type StyledSpan, styledSpan } from "./document.js";
import { matchRanges } from "./pattern.js";
import type { SpanStyle } from "./style.js";

/**
 * One match: the index of its line in the document and the UTF-8 byte range
 * it covers within the line's text.
 */
export interface MatchPosition {
	lineIndex: number;
	startByte: number;
	endByte: number;
}

function byteOffset(text: string, index: number): number {
	return Buffer.byteLength(text.slice(0, index), "utf8");
}

/**
 * Compiled search pattern with its matches and a cursor for n/N navigation.
 */
export class SearchState {
	readonly pattern: RegExp;
	matches: MatchPosition[] = [];
	currentMatch: number | undefined;

	constructor(pattern: RegExp) {
		this.pattern = pattern;
	}

	findMatches(document: Document): void {
		this.matches = [];
		document.lines.forEach((line, lineIndex) => {
			const text = lineText(line);
			for (const [start, end] of matchRanges(this.pattern, text)) {
				this.matches.push({ lineIndex, startByte: byteOffset(text, start), endByte: byteOffset(text, end) });
			}
		});
	}

	get matchCount(): number {
		return this.matches.length;
	}

	/** 1-based number of the current match, for the status bar */
	get currentMatchDisplay(): number | undefined {
		return this.currentMatch === undefined ? undefined : this.currentMatch + 1;
	}

	/** Advance cyclically; returns the line index of the new current match */
	nextMatch(): number | undefined {
		if (this.matches.length === 0) {
			return undefined;
		}
		const next = this.currentMatch === undefined ? 0 : (this.currentMatch + 1) % this.matches.length;
		this.currentMatch = next;
		return this.matches[next]?.lineIndex;
	}

	prevMatch(): number | undefined {
		if (this.matches.length === 0) {
			return undefined;
		}
		const prev =
			this.currentMatch === undefined || this.currentMatch === 0 ? this.matches.length - 1 : this.currentMatch - 1;
		this.currentMatch = prev;
		return this.matches[prev]?.lineIndex;
	}
}

export function searchStyle(palette: Pick<ThemeColors, "searchBg" | "searchFg">): SpanStyle {
	return { fg: palette.searchFg, bg: palette.searchBg, bold: true };
}

function overlayLine(line: Line, ranges: ReadonlyArray<readonly [number, number]>, style: SpanStyle): Line {
	const spans: StyledSpan[] = [];
	let offset = 0;
	for (const span of line.spans) {
		const spanStart = offset;
		const spanEnd = offset + span.text.length;
		let last = 0;
		for (const [start, end] of ranges) {
			if (end <= spanStart || start >= spanEnd) continue;
			const from = Math.max(start - spanStart, 0);
			const to = Math.min(end - spanStart, span.text.length);
			if (from > last) {
				spans.push(styledSpan(span.text.slice(last, from), span.style));
			}
			if (to > from) {
				spans.push(styledSpan(span.text.slice(from, to), style));
			}
			last = Math.max(last, to);
		}
		if (last < span.text.length) {
			spans.push(styledSpan(span.text.slice(last), span.style));
		}
		offset = spanEnd;
	}
	return { ...line, spans };
}

/**
 * Restyle every match of the pattern with the search style. Text is unchanged,
 * and spans are split only at match boundaries, so text outside a match keeps
 * its style. Lines without a match are shared with the input document.
 */
export function applySearchOverlay(document: Document, pattern: RegExp, style: SpanStyle): Document {
	const lines = document.lines.map((line) => {
		const ranges = matchRanges(pattern, lineText(line)).filter(([start, end]) => end > start);
		return ranges.length > 0 ? overlayLine(line, ranges, style) : line;
	});
	return document.withLines(lines);
}
