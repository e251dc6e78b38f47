import { ViewerError } from "../errors.js";
import type { Document } from "./document.js";

/** Inclusive 1-based line range */
export interface LineRange {
	start: number;
	end: number;
}

function parseBound(text: string, range: string): number {
	if (!/^\+?\d+$/.test(text)) {
		throw new ViewerError({ kind: "invalidLineRange", range });
	}
	return Number.parseInt(text, 10);
}

/**
 * Parse `X:Y`, `:Y`, `X:` or `X` against a document of `total` lines.
 * An empty start means 1 and an empty end means `total`; an end past the
 * document is clamped, and a single `X` must name an existing line.
 */
export function parseLineRange(range: string, total: number): LineRange {
	const trimmed = range.trim();
	if (trimmed.length === 0) {
		throw new ViewerError({ kind: "invalidLineRange", range: trimmed });
	}

	const colon = trimmed.indexOf(":");
	if (colon === -1) {
		const line = parseBound(trimmed, trimmed);
		if (line === 0 || line > total) {
			throw new ViewerError({ kind: "invalidLineRange", range: trimmed });
		}
		return { start: line, end: line };
	}

	const startText = trimmed.slice(0, colon).trim();
	const endText = trimmed.slice(colon + 1).trim();
	const start = startText.length === 0 ? 1 : parseBound(startText, trimmed);
	const end = endText.length === 0 ? total : parseBound(endText, trimmed);
	if (start === 0 || end === 0 || start > end) {
		throw new ViewerError({ kind: "invalidLineRange", range: trimmed });
	}
	return { start, end: Math.min(end, total) };
}

/** Keep the lines whose number falls inside the range */
export function applyLineRange(document: Document, range: LineRange): Document {
	return document.withLines(document.lines.filter((line) => line.number >= range.start && line.number <= range.end));
}
