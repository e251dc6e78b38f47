import { describe, expect, it } from "vitest";
import { Document, type Line, lineText } from "../src/core/document.js";
import { buildPattern, DEFAULT_PATTERN_OPTIONS } from "../src/core/pattern.js";
import { applySearchOverlay, SearchState, searchStyle } from "../src/core/search.js";
import { getPalette } from "../src/theme/theme.js";

const style = searchStyle(getPalette("dark"));

function pattern(text: string) {
	return buildPattern(text, DEFAULT_PATTERN_OPTIONS);
}

describe("SearchState", () => {
	it("records byte offsets of every match", () => {
		const state = new SearchState(pattern("b"));
		state.findMatches(Document.fromText("abc\nébé", "x", "UTF-8"));
		expect(state.matches).toEqual([
			{ lineIndex: 0, startByte: 1, endByte: 2 },
			{ lineIndex: 1, startByte: 2, endByte: 3 },
		]);
		expect(state.matchCount).toBe(2);
	});

	it("cycles forward and backward through matches", () => {
		const state = new SearchState(pattern("x"));
		state.findMatches(Document.fromText("x\na\nx\nx", "x", "UTF-8"));
		expect(state.currentMatchDisplay).toBeUndefined();
		expect(state.nextMatch()).toBe(0);
		expect(state.nextMatch()).toBe(2);
		expect(state.nextMatch()).toBe(3);
		expect(state.nextMatch()).toBe(0);
		expect(state.prevMatch()).toBe(3);
		expect(state.currentMatchDisplay).toBe(3);
	});

	it("starts backward navigation at the last match", () => {
		const state = new SearchState(pattern("x"));
		state.findMatches(Document.fromText("x\nx", "x", "UTF-8"));
		expect(state.prevMatch()).toBe(1);
	});

	it("navigates nowhere without matches", () => {
		const state = new SearchState(pattern("zzz"));
		state.findMatches(Document.fromText("abc", "x", "UTF-8"));
		expect(state.nextMatch()).toBeUndefined();
		expect(state.prevMatch()).toBeUndefined();
	});
});

describe("applySearchOverlay", () => {
	it("splits spans at match boundaries and keeps the outer style", () => {
		const line: Line = {
			number: 1,
			spans: [
				{ text: "let ", style: { fg: "magenta" } },
				{ text: "value", style: { fg: "red" } },
			],
			isMatch: false,
			isContext: false,
		};
		const doc = new Document([line], "x", "UTF-8");
		const result = applySearchOverlay(doc, pattern("t va"), style);
		expect(result.lines[0]?.spans).toEqual([
			{ text: "le", style: { fg: "magenta" } },
			{ text: "t ", style },
			{ text: "va", style },
			{ text: "lue", style: { fg: "red" } },
		]);
	});

	it("keeps the text of every line", () => {
		const doc = Document.fromText("日本語 text\nnone here\n日本", "x", "UTF-8");
		const result = applySearchOverlay(doc, pattern("本"), style);
		expect(result.lines.map(lineText)).toEqual(doc.lines.map(lineText));
		expect(result.lines[0]?.spans).toEqual([
			{ text: "日", style: {} },
			{ text: "本", style },
			{ text: "語 text", style: {} },
		]);
	});

	it("leaves the document as it was when nothing matches", () => {
		const doc = Document.fromText("alpha\nbeta", "x", "UTF-8");
		const result = applySearchOverlay(doc, pattern("zzz"), style);
		expect(result.lines).toEqual(doc.lines);
	});

	it("uses the palette's search colors in bold", () => {
		expect(style).toEqual({ fg: "black", bg: "yellow", bold: true });
	});
});
