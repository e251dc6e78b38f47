import { describe, expect, it } from "vitest";
import { Document, lineText } from "../src/core/document.js";
import { grepDocument, mergeWindows, resolveContext } from "../src/core/grep.js";
import { buildPattern, DEFAULT_PATTERN_OPTIONS } from "../src/core/pattern.js";
import { getPalette } from "../src/theme/theme.js";

const palette = getPalette("dark");

function grep(text: string, pattern: string, before = 0, after = 0, wordRegexp = false): Document {
	const document = Document.fromText(text, "input.txt", "UTF-8");
	return grepDocument(
		document,
		{ pattern: buildPattern(pattern, { ...DEFAULT_PATTERN_OPTIONS, wordRegexp }), before, after },
		palette,
	);
}

describe("grepDocument", () => {
	it("keeps matching lines with their original numbers", () => {
		const result = grep("test\ntesting\na test here\n", "test", 0, 0, true);
		expect(result.lines.map(lineText)).toEqual(["test", "a test here"]);
		expect(result.lines.map((line) => line.number)).toEqual([1, 3]);
		expect(result.lines.every((line) => line.isMatch)).toBe(true);
	});

	it("separates disjoint context windows", () => {
		const result = grep("a\nb\nMATCH1\nc\nd\ne\nMATCH2\nf\n", "MATCH", 1, 1);
		expect(result.lines.map(lineText)).toEqual(["b", "MATCH1", "c", "--", "e", "MATCH2", "f"]);
		expect(result.lines.map((line) => line.number)).toEqual([2, 3, 4, 0, 6, 7, 8]);
	});

	it("merges windows that touch into one", () => {
		const result = grep("a\nb\nMATCH1\nc\nd\ne\nMATCH2\nf\n", "MATCH", 1, 2);
		expect(result.lines.map(lineText)).toEqual(["b", "MATCH1", "c", "d", "e", "MATCH2", "f"]);
	});

	it("redraws context lines as one dim span", () => {
		const result = grep("before\nhit\n", "hit", 1, 0);
		expect(result.lines[0]).toEqual({
			number: 1,
			spans: [{ text: "before", style: { fg: palette.contextFg } }],
			isMatch: false,
			isContext: true,
		});
	});

	it("styles separators with the separator color", () => {
		const result = grep("x\na\nb\nc\nx\n", "x");
		expect(result.lines[1]?.spans).toEqual([{ text: "--", style: { fg: palette.separator } }]);
	});

	it("returns an empty document when nothing matches", () => {
		const result = grep("one\ntwo\n", "three");
		expect(result.lineCount).toBe(0);
		expect(result.sourceName).toBe("input.txt");
	});

	it("clamps windows to the document", () => {
		const result = grep("hit\nb\n", "hit", 5, 5);
		expect(result.lines.map(lineText)).toEqual(["hit", "b"]);
	});
});

describe("mergeWindows", () => {
	it("merges overlapping and adjacent windows", () => {
		expect(
			mergeWindows([
				{ start: 7, end: 9 },
				{ start: 0, end: 3 },
				{ start: 3, end: 5 },
			]),
		).toEqual([
			{ start: 0, end: 5 },
			{ start: 7, end: 9 },
		]);
	});

	it("leaves disjoint sorted windows unchanged", () => {
		const windows = [
			{ start: 0, end: 2 },
			{ start: 4, end: 6 },
		];
		expect(mergeWindows(windows)).toEqual(windows);
		expect(mergeWindows(mergeWindows(windows))).toEqual(windows);
	});
});

describe("resolveContext", () => {
	it("lets -C override -A and -B", () => {
		expect(resolveContext(1, 2, 5)).toEqual({ before: 5, after: 5 });
	});

	it("defaults missing sides to zero", () => {
		expect(resolveContext(1, undefined, undefined)).toEqual({ before: 0, after: 1 });
	});
});
