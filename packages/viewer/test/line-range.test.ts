import { describe, expect, it } from "vitest";
import { Document, lineText } from "../src/core/document.js";
import { applyLineRange, parseLineRange } from "../src/core/line-range.js";

describe("parseLineRange", () => {
	it("parses every form", () => {
		expect(parseLineRange("3:5", 10)).toEqual({ start: 3, end: 5 });
		expect(parseLineRange(":3", 10)).toEqual({ start: 1, end: 3 });
		expect(parseLineRange("4:", 10)).toEqual({ start: 4, end: 10 });
		expect(parseLineRange("2", 10)).toEqual({ start: 2, end: 2 });
	});

	it("clamps an end past the document", () => {
		expect(parseLineRange("5:100", 10)).toEqual({ start: 5, end: 10 });
	});

	it("ignores surrounding whitespace", () => {
		expect(parseLineRange(" 2:4 ", 10)).toEqual({ start: 2, end: 4 });
	});

	it("accepts an explicit plus sign on a bound", () => {
		expect(parseLineRange("+2:+4", 10)).toEqual({ start: 2, end: 4 });
		expect(parseLineRange("+7", 10)).toEqual({ start: 7, end: 7 });
		expect(() => parseLineRange("++2", 10)).toThrow("Invalid line range format");
	});

	it("rejects zero, reversed and non-numeric ranges", () => {
		for (const range of ["0:3", "3:0", "5:3", "a:b", "1-3", "-1:2", "0", "11"]) {
			expect(() => parseLineRange(range, 10), range).toThrow("Invalid line range format");
		}
	});

	it("names the range in the message", () => {
		expect(() => parseLineRange("x", 10)).toThrow(
			"Invalid line range format: 'x'. Expected formats: X:Y, :Y, X:, or X",
		);
	});
});

describe("applyLineRange", () => {
	it("keeps lines inside the range", () => {
		const text = Array.from({ length: 10 }, (_, i) => `Line ${i + 1}`).join("\n");
		const doc = applyLineRange(Document.fromText(text, "x", "UTF-8"), { start: 3, end: 5 });
		expect(doc.lines.map(lineText)).toEqual(["Line 3", "Line 4", "Line 5"]);
		expect(doc.lines.map((line) => line.number)).toEqual([3, 4, 5]);
	});
});
