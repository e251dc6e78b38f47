import { describe, expect, it } from "vitest";
import { buildPattern, DEFAULT_PATTERN_OPTIONS, matchesText, matchRanges } from "../src/core/pattern.js";
import { ViewerError } from "../src/errors.js";

const options = DEFAULT_PATTERN_OPTIONS;

describe("buildPattern", () => {
	it("quotes metacharacters for fixed strings", () => {
		const pattern = buildPattern("test[0]", { ...options, fixedStrings: true });
		expect(matchesText(pattern, "value test[0] here")).toBe(true);
		expect(matchesText(pattern, "test0")).toBe(false);
	});

	it("matches whole words", () => {
		const pattern = buildPattern("test", { ...options, wordRegexp: true });
		expect(matchesText(pattern, "a test here")).toBe(true);
		expect(matchesText(pattern, "testing")).toBe(false);
	});

	it("matches whole lines", () => {
		const pattern = buildPattern("ab", { ...options, lineRegexp: true });
		expect(matchesText(pattern, "ab")).toBe(true);
		expect(matchesText(pattern, "abc")).toBe(false);
	});

	it("ignores case on request", () => {
		expect(matchesText(buildPattern("hello", { ...options, ignoreCase: true }), "HELLO")).toBe(true);
		expect(matchesText(buildPattern("hello", options), "HELLO")).toBe(false);
	});

	it("applies the transformations in a fixed order", () => {
		const pattern = buildPattern("a.b", { ignoreCase: true, fixedStrings: true, wordRegexp: true, lineRegexp: true });
		expect(pattern.flags).toBe("giu");
		expect(pattern.source.startsWith("^")).toBe(true);
		expect(pattern.source.endsWith("$")).toBe(true);
		expect(matchesText(pattern, "A.B")).toBe(true);
		expect(matchesText(pattern, "axb")).toBe(false);
		expect(matchesText(pattern, "a.b c")).toBe(false);
	});

	it("finds word boundaries around non-ASCII letters", () => {
		const cafe = buildPattern("café", { ...options, wordRegexp: true });
		expect(matchesText(cafe, "café bar")).toBe(true);
		expect(matchesText(cafe, "cafés")).toBe(false);
		const uber = buildPattern("über", { ...options, wordRegexp: true });
		expect(matchesText(uber, "xüber")).toBe(false);
		expect(matchesText(uber, "das über alles")).toBe(true);
		expect(matchRanges(buildPattern("naïve", { ...options, wordRegexp: true }), "naïve naïveté")).toEqual([[0, 5]]);
	});

	it("treats \\b in a pattern as a Unicode word boundary", () => {
		expect(matchesText(buildPattern("\\bwelt\\b", options), "grüße welt")).toBe(true);
		expect(matchesText(buildPattern("\\bber", options), "über")).toBe(false);
		expect(matchesText(buildPattern("\\Bber", options), "über")).toBe(true);
	});

	it("reads \\< and \\> as word start and end", () => {
		const pattern = buildPattern("\\<log\\>", options);
		expect(matchesText(pattern, "a log line")).toBe(true);
		expect(matchesText(pattern, "catalog")).toBe(false);
		expect(matchesText(pattern, "logger")).toBe(false);
	});

	it("accepts escaped punctuation as the literal character", () => {
		expect(matchesText(buildPattern("foo\\-bar", options), "x foo-bar y")).toBe(true);
		expect(matchesText(buildPattern("key\\:value", options), "key:value")).toBe(true);
		expect(matchesText(buildPattern("\\#\\@\\~", options), "#@~")).toBe(true);
		expect(matchesText(buildPattern("[a\\-z]", options), "-")).toBe(true);
		expect(matchesText(buildPattern("[a\\-z]", options), "m")).toBe(false);
		expect(matchesText(buildPattern("a\\.b", options), "axb")).toBe(false);
	});

	it("rejects an empty pattern", () => {
		expect(() => buildPattern("", options)).toThrow("Empty pattern provided. Did you mean to omit -s/-g?");
	});

	it("reports an invalid regex with the pattern and exit code 2", () => {
		let caught: unknown;
		try {
			buildPattern("[invalid", options);
		} catch (error) {
			caught = error;
		}
		expect(caught).toBeInstanceOf(ViewerError);
		if (caught instanceof ViewerError) {
			expect(caught.detail.kind).toBe("invalidRegex");
			expect(caught.message.startsWith("Invalid regex pattern '[invalid': ")).toBe(true);
			expect(caught.exitCode).toBe(2);
		}
	});
});

describe("matchRanges", () => {
	it("returns every non-overlapping match", () => {
		expect(matchRanges(buildPattern("o", options), "foo bar boo")).toEqual([
			[1, 2],
			[2, 3],
			[9, 10],
			[10, 11],
		]);
	});

	it("is repeatable with the same compiled pattern", () => {
		const pattern = buildPattern("a", options);
		expect(matchRanges(pattern, "aa")).toEqual(matchRanges(pattern, "aa"));
		expect(matchesText(pattern, "xa")).toBe(true);
		expect(matchesText(pattern, "xa")).toBe(true);
	});
});
