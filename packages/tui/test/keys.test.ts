/**
 * Tests for keyboard input handling
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { matchesKey, parseKey, printableText } from "../src/keys.js";

describe("parseKey", () => {
	it("decodes CSI and SS3 arrow keys", () => {
		assert.strictEqual(parseKey("\x1b[A"), "up");
		assert.strictEqual(parseKey("\x1b[B"), "down");
		assert.strictEqual(parseKey("\x1bOC"), "right");
		assert.strictEqual(parseKey("\x1bOD"), "left");
	});

	it("decodes navigation keys from several terminal families", () => {
		assert.strictEqual(parseKey("\x1b[5~"), "pageUp");
		assert.strictEqual(parseKey("\x1b[6~"), "pageDown");
		assert.strictEqual(parseKey("\x1b[H"), "home");
		assert.strictEqual(parseKey("\x1b[1~"), "home");
		assert.strictEqual(parseKey("\x1b[F"), "end");
		assert.strictEqual(parseKey("\x1b[4~"), "end");
	});

	it("decodes control characters", () => {
		assert.strictEqual(parseKey("\x03"), "ctrl+c");
		assert.strictEqual(parseKey("\x1b"), "escape");
		assert.strictEqual(parseKey("\r"), "enter");
		assert.strictEqual(parseKey("\x7f"), "backspace");
		assert.strictEqual(parseKey("\x08"), "backspace");
		assert.strictEqual(parseKey("\t"), "tab");
	});

	it("returns printable ASCII characters as themselves", () => {
		assert.strictEqual(parseKey("G"), "G");
		assert.strictEqual(parseKey("$"), "$");
		assert.strictEqual(parseKey("#"), "#");
		assert.strictEqual(parseKey("?"), "?");
		assert.strictEqual(parseKey(" "), "space");
	});

	it("decodes legacy alt+letter", () => {
		assert.strictEqual(parseKey("\x1bb"), "alt+b");
	});

	it("returns undefined for unknown sequences", () => {
		assert.strictEqual(parseKey("\x1b[99~"), undefined);
		assert.strictEqual(parseKey("世"), undefined);
	});
});

describe("matchesKey", () => {
	it("compares the parsed identifier", () => {
		assert.strictEqual(matchesKey("\x1b[6~", "pageDown"), true);
		assert.strictEqual(matchesKey("\x1b[6~", "pageUp"), false);
		assert.strictEqual(matchesKey("q", "q"), true);
	});
});

describe("printableText", () => {
	it("accepts ASCII and non-ASCII text", () => {
		assert.strictEqual(printableText("a"), "a");
		assert.strictEqual(printableText(" "), " ");
		assert.strictEqual(printableText("é"), "é");
		assert.strictEqual(printableText("世界"), "世界");
	});

	it("rejects escape sequences and control characters", () => {
		assert.strictEqual(printableText("\x1b[A"), undefined);
		assert.strictEqual(printableText("\r"), undefined);
		assert.strictEqual(printableText("\x7f"), undefined);
		assert.strictEqual(printableText("\x03"), undefined);
		assert.strictEqual(printableText(""), undefined);
	});
});
