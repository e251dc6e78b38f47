/**
 * Tests for StdinBuffer
 *
 * Based on code from OpenTUI (https://github.com/anomalyco/opentui)
 * MIT License - Copyright (c) 2025 opentui
 */

import assert from "node:assert";
import { afterEach, beforeEach, describe, it } from "node:test";
import { extractCompleteSequences, StdinBuffer } from "../src/stdin-buffer.js";

describe("StdinBuffer", () => {
	let buffer: StdinBuffer;
	let emittedSequences: string[];

	beforeEach(() => {
		buffer = new StdinBuffer({ timeout: 10 });
		emittedSequences = [];
		buffer.on("data", (sequence) => {
			emittedSequences.push(sequence);
		});
	});

	afterEach(() => {
		buffer.destroy();
	});

	async function wait(ms: number): Promise<void> {
		return new Promise((resolve) => setTimeout(resolve, ms));
	}

	describe("Regular Characters", () => {
		it("should split batched characters", () => {
			buffer.process("abc");
			assert.deepStrictEqual(emittedSequences, ["a", "b", "c"]);
		});

		it("should keep astral and CJK characters whole", () => {
			buffer.process("世😀");
			assert.deepStrictEqual(emittedSequences, ["世", "😀"]);
		});
	});

	describe("Escape Sequences", () => {
		it("should emit a complete CSI sequence", () => {
			buffer.process("\x1b[A");
			assert.deepStrictEqual(emittedSequences, ["\x1b[A"]);
		});

		it("should split consecutive sequences", () => {
			buffer.process("\x1b[A\x1b[6~j");
			assert.deepStrictEqual(emittedSequences, ["\x1b[A", "\x1b[6~", "j"]);
		});

		it("should join a sequence split across chunks", () => {
			buffer.process("\x1b");
			assert.deepStrictEqual(emittedSequences, []);
			buffer.process("[B");
			assert.deepStrictEqual(emittedSequences, ["\x1b[B"]);
		});

		it("should join an OSC reply split mid-payload", () => {
			buffer.process("\x1b]11;rgb:ff");
			assert.deepStrictEqual(emittedSequences, []);
			buffer.process("ff/ffff/ffff\x1b\\");
			assert.deepStrictEqual(emittedSequences, ["\x1b]11;rgb:ffff/ffff/ffff\x1b\\"]);
		});

		it("should treat ESC followed by a character as one sequence", () => {
			buffer.process("\x1bb");
			assert.deepStrictEqual(emittedSequences, ["\x1bb"]);
		});

		it("should keep SS3 sequences together", () => {
			buffer.process("\x1bOH");
			assert.deepStrictEqual(emittedSequences, ["\x1bOH"]);
		});
	});

	describe("Timeout", () => {
		it("should flush a lone escape after the timeout", async () => {
			buffer.process("\x1b");
			assert.deepStrictEqual(emittedSequences, []);
			await wait(25);
			assert.deepStrictEqual(emittedSequences, ["\x1b"]);
		});
	});

	describe("Buffers", () => {
		it("should convert a single high byte to a meta sequence", () => {
			buffer.process(Buffer.from([0xe1]));
			assert.deepStrictEqual(emittedSequences, ["\x1ba"]);
		});

		it("should decode UTF-8 buffers", () => {
			buffer.process(Buffer.from("é", "utf8"));
			assert.deepStrictEqual(emittedSequences, ["é"]);
		});
	});

	describe("flush and clear", () => {
		it("should return pending data on flush", () => {
			buffer.process("\x1b[");
			assert.strictEqual(buffer.getBuffer(), "\x1b[");
			assert.deepStrictEqual(buffer.flush(), ["\x1b["]);
			assert.strictEqual(buffer.getBuffer(), "");
		});

		it("should drop pending data on clear", () => {
			buffer.process("\x1b[");
			buffer.clear();
			assert.deepStrictEqual(buffer.flush(), []);
		});
	});
});

describe("extractCompleteSequences", () => {
	it("returns the incomplete tail as remainder", () => {
		assert.deepStrictEqual(extractCompleteSequences("a\x1b["), { sequences: ["a"], remainder: "\x1b[" });
	});

	it("waits for the second bracket of Linux console function keys", () => {
		assert.deepStrictEqual(extractCompleteSequences("\x1b[[A"), { sequences: ["\x1b[[A"], remainder: "" });
	});
});
