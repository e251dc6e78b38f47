/**
 * StdinBuffer buffers input and emits complete sequences.
 *
 * Stdin data events can arrive in partial chunks, and a single chunk can hold
 * several keys typed in quick succession. An arrow key `\x1b[A` might arrive
 * as `\x1b` followed by `[A`, and the reply to a background color query
 * `\x1b]11;rgb:0000/0000/0000\x1b\\` can be split anywhere. The buffer
 * accumulates chunks until a complete sequence is detected and then emits
 * each sequence on its own. An incomplete sequence is flushed as-is once
 * no more data has arrived for `timeout` milliseconds, so a lone Escape
 * key still gets through.
 *
 * Based on code from OpenTUI (https://github.com/anomalyco/opentui)
 * MIT License - Copyright (c) 2025 opentui
 */

import { EventEmitter } from "node:events";

const ESC = "\x1b";

type SequenceStatus = "complete" | "incomplete" | "not-escape";

/**
 * Check if a string is a complete escape sequence or needs more data
 */
function isCompleteSequence(data: string): SequenceStatus {
	if (!data.startsWith(ESC)) {
		return "not-escape";
	}
	if (data.length === 1) {
		return "incomplete";
	}

	const introducer = data[1];

	// CSI: ESC [ params final, where final is in 0x40-0x7E
	if (introducer === "[") {
		if (data.length < 3) {
			return "incomplete";
		}
		// Linux console function keys: ESC [ [ A
		if (data === `${ESC}[[`) {
			return "incomplete";
		}
		const last = data.charCodeAt(data.length - 1);
		return last >= 0x40 && last <= 0x7e ? "complete" : "incomplete";
	}

	// OSC, DCS, APC: terminated by ST (ESC \) or, for OSC, BEL
	if (introducer === "]" || introducer === "P" || introducer === "_") {
		if (data.endsWith(`${ESC}\\`) && data.length > 3) {
			return "complete";
		}
		if (introducer === "]" && data.endsWith("\x07")) {
			return "complete";
		}
		return "incomplete";
	}

	// SS3: ESC O followed by a single character
	if (introducer === "O") {
		return data.length >= 3 ? "complete" : "incomplete";
	}

	// Meta key sequences: ESC followed by a single character
	return "complete";
}

/**
 * Split accumulated buffer into complete sequences
 */
export function extractCompleteSequences(buffer: string): { sequences: string[]; remainder: string } {
	const sequences: string[] = [];
	let pos = 0;

	while (pos < buffer.length) {
		const remaining = buffer.slice(pos);

		if (remaining.startsWith(ESC)) {
			let seqEnd = 1;
			let found = false;
			while (seqEnd <= remaining.length) {
				const candidate = remaining.slice(0, seqEnd);
				const status = isCompleteSequence(candidate);
				if (status === "incomplete") {
					seqEnd++;
					continue;
				}
				sequences.push(candidate);
				pos += seqEnd;
				found = true;
				break;
			}
			if (!found) {
				return { sequences, remainder: remaining };
			}
		} else {
			// Not an escape sequence - take a single character (a full code point)
			const cp = remaining.codePointAt(0) ?? 0;
			const char = String.fromCodePoint(cp);
			sequences.push(char);
			pos += char.length;
		}
	}

	return { sequences, remainder: "" };
}

export type StdinBufferOptions = {
	/**
	 * Maximum time to wait for sequence completion (default: 10ms)
	 * After this time, the buffer is flushed even if incomplete
	 */
	timeout?: number;
};

export type StdinBufferEventMap = {
	data: [string];
};

/**
 * Buffers stdin input and emits complete sequences via the 'data' event.
 * Handles partial escape sequences that arrive across multiple chunks.
 */
export class StdinBuffer extends EventEmitter<StdinBufferEventMap> {
	private buffer = "";
	private timeout: ReturnType<typeof setTimeout> | null = null;
	private readonly timeoutMs: number;

	constructor(options: StdinBufferOptions = {}) {
		super();
		this.timeoutMs = options.timeout ?? 10;
	}

	public process(data: string | Buffer): void {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}

		// A single high byte from a meta-sends-high-bit terminal is ESC + (byte - 128)
		let str: string;
		if (Buffer.isBuffer(data)) {
			const first = data[0];
			if (data.length === 1 && first !== undefined && first > 127) {
				str = `${ESC}${String.fromCharCode(first - 128)}`;
			} else {
				str = data.toString("utf8");
			}
		} else {
			str = data;
		}

		this.buffer += str;
		const result = extractCompleteSequences(this.buffer);
		this.buffer = result.remainder;

		for (const sequence of result.sequences) {
			this.emit("data", sequence);
		}

		if (this.buffer.length > 0) {
			this.timeout = setTimeout(() => {
				for (const sequence of this.flush()) {
					this.emit("data", sequence);
				}
			}, this.timeoutMs);
		}
	}

	flush(): string[] {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}
		if (this.buffer.length === 0) {
			return [];
		}
		const sequences = [this.buffer];
		this.buffer = "";
		return sequences;
	}

	clear(): void {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}
		this.buffer = "";
	}

	getBuffer(): string {
		return this.buffer;
	}

	destroy(): void {
		this.clear();
		this.removeAllListeners();
	}
}
