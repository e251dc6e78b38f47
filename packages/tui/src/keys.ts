/**
 * Keyboard input decoding for legacy terminal sequences.
 *
 * Input arrives one sequence at a time from StdinBuffer. `parseKey` maps a
 * sequence to a key identifier such as "up", "ctrl+c", "pageDown" or a
 * single printable character ("G", "$", "/"). `printableText` returns the
 * text a sequence would insert into a line editor.
 *
 * API:
 * - parseKey(data) - Parse input and return the key identifier
 * - matchesKey(data, keyId) - Check if input matches a key identifier
 * - printableText(data) - Text carried by the input, if it is plain text
 */

type SpecialKey =
	| "escape"
	| "enter"
	| "tab"
	| "space"
	| "backspace"
	| "delete"
	| "insert"
	| "home"
	| "end"
	| "pageUp"
	| "pageDown"
	| "up"
	| "down"
	| "left"
	| "right"
	| "f1"
	| "f2"
	| "f3"
	| "f4"
	| "f5"
	| "f6"
	| "f7"
	| "f8"
	| "f9"
	| "f10"
	| "f11"
	| "f12";

/**
 * Key identifier: a special key, a printable ASCII character, or a modified key
 * such as "ctrl+c" or "alt+b".
 */
export type KeyId = SpecialKey | (string & {});

const LEGACY_SEQUENCE_KEY_IDS: Record<string, SpecialKey | `${"shift" | "ctrl"}+${SpecialKey}`> = {
	"\x1b[A": "up",
	"\x1b[B": "down",
	"\x1b[C": "right",
	"\x1b[D": "left",
	"\x1bOA": "up",
	"\x1bOB": "down",
	"\x1bOC": "right",
	"\x1bOD": "left",
	"\x1b[H": "home",
	"\x1b[F": "end",
	"\x1bOH": "home",
	"\x1bOF": "end",
	"\x1b[1~": "home",
	"\x1b[4~": "end",
	"\x1b[7~": "home",
	"\x1b[8~": "end",
	"\x1b[2~": "insert",
	"\x1b[3~": "delete",
	"\x1b[5~": "pageUp",
	"\x1b[6~": "pageDown",
	"\x1b[[5~": "pageUp",
	"\x1b[[6~": "pageDown",
	"\x1b[1;2A": "shift+up",
	"\x1b[1;2B": "shift+down",
	"\x1b[1;5A": "ctrl+up",
	"\x1b[1;5B": "ctrl+down",
	"\x1b[1;5C": "ctrl+right",
	"\x1b[1;5D": "ctrl+left",
	"\x1b[1;5H": "ctrl+home",
	"\x1b[1;5F": "ctrl+end",
	"\x1bOP": "f1",
	"\x1bOQ": "f2",
	"\x1bOR": "f3",
	"\x1bOS": "f4",
	"\x1b[11~": "f1",
	"\x1b[12~": "f2",
	"\x1b[13~": "f3",
	"\x1b[14~": "f4",
	"\x1b[15~": "f5",
	"\x1b[17~": "f6",
	"\x1b[18~": "f7",
	"\x1b[19~": "f8",
	"\x1b[20~": "f9",
	"\x1b[21~": "f10",
	"\x1b[23~": "f11",
	"\x1b[24~": "f12",
	"\x1b[Z": "shift+tab",
	"\x1bOM": "enter",
};

/**
 * Parse input data and return the key identifier if recognized.
 */
export function parseKey(data: string): KeyId | undefined {
	const legacySequenceKeyId = LEGACY_SEQUENCE_KEY_IDS[data];
	if (legacySequenceKeyId) return legacySequenceKeyId;

	if (data === "\x1b") return "escape";
	if (data === "\t") return "tab";
	if (data === "\r" || data === "\n") return "enter";
	if (data === "\x00") return "ctrl+space";
	if (data === " ") return "space";
	if (data === "\x7f" || data === "\x08") return "backspace";
	if (data === "\x1c") return "ctrl+\\";
	if (data === "\x1d") return "ctrl+]";
	if (data === "\x1f") return "ctrl+-";
	if (data === "\x1b\x7f" || data === "\x1b\b") return "alt+backspace";
	if (data === "\x1b\r") return "alt+enter";
	if (data.length === 2 && data[0] === "\x1b") {
		const code = data.charCodeAt(1);
		if (code >= 1 && code <= 26) {
			return `ctrl+alt+${String.fromCharCode(code + 96)}`;
		}
		// Legacy alt+letter (ESC followed by letter a-z)
		if (code >= 97 && code <= 122) {
			return `alt+${String.fromCharCode(code)}`;
		}
	}

	// Raw Ctrl+letter
	if (data.length === 1) {
		const code = data.charCodeAt(0);
		if (code >= 1 && code <= 26) {
			return `ctrl+${String.fromCharCode(code + 96)}`;
		}
		if (code >= 32 && code <= 126) {
			return data;
		}
	}

	return undefined;
}

/**
 * Check if input matches a key identifier.
 */
export function matchesKey(data: string, keyId: KeyId): boolean {
	return parseKey(data) === keyId;
}

/**
 * Return the text carried by an input sequence when it is plain text:
 * one or more characters, none of them control characters.
 * Escape sequences, Ctrl chords, Enter, Tab and Backspace yield undefined.
 */
export function printableText(data: string): string | undefined {
	if (data.length === 0) {
		return undefined;
	}
	for (const char of data) {
		const code = char.codePointAt(0) ?? 0;
		if (code < 0x20 || code === 0x7f || (code >= 0x80 && code < 0xa0)) {
			return undefined;
		}
	}
	return data;
}
