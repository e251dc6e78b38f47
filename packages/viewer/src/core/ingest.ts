import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { charWidth } from "mat-tui";
import { TAB_WIDTH } from "../config.js";
import { errorMessage, ViewerError } from "../errors.js";
import { isBinary } from "./binary.js";
import type { Encoding } from "./document.js";
import { decodeBytes, detectEncoding } from "./encoding.js";

export type InputSource = { kind: "file"; path: string } | { kind: "stdin" };

export interface IngestOptions {
	forceBinary: boolean;
	preserveAnsi: boolean;
	tabWidth?: number;
}

export interface IngestResult {
	text: string;
	encoding: Encoding;
}

const MARKDOWN_EXTENSIONS = new Set(["md", "markdown", "mdown", "mkd", "mkdn"]);

export function sourceName(source: InputSource): string {
	return source.kind === "file" ? source.path : "stdin";
}

/** Lowercased extension without the dot, or undefined when the name has none */
export function fileExtension(path: string): string | undefined {
	const ext = extname(path);
	return ext.length > 1 ? ext.slice(1).toLowerCase() : undefined;
}

export function isMarkdownPath(path: string): boolean {
	const ext = fileExtension(path);
	return ext !== undefined && MARKDOWN_EXTENSIONS.has(ext);
}

/**
 * Remove CSI sequences (ESC [ ... up to and including the first ASCII letter)
 * and two-character escapes (ESC plus any character). A trailing lone ESC is dropped.
 */
export function stripAnsiSequences(text: string): string {
	if (!text.includes("\x1b")) {
		return text;
	}
	let result = "";
	let i = 0;
	while (i < text.length) {
		const char = text[i];
		if (char !== "\x1b") {
			result += char;
			i++;
			continue;
		}
		i++;
		if (text[i] === "[") {
			i++;
			while (i < text.length) {
				const code = text.charCodeAt(i);
				i++;
				if ((code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a)) {
					break;
				}
			}
		} else if (i < text.length) {
			// Skip the whole code point following ESC
			const cp = text.codePointAt(i) ?? 0;
			i += cp > 0xffff ? 2 : 1;
		}
	}
	return result;
}

/**
 * Replace each tab with the spaces that move the column to the next multiple of
 * `tabWidth`. Columns are display columns; "\n" resets the column, "\r" does not.
 */
export function expandTabs(text: string, tabWidth = TAB_WIDTH): string {
	if (!text.includes("\t")) {
		return text;
	}
	let result = "";
	let column = 0;
	for (const char of text) {
		if (char === "\t") {
			const spaces = tabWidth - (column % tabWidth);
			result += " ".repeat(spaces);
			column += spaces;
		} else if (char === "\n") {
			result += char;
			column = 0;
		} else {
			result += char;
			column += charWidth(char);
		}
	}
	return result;
}

/**
 * Bytes to text: binary check, encoding detection and decoding, ANSI removal, tab expansion.
 */
export function ingestBytes(bytes: Uint8Array, name: string, options: IngestOptions): IngestResult {
	if (!options.forceBinary && isBinary(bytes)) {
		throw new ViewerError({ kind: "binaryFile", path: name });
	}
	const encoding = detectEncoding(bytes);
	let text = decodeBytes(bytes, encoding, name);
	if (!options.preserveAnsi) {
		text = stripAnsiSequences(text);
	}
	text = expandTabs(text, options.tabWidth ?? TAB_WIDTH);
	return { text, encoding };
}

async function readStream(stream: NodeJS.ReadableStream): Promise<Uint8Array> {
	const chunks: Buffer[] = [];
	for await (const chunk of stream) {
		chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
	}
	return Buffer.concat(chunks);
}

export async function readSource(source: InputSource, stdin: NodeJS.ReadableStream): Promise<Uint8Array> {
	const name = sourceName(source);
	try {
		return source.kind === "file" ? await readFile(source.path) : await readStream(stdin);
	} catch (error) {
		throw new ViewerError({ kind: "io", path: name, cause: errorMessage(error) });
	}
}
