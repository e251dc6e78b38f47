import { ViewerError } from "../errors.js";
import type { Encoding } from "./document.js";

const UTF8_BOM = [0xef, 0xbb, 0xbf];
const UTF16_LE_BOM = [0xff, 0xfe];
const UTF16_BE_BOM = [0xfe, 0xff];

function startsWith(bytes: Uint8Array, prefix: number[]): boolean {
	return prefix.length <= bytes.length && prefix.every((byte, i) => bytes[i] === byte);
}

function isValidUtf8(bytes: Uint8Array): boolean {
	try {
		new TextDecoder("utf-8", { fatal: true }).decode(bytes);
		return true;
	} catch {
		return false;
	}
}

/**
 * BOMs decide first; otherwise strict UTF-8, falling back to Latin-1.
 */
export function detectEncoding(bytes: Uint8Array): Encoding {
	if (startsWith(bytes, UTF8_BOM)) return "UTF-8-BOM";
	if (startsWith(bytes, UTF16_LE_BOM)) return "UTF-16LE";
	if (startsWith(bytes, UTF16_BE_BOM)) return "UTF-16BE";
	if (isValidUtf8(bytes)) return "UTF-8";
	return "Latin-1";
}

// Latin-1 input is decoded as Windows-1252, its superset with curly quotes and dashes in 0x80-0x9F
const DECODER_LABELS: Record<Encoding, string> = {
	"UTF-8": "utf-8",
	"UTF-8-BOM": "utf-8",
	"UTF-16LE": "utf-16le",
	"UTF-16BE": "utf-16be",
	"Latin-1": "windows-1252",
};

const BOM_LENGTHS: Record<Encoding, number> = {
	"UTF-8": 0,
	"UTF-8-BOM": 3,
	"UTF-16LE": 2,
	"UTF-16BE": 2,
	"Latin-1": 0,
};

/**
 * Decode bytes with the detected encoding, BOM removed. Malformed sequences
 * become U+FFFD rather than failing.
 */
export function decodeBytes(bytes: Uint8Array, encoding: Encoding, sourceName: string): string {
	let decoder: TextDecoder;
	try {
		decoder = new TextDecoder(DECODER_LABELS[encoding], { fatal: false, ignoreBOM: true });
	} catch {
		throw new ViewerError({ kind: "encoding", path: sourceName });
	}
	return decoder.decode(bytes.subarray(BOM_LENGTHS[encoding]));
}
