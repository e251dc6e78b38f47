import { describe, expect, it } from "vitest";
import { isBinary } from "../src/core/binary.js";
import { detectEncoding } from "../src/core/encoding.js";
import { expandTabs, fileExtension, ingestBytes, isMarkdownPath, stripAnsiSequences } from "../src/core/ingest.js";
import { ViewerError } from "../src/errors.js";

const plain = { forceBinary: false, preserveAnsi: false };

describe("isBinary", () => {
	it("treats empty input as text", () => {
		expect(isBinary(new Uint8Array())).toBe(false);
	});

	it("flags a NUL byte", () => {
		expect(isBinary(Buffer.from("Hello\x00World"))).toBe(true);
	});

	it("flags input where more than 30% of bytes are control characters", () => {
		expect(isBinary(Uint8Array.from([0x01, 0x02, 0x41, 0x42]))).toBe(true);
		expect(isBinary(Uint8Array.from([0x01, 0x41, 0x42, 0x43]))).toBe(false);
	});

	it("counts high bytes as printable", () => {
		expect(isBinary(Buffer.from("größe"))).toBe(false);
	});
});

describe("detectEncoding", () => {
	it("recognises byte order marks", () => {
		expect(detectEncoding(Uint8Array.from([0xef, 0xbb, 0xbf, 0x68]))).toBe("UTF-8-BOM");
		expect(detectEncoding(Uint8Array.from([0xff, 0xfe, 0x68, 0x00]))).toBe("UTF-16LE");
		expect(detectEncoding(Uint8Array.from([0xfe, 0xff, 0x00, 0x68]))).toBe("UTF-16BE");
	});

	it("falls back to Latin-1 for invalid UTF-8", () => {
		expect(detectEncoding(Buffer.from("plain ascii"))).toBe("UTF-8");
		expect(detectEncoding(Uint8Array.from([0x63, 0x61, 0x66, 0xe9]))).toBe("Latin-1");
	});
});

describe("stripAnsiSequences", () => {
	it("removes CSI sequences", () => {
		expect(stripAnsiSequences("\x1b[1;31mred\x1b[0m plain")).toBe("red plain");
	});

	it("removes two-character escapes", () => {
		expect(stripAnsiSequences("\x1b(Bx")).toBe("Bx");
	});

	it("leaves text without escapes untouched", () => {
		expect(stripAnsiSequences("no escapes [here]")).toBe("no escapes [here]");
	});
});

describe("expandTabs", () => {
	it("advances to the next multiple of the tab width", () => {
		expect(expandTabs("a\tb")).toBe("a   b");
		expect(expandTabs("\tx")).toBe("    x");
		expect(expandTabs("abcd\te")).toBe("abcd    e");
	});

	it("resets the column after a newline", () => {
		expect(expandTabs("ab\tc\n\td")).toBe("ab  c\n    d");
	});

	it("counts wide characters as two columns", () => {
		expect(expandTabs("世\tx")).toBe("世  x");
	});

	it("honours a custom tab width", () => {
		expect(expandTabs("a\tb", 8)).toBe("a       b");
	});
});

describe("ingestBytes", () => {
	it("rejects binary input unless forced", () => {
		const bytes = Buffer.from("Hello\x00World");
		expect(() => ingestBytes(bytes, "blob.bin", plain)).toThrow(ViewerError);
		expect(() => ingestBytes(bytes, "blob.bin", plain)).toThrow(
			"Binary file detected: 'blob.bin'. Use --force-binary to view anyway",
		);
		expect(ingestBytes(bytes, "blob.bin", { ...plain, forceBinary: true }).text).toBe("Hello\x00World");
	});

	it("decodes Latin-1 as Windows-1252", () => {
		const result = ingestBytes(Uint8Array.from([0x63, 0x61, 0x66, 0xe9, 0x20, 0x93, 0x71, 0x94]), "x", plain);
		expect(result.encoding).toBe("Latin-1");
		expect(result.text).toBe("café “q”");
	});

	it("strips the byte order mark", () => {
		const result = ingestBytes(Uint8Array.from([0xef, 0xbb, 0xbf, 0x68, 0x69]), "x", plain);
		expect(result).toEqual({ text: "hi", encoding: "UTF-8-BOM" });
	});

	it("decodes UTF-16 when binary detection is bypassed", () => {
		const result = ingestBytes(Uint8Array.from([0xff, 0xfe, 0x68, 0x00, 0x69, 0x00]), "x", { ...plain, forceBinary: true });
		expect(result).toEqual({ text: "hi", encoding: "UTF-16LE" });
	});

	it("keeps ANSI sequences when asked", () => {
		const bytes = Buffer.from("\x1b[31mred\x1b[0m");
		expect(ingestBytes(bytes, "x", plain).text).toBe("red");
		expect(ingestBytes(bytes, "x", { ...plain, preserveAnsi: true }).text).toBe("\x1b[31mred\x1b[0m");
	});

	it("expands tabs after stripping escapes", () => {
		expect(ingestBytes(Buffer.from("\x1b[1ma\x1b[0m\tb"), "x", plain).text).toBe("a   b");
	});
});

describe("file names", () => {
	it("extracts a lowercased extension", () => {
		expect(fileExtension("docs/README.MD")).toBe("md");
		expect(fileExtension("Makefile")).toBeUndefined();
	});

	it("recognises markdown extensions", () => {
		expect(isMarkdownPath("notes.markdown")).toBe(true);
		expect(isMarkdownPath("notes.mkdn")).toBe(true);
		expect(isMarkdownPath("notes.txt")).toBe(false);
	});
});
