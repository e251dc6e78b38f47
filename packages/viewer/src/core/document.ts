import { textWidth } from "mat-tui";
import { PLAIN, type SpanStyle } from "./style.js";

/** Encodings recognised on input, reported verbatim in the status bar */
export type Encoding = "UTF-8" | "UTF-8-BOM" | "UTF-16LE" | "UTF-16BE" | "Latin-1";

export interface StyledSpan {
	text: string;
	style: SpanStyle;
}

/**
 * One row of the document. `number` is 1-based; 0 marks a grep separator.
 */
export interface Line {
	number: number;
	spans: StyledSpan[];
	isMatch: boolean;
	isContext: boolean;
}

export function styledSpan(text: string, style: SpanStyle = PLAIN): StyledSpan {
	return { text, style };
}

export function plainLine(number: number, text: string): Line {
	return {
		number,
		spans: text.length > 0 ? [styledSpan(text)] : [],
		isMatch: false,
		isContext: false,
	};
}

export function lineText(line: Line): string {
	let text = "";
	for (const span of line.spans) {
		text += span.text;
	}
	return text;
}

export function lineWidth(line: Line): number {
	let width = 0;
	for (const span of line.spans) {
		width += textWidth(span.text);
	}
	return width;
}

export function cloneLine(line: Line): Line {
	return {
		number: line.number,
		spans: line.spans.map((span) => ({ text: span.text, style: span.style })),
		isMatch: line.isMatch,
		isContext: line.isContext,
	};
}

/**
 * Width of the line-number gutter: the digits of the largest number plus two
 * columns, or 3 for an empty document.
 */
export function gutterWidthFor(maxLineNumber: number): number {
	if (maxLineNumber <= 0) {
		return 3;
	}
	return String(maxLineNumber).length + 2;
}

/**
 * Ordered styled lines plus the metadata every transform carries along.
 * `maxLineWidth` is kept equal to the widest line and `maxLineNumber` to the
 * larger of the line count and the highest line number.
 */
export class Document {
	lines: Line[];
	maxLineWidth: number;
	maxLineNumber: number;
	readonly sourceName: string;
	readonly encoding: Encoding;

	constructor(lines: Line[], sourceName: string, encoding: Encoding) {
		this.lines = lines;
		this.sourceName = sourceName;
		this.encoding = encoding;
		this.maxLineWidth = 0;
		this.maxLineNumber = 0;
		this.recomputeMetrics();
	}

	/**
	 * Split text on "\n" into numbered plain lines. A trailing newline does not
	 * start another line, and a trailing "\r" is removed from each line.
	 */
	static fromText(text: string, sourceName: string, encoding: Encoding): Document {
		const rows = text.split("\n");
		if (rows.length > 0 && rows[rows.length - 1] === "") {
			rows.pop();
		}
		const lines = rows.map((row, index) => plainLine(index + 1, row.endsWith("\r") ? row.slice(0, -1) : row));
		return new Document(lines, sourceName, encoding);
	}

	static empty(sourceName: string, encoding: Encoding): Document {
		return new Document([], sourceName, encoding);
	}

	get lineCount(): number {
		return this.lines.length;
	}

	/** Derive a document with the same source and encoding */
	withLines(lines: Line[]): Document {
		return new Document(lines, this.sourceName, this.encoding);
	}

	append(lines: Line[]): void {
		for (const line of lines) {
			this.lines.push(line);
			this.maxLineWidth = Math.max(this.maxLineWidth, lineWidth(line));
			this.maxLineNumber = Math.max(this.maxLineNumber, line.number);
		}
		this.maxLineNumber = Math.max(this.maxLineNumber, this.lines.length);
	}

	recomputeMetrics(): void {
		let maxWidth = 0;
		let maxNumber = this.lines.length;
		for (const line of this.lines) {
			maxWidth = Math.max(maxWidth, lineWidth(line));
			maxNumber = Math.max(maxNumber, line.number);
		}
		this.maxLineWidth = maxWidth;
		this.maxLineNumber = maxNumber;
	}

	clone(): Document {
		return this.withLines(this.lines.map(cloneLine));
	}
}
