/**
 * Print mode: write the processed document to stdout and exit, without the pager.
 */

import { type Document, gutterWidthFor, lineText } from "../core/document.js";

export interface PrintModeOptions {
	lineNumbers: boolean;
	output?: NodeJS.WritableStream;
}

/**
 * Format each line as plain text, optionally behind a right-aligned line
 * number. Styles are dropped; separator rows get a blank number column.
 */
export function formatDocument(document: Document, lineNumbers: boolean): string {
	const numberWidth = gutterWidthFor(document.maxLineNumber) - 2;
	let out = "";
	for (const line of document.lines) {
		if (lineNumbers) {
			const number = line.number === 0 ? "" : String(line.number);
			out += `${number.padStart(numberWidth)} `;
		}
		out += `${lineText(line)}\n`;
	}
	return out;
}

export async function runPrintMode(document: Document, options: PrintModeOptions): Promise<void> {
	const output = options.output ?? process.stdout;
	const text = formatDocument(document, options.lineNumbers);
	if (text.length === 0) {
		return;
	}
	await new Promise<void>((resolve, reject) => {
		output.write(text, (error) => (error ? reject(error) : resolve()));
	});
}
