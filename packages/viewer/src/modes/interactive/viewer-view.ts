import { type Component, charWidth, fitToWidth, textWidth } from "mat-tui";
import { type Line, lineWidth, type StyledSpan, styledSpan } from "../../core/document.js";
import type { SpanStyle } from "../../core/style.js";
import { KeyHandler } from "./key-handler.js";
import { paint, paintSpans } from "./paint.js";
import type { ViewerState, WrappedRow } from "./viewer-state.js";

const TRUNCATION_MARK = "…";
const TRUNCATION_STYLE: SpanStyle = { fg: "darkGray" };

interface Slice {
	spans: StyledSpan[];
	width: number;
}

/**
 * Cut `width` columns out of a line starting at display column `startCol`.
 * A wide character straddling `startCol` shows as spaces for its visible part;
 * the slice ends before the first character that would not fit.
 */
export function sliceColumns(spans: readonly StyledSpan[], startCol: number, width: number): Slice {
	const out: StyledSpan[] = [];
	let col = 0;
	let taken = 0;
	let done = false;
	for (const span of spans) {
		if (done) break;
		let text = "";
		for (const char of span.text) {
			const w = charWidth(char);
			if (col >= startCol) {
				if (taken + w > width) {
					done = true;
					break;
				}
				text += char;
				taken += w;
			} else if (col + w > startCol) {
				const overlap = Math.min(col + w - startCol, width - taken);
				text += " ".repeat(overlap);
				taken += overlap;
			}
			col += w;
		}
		if (text.length > 0) {
			out.push(styledSpan(text, span.style));
		}
	}
	return { spans: out, width: taken };
}

/** Characters [charOffset, charOffset + charCount) of a line, keeping span styles */
export function sliceChars(spans: readonly StyledSpan[], charOffset: number, charCount: number): StyledSpan[] {
	const out: StyledSpan[] = [];
	const end = charOffset + charCount;
	let index = 0;
	for (const span of spans) {
		let text = "";
		for (const char of span.text) {
			if (index >= charOffset && index < end) {
				text += char;
			}
			index++;
		}
		if (text.length > 0) {
			out.push(styledSpan(text, span.style));
		}
		if (index >= end) break;
	}
	return out;
}

function padded(slice: Slice, width: number): string {
	const pad = Math.max(0, width - slice.width);
	return paintSpans(slice.spans) + " ".repeat(pad);
}

/**
 * The pager screen: content rows with an optional line-number gutter, and a
 * one-row status bar at the bottom.
 */
export class ViewerView implements Component {
	private state: ViewerState;
	private keyHandler: KeyHandler;
	onQuit?: () => void;

	constructor(state: ViewerState, keyHandler = new KeyHandler(state)) {
		this.state = state;
		this.keyHandler = keyHandler;
	}

	handleInput(data: string): void {
		this.keyHandler.handle(data);
		if (this.state.shouldQuit) {
			this.onQuit?.();
		}
	}

	invalidate(): void {
		this.state.invalidateWrap();
	}

	render(width: number, height: number): string[] {
		const state = this.state;
		state.setTerminalSize(width, height);
		if (height <= 0 || width <= 0) {
			return [];
		}

		const rows = state.wrapMode === "wrap" ? this.renderWrapped() : this.renderLines();
		while (rows.length < state.contentHeight) {
			rows.push(" ".repeat(width));
		}
		rows.push(this.renderStatusBar());
		return rows;
	}

	private renderGutter(line: Line, showNumber: boolean): string {
		const gutter = this.state.gutterWidth;
		if (gutter === 0) {
			return "";
		}
		const number = showNumber && line.number !== 0 ? String(line.number) : "";
		const text = fitToWidth(`${number.padStart(gutter - 2)} `, Math.min(gutter, this.state.terminalWidth));
		const style: SpanStyle = line.isMatch
			? { fg: this.state.palette.lineNumber, bg: this.state.palette.matchLineBg }
			: { fg: this.state.palette.lineNumber };
		return paint(text, style);
	}

	private renderLines(): string[] {
		const state = this.state;
		const contentWidth = state.contentWidth;
		const truncateAt = Math.min(state.maxWidth, contentWidth);
		const visible = state.document.lines.slice(state.scrollLine, state.scrollLine + state.contentHeight);

		return visible.map((line) => {
			let content: string;
			if (state.wrapMode === "truncate" && lineWidth(line) > truncateAt) {
				const slice = sliceColumns(line.spans, state.scrollCol, Math.max(0, truncateAt - 1));
				const markWidth = Math.min(1, contentWidth - slice.width);
				const mark = markWidth > 0 ? paint(TRUNCATION_MARK, TRUNCATION_STYLE) : "";
				content = paintSpans(slice.spans) + mark + " ".repeat(Math.max(0, contentWidth - slice.width - markWidth));
			} else {
				content = padded(sliceColumns(line.spans, state.scrollCol, contentWidth), contentWidth);
			}
			return this.renderGutter(line, true) + content;
		});
	}

	private renderWrapped(): string[] {
		const state = this.state;
		const contentWidth = state.contentWidth;
		const visible = state.wrappedRows.slice(state.scrollLine, state.scrollLine + state.contentHeight);

		return visible.map((row: WrappedRow) => {
			const line = state.document.lines[row.lineIndex];
			if (!line) {
				return " ".repeat(state.terminalWidth);
			}
			const spans = sliceChars(line.spans, row.charOffset, row.charCount);
			const content = padded(sliceColumns(spans, 0, contentWidth), contentWidth);
			return this.renderGutter(line, row.isFirstRow) + content;
		});
	}

	private statusCenter(): { text: string; style?: SpanStyle } {
		const state = this.state;
		if (state.mode === "search") {
			return { text: ` [SEARCH: ${state.searchQuery}] ` };
		}
		if (state.statusMessage) {
			const style = state.statusMessage.isError ? { fg: state.palette.error } : undefined;
			return { text: ` ${state.statusMessage.text} `, style };
		}
		const indicators: string[] = [];
		if (state.wrapMode === "wrap") indicators.push("[WRAP]");
		if (state.wrapMode === "truncate") indicators.push("[TRUNC]");
		if (state.follow) indicators.push("[FOLLOW]");
		const match = state.matchInfo;
		if (match) indicators.push(`Match ${match.current}/${match.total}`);
		return { text: indicators.length > 0 ? ` ${indicators.join(" | ")} ` : "" };
	}

	private statusRight(): string {
		const state = this.state;
		const encoding = state.document.encoding;
		if (state.wrapMode === "wrap") {
			return encoding === "UTF-8" ? "" : `${encoding} `;
		}
		const col = `Col ${state.scrollCol + 1}/${state.document.maxLineWidth}`;
		return encoding === "UTF-8" ? `${col} ` : `${col} | ${encoding} `;
	}

	renderStatusBar(): string {
		const state = this.state;
		const width = state.terminalWidth;
		const base: SpanStyle = { fg: state.palette.statusFg, bg: state.palette.statusBg, bold: true };

		const left = ` ${state.document.sourceName} (${state.scrollLine + 1}/${state.document.lineCount}) `;
		const center = this.statusCenter();
		const right = this.statusRight();

		const available = width - textWidth(left) - textWidth(center.text) - textWidth(right);
		if (available < 0) {
			return paint(fitToWidth(left + center.text + right, width), base);
		}
		const leftPad = Math.floor(available / 2);
		const rightPad = available - leftPad;
		const centerStyle = center.style ? { ...base, ...center.style } : base;
		return (
			paint(left + " ".repeat(leftPad), base) +
			paint(center.text, centerStyle) +
			paint(" ".repeat(rightPad) + right, base)
		);
	}
}
