import { charWidth } from "mat-tui";
import type { WrapMode } from "../../cli/args.js";
import { type Document, gutterWidthFor, type Line, lineText, plainLine } from "../../core/document.js";
import { expandTabs, stripAnsiSequences } from "../../core/ingest.js";
import { buildPattern, DEFAULT_PATTERN_OPTIONS, type PatternOptions } from "../../core/pattern.js";
import { applySearchOverlay, SearchState, searchStyle } from "../../core/search.js";
import { TailReader } from "../../core/tail-reader.js";
import { errorMessage } from "../../errors.js";
import { logDebug } from "../../log.js";
import type { ThemeColors } from "../../theme/theme.js";

export type ViewerMode = "normal" | "search";

/** One screen row of a soft-wrapped line */
export interface WrappedRow {
	lineIndex: number;
	lineNumber: number;
	isFirstRow: boolean;
	/** Offset into the line's text, in code points */
	charOffset: number;
	charCount: number;
	displayWidth: number;
}

export interface StatusMessage {
	text: string;
	isError: boolean;
}

export interface ViewerStateOptions {
	document: Document;
	showGutter: boolean;
	palette: ThemeColors;
	searchState?: SearchState;
	/** -F, -w and -x as given on the command line; reused by / and ? */
	patternOptions?: PatternOptions;
	/** File being viewed; follow mode needs it */
	path?: string;
	wrapMode?: WrapMode;
	maxWidth?: number;
}

/**
 * Everything the pager shows, and every operation a key can trigger.
 * Rendering reads this state; only the key handler and the follow poll change it.
 */
export class ViewerState {
	document: Document;
	scrollLine = 0;
	scrollCol = 0;
	mode: ViewerMode = "normal";
	showGutter: boolean;
	searchState: SearchState | undefined;
	searchQuery = "";
	statusMessage: StatusMessage | undefined;
	follow = false;
	shouldQuit = false;
	readonly palette: ThemeColors;
	readonly path: string | undefined;
	readonly wrapMode: WrapMode;
	readonly maxWidth: number;

	private patternOptions: PatternOptions;
	private searchCaseInsensitive = true;
	private snapshot: Document | undefined;
	private tailReader: TailReader | undefined;
	private width = 80;
	private height = 24;
	private wrapCache: WrappedRow[] | undefined;

	constructor(options: ViewerStateOptions) {
		this.document = options.document;
		this.showGutter = options.showGutter;
		this.palette = options.palette;
		this.searchState = options.searchState;
		this.patternOptions = options.patternOptions ?? DEFAULT_PATTERN_OPTIONS;
		this.path = options.path;
		this.wrapMode = options.wrapMode ?? "none";
		this.maxWidth = options.maxWidth ?? 200;
	}

	// =========================================================================
	// Geometry
	// =========================================================================

	setTerminalSize(width: number, height: number): void {
		if (width === this.width && height === this.height) {
			return;
		}
		this.width = width;
		this.height = height;
		this.invalidateWrap();
		this.clampScroll();
		// Following keeps the tail in view at any size
		if (this.follow) {
			this.goToBottom();
		}
	}

	get terminalWidth(): number {
		return this.width;
	}

	get terminalHeight(): number {
		return this.height;
	}

	/** Rows available for content; the last row is the status bar */
	get contentHeight(): number {
		return Math.max(0, this.height - 1);
	}

	get gutterWidth(): number {
		return this.showGutter ? gutterWidthFor(this.document.maxLineNumber) : 0;
	}

	get contentWidth(): number {
		return Math.max(0, this.width - this.gutterWidth);
	}

	/** Screen rows in Wrap mode, rebuilt after any change to width or content */
	get wrappedRows(): WrappedRow[] {
		if (!this.wrapCache) {
			this.wrapCache = buildWrappedRows(this.document.lines, this.contentWidth);
		}
		return this.wrapCache;
	}

	get totalRows(): number {
		return this.wrapMode === "wrap" ? this.wrappedRows.length : this.document.lineCount;
	}

	get maxScroll(): number {
		return Math.max(0, this.totalRows - this.contentHeight);
	}

	get maxScrollCol(): number {
		return Math.max(0, this.document.maxLineWidth - this.contentWidth);
	}

	invalidateWrap(): void {
		this.wrapCache = undefined;
	}

	private clampScroll(): void {
		this.scrollLine = Math.min(this.scrollLine, this.maxScroll);
		this.scrollCol = Math.min(this.scrollCol, this.maxScrollCol);
	}

	// =========================================================================
	// Scrolling
	// =========================================================================

	scrollDown(n: number): void {
		this.scrollLine = Math.min(this.scrollLine + n, this.maxScroll);
	}

	scrollUp(n: number): void {
		this.scrollLine = Math.max(0, this.scrollLine - n);
	}

	scrollLeft(n: number): void {
		if (this.wrapMode === "wrap") return;
		this.scrollCol = Math.max(0, this.scrollCol - n);
	}

	scrollRight(n: number): void {
		if (this.wrapMode === "wrap") return;
		this.scrollCol = Math.min(this.scrollCol + n, this.maxScrollCol);
	}

	scrollToLineStart(): void {
		if (this.wrapMode === "wrap") return;
		this.scrollCol = 0;
	}

	scrollToLineEnd(): void {
		if (this.wrapMode === "wrap") return;
		this.scrollCol = this.maxScrollCol;
	}

	goToTop(): void {
		this.scrollLine = 0;
	}

	goToBottom(): void {
		this.scrollLine = this.maxScroll;
	}

	halfPageDown(): void {
		this.scrollDown(Math.floor(this.contentHeight / 2));
	}

	halfPageUp(): void {
		this.scrollUp(Math.floor(this.contentHeight / 2));
	}

	toggleGutter(): void {
		this.showGutter = !this.showGutter;
		this.invalidateWrap();
		this.clampScroll();
	}

	quit(): void {
		this.shouldQuit = true;
	}

	// =========================================================================
	// Follow mode
	// =========================================================================

	/** Follow needs a file; enabling starts reading at the current end of the file */
	toggleFollow(): void {
		if (!this.path) {
			return;
		}
		if (this.follow) {
			this.follow = false;
			this.tailReader = undefined;
			return;
		}
		try {
			this.tailReader = new TailReader(this.path, true);
		} catch (error) {
			logDebug(`Cannot follow ${this.path}: ${errorMessage(error)}`);
			return;
		}
		this.follow = true;
		this.goToBottom();
	}

	/** Append lines written since the last poll. Returns true when the document grew. */
	checkFollowUpdates(): boolean {
		if (!this.follow || !this.tailReader) {
			return false;
		}
		let texts: string[];
		try {
			texts = this.tailReader.poll();
		} catch (error) {
			logDebug(`Follow poll of ${this.path ?? ""} failed: ${errorMessage(error)}`);
			return false;
		}
		if (texts.length === 0) {
			return false;
		}

		const start = this.document.lineCount + 1;
		const lines = texts.map((text, i) => plainLine(start + i, expandTabs(stripAnsiSequences(text))));
		if (this.snapshot) {
			this.snapshot.append(lines);
		}
		this.document.append(this.searchState ? this.highlightAppended(lines, this.searchState) : lines);
		if (this.searchState) {
			this.searchState.findMatches(this.document);
		}
		this.invalidateWrap();
		this.goToBottom();
		return true;
	}

	private highlightAppended(lines: Line[], state: SearchState): Line[] {
		const overlay = applySearchOverlay(this.document.withLines(lines), state.pattern, searchStyle(this.palette));
		return overlay.lines;
	}

	// =========================================================================
	// Search
	// =========================================================================

	enterSearchMode(caseInsensitive: boolean): void {
		this.mode = "search";
		this.searchQuery = "";
		this.searchCaseInsensitive = caseInsensitive;
		this.snapshot = this.document.clone();
		this.statusMessage = undefined;
	}

	searchAddChar(text: string): void {
		if (this.mode !== "search") return;
		this.searchQuery += text;
		this.refreshSearchPreview();
	}

	searchBackspace(): void {
		if (this.mode !== "search") return;
		this.searchQuery = Array.from(this.searchQuery).slice(0, -1).join("");
		this.refreshSearchPreview();
	}

	private compileQuery(): RegExp {
		return buildPattern(this.searchQuery, { ...this.patternOptions, ignoreCase: this.searchCaseInsensitive });
	}

	/** Restore the pre-search document and highlight the query typed so far */
	private refreshSearchPreview(): void {
		const base = this.snapshot;
		if (!base) return;
		let pattern: RegExp | undefined;
		if (this.searchQuery.length > 0) {
			try {
				pattern = this.compileQuery();
			} catch {
				// Half-typed patterns such as "foo(" are expected while typing
				pattern = undefined;
			}
		}
		this.document = pattern ? applySearchOverlay(base, pattern, searchStyle(this.palette)) : base.withLines([...base.lines]);
		this.invalidateWrap();
	}

	confirmSearch(): void {
		if (this.mode !== "search") return;
		const query = this.searchQuery;
		if (query.length > 0) {
			try {
				const state = new SearchState(this.compileQuery());
				state.findMatches(this.document);
				this.searchState = state;
				if (state.matchCount === 0) {
					this.statusMessage = { text: `Pattern not found: ${query}`, isError: false };
				}
			} catch (error) {
				logDebug(`Search pattern rejected: ${errorMessage(error)}`);
				this.statusMessage = { text: `Invalid pattern: ${query}`, isError: true };
			}
		}
		this.mode = "normal";
		this.snapshot = undefined;
	}

	cancelSearch(): void {
		if (this.snapshot) {
			this.document = this.snapshot;
			this.snapshot = undefined;
			this.invalidateWrap();
		}
		this.mode = "normal";
		this.searchQuery = "";
	}

	nextMatch(): void {
		const lineIndex = this.searchState?.nextMatch();
		if (lineIndex !== undefined) {
			this.centerLine(lineIndex);
		}
	}

	prevMatch(): void {
		const lineIndex = this.searchState?.prevMatch();
		if (lineIndex !== undefined) {
			this.centerLine(lineIndex);
		}
	}

	/** Current and total match numbers when there are matches */
	get matchInfo(): { current: number; total: number } | undefined {
		const state = this.searchState;
		if (!state || state.matchCount === 0) {
			return undefined;
		}
		return { current: state.currentMatchDisplay ?? 0, total: state.matchCount };
	}

	/** Scroll so the line sits in the middle of the viewport, within scroll bounds */
	private centerLine(lineIndex: number): void {
		let row = lineIndex;
		if (this.wrapMode === "wrap") {
			const found = this.wrappedRows.findIndex((r) => r.lineIndex === lineIndex);
			row = found === -1 ? 0 : found;
		}
		const target = Math.max(0, row - Math.floor(this.contentHeight / 2));
		this.scrollLine = Math.min(target, this.maxScroll);
	}
}

/**
 * Split lines into rows no wider than `width` columns. A row ends before the
 * character that would overflow it; every row holds at least one character,
 * and an empty line is one row of width 0.
 */
export function buildWrappedRows(lines: readonly Line[], width: number): WrappedRow[] {
	const limit = Math.max(1, width);
	const rows: WrappedRow[] = [];
	lines.forEach((line, lineIndex) => {
		const base = { lineIndex, lineNumber: line.number };
		let charOffset = 0;
		let charCount = 0;
		let rowWidth = 0;
		let isFirstRow = true;
		for (const char of lineText(line)) {
			const w = charWidth(char);
			if (rowWidth + w > limit && rowWidth > 0) {
				rows.push({ ...base, isFirstRow, charOffset, charCount, displayWidth: rowWidth });
				isFirstRow = false;
				charOffset += charCount;
				charCount = 0;
				rowWidth = 0;
			}
			charCount++;
			rowWidth += w;
		}
		rows.push({ ...base, isFirstRow, charOffset, charCount, displayWidth: rowWidth });
	});
	return rows;
}
