import type { Terminal as XtermTerminalType } from "@xterm/headless";
import xterm from "@xterm/headless";
import type { Terminal } from "../src/terminal.js";

// Extract Terminal class from the module
const XtermTerminal = xterm.Terminal;

/**
 * Virtual terminal for testing using xterm.js for accurate terminal emulation
 */
export class VirtualTerminal implements Terminal {
	private xterm: XtermTerminalType;
	private inputHandler?: (data: string) => void;
	private resizeHandler?: () => void;
	private _columns: number;
	private _rows: number;
	private _writes: string[] = [];

	constructor(columns = 80, rows = 24) {
		this._columns = columns;
		this._rows = rows;

		this.xterm = new XtermTerminal({
			cols: columns,
			rows: rows,
			disableStdin: true,
			allowProposedApi: true,
		});
	}

	start(onInput: (data: string) => void, onResize: () => void): void {
		this.inputHandler = onInput;
		this.resizeHandler = onResize;
		this.xterm.write("\x1b[?1049h\x1b[H");
	}

	stop(): void {
		this.xterm.write("\x1b[?1049l");
		this.inputHandler = undefined;
		this.resizeHandler = undefined;
	}

	write(data: string): void {
		this._writes.push(data);
		this.xterm.write(data);
	}

	get columns(): number {
		return this._columns;
	}

	get rows(): number {
		return this._rows;
	}

	/** Every string passed to write() so far */
	get writes(): readonly string[] {
		return this._writes;
	}

	hideCursor(): void {
		this.write("\x1b[?25l");
	}

	showCursor(): void {
		this.write("\x1b[?25h");
	}

	setTitle(title: string): void {
		this.write(`\x1b]0;${title}\x07`);
	}

	// Test-specific methods not in Terminal interface

	/**
	 * Simulate keyboard input
	 */
	sendInput(data: string): void {
		if (this.inputHandler) {
			this.inputHandler(data);
		}
	}

	/**
	 * Resize the terminal
	 */
	resize(columns: number, rows: number): void {
		this._columns = columns;
		this._rows = rows;
		this.xterm.resize(columns, rows);
		if (this.resizeHandler) {
			this.resizeHandler();
		}
	}

	/**
	 * Let a pending render run, then wait for xterm to parse everything written so far.
	 */
	async flush(): Promise<void> {
		await new Promise<void>((resolve) => process.nextTick(resolve));
		return new Promise<void>((resolve) => {
			this.xterm.write("", () => resolve());
		});
	}

	/**
	 * Flush and get viewport - convenience method for tests
	 */
	async flushAndGetViewport(): Promise<string[]> {
		await this.flush();
		return this.getViewport();
	}

	/**
	 * Get the visible viewport (what's currently on screen)
	 */
	getViewport(): string[] {
		const lines: string[] = [];
		const buffer = this.xterm.buffer.active;
		for (let i = 0; i < this.xterm.rows; i++) {
			const line = buffer.getLine(buffer.viewportY + i);
			lines.push(line ? line.translateToString(true) : "");
		}
		return lines;
	}

	/**
	 * Whether the cell at (row, col) of the viewport is drawn bold
	 */
	isBold(row: number, col: number): boolean {
		const buffer = this.xterm.buffer.active;
		const cell = buffer.getLine(buffer.viewportY + row)?.getCell(col);
		return cell !== undefined && cell.isBold() !== 0;
	}
}
