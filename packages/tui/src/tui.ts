/**
 * Minimal full-screen TUI implementation with differential rendering
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { Terminal } from "./terminal.js";
import { visibleWidth } from "./utils.js";

/**
 * Component interface - all components must implement this
 */
export interface Component {
	/**
	 * Render the component to lines for the given viewport
	 * @param width - Current viewport width
	 * @param height - Rows available to this component
	 * @returns Array of strings, each representing a line
	 */
	render(width: number, height: number): string[];

	/**
	 * Optional handler for keyboard input when component has focus
	 */
	handleInput?(data: string): void;

	/**
	 * Invalidate any cached rendering state.
	 * Called when the component needs to re-render from scratch.
	 */
	invalidate(): void;
}

export { visibleWidth };

/**
 * Container - a component that stacks its children vertically
 */
export class Container implements Component {
	children: Component[] = [];

	addChild(component: Component): void {
		this.children.push(component);
	}

	invalidate(): void {
		for (const child of this.children) {
			child.invalidate();
		}
	}

	render(width: number, height: number): string[] {
		const lines: string[] = [];
		for (const child of this.children) {
			lines.push(...child.render(width, Math.max(0, height - lines.length)));
		}
		return lines;
	}
}

/**
 * TUI - owns the whole screen and repaints only the rows that changed
 */
export class TUI extends Container {
	public terminal: Terminal;
	private previousLines: string[] = [];
	private previousWidth = 0;
	private previousHeight = 0;
	private focusedComponent: Component | null = null;
	private renderRequested = false;
	private fullRedrawCount = 0;
	private stopped = true;

	private static readonly SEGMENT_RESET = "\x1b[0m";

	constructor(terminal: Terminal) {
		super();
		this.terminal = terminal;
	}

	get fullRedraws(): number {
		return this.fullRedrawCount;
	}

	setFocus(component: Component | null): void {
		this.focusedComponent = component;
	}

	start(): void {
		this.stopped = false;
		this.terminal.start(
			(data) => this.handleInput(data),
			() => {
				this.invalidate();
				this.requestRender();
			},
		);
		this.terminal.hideCursor();
		this.requestRender();
	}

	stop(): void {
		if (this.stopped) return;
		this.stopped = true;
		this.terminal.write(TUI.SEGMENT_RESET);
		this.terminal.showCursor();
		this.terminal.stop();
	}

	requestRender(): void {
		if (this.renderRequested) return;
		this.renderRequested = true;
		process.nextTick(() => {
			this.renderRequested = false;
			this.doRender();
		});
	}

	private handleInput(data: string): void {
		if (this.focusedComponent?.handleInput) {
			this.focusedComponent.handleInput(data);
			this.requestRender();
		}
	}

	private doRender(): void {
		if (this.stopped) return;
		const width = this.terminal.columns;
		const height = this.terminal.rows;

		// Exactly one string per screen row
		const rendered = this.render(width, height).slice(0, height);
		while (rendered.length < height) {
			rendered.push("");
		}
		const newLines = rendered.map((line) => line + TUI.SEGMENT_RESET);

		for (let i = 0; i < newLines.length; i++) {
			const lineWidth = visibleWidth(newLines[i] ?? "");
			if (lineWidth > width) {
				this.stop();
				throw new Error(`Rendered line ${i} exceeds terminal width (${lineWidth} > ${width}).`);
			}
		}

		const debugRedraw = process.env.MAT_DEBUG_REDRAW === "1";
		const logRedraw = (reason: string): void => {
			if (!debugRedraw) return;
			const logPath = path.join(os.tmpdir(), "mat-debug.log");
			const msg = `[${new Date().toISOString()}] fullRender: ${reason} (size=${width}x${height})\n`;
			fs.appendFileSync(logPath, msg);
		};

		const sizeChanged = this.previousWidth !== width || this.previousHeight !== height;
		if (this.previousLines.length === 0 || sizeChanged) {
			logRedraw(this.previousLines.length === 0 ? "first render" : "terminal resized");
			this.fullRedrawCount += 1;
			let buffer = "\x1b[?2026h"; // Begin synchronized output
			buffer += "\x1b[2J";
			for (let i = 0; i < newLines.length; i++) {
				buffer += `\x1b[${i + 1};1H${newLines[i]}`;
			}
			buffer += "\x1b[?2026l"; // End synchronized output
			this.terminal.write(buffer);
			this.previousLines = newLines;
			this.previousWidth = width;
			this.previousHeight = height;
			return;
		}

		let buffer = "";
		for (let i = 0; i < newLines.length; i++) {
			const line = newLines[i];
			if (line !== this.previousLines[i]) {
				buffer += `\x1b[${i + 1};1H\x1b[2K${line}`;
			}
		}
		if (buffer.length > 0) {
			this.terminal.write(`\x1b[?2026h${buffer}\x1b[?2026l`);
		}
		this.previousLines = newLines;
	}
}
