import * as fs from "node:fs";
import * as tty from "node:tty";
import koffi from "koffi";
import { StdinBuffer } from "./stdin-buffer.js";

/**
 * Minimal terminal interface for TUI
 */
export interface Terminal {
	// Start the terminal with input and resize handlers
	start(onInput: (data: string) => void, onResize: () => void): void;

	// Stop the terminal and restore state
	stop(): void;

	// Write output to terminal
	write(data: string): void;

	// Get terminal dimensions
	get columns(): number;
	get rows(): number;

	// Cursor visibility
	hideCursor(): void;
	showCursor(): void;

	// Set terminal window title
	setTitle(title: string): void;
}

/** Background color reported by the terminal, each channel normalized to 0..1 */
export interface RgbColor {
	r: number;
	g: number;
	b: number;
}

type InputStream = NodeJS.ReadableStream & {
	isTTY?: boolean;
	isRaw?: boolean;
	setRawMode?: (mode: boolean) => unknown;
};

// OSC 11 reply: ESC ] 11 ; rgb:RRRR/GGGG/BBBB terminated by BEL or ST
const oscColorReplyPattern = /^\x1b\]11;rgb:([0-9a-f]{1,4})\/([0-9a-f]{1,4})\/([0-9a-f]{1,4})(?:\x07|\x1b\\)$/i;

/**
 * Parse a reply to the OSC 11 background color query.
 * Channels may carry one to four hex digits; each is scaled by its own maximum.
 */
export function parseBackgroundColorReply(sequence: string): RgbColor | undefined {
	const match = sequence.match(oscColorReplyPattern);
	if (!match) {
		return undefined;
	}
	const channel = (hex: string): number => parseInt(hex, 16) / (16 ** hex.length - 1);
	const [, r, g, b] = match;
	if (r === undefined || g === undefined || b === undefined) {
		return undefined;
	}
	return { r: channel(r), g: channel(g), b: channel(b) };
}

/**
 * Real terminal on the alternate screen.
 *
 * Output goes to process.stdout. Keys are read from process.stdin when it is a
 * TTY; when stdin carries piped content, the controlling terminal is opened
 * instead (/dev/tty, or CONIN$ on Windows).
 */
export class ProcessTerminal implements Terminal {
	private wasRaw = false;
	private inputHandler?: (data: string) => void;
	private resizeHandler?: () => void;
	private stdinBuffer?: StdinBuffer;
	private stdinDataHandler?: (data: string | Buffer) => void;
	private input?: InputStream;
	private ownedInput?: tty.ReadStream;
	private writeLogPath = process.env.MAT_TUI_WRITE_LOG || "";

	start(onInput: (data: string) => void, onResize: () => void): void {
		this.inputHandler = onInput;
		this.resizeHandler = onResize;

		const input = this.openInput();
		this.wasRaw = input.isRaw || false;
		input.setRawMode?.(true);
		input.setEncoding("utf8");
		input.resume();

		// Alternate screen, cursor home
		this.write("\x1b[?1049h\x1b[H");

		process.stdout.on("resize", this.resizeHandler);

		// Must run after setRawMode(true), which resets console mode flags
		this.enableWindowsVTInput();

		this.stdinBuffer = new StdinBuffer({ timeout: 10 });
		this.stdinBuffer.on("data", (sequence) => {
			this.inputHandler?.(sequence);
		});
		const buffer = this.stdinBuffer;
		this.stdinDataHandler = (data: string | Buffer) => {
			buffer.process(data);
		};
		input.on("data", this.stdinDataHandler);
	}

	/**
	 * Ask the terminal for its background color (OSC 11) and wait up to
	 * `timeoutMs` for the reply. Resolves undefined when the terminal does not
	 * answer or the input is not a terminal. Must be called before start().
	 */
	async queryBackgroundColor(timeoutMs = 100): Promise<RgbColor | undefined> {
		if (!process.stdout.isTTY) {
			return undefined;
		}
		const input = this.openInput();
		if (!input.setRawMode) {
			return undefined;
		}
		const wasRaw = input.isRaw || false;
		input.setRawMode(true);
		input.setEncoding("utf8");
		input.resume();

		const buffer = new StdinBuffer({ timeout: 10 });
		const onData = (data: string | Buffer) => {
			buffer.process(data);
		};

		try {
			return await new Promise<RgbColor | undefined>((resolve) => {
				const timer = setTimeout(() => resolve(undefined), timeoutMs);
				buffer.on("data", (sequence) => {
					const color = parseBackgroundColorReply(sequence);
					if (color) {
						clearTimeout(timer);
						resolve(color);
					}
				});
				input.on("data", onData);
				this.write("\x1b]11;?\x1b\\");
			});
		} finally {
			input.removeListener("data", onData);
			buffer.destroy();
			input.pause();
			input.setRawMode(wasRaw);
		}
	}

	private openInput(): InputStream {
		if (this.input) {
			return this.input;
		}
		if (process.stdin.isTTY) {
			this.input = process.stdin;
			return this.input;
		}
		const device = process.platform === "win32" ? "CONIN$" : "/dev/tty";
		this.ownedInput = new tty.ReadStream(fs.openSync(device, "r"));
		this.input = this.ownedInput;
		return this.input;
	}

	/**
	 * On Windows, add ENABLE_VIRTUAL_TERMINAL_INPUT (0x0200) to the stdin
	 * console handle so the console sends VT sequences for arrow and
	 * navigation keys instead of raw console events.
	 */
	private enableWindowsVTInput(): void {
		if (process.platform !== "win32") return;
		try {
			const k32 = koffi.load("kernel32.dll");
			const GetStdHandle = k32.func("void* __stdcall GetStdHandle(int)");
			const GetConsoleMode = k32.func("bool __stdcall GetConsoleMode(void*, _Out_ uint32_t*)");
			const SetConsoleMode = k32.func("bool __stdcall SetConsoleMode(void*, uint32_t)");

			const STD_INPUT_HANDLE = -10;
			const ENABLE_VIRTUAL_TERMINAL_INPUT = 0x0200;
			const handle = GetStdHandle(STD_INPUT_HANDLE);
			const mode = new Uint32Array(1);
			GetConsoleMode(handle, mode);
			SetConsoleMode(handle, (mode[0] ?? 0) | ENABLE_VIRTUAL_TERMINAL_INPUT);
		} catch (error) {
			// Arrow keys keep arriving as console events; letter keys still navigate
			this.logWrite(`\n[enableWindowsVTInput failed: ${String(error)}]\n`);
		}
	}

	stop(): void {
		if (this.stdinBuffer) {
			this.stdinBuffer.destroy();
			this.stdinBuffer = undefined;
		}

		const input = this.input;
		if (input && this.stdinDataHandler) {
			input.removeListener("data", this.stdinDataHandler);
		}
		this.stdinDataHandler = undefined;
		this.inputHandler = undefined;
		if (this.resizeHandler) {
			process.stdout.removeListener("resize", this.resizeHandler);
			this.resizeHandler = undefined;
		}

		// Leave alternate screen
		this.write("\x1b[?1049l");

		if (input) {
			// Pause so buffered input is not re-interpreted by the shell after raw mode ends
			input.pause();
			input.setRawMode?.(this.wasRaw);
		}
		if (this.ownedInput) {
			this.ownedInput.destroy();
			this.ownedInput = undefined;
		}
		this.input = undefined;
	}

	write(data: string): void {
		process.stdout.write(data);
		this.logWrite(data);
	}

	private logWrite(data: string): void {
		if (!this.writeLogPath) {
			return;
		}
		try {
			fs.appendFileSync(this.writeLogPath, data, { encoding: "utf8" });
		} catch {
			// Stop logging after the first failed append
			this.writeLogPath = "";
		}
	}

	get columns(): number {
		return process.stdout.columns || 80;
	}

	get rows(): number {
		return process.stdout.rows || 24;
	}

	hideCursor(): void {
		this.write("\x1b[?25l");
	}

	showCursor(): void {
		this.write("\x1b[?25h");
	}

	setTitle(title: string): void {
		// OSC 0;title BEL - set terminal window title
		this.write(`\x1b]0;${title}\x07`);
	}
}
