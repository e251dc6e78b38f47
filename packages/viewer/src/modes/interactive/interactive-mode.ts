/**
 * Full-screen pager: owns the terminal until the user quits.
 */

import { type Terminal, TUI } from "mat-tui";
import { APP_NAME, FOLLOW_POLL_INTERVAL_MS } from "../../config.js";
import { logError } from "../../log.js";
import type { ViewerState } from "./viewer-state.js";
import { ViewerView } from "./viewer-view.js";

export interface InteractiveModeOptions {
	pollIntervalMs?: number;
}

export class InteractiveMode {
	private ui: TUI;
	private state: ViewerState;
	private view: ViewerView;
	private pollTimer: NodeJS.Timeout | undefined;
	private pollIntervalMs: number;
	private isInitialized = false;
	private resolveExit: (() => void) | undefined;

	private readonly restoreOnExit = (): void => {
		this.stop();
	};

	private readonly handleSigterm = (): void => {
		this.stop();
		process.exit(0);
	};

	private readonly handleUncaught = (error: Error): void => {
		this.stop();
		logError(error.stack ?? error.message);
		process.exit(1);
	};

	constructor(terminal: Terminal, state: ViewerState, options: InteractiveModeOptions = {}) {
		this.ui = new TUI(terminal);
		this.state = state;
		this.view = new ViewerView(state);
		this.pollIntervalMs = options.pollIntervalMs ?? FOLLOW_POLL_INTERVAL_MS;
	}

	/** Resolves once the user quits and the terminal is restored */
	async run(): Promise<void> {
		const exited = new Promise<void>((resolve) => {
			this.resolveExit = resolve;
		});
		this.view.onQuit = () => {
			this.stop();
		};

		try {
			this.init();
			await exited;
		} finally {
			this.stop();
		}
	}

	private init(): void {
		this.ui.addChild(this.view);
		this.ui.setFocus(this.view);

		process.on("exit", this.restoreOnExit);
		process.on("SIGTERM", this.handleSigterm);
		process.on("uncaughtException", this.handleUncaught);

		this.ui.terminal.setTitle(`${APP_NAME} - ${this.state.document.sourceName}`);
		this.ui.start();
		this.isInitialized = true;

		this.pollTimer = setInterval(() => {
			if (this.state.checkFollowUpdates()) {
				this.ui.requestRender();
			}
		}, this.pollIntervalMs);
	}

	stop(): void {
		if (this.pollTimer) {
			clearInterval(this.pollTimer);
			this.pollTimer = undefined;
		}
		process.removeListener("exit", this.restoreOnExit);
		process.removeListener("SIGTERM", this.handleSigterm);
		process.removeListener("uncaughtException", this.handleUncaught);
		if (this.isInitialized) {
			this.ui.stop();
			this.isInitialized = false;
		}
		const resolve = this.resolveExit;
		this.resolveExit = undefined;
		resolve?.();
	}
}

export async function runInteractiveMode(terminal: Terminal, state: ViewerState): Promise<void> {
	await new InteractiveMode(terminal, state).run();
}
