import { type KeyBindings, KeybindingsManager, printableText } from "mat-tui";
import type { ViewerState } from "./viewer-state.js";

/** Columns moved by one horizontal scroll step */
export const HORIZONTAL_STEP = 4;

export const NORMAL_ACTIONS = [
	"quit",
	"scrollDown",
	"scrollUp",
	"scrollLeft",
	"scrollRight",
	"halfPageDown",
	"halfPageUp",
	"lineStart",
	"lineEnd",
	"top",
	"bottom",
	"searchForward",
	"searchCaseSensitive",
	"nextMatch",
	"prevMatch",
	"toggleFollow",
	"toggleGutter",
] as const;

export const SEARCH_ACTIONS = ["searchConfirm", "searchCancel", "searchBackspace"] as const;

export type NormalAction = (typeof NORMAL_ACTIONS)[number];
export type SearchAction = (typeof SEARCH_ACTIONS)[number];
export type ViewerAction = NormalAction | SearchAction | "forceQuit";

export const DEFAULT_VIEWER_KEYBINDINGS: KeyBindings<ViewerAction> = {
	forceQuit: "ctrl+c",
	quit: ["q", "escape"],
	scrollDown: ["j", "down"],
	scrollUp: ["k", "up"],
	scrollLeft: ["h", "left"],
	scrollRight: ["l", "right"],
	halfPageDown: ["d", "pageDown"],
	halfPageUp: ["u", "pageUp"],
	lineStart: "0",
	lineEnd: "$",
	top: ["g", "home"],
	bottom: ["G", "end"],
	searchForward: "/",
	searchCaseSensitive: "?",
	nextMatch: "n",
	prevMatch: "N",
	toggleFollow: "f",
	toggleGutter: "#",
	searchConfirm: "enter",
	searchCancel: "escape",
	searchBackspace: "backspace",
};

const NORMAL_HANDLERS: Record<NormalAction, (state: ViewerState) => void> = {
	quit: (s) => s.quit(),
	scrollDown: (s) => s.scrollDown(1),
	scrollUp: (s) => s.scrollUp(1),
	scrollLeft: (s) => s.scrollLeft(HORIZONTAL_STEP),
	scrollRight: (s) => s.scrollRight(HORIZONTAL_STEP),
	halfPageDown: (s) => s.halfPageDown(),
	halfPageUp: (s) => s.halfPageUp(),
	lineStart: (s) => s.scrollToLineStart(),
	lineEnd: (s) => s.scrollToLineEnd(),
	top: (s) => s.goToTop(),
	bottom: (s) => s.goToBottom(),
	searchForward: (s) => s.enterSearchMode(true),
	searchCaseSensitive: (s) => s.enterSearchMode(false),
	nextMatch: (s) => s.nextMatch(),
	prevMatch: (s) => s.prevMatch(),
	toggleFollow: (s) => s.toggleFollow(),
	toggleGutter: (s) => s.toggleGutter(),
};

const SEARCH_HANDLERS: Record<SearchAction, (state: ViewerState) => void> = {
	searchConfirm: (s) => s.confirmSearch(),
	searchCancel: (s) => s.cancelSearch(),
	searchBackspace: (s) => s.searchBackspace(),
};

/**
 * Routes key presses to viewer operations according to the current mode.
 * Any key clears the transient status message.
 */
export class KeyHandler {
	private state: ViewerState;
	private keybindings: KeybindingsManager<ViewerAction>;

	constructor(state: ViewerState, keybindings = new KeybindingsManager(DEFAULT_VIEWER_KEYBINDINGS)) {
		this.state = state;
		this.keybindings = keybindings;
	}

	handle(data: string): void {
		const state = this.state;
		state.statusMessage = undefined;

		if (this.keybindings.matches(data, "forceQuit")) {
			state.quit();
			return;
		}

		if (state.mode === "search") {
			const action = this.keybindings.actionFor(data, SEARCH_ACTIONS);
			if (action) {
				SEARCH_HANDLERS[action](state);
				return;
			}
			const text = printableText(data);
			if (text !== undefined) {
				state.searchAddChar(text);
			}
			return;
		}

		const action = this.keybindings.actionFor(data, NORMAL_ACTIONS);
		if (action) {
			NORMAL_HANDLERS[action](state);
		}
	}
}
