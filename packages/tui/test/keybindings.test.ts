import assert from "node:assert";
import { describe, it } from "node:test";
import { KeybindingsManager } from "../src/keybindings.js";

type Action = "down" | "up" | "quit";

const defaults = {
	down: ["j", "down"],
	up: ["k", "up"],
	quit: "q",
};

describe("KeybindingsManager", () => {
	it("matches every key bound to an action", () => {
		const keys = new KeybindingsManager<Action>(defaults);
		assert.strictEqual(keys.matches("j", "down"), true);
		assert.strictEqual(keys.matches("\x1b[B", "down"), true);
		assert.strictEqual(keys.matches("k", "down"), false);
		assert.strictEqual(keys.matches("q", "quit"), true);
	});

	it("finds the first action bound to an input", () => {
		const keys = new KeybindingsManager<Action>(defaults);
		assert.strictEqual(keys.actionFor("\x1b[A", ["down", "up", "quit"]), "up");
		assert.strictEqual(keys.actionFor("x", ["down", "up", "quit"]), undefined);
	});

	it("replaces the keys of a rebound action without touching the defaults", () => {
		const keys = new KeybindingsManager<Action>(defaults);
		keys.setKeys("quit", ["ctrl+q", "escape"]);
		assert.deepStrictEqual(keys.getKeys("quit"), ["ctrl+q", "escape"]);
		assert.strictEqual(keys.matches("q", "quit"), false);
		assert.strictEqual(keys.matches("\x11", "quit"), true);
		assert.strictEqual(defaults.quit, "q");
	});
});
