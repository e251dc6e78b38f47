import { type KeyId, matchesKey } from "./keys.js";

// Re-export KeyId from keys.ts
export type { KeyId };

/**
 * Keys bound to each action of a component. An action may have one key or several.
 */
export type KeyBindings<A extends string> = Record<A, KeyId | KeyId[]>;

function toKeyArray(keys: KeyId | KeyId[]): KeyId[] {
	return Array.isArray(keys) ? [...keys] : [keys];
}

/**
 * Maps input sequences to the actions of a component.
 */
export class KeybindingsManager<A extends string> {
	private bindings: KeyBindings<A>;

	constructor(defaults: KeyBindings<A>) {
		this.bindings = { ...defaults };
	}

	/**
	 * Check if input matches a specific action.
	 */
	matches(data: string, action: A): boolean {
		for (const key of this.getKeys(action)) {
			if (matchesKey(data, key)) return true;
		}
		return false;
	}

	/**
	 * First action, in the order given, bound to the input.
	 */
	actionFor<B extends A>(data: string, actions: readonly B[]): B | undefined {
		return actions.find((action) => this.matches(data, action));
	}

	/**
	 * Get keys bound to an action.
	 */
	getKeys(action: A): KeyId[] {
		return toKeyArray(this.bindings[action]);
	}

	/**
	 * Rebind one action, replacing its keys.
	 */
	setKeys(action: A, keys: KeyId | KeyId[]): void {
		this.bindings[action] = toKeyArray(keys);
	}
}
