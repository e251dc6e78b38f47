import { describe, expect, it, vi } from "vitest";
import { getPalette, isLightBackground, parseThemeMode, resolveTheme, themeFromColorFgBg } from "../src/theme/theme.js";

describe("parseThemeMode", () => {
	it("accepts light and dark in any case", () => {
		expect(parseThemeMode("Light")).toBe("light");
		expect(parseThemeMode("DARK")).toBe("dark");
		expect(parseThemeMode("solarized")).toBeUndefined();
	});
});

describe("isLightBackground", () => {
	it("classifies by relative luminance", () => {
		expect(isLightBackground({ r: 1, g: 1, b: 1 })).toBe(true);
		expect(isLightBackground({ r: 0.1, g: 0.1, b: 0.1 })).toBe(false);
		// Pure green alone is above the threshold, pure blue is not
		expect(isLightBackground({ r: 0, g: 1, b: 0 })).toBe(true);
		expect(isLightBackground({ r: 0, g: 0, b: 1 })).toBe(false);
	});
});

describe("themeFromColorFgBg", () => {
	it("reads the background index from the last field", () => {
		expect(themeFromColorFgBg("15;0")).toBe("dark");
		expect(themeFromColorFgBg("0;15")).toBe("light");
		expect(themeFromColorFgBg("0;default;15")).toBe("light");
	});

	it("ignores values it cannot read", () => {
		expect(themeFromColorFgBg(undefined)).toBeUndefined();
		expect(themeFromColorFgBg("7")).toBeUndefined();
		expect(themeFromColorFgBg("a;b")).toBeUndefined();
	});
});

describe("resolveTheme", () => {
	it("uses an explicit choice without asking the terminal", async () => {
		const queryBackground = vi.fn(async () => ({ r: 1, g: 1, b: 1 }));
		expect(await resolveTheme("dark", { queryBackground, env: {} })).toBe("dark");
		expect(queryBackground).not.toHaveBeenCalled();
	});

	it("classifies the reported background", async () => {
		expect(await resolveTheme(undefined, { queryBackground: async () => ({ r: 0.95, g: 0.95, b: 0.9 }), env: {} })).toBe(
			"light",
		);
	});

	it("falls back to COLORFGBG when the terminal does not answer", async () => {
		expect(await resolveTheme(undefined, { queryBackground: async () => undefined, env: { COLORFGBG: "0;15" } })).toBe(
			"light",
		);
	});

	it("falls back to COLORFGBG when the query fails", async () => {
		const queryBackground = async () => {
			throw new Error("no terminal");
		};
		expect(await resolveTheme(undefined, { queryBackground, env: { COLORFGBG: "0;15" } })).toBe("light");
	});

	it("defaults to dark", async () => {
		expect(await resolveTheme(undefined, { env: {} })).toBe("dark");
	});
});

describe("getPalette", () => {
	it("gives each theme its own status bar colors", () => {
		expect(getPalette("light").statusBg).toEqual({ r: 200, g: 200, b: 200 });
		expect(getPalette("dark").statusBg).toBe("darkGray");
	});
});
