import { describe, expect, it } from "vitest";
import { plainLines, stripAnsi } from "../../../test-utils/index.js";
import { ROUNDED } from "../border-styles.js";
import { blockWidth, clipLine, padLine, place, renderBox } from "../layout.js";
import { FALLBACK_SPINNER, isSpinnerName, resolveSpinner, spinnerGlyph } from "../spinner.js";
import { defaultTheme, fg, plainTheme, themeFor } from "../theme.js";

// ── Layout ───────────────────────────────────────────────────────────────────

describe("renderBox", () => {
	it("fits the content when no width is given", () => {
		expect(renderBox(["ab", "c"])).toEqual(["┌────┐", "│ ab │", "│ c  │", "└────┘"]);
	});

	it("clips content to a fixed width", () => {
		expect(plainLines(renderBox(["abcdef"], { width: 6, borderStyle: ROUNDED }))).toEqual([
			"╭────╮",
			"│ ab │",
			"╰────╯",
		]);
	});

	it("adds vertical padding and colours only the border", () => {
		const lines = renderBox(["x"], { paddingY: 1, borderColorFn: (s) => `<${s}>` });
		expect(lines).toEqual(["<┌───┐>", "<│>   <│>", "<│> x <│>", "<│>   <│>", "<└───┘>"]);
	});

	it("returns the content unchanged when the borders do not fit", () => {
		expect(renderBox(["abc"], { width: 3 })).toEqual(["abc"]);
	});
});

describe("line helpers", () => {
	it("clips and pads by visible width", () => {
		expect(stripAnsi(clipLine("abcdef", 3))).toBe("abc");
		expect(clipLine("abc", 0)).toBe("");
		expect(padLine("ab", 4)).toBe("ab  ");
		expect(blockWidth(["a", "abc", ""])).toBe(3);
	});

	it("measures styled text by what is visible", () => {
		expect(blockWidth([fg("#ffffff")("abc")])).toBe(3);
	});
});

describe("place", () => {
	it("centres a block in both directions", () => {
		expect(place(["ab"], 6, 3, "center")).toEqual(["", "  ab"]);
	});

	it("anchors at the top and clips to the viewport", () => {
		expect(plainLines(place(["abcdef", "x", "y"], 4, 2, "top"))).toEqual(["abcd", "x"]);
	});

	it("returns nothing for an empty viewport", () => {
		expect(place(["a"], 0, 5, "top")).toEqual([]);
	});
});

// ── Spinner ──────────────────────────────────────────────────────────────────

describe("spinner presets", () => {
	it("resolves cli-spinners presets by name", () => {
		expect(isSpinnerName("line")).toBe(true);
		expect(resolveSpinner("line")).toBe(FALLBACK_SPINNER);
		expect(resolveSpinner("no-such-spinner")).toBeUndefined();
		expect(isSpinnerName("toString")).toBe(false);
	});

	it("cycles through the frames", () => {
		const preset = { frames: ["a", "b", "c"], interval: 80 };
		expect([0, 1, 2, 3, 7].map((frame) => spinnerGlyph(preset, frame))).toEqual([
			"a",
			"b",
			"c",
			"a",
			"b",
		]);
		expect(spinnerGlyph({ frames: [], interval: 80 }, 4)).toBe("");
	});
});

// ── Theme ────────────────────────────────────────────────────────────────────

describe("themes", () => {
	it("wraps text in 24-bit colour codes", () => {
		expect(fg("#F5E642")("hi")).toBe("\x1b[38;2;245;230;66mhi\x1b[39m");
	});

	it("picks the plain theme when colour is off", () => {
		expect(themeFor(false)).toBe(plainTheme);
		expect(themeFor(true)).toBe(defaultTheme);
		expect(plainTheme.badge("RESULTS")).toBe("RESULTS");
	});
});
