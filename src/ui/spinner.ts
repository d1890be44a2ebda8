/**
 * Spinner presets for the Waiting screen, resolved from cli-spinners.
 *
 * The session only counts frames; which glyph a frame shows and how often
 * frames advance is decided here.
 */

import cliSpinners from "cli-spinners";

/** Names of the bundled presets. */
export type SpinnerName = keyof typeof cliSpinners;

/** Frames plus the interval between them. */
export interface SpinnerPreset {
	readonly frames: readonly string[];
	readonly interval: number;
}

/** Used when the configured name is not a cli-spinners preset. */
export const FALLBACK_SPINNER: SpinnerPreset = cliSpinners.line;

/**
 * Whether `name` is a cli-spinners preset.
 *
 * @param name - Preset name from settings or flags
 */
export function isSpinnerName(name: string): name is SpinnerName {
	return Object.hasOwn(cliSpinners, name);
}

/**
 * Resolve a preset by name.
 *
 * @param name - Preset name (e.g. "line", "dots", "arc")
 * @returns The preset, or undefined when the name is unknown
 */
export function resolveSpinner(name: string): SpinnerPreset | undefined {
	return isSpinnerName(name) ? cliSpinners[name] : undefined;
}

/**
 * Glyph for an animation frame counter.
 *
 * @param preset - Spinner preset
 * @param frame - Monotonic frame counter
 */
export function spinnerGlyph(preset: SpinnerPreset, frame: number): string {
	if (preset.frames.length === 0) return "";
	return preset.frames[frame % preset.frames.length] ?? "";
}
