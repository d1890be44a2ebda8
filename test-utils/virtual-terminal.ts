/**
 * Virtual terminal utilities for TUI tests.
 *
 * Strips ANSI escape codes for plaintext comparison and provides a
 * recording terminal that stands in for pi-tui's ProcessTerminal.
 */

import type { TerminalSurface } from "../src/session/loop.js";

// ── ANSI Stripping ───────────────────────────────────────────────────────────

/**
 * Regex matching all common ANSI escape sequences:
 * - CSI sequences: \x1b[...m, \x1b[?25l (colors, cursor, screen modes)
 * - OSC sequences: \x1b]...ST (hyperlinks, window titles)
 * - Simple escapes: \x1b followed by a single letter
 */
// biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI stripping requires matching control characters
const ANSI_REGEX = /\x1b(?:\[[?0-9;]*[A-Za-z]|\][^\x07\x1b]*(?:\x07|\x1b\\)|[A-Za-z])/g;

/**
 * Strip ANSI escape codes from text for plaintext comparison.
 *
 * @param text - Text possibly containing ANSI codes
 * @returns Clean plaintext with no escape sequences
 */
export function stripAnsi(text: string): string {
	return text.replace(ANSI_REGEX, "");
}

/**
 * Strip every line of a rendered frame and drop trailing spaces.
 *
 * @param lines - Rendered frame
 */
export function plainLines(lines: readonly string[]): string[] {
	return lines.map((line) => stripAnsi(line).trimEnd());
}

// ── Recording Terminal ───────────────────────────────────────────────────────

/**
 * In-memory terminal: records writes, lets tests type keys and resize.
 */
export class RecordingTerminal implements TerminalSurface {
	readonly writes: string[] = [];
	started = false;
	stopped = false;

	private onInput: ((data: string) => void) | undefined;
	private onResize: (() => void) | undefined;

	constructor(
		public columns = 80,
		public rows = 24,
		private readonly failOnStart?: Error
	) {}

	start(onInput: (data: string) => void, onResize: () => void): void {
		if (this.failOnStart) throw this.failOnStart;
		this.started = true;
		this.onInput = onInput;
		this.onResize = onResize;
	}

	stop(): void {
		this.stopped = true;
	}

	write(data: string): void {
		this.writes.push(data);
	}

	/**
	 * Deliver raw input as if typed.
	 *
	 * @param keys - One chunk per keypress
	 */
	type(...keys: string[]): void {
		for (const key of keys) this.onInput?.(key);
	}

	/**
	 * Change the size and fire the resize callback.
	 *
	 * @param columns - New width
	 * @param rows - New height
	 */
	resize(columns: number, rows: number): void {
		this.columns = columns;
		this.rows = rows;
		this.onResize?.();
	}

	/** Everything written so far, ANSI stripped. */
	get plainOutput(): string {
		return stripAnsi(this.writes.join(""));
	}

	/** Last write, ANSI stripped and split into trimmed lines. */
	lastFrame(): string[] {
		const last = this.writes.at(-1) ?? "";
		return stripAnsi(last)
			.split("\r\n")
			.map((line) => line.trimEnd());
	}
}
