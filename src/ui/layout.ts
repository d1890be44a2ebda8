/**
 * Line-based layout helpers: bordered boxes, clipping and placement inside
 * the viewport. All functions take and return arrays of terminal lines and
 * measure with ANSI-aware widths.
 *
 * @module
 */

import { truncateToWidth, visibleWidth } from "@mariozechner/pi-tui";
import { type BorderStyle, SHARP } from "./border-styles.js";
import type { StyleFn } from "./theme.js";

/** Configuration for {@link renderBox}. */
export interface BoxOptions {
	/** Border character set (default: SHARP) */
	borderStyle?: BorderStyle;
	/** Horizontal padding inside the border (default: 1) */
	paddingX?: number;
	/** Blank lines above and below the content (default: 0) */
	paddingY?: number;
	/** Outer width including borders; fits the content when omitted */
	width?: number;
	/** Upper bound on the outer width, usually the viewport width */
	maxWidth?: number;
	/** Color function applied to border characters */
	borderColorFn?: StyleFn;
}

/**
 * Cut a line down to `width` visible cells.
 *
 * @param line - Possibly styled line
 * @param width - Maximum visible width
 */
export function clipLine(line: string, width: number): string {
	if (width <= 0) return "";
	return visibleWidth(line) > width ? truncateToWidth(line, width, "") : line;
}

/**
 * Pad a line with spaces up to `width` visible cells.
 *
 * @param line - Possibly styled line
 * @param width - Target visible width
 */
export function padLine(line: string, width: number): string {
	return line + " ".repeat(Math.max(0, width - visibleWidth(line)));
}

/**
 * Widest visible line.
 *
 * @param lines - Lines to measure
 */
export function blockWidth(lines: readonly string[]): number {
	return lines.reduce((max, line) => Math.max(max, visibleWidth(line)), 0);
}

/**
 * Wrap content lines in a full border.
 *
 * Usage:
 * ```typescript
 * const lines = renderBox(["line 1", "line 2"], { paddingX: 3, width: 58 });
 * ```
 *
 * @param contentLines - Pre-rendered content lines
 * @param options - Border style, padding, sizing and color
 * @returns Lines including top and bottom borders
 */
export function renderBox(contentLines: readonly string[], options: BoxOptions = {}): string[] {
	const style = options.borderStyle ?? SHARP;
	const padX = options.paddingX ?? 1;
	const padY = options.paddingY ?? 0;
	const colorBorder = options.borderColorFn ?? ((s: string) => s);

	let width = options.width ?? blockWidth(contentLines) + 2 + padX * 2;
	if (options.maxWidth !== undefined) width = Math.min(width, options.maxWidth);

	const innerWidth = width - 2 - padX * 2; // borders + padding
	if (innerWidth < 1) return [...contentLines];

	const pad = " ".repeat(padX);
	const blank = Array.from({ length: padY }, () => "");

	const bodyLines = [...blank, ...contentLines, ...blank].map(
		(line) =>
			colorBorder(style.vertical) +
			pad +
			padLine(clipLine(line, innerWidth), innerWidth) +
			pad +
			colorBorder(style.vertical)
	);

	const topBar = colorBorder(style.topLeft + style.horizontal.repeat(width - 2) + style.topRight);
	const bottomBar = colorBorder(
		style.bottomLeft + style.horizontal.repeat(width - 2) + style.bottomRight
	);

	return [topBar, ...bodyLines, bottomBar];
}

/** Vertical anchoring for {@link place}. */
export type VerticalAnchor = "top" | "center";

/**
 * Position a block inside the viewport: centred horizontally, anchored
 * vertically, clipped to both dimensions.
 *
 * @param lines - Block to place
 * @param width - Viewport width
 * @param height - Viewport height
 * @param vertical - Vertical anchor
 * @returns At most `height` lines, none wider than `width`
 */
export function place(
	lines: readonly string[],
	width: number,
	height: number,
	vertical: VerticalAnchor
): string[] {
	if (width <= 0 || height <= 0) return [];

	const left = Math.max(0, Math.floor((width - blockWidth(lines)) / 2));
	const top = vertical === "center" ? Math.max(0, Math.floor((height - lines.length) / 2)) : 0;
	const indent = " ".repeat(left);

	const placed = [
		...Array.from({ length: top }, () => ""),
		...lines.map((line) => clipLine(indent + line, width)),
	];
	return placed.slice(0, height);
}
