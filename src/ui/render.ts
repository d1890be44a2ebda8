/**
 * Pure renderer: Session → frame lines.
 *
 * No I/O and no mutation. Branches on the session mode only; styling comes
 * from the Theme passed in. Returns an empty frame until the viewport size
 * is known.
 */

import { visibleWidth, wrapTextWithAnsi } from "@mariozechner/pi-tui";
import { APP_NAME } from "../config.js";
import {
	filterRows,
	listHeight,
	listWidth,
	pageSize,
	showsFilterLine,
	visibleWindow,
} from "../session/list-view.js";
import type { QueryBuffer } from "../session/query-buffer.js";
import type { Session, Viewport } from "../session/state.js";
import { ROUNDED } from "./border-styles.js";
import { place, renderBox } from "./layout.js";
import { type SpinnerPreset, spinnerGlyph } from "./spinner.js";
import type { Theme } from "./theme.js";

/** Everything the renderer needs besides the session. */
export interface RenderOptions {
	readonly theme: Theme;
	readonly spinner: SpinnerPreset;
}

/** Outer width of the search and loading boxes. */
const PANEL_WIDTH = 60;

/** Visible width of the search field. */
const FIELD_WIDTH = 44;

const TAGLINE = "search titles from your terminal";
const PLACEHOLDER = "search title...";

/**
 * Render one frame.
 *
 * @param session - Current session
 * @param options - Theme and spinner preset
 * @returns Frame lines, at most viewport height, none wider than the viewport
 */
export function render(session: Session, options: RenderOptions): string[] {
	const viewport = session.viewport;
	if (!viewport || viewport.width <= 0 || viewport.height <= 0) return [];

	switch (session.mode) {
		case "input":
			return renderInput(session, viewport, options.theme);
		case "waiting":
			return renderWaiting(session, viewport, options);
		case "showing":
			return renderShowing(session, viewport, options.theme);
		case "failed":
			return renderFailed(session, viewport, options.theme);
	}
}

/**
 * Key hint line: badge + description pairs.
 *
 * @param pairs - [key, description] pairs
 * @param theme - Styles
 */
export function hintLine(pairs: ReadonlyArray<readonly [string, string]>, theme: Theme): string {
	const parts = pairs.map(([key, desc]) => `${theme.key(` ${key} `)} ${theme.hint(desc)}`);
	return `  ${parts.join("   ")}`;
}

/**
 * The search field: visible window of the text with the cursor cell,
 * or the placeholder when empty.
 *
 * @param buffer - Edit buffer
 * @param theme - Styles
 */
export function renderField(buffer: QueryBuffer, theme: Theme): string {
	const prompt = theme.prompt("> ");
	const chars = [...buffer.text];

	if (chars.length === 0) {
		const [first = " ", ...rest] = [...PLACEHOLDER];
		return prompt + theme.cursor(first) + theme.placeholder(rest.join(""));
	}

	const start = Math.max(0, buffer.cursor - FIELD_WIDTH + 1);
	const visible = chars.slice(start, start + FIELD_WIDTH);
	const cursorAt = buffer.cursor - start;

	const before = visible.slice(0, cursorAt).join("");
	const under = visible[cursorAt] ?? " ";
	const after = visible.slice(cursorAt + 1).join("");

	return prompt + theme.inputText(before) + theme.cursor(under) + theme.inputText(after);
}

/**
 * Search screen.
 *
 * @param session - Session in input mode
 * @param viewport - Terminal size
 * @param theme - Styles
 */
function renderInput(session: Session, viewport: Viewport, theme: Theme): string[] {
	const content = [
		theme.logo(APP_NAME.toUpperCase()),
		theme.tagline(TAGLINE),
		"",
		theme.divider("-".repeat(50)),
		"",
		theme.label("SEARCH"),
		`  ${renderField(session.query, theme)}`,
		"",
		hintLine(
			[
				["ENTER", "search"],
				["CTRL+C", "quit"],
			],
			theme
		),
	];
	const box = renderBox(content, {
		width: PANEL_WIDTH,
		maxWidth: viewport.width,
		paddingX: 3,
		paddingY: 1,
		borderColorFn: theme.border,
	});
	return place(box, viewport.width, viewport.height, "center");
}

/**
 * Loading screen: spinner plus the query being searched.
 *
 * @param session - Session in waiting mode
 * @param viewport - Terminal size
 * @param options - Theme and spinner preset
 */
function renderWaiting(session: Session, viewport: Viewport, options: RenderOptions): string[] {
	const { theme, spinner } = options;
	const glyph = theme.spinner(spinnerGlyph(spinner, session.spinnerFrame));
	const line = `  ${glyph}  ${theme.loading(`searching for "${session.searchedQuery}"`)}`;
	const box = renderBox([line], {
		width: PANEL_WIDTH,
		maxWidth: viewport.width,
		paddingX: 3,
		paddingY: 1,
		borderColorFn: theme.border,
	});
	return place(box, viewport.width, viewport.height, "center");
}

/**
 * Results screen: header, filter line, the current page of entries, hints.
 *
 * @param session - Session in showing mode
 * @param viewport - Terminal size
 * @param theme - Styles
 */
function renderShowing(session: Session, viewport: Viewport, theme: Theme): string[] {
	const { items, list } = session;
	const width = listWidth(viewport);
	const height = listHeight(viewport, list);
	const rows = filterRows(items, list.filter);
	const size = pageSize(viewport, list);
	const window = visibleWindow(rows.length, list.highlighted, size);

	const total = items.length;
	const countText =
		list.filter === ""
			? `  ${total} results for "${session.searchedQuery}"`
			: `  ${rows.length} of ${total} results for "${session.searchedQuery}"`;
	const header = theme.badge("  RESULTS  ") + theme.count(countText);
	const divider = theme.divider("-".repeat(width));

	const filterLines = showsFilterLine(list)
		? [`Filter: ${theme.inputText(list.filter)}${list.filtering ? theme.cursor(" ") : ""}`]
		: [];

	const body: string[] = [];
	if (rows.length === 0) {
		body.push(theme.hint("  No items match the filter."));
	}
	for (let row = window.start; row < window.end; row++) {
		const item = items[rows[row] ?? -1];
		if (!item) continue;
		if (row > window.start) body.push("");
		if (row === list.highlighted) {
			body.push(theme.selectedTitle("> ") + theme.selectedTitle(item.title));
			body.push(`  ${theme.selectedDesc(item.subtitle)}`);
		} else {
			body.push(`  ${theme.normalTitle(item.title)}`);
			body.push(`  ${theme.normalDesc(item.subtitle)}`);
		}
	}
	const clippedBody = body.slice(0, height);
	while (clippedBody.length < height) clippedBody.push("");

	const hints = list.filtering
		? hintLine(
				[
					["ENTER", "apply filter"],
					["ESC", "clear filter"],
				],
				theme
			)
		: hintLine(
				[
					["UP/DOWN", "navigate"],
					["ENTER", "open"],
					["ESC", "back"],
					["/", "filter"],
				],
				theme
			);
	const pager = window.pages > 1 ? theme.pager(`   ${window.page + 1}/${window.pages}`) : "";

	const block = [
		header,
		divider,
		...filterLines,
		...clippedBody,
		divider,
		hints + pager,
	];

	return place(padBlock(block, width), viewport.width, viewport.height, "top");
}

/**
 * Give every line the block's width so `place` centres the list column
 * as a whole rather than line by line.
 *
 * @param lines - Block lines
 * @param width - Column width
 */
function padBlock(lines: readonly string[], width: number): string[] {
	const target = Math.max(width, ...lines.map((line) => visibleWidth(line)));
	return lines.map((line) => line + " ".repeat(Math.max(0, target - visibleWidth(line))));
}

/**
 * Error screen.
 *
 * @param session - Session in failed mode
 * @param viewport - Terminal size
 * @param theme - Styles
 */
function renderFailed(session: Session, viewport: Viewport, theme: Theme): string[] {
	const message = session.lastError?.message ?? "unknown error";
	const wrapWidth = Math.max(10, Math.min(72, viewport.width - 10));
	const messageLines = wrapTextWithAnsi(message, wrapWidth).map((line) => theme.errorText(line));

	const content = [
		theme.label("ERROR"),
		"",
		...messageLines,
		"",
		theme.hint("press ESC to go back"),
	];
	const box = renderBox(content, {
		borderStyle: ROUNDED,
		maxWidth: viewport.width,
		paddingX: 3,
		paddingY: 1,
		borderColorFn: theme.errorBorder,
	});
	return place(box, viewport.width, viewport.height, "center");
}
