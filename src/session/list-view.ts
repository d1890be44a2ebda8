/**
 * Navigation state for the result list: highlight, filter and paging.
 *
 * The highlighted index points into the *filtered* rows. Paging is derived
 * from the highlight and the viewport, so no scroll offset is stored.
 */

import type { SearchResult } from "../search/types.js";
import type { Viewport } from "./state.js";

/** Highlight and filter state of the result list. */
export interface ListState {
	/** Index into the filtered rows */
	readonly highlighted: number;
	/** Case-insensitive title filter ("" = no filter) */
	readonly filter: string;
	/** Whether keystrokes currently edit the filter */
	readonly filtering: boolean;
}

/** Initial list state: first row, no filter. */
export const INITIAL_LIST: ListState = { highlighted: 0, filter: "", filtering: false };

/** Lines used by one entry: title + metadata. */
export const ITEM_HEIGHT = 2;

/** Blank lines between entries. */
export const ITEM_SPACING = 1;

/** Lines around the list on the results screen: header, two dividers, hints, margins. */
export const RESULTS_CHROME_HEIGHT = 7;

/** Widest the list is allowed to grow. */
export const MAX_LIST_WIDTH = 84;

/** Horizontal margin kept free around the list. */
export const LIST_MARGIN_X = 8;

/**
 * Indices of the items whose title matches the filter, in order.
 *
 * @param items - All results
 * @param filter - Filter text ("" keeps everything)
 */
export function filterRows(items: readonly SearchResult[], filter: string): number[] {
	const needle = filter.trim().toLowerCase();
	const rows: number[] = [];
	items.forEach((item, index) => {
		if (!needle || item.title.toLowerCase().includes(needle)) rows.push(index);
	});
	return rows;
}

/**
 * Whether the filter line occupies a row above the list.
 *
 * @param list - List state
 */
export function showsFilterLine(list: ListState): boolean {
	return list.filtering || list.filter !== "";
}

/**
 * Width of the list column for a viewport.
 *
 * @param viewport - Terminal size
 */
export function listWidth(viewport: Viewport): number {
	return Math.max(1, Math.min(viewport.width - LIST_MARGIN_X, MAX_LIST_WIDTH));
}

/**
 * Number of lines available to the list body.
 *
 * @param viewport - Terminal size
 * @param list - List state (the filter line takes one row)
 */
export function listHeight(viewport: Viewport, list: ListState): number {
	const filterRow = showsFilterLine(list) ? 1 : 0;
	return Math.max(0, viewport.height - RESULTS_CHROME_HEIGHT - filterRow);
}

/**
 * How many entries fit in the list body at once (at least one).
 *
 * @param viewport - Terminal size, or undefined before the first resize
 * @param list - List state
 */
export function pageSize(viewport: Viewport | undefined, list: ListState): number {
	if (!viewport) return 1;
	const height = listHeight(viewport, list);
	return Math.max(1, Math.floor((height + ITEM_SPACING) / (ITEM_HEIGHT + ITEM_SPACING)));
}

/**
 * The slice of rows shown on the page containing the highlight.
 *
 * @param rowCount - Number of filtered rows
 * @param highlighted - Highlighted row
 * @param size - Page size
 * @returns Half-open range [start, end)
 */
export function visibleWindow(
	rowCount: number,
	highlighted: number,
	size: number
): { start: number; end: number; page: number; pages: number } {
	const pages = Math.max(1, Math.ceil(rowCount / size));
	const page = Math.min(Math.floor(Math.max(highlighted, 0) / size), pages - 1);
	const start = page * size;
	return { start, end: Math.min(start + size, rowCount), page, pages };
}

/**
 * Move the highlight by `delta` rows, wrapping around at both ends.
 *
 * @param list - List state
 * @param delta - Rows to move (negative = up)
 * @param rowCount - Number of filtered rows
 */
export function moveHighlight(list: ListState, delta: number, rowCount: number): ListState {
	if (rowCount === 0) return list;
	const next = (((list.highlighted + delta) % rowCount) + rowCount) % rowCount;
	return next === list.highlighted ? list : { ...list, highlighted: next };
}

/**
 * Move the highlight by whole pages, stopping at the ends.
 *
 * @param list - List state
 * @param pages - Pages to move (negative = up)
 * @param size - Page size
 * @param rowCount - Number of filtered rows
 */
export function movePage(list: ListState, pages: number, size: number, rowCount: number): ListState {
	return jumpTo(list, list.highlighted + pages * size, rowCount);
}

/**
 * Put the highlight on a row, clamped to the list.
 *
 * @param list - List state
 * @param row - Target row
 * @param rowCount - Number of filtered rows
 */
export function jumpTo(list: ListState, row: number, rowCount: number): ListState {
	const next = rowCount === 0 ? 0 : Math.min(Math.max(row, 0), rowCount - 1);
	return next === list.highlighted ? list : { ...list, highlighted: next };
}

/**
 * The item under the highlight, if any.
 *
 * @param items - All results
 * @param list - List state
 */
export function highlightedItem(
	items: readonly SearchResult[],
	list: ListState
): SearchResult | undefined {
	const rows = filterRows(items, list.filter);
	const index = rows[list.highlighted];
	return index === undefined ? undefined : items[index];
}
