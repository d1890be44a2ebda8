/**
 * Pulls result records out of the HTML fragment the search endpoint embeds
 * in its JSON envelope.
 *
 * Scraping is pattern-based and tied to the upstream markup: each result is
 * an `<a class="item">` anchor holding three metadata spans followed by a
 * title div. Blocks that do not carry all five pieces are skipped without a
 * trace, and a layout change upstream yields zero results rather than an
 * error. That permissiveness is relied upon; partial markup is common.
 */

import type { SearchResult } from "./types.js";

/**
 * Filler allowed between two captured groups: anything, newlines included,
 * up to (but not across) the end of the current anchor or the start of the
 * next one.
 */
const GAP = String.raw`(?:(?!<\/a>|<a\s)[\s\S])*?`;

const ITEM_PATTERN = new RegExp(
	[
		String.raw`<a class="item" href="([^"]+)">`,
		String.raw`<span>([^<]+)<\/span>`,
		String.raw`<span>([^<]+)<\/span>`,
		String.raw`<span>([^<]+)<\/span>`,
		String.raw`<div class="title">([^<]+)<\/div>`,
	].join(GAP),
	"g"
);

/** Separator between metadata fields in the subtitle line. */
const SUBTITLE_SEPARATOR = "  ";

/**
 * Collapse whitespace runs left behind by multi-line markup.
 *
 * @param text - Raw captured text
 */
function clean(text: string): string {
	return text.replace(/\s+/g, " ").trim();
}

/**
 * Extract result records from a search fragment, in document order.
 *
 * No deduplication, sorting or validation: "2020" and "S1" are equally
 * acceptable year fields. Deciding what an empty result means is left to
 * the caller.
 *
 * @param html - Fragment taken from the envelope's `result.html`
 * @returns One record per well-formed item block
 */
export function extractResults(html: string): SearchResult[] {
	const results: SearchResult[] = [];

	for (const match of html.matchAll(ITEM_PATTERN)) {
		const [, href, kind, year, duration, title] = match;
		if (!href || !kind || !year || !duration || !title) continue;

		const cleanTitle = clean(title);
		if (!cleanTitle) continue;

		results.push({
			title: cleanTitle,
			subtitle: [kind, year, duration].map(clean).join(SUBTITLE_SEPARATOR),
			targetPath: href.trim(),
		});
	}

	return results;
}
