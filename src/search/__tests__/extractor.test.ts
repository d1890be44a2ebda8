import { describe, expect, it } from "vitest";
import { extractResults } from "../extractor.js";

/**
 * Build one item block as the search endpoint lays it out.
 *
 * @param href - Anchor target
 * @param kind - First metadata span
 * @param year - Second metadata span
 * @param duration - Third metadata span
 * @param title - Title div text
 */
function item(href: string, kind: string, year: string, duration: string, title: string): string {
	return [
		`<a class="item" href="${href}">`,
		`  <div class="poster"><img src="/p.jpg"></div>`,
		`  <div class="meta">`,
		`    <span>${kind}</span>`,
		`    <span>${year}</span>`,
		`    <span>${duration}</span>`,
		"  </div>",
		`  <div class="title">${title}</div>`,
		"</a>",
	].join("\n");
}

describe("extractResults", () => {
	it("extracts a compact single-line block", () => {
		const html =
			'<a class="item" href="/watch/x1"><span>Movie</span><span>2020</span><span>120m</span><div class="title">Example</div></a>';

		expect(extractResults(html)).toEqual([
			{ title: "Example", subtitle: "Movie  2020  120m", targetPath: "/watch/x1" },
		]);
	});

	it("extracts multi-line blocks in document order", () => {
		const html = [
			'<div class="film-list">',
			item("/watch/alpha-1", "Movie", "2021", "98 min", "Alpha Run"),
			item("/watch/beta-2", "TV", "S2", "EP 10", "Beta Story"),
			"</div>",
		].join("\n");

		expect(extractResults(html)).toEqual([
			{ title: "Alpha Run", subtitle: "Movie  2021  98 min", targetPath: "/watch/alpha-1" },
			{ title: "Beta Story", subtitle: "TV  S2  EP 10", targetPath: "/watch/beta-2" },
		]);
	});

	it("collapses whitespace inside captured fields", () => {
		const html = item("/watch/g1", "Movie", "2019", "90m", "\n    Gamma\n    Night\n  ");
		expect(extractResults(html)[0]?.title).toBe("Gamma Night");
	});

	it("skips a block missing a metadata span without affecting its neighbours", () => {
		const broken = [
			'<a class="item" href="/watch/broken">',
			"  <span>Movie</span>",
			"  <span>2018</span>",
			'  <div class="title">Broken</div>',
			"</a>",
		].join("\n");
		const html = [
			item("/watch/one", "Movie", "2020", "100m", "One"),
			broken,
			item("/watch/two", "Movie", "2022", "110m", "Two"),
		].join("\n");

		expect(extractResults(html).map((r) => r.targetPath)).toEqual(["/watch/one", "/watch/two"]);
	});

	it("skips a block whose title is only whitespace", () => {
		const html = item("/watch/blank", "Movie", "2020", "100m", "   ");
		expect(extractResults(html)).toEqual([]);
	});

	it("keeps HTML entities as they appear in the markup", () => {
		const html = item("/watch/tj", "Movie", "1992", "80m", "Tom &amp; Jerry");
		expect(extractResults(html)[0]?.title).toBe("Tom &amp; Jerry");
	});

	it("accepts non-numeric year fields", () => {
		const html = item("/watch/s1", "TV", "SS 1", "EPS 8", "Season Show");
		expect(extractResults(html)[0]?.subtitle).toBe("TV  SS 1  EPS 8");
	});

	it("returns an empty list for an empty fragment", () => {
		expect(extractResults("")).toEqual([]);
	});

	it("returns an empty list for unrelated markup", () => {
		expect(extractResults('<div class="empty">Nothing found</div>')).toEqual([]);
	});

	it("is deterministic across calls on the same input", () => {
		const html = item("/watch/d1", "Movie", "2020", "100m", "Delta");
		expect(extractResults(html)).toEqual(extractResults(html));
	});
});
