/**
 * Search endpoint client.
 *
 * One GET per call, no retries, no shared state. Failures are reported as
 * {@link SearchError} with a code the error screen does not branch on but
 * whose message tells a network problem from a decode problem.
 */

import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { DEFAULT_TIMEOUT_MS, SEARCH_HEADERS, SEARCH_PARAM, SEARCH_PATH } from "../config.js";
import { extractResults } from "./extractor.js";
import { SearchError, type SearchResult } from "./types.js";

/** The JSON wrapper around the HTML fragment. Only `html` is read. */
const EnvelopeSchema = Type.Object({
	status: Type.Unknown(),
	result: Type.Object({
		count: Type.Optional(Type.Unknown()),
		html: Type.String(),
	}),
});

/** Top-level shape of the search response. */
export type SearchEnvelope = Static<typeof EnvelopeSchema>;

/** Connection settings for {@link fetchResults}. */
export interface FetchOptions {
	/** Site root, without trailing slash */
	baseUrl: string;
	/** Request ceiling in ms (default: 10 000) */
	timeoutMs?: number;
	/** fetch implementation; defaults to the global one */
	fetchImpl?: typeof fetch;
}

/** Signature the session loop uses to run a search. */
export type SearchFn = (query: string) => Promise<SearchResult[]>;

/**
 * Build the request URL. The query is form-encoded (spaces become "+").
 * A path on the base URL is kept, as it is for result links.
 *
 * @param baseUrl - Site root, without trailing slash
 * @param query - Raw search text
 */
export function buildSearchUrl(baseUrl: string, query: string): string {
	const url = new URL(`${baseUrl}${SEARCH_PATH}`);
	url.searchParams.set(SEARCH_PARAM, query);
	return url.toString();
}

/**
 * Parse and validate a response body.
 *
 * @param body - Raw response text
 * @returns The envelope
 * @throws {SearchError} code "decode" when the body is not the expected JSON
 */
export function decodeEnvelope(body: string): SearchEnvelope {
	let parsed: unknown;
	try {
		parsed = JSON.parse(body);
	} catch (err) {
		const detail = err instanceof Error ? err.message : String(err);
		throw new SearchError("decode", `could not decode response: ${detail}`, { cause: err });
	}

	if (!Value.Check(EnvelopeSchema, parsed)) {
		const first = Value.Errors(EnvelopeSchema, parsed).First();
		const where = first ? `${first.path || "/"} ${first.message}` : "unexpected shape";
		throw new SearchError("decode", `could not decode response: ${where}`);
	}

	return parsed;
}

/**
 * Run one search.
 *
 * @param query - Search text, sent verbatim
 * @param options - Base URL, timeout and fetch implementation
 * @returns Results in page order, never empty
 * @throws {SearchError} "network" on transport failure, timeout or non-2xx;
 *   "decode" on a malformed body; "no_results" when nothing was extracted
 */
export async function fetchResults(query: string, options: FetchOptions): Promise<SearchResult[]> {
	const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
	const fetchImpl = options.fetchImpl ?? fetch;
	const url = buildSearchUrl(options.baseUrl, query);

	let body: string;
	try {
		const response = await fetchImpl(url, {
			method: "GET",
			headers: { ...SEARCH_HEADERS },
			signal: AbortSignal.timeout(timeoutMs),
		});
		if (!response.ok) {
			throw new SearchError(
				"network",
				`network error: server returned HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`
			);
		}
		body = await response.text();
	} catch (err: unknown) {
		if (err instanceof SearchError) throw err;
		if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
			throw new SearchError(
				"network",
				`network error: request timed out after ${formatSeconds(timeoutMs)}`,
				{ cause: err }
			);
		}
		const detail = err instanceof Error ? err.message : String(err);
		throw new SearchError("network", `network error: ${detail}`, { cause: err });
	}

	const envelope = decodeEnvelope(body);
	const results = extractResults(envelope.result.html);
	if (results.length === 0) {
		throw SearchError.noResults(query);
	}
	return results;
}

/**
 * Bind connection settings into a {@link SearchFn}.
 *
 * @param options - Base URL, timeout and fetch implementation
 */
export function createSearch(options: FetchOptions): SearchFn {
	return (query) => fetchResults(query, options);
}

/**
 * Format a millisecond duration as seconds for messages ("10s", "2.5s").
 *
 * @param ms - Duration in milliseconds
 */
function formatSeconds(ms: number): string {
	const seconds = ms / 1000;
	return `${Number.isInteger(seconds) ? seconds : seconds.toFixed(1)}s`;
}
