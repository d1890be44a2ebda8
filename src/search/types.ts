/**
 * Search result record and the typed error shared by the fetcher,
 * the session state machine and the renderer.
 */

/** One item extracted from the search fragment. Never mutated after creation. */
export interface SearchResult {
	/** Display title */
	readonly title: string;
	/** Media kind, year/season and duration/episodes joined for display */
	readonly subtitle: string;
	/** Site-relative path (e.g., "/watch/x1"), joined with the base URL on open */
	readonly targetPath: string;
}

/** Error codes for structured error handling. */
export type SearchErrorCode = "network" | "decode" | "no_results";

/**
 * Typed error for search failures.
 * Carries a machine-readable code alongside the human message.
 */
export class SearchError extends Error {
	readonly code: SearchErrorCode;

	/**
	 * @param code - Machine-readable error category
	 * @param message - Human-readable description, shown on the error screen
	 * @param options - Underlying cause, when there is one
	 */
	constructor(code: SearchErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "SearchError";
		this.code = code;
	}

	/**
	 * A well-formed response with nothing in it. A business outcome, not a fault.
	 *
	 * @param query - The query that matched nothing
	 */
	static noResults(query: string): SearchError {
		return new SearchError("no_results", `no results for ${JSON.stringify(query)}`);
	}
}

/**
 * Normalize anything thrown by a search into a SearchError.
 *
 * @param err - Caught value
 */
export function toSearchError(err: unknown): SearchError {
	if (err instanceof SearchError) return err;
	const detail = err instanceof Error ? err.message : String(err);
	return new SearchError("network", `network error: ${detail}`, { cause: err });
}
