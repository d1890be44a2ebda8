/**
 * Message and effect contract between the session state machine and the
 * loop that drives it.
 *
 * Everything the session reacts to arrives as a {@link SessionMessage} on one
 * serialized stream. Everything it wants done outside itself leaves as a
 * {@link SessionEffect}. The two never share memory.
 */

import type { SearchError, SearchResult } from "../search/types.js";

/** Correlation token for the one fetch in flight. */
export interface PendingFetch {
	/** Generation counter value at dispatch */
	readonly id: number;
	/** Query text at dispatch */
	readonly query: string;
}

/** How a fetch ended. */
export type FetchOutcome =
	| { readonly ok: true; readonly results: readonly SearchResult[] }
	| { readonly ok: false; readonly error: SearchError };

/** Inbound messages. */
export type SessionMessage =
	/** Raw terminal input for one key or paste */
	| { readonly type: "key"; readonly data: string }
	/** Submit the current query, as the enter key does in Input mode */
	| { readonly type: "submit" }
	/** Terminal size changed (also sent once at start) */
	| { readonly type: "resize"; readonly width: number; readonly height: number }
	/** Spinner animation frame */
	| { readonly type: "tick" }
	/** A dispatched fetch settled; tagged with the token it was dispatched under */
	| ({ readonly type: "fetchSettled"; readonly outcome: FetchOutcome } & PendingFetch);

/** Outbound effects, run by the loop in order. */
export type SessionEffect =
	/** Start a search and report back with a `fetchSettled` carrying this token */
	| { readonly type: "fetch"; readonly fetch: PendingFetch }
	/** Open an absolute URL in the user's browser */
	| { readonly type: "launch"; readonly url: string }
	/** Leave the program */
	| { readonly type: "quit" };
