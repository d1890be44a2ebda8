/**
 * Session state machine.
 *
 * `update` is the only place a Session changes. It is pure: it takes the
 * current session and one message, and returns the next session plus the
 * effects the loop must run. Rendering and I/O live elsewhere.
 *
 * Modes: input → waiting → (showing | failed) → input. Quit is reachable
 * from every mode. A fetch completion is applied only while waiting and only
 * when it carries the token of the pending fetch; anything else is dropped
 * without touching the session.
 */

import { Key, matchesKey } from "@mariozechner/pi-tui";
import { QUERY_CHAR_LIMIT } from "../config.js";
import { SearchError, type SearchResult } from "../search/types.js";
import {
	filterRows,
	highlightedItem,
	INITIAL_LIST,
	jumpTo,
	type ListState,
	moveHighlight,
	movePage,
	pageSize,
} from "./list-view.js";
import type { PendingFetch, SessionEffect, SessionMessage } from "./messages.js";
import {
	applyEditKey,
	bufferOf,
	decodeTextInput,
	EMPTY_BUFFER,
	type QueryBuffer,
} from "./query-buffer.js";

/** Which screen is active. Exactly one at a time. */
export type Mode = "input" | "waiting" | "showing" | "failed";

/** Terminal size in cells. */
export interface Viewport {
	readonly width: number;
	readonly height: number;
}

/** Root state of an interactive search session. */
export interface Session {
	readonly mode: Mode;
	/** Search field contents; editable only in input mode */
	readonly query: QueryBuffer;
	/** Query of the last dispatched search, shown while waiting and with results */
	readonly searchedQuery: string;
	/** Current results; non-empty only in showing mode */
	readonly items: readonly SearchResult[];
	readonly list: ListState;
	/** Set only in failed mode */
	readonly lastError?: SearchError;
	/** Set only in waiting mode */
	readonly pending?: PendingFetch;
	/** Unknown until the first resize message */
	readonly viewport?: Viewport;
	readonly spinnerFrame: number;
	/** Generation counter for fetch tokens */
	readonly nextFetchId: number;
	/** Site root that result paths are resolved against */
	readonly baseUrl: string;
}

/** Result of one `update` step. */
export interface Transition {
	readonly session: Session;
	readonly effects: readonly SessionEffect[];
	/** True when a fetch completion was dropped as stale */
	readonly stale?: boolean;
}

/** Options for {@link createSession}. */
export interface SessionOptions {
	baseUrl: string;
	/** Prefills the search field */
	initialQuery?: string;
}

/**
 * Create a session in input mode.
 *
 * @param options - Base URL and optional prefilled query
 */
export function createSession(options: SessionOptions): Session {
	return {
		mode: "input",
		query: options.initialQuery ? bufferOf(options.initialQuery) : EMPTY_BUFFER,
		searchedQuery: "",
		items: [],
		list: INITIAL_LIST,
		spinnerFrame: 0,
		nextFetchId: 1,
		baseUrl: options.baseUrl,
	};
}

/**
 * Absolute URL for a result.
 *
 * @param baseUrl - Site root without trailing slash
 * @param targetPath - Path from the result record
 */
export function resultUrl(baseUrl: string, targetPath: string): string {
	if (/^https?:\/\//i.test(targetPath)) return targetPath;
	return `${baseUrl}${targetPath.startsWith("/") ? "" : "/"}${targetPath}`;
}

const QUIT: Transition["effects"] = [{ type: "quit" }];

/**
 * Unmodified page keys, legacy form plus the kitty press and repeat forms.
 * pi-tui's `Key` table has no page keys.
 *
 * @param code - 5 for page up, 6 for page down
 */
function pageSequences(code: 5 | 6): ReadonlySet<string> {
	return new Set([
		`\x1b[${code}~`,
		`\x1b[${code};1~`,
		`\x1b[${code};1:1~`,
		`\x1b[${code};1:2~`,
	]);
}

const PAGE_UP = pageSequences(5);
const PAGE_DOWN = pageSequences(6);

/**
 * Advance the session by one message.
 *
 * @param session - Current session
 * @param message - Inbound message
 */
export function update(session: Session, message: SessionMessage): Transition {
	switch (message.type) {
		case "resize":
			return {
				session: { ...session, viewport: { width: message.width, height: message.height } },
				effects: [],
			};
		case "tick":
			if (session.mode !== "waiting") return unchanged(session);
			return { session: { ...session, spinnerFrame: session.spinnerFrame + 1 }, effects: [] };
		case "submit":
			return session.mode === "input" ? submit(session) : unchanged(session);
		case "fetchSettled":
			return settle(session, message);
		case "key":
			return handleKey(session, message.data);
	}
}

/**
 * No change, no effects.
 *
 * @param session - Session to return as is
 */
function unchanged(session: Session): Transition {
	return { session, effects: [] };
}

/**
 * Input → Waiting: tag a new fetch with the current query and dispatch it.
 *
 * @param session - Session in input mode
 */
function submit(session: Session): Transition {
	const query = session.query.text;
	if (query.length === 0) return unchanged(session);

	const pending: PendingFetch = { id: session.nextFetchId, query };
	return {
		session: {
			...session,
			mode: "waiting",
			searchedQuery: query,
			pending,
			nextFetchId: session.nextFetchId + 1,
			spinnerFrame: 0,
		},
		effects: [{ type: "fetch", fetch: pending }],
	};
}

/**
 * Waiting → Showing | Failed, if the completion belongs to the pending fetch.
 *
 * @param session - Current session
 * @param message - The completion
 */
function settle(
	session: Session,
	message: Extract<SessionMessage, { type: "fetchSettled" }>
): Transition {
	const pending = session.pending;
	if (
		session.mode !== "waiting" ||
		!pending ||
		pending.id !== message.id ||
		pending.query !== message.query
	) {
		return { session, effects: [], stale: true };
	}

	const { outcome } = message;
	if (outcome.ok && outcome.results.length > 0) {
		return {
			session: {
				...session,
				mode: "showing",
				items: outcome.results,
				list: INITIAL_LIST,
				pending: undefined,
			},
			effects: [],
		};
	}

	const error = outcome.ok ? SearchError.noResults(pending.query) : outcome.error;
	return {
		session: { ...session, mode: "failed", lastError: error, pending: undefined },
		effects: [],
	};
}

/**
 * Route a key to the active mode. ctrl+c quits from anywhere.
 *
 * @param session - Current session
 * @param data - Raw terminal input
 */
function handleKey(session: Session, data: string): Transition {
	if (matchesKey(data, Key.ctrl("c"))) return { session, effects: QUIT };

	switch (session.mode) {
		case "input":
			return handleInputKey(session, data);
		case "waiting":
			return data === "q" ? { session, effects: QUIT } : unchanged(session);
		case "failed":
			if (matchesKey(data, Key.escape)) {
				return { session: { ...session, mode: "input", lastError: undefined }, effects: [] };
			}
			return data === "q" ? { session, effects: QUIT } : unchanged(session);
		case "showing":
			return session.list.filtering
				? handleFilterKey(session, data)
				: handleListKey(session, data);
	}
}

/**
 * Input mode: enter submits, everything else edits the field.
 *
 * @param session - Session in input mode
 * @param data - Raw terminal input
 */
function handleInputKey(session: Session, data: string): Transition {
	if (matchesKey(data, Key.enter)) return submit(session);

	const query = applyEditKey(session.query, data, QUERY_CHAR_LIMIT);
	if (!query || query === session.query) return unchanged(session);
	return { session: { ...session, query }, effects: [] };
}

/**
 * Showing → Input. Results are dropped; the query stays for editing.
 *
 * @param session - Session in showing mode
 */
function backToInput(session: Session): Transition {
	return {
		session: {
			...session,
			mode: "input",
			items: [],
			list: INITIAL_LIST,
			query: bufferOf(session.query.text),
		},
		effects: [],
	};
}

/**
 * Replace the list state, keeping the session otherwise unchanged.
 *
 * @param session - Current session
 * @param list - Next list state
 */
function withList(session: Session, list: ListState): Transition {
	if (list === session.list) return unchanged(session);
	return { session: { ...session, list }, effects: [] };
}

/**
 * Showing mode, navigating the list.
 *
 * @param session - Session in showing mode
 * @param data - Raw terminal input
 */
function handleListKey(session: Session, data: string): Transition {
	const { list, items } = session;
	const rowCount = filterRows(items, list.filter).length;
	const size = pageSize(session.viewport, list);

	if (matchesKey(data, Key.escape)) {
		if (list.filter !== "") return withList(session, { ...list, filter: "", highlighted: 0 });
		return backToInput(session);
	}
	if (matchesKey(data, Key.enter)) {
		const item = highlightedItem(items, list);
		if (!item) return unchanged(session);
		return {
			session,
			effects: [{ type: "launch", url: resultUrl(session.baseUrl, item.targetPath) }, ...QUIT],
		};
	}
	if (matchesKey(data, Key.up) || data === "k") {
		return withList(session, moveHighlight(list, -1, rowCount));
	}
	if (matchesKey(data, Key.down) || data === "j") {
		return withList(session, moveHighlight(list, 1, rowCount));
	}
	if (PAGE_UP.has(data)) return withList(session, movePage(list, -1, size, rowCount));
	if (PAGE_DOWN.has(data)) return withList(session, movePage(list, 1, size, rowCount));
	if (matchesKey(data, Key.home) || data === "g") {
		return withList(session, jumpTo(list, 0, rowCount));
	}
	if (matchesKey(data, Key.end) || data === "G") {
		return withList(session, jumpTo(list, rowCount - 1, rowCount));
	}
	if (data === "/") return withList(session, { ...list, filtering: true });
	if (data === "q") return { session, effects: QUIT };
	return unchanged(session);
}

/**
 * Showing mode, editing the filter.
 *
 * @param session - Session in showing mode with filtering on
 * @param data - Raw terminal input
 */
function handleFilterKey(session: Session, data: string): Transition {
	const { list, items } = session;

	if (matchesKey(data, Key.escape)) {
		return withList(session, { highlighted: 0, filter: "", filtering: false });
	}
	if (matchesKey(data, Key.enter)) {
		return withList(session, { ...list, filtering: false });
	}

	const rowCount = filterRows(items, list.filter).length;
	if (matchesKey(data, Key.up)) return withList(session, moveHighlight(list, -1, rowCount));
	if (matchesKey(data, Key.down)) return withList(session, moveHighlight(list, 1, rowCount));

	if (matchesKey(data, Key.backspace)) {
		if (list.filter === "") return unchanged(session);
		const chars = [...list.filter];
		return withList(session, { ...list, filter: chars.slice(0, -1).join(""), highlighted: 0 });
	}

	const text = decodeTextInput(data);
	if (text === undefined) return unchanged(session);
	return withList(session, { ...list, filter: list.filter + text, highlighted: 0 });
}
