import { describe, expect, it } from "vitest";
import { SearchError, type SearchResult } from "../../search/types.js";
import type { SessionEffect, SessionMessage } from "../messages.js";
import { createSession, resultUrl, type Session, update } from "../state.js";

// ── Fixtures ─────────────────────────────────────────────────────────────────

const BASE_URL = "https://catalogue.test";

const KEY = {
	enter: "\r",
	escape: "\x1b",
	backspace: "\x7f",
	up: "\x1b[A",
	down: "\x1b[B",
	pageUp: "\x1b[5~",
	pageDown: "\x1b[6~",
	ctrlC: "\x03",
} as const;

/**
 * @param title - Result title
 */
function result(title: string): SearchResult {
	return { title, subtitle: "Movie  2020  90m", targetPath: `/watch/${title.toLowerCase()}` };
}

const ITEMS = [result("Alien"), result("Aliens"), result("Predator")];

/**
 * Feed messages through `update` in order, collecting every effect.
 *
 * @param session - Starting session
 * @param messages - Messages to apply
 */
function run(session: Session, ...messages: SessionMessage[]) {
	let current = session;
	const effects: SessionEffect[] = [];
	for (const message of messages) {
		const transition = update(current, message);
		current = transition.session;
		effects.push(...transition.effects);
	}
	return { session: current, effects };
}

/**
 * @param data - Raw key input
 */
function key(data: string): SessionMessage {
	return { type: "key", data };
}

/**
 * Type a word one character per key message.
 *
 * @param text - Characters to type
 */
function typed(text: string): SessionMessage[] {
	return [...text].map((ch) => key(ch));
}

/** A session in waiting mode for `query`, with its fetch token. */
function waitingFor(query: string) {
	const start = createSession({ baseUrl: BASE_URL, initialQuery: query });
	const { session, effects } = run(start, { type: "submit" });
	const effect = effects[0];
	if (effect?.type !== "fetch") throw new Error("expected a fetch effect");
	return { session, pending: effect.fetch };
}

/** A session in showing mode with {@link ITEMS}. */
function showing(): Session {
	const { session, pending } = waitingFor("alien");
	return update(session, {
		type: "fetchSettled",
		...pending,
		outcome: { ok: true, results: ITEMS },
	}).session;
}

// ── Input ────────────────────────────────────────────────────────────────────

describe("input mode", () => {
	it("starts empty in input mode", () => {
		const session = createSession({ baseUrl: BASE_URL });
		expect(session.mode).toBe("input");
		expect(session.query).toEqual({ text: "", cursor: 0 });
		expect(session.items).toEqual([]);
	});

	it("edits the query from key messages", () => {
		const { session } = run(
			createSession({ baseUrl: BASE_URL }),
			...typed("alienz"),
			key(KEY.backspace)
		);
		expect(session.query.text).toBe("alien");
	});

	it("treats q as a typed character", () => {
		const { session, effects } = run(createSession({ baseUrl: BASE_URL }), key("q"));
		expect(session.query.text).toBe("q");
		expect(effects).toEqual([]);
	});

	it("ignores enter on an empty query", () => {
		const start = createSession({ baseUrl: BASE_URL });
		const transition = update(start, key(KEY.enter));
		expect(transition.session).toBe(start);
		expect(transition.effects).toEqual([]);
	});

	it("submits on enter with a fetch token", () => {
		const { session, effects } = run(
			createSession({ baseUrl: BASE_URL }),
			...typed("alien"),
			key(KEY.enter)
		);

		expect(session.mode).toBe("waiting");
		expect(session.searchedQuery).toBe("alien");
		expect(session.pending).toEqual({ id: 1, query: "alien" });
		expect(effects).toEqual([{ type: "fetch", fetch: { id: 1, query: "alien" } }]);
	});

	it("submits an untrimmed query as typed", () => {
		const { effects } = run(createSession({ baseUrl: BASE_URL, initialQuery: " " }), {
			type: "submit",
		});
		expect(effects).toEqual([{ type: "fetch", fetch: { id: 1, query: " " } }]);
	});
});

// ── Waiting ──────────────────────────────────────────────────────────────────

describe("waiting mode", () => {
	it("ignores keys other than quit", () => {
		const { session } = waitingFor("alien");
		const transition = update(session, key("x"));
		expect(transition.session).toBe(session);
	});

	it("does not dispatch a second fetch while one is pending", () => {
		const { session } = waitingFor("alien");
		const { session: after, effects } = run(session, ...typed("predator"), key(KEY.enter), {
			type: "submit",
		});

		expect(effects).toEqual([]);
		expect(after.pending).toEqual({ id: 1, query: "alien" });
		expect(after.query.text).toBe("alien");
	});

	it("advances the spinner on tick", () => {
		const { session } = waitingFor("alien");
		expect(run(session, { type: "tick" }, { type: "tick" }).session.spinnerFrame).toBe(2);
	});

	it("ignores ticks outside waiting", () => {
		const start = createSession({ baseUrl: BASE_URL });
		expect(update(start, { type: "tick" }).session).toBe(start);
	});
});

// ── Completion ───────────────────────────────────────────────────────────────

describe("fetch completion", () => {
	it("shows results for a matching token", () => {
		const session = showing();
		expect(session.mode).toBe("showing");
		expect(session.items).toEqual(ITEMS);
		expect(session.list).toEqual({ highlighted: 0, filter: "", filtering: false });
		expect(session.pending).toBeUndefined();
	});

	it("fails with no results when the result list is empty", () => {
		const { session, pending } = waitingFor("batman");
		const { session: after } = run(session, {
			type: "fetchSettled",
			...pending,
			outcome: { ok: true, results: [] },
		});

		expect(after.mode).toBe("failed");
		expect(after.items).toEqual([]);
		expect(after.lastError?.code).toBe("no_results");
		expect(after.lastError?.message).toBe('no results for "batman"');
	});

	it("fails with the fetch error", () => {
		const { session, pending } = waitingFor("alien");
		const error = new SearchError("network", "network error: request timed out after 10s");
		const { session: after } = run(session, {
			type: "fetchSettled",
			...pending,
			outcome: { ok: false, error },
		});

		expect(after.mode).toBe("failed");
		expect(after.lastError).toBe(error);
	});

	it("drops a completion with another id", () => {
		const { session, pending } = waitingFor("alien");
		const transition = update(session, {
			type: "fetchSettled",
			id: pending.id + 1,
			query: pending.query,
			outcome: { ok: true, results: ITEMS },
		});

		expect(transition.stale).toBe(true);
		expect(transition.session).toBe(session);
		expect(transition.effects).toEqual([]);
	});

	it("drops a completion with another query", () => {
		const { session, pending } = waitingFor("alien");
		const transition = update(session, {
			type: "fetchSettled",
			id: pending.id,
			query: "predator",
			outcome: { ok: true, results: ITEMS },
		});
		expect(transition.stale).toBe(true);
		expect(transition.session).toBe(session);
	});

	it("drops a completion that arrives outside waiting", () => {
		const session = showing();
		const transition = update(session, {
			type: "fetchSettled",
			id: 1,
			query: "alien",
			outcome: { ok: true, results: [result("Late")] },
		});
		expect(transition.stale).toBe(true);
		expect(transition.session.items).toEqual(ITEMS);
	});

	it("drops the first search's late completion after a second search starts", () => {
		const { session: first, pending: firstToken } = waitingFor("alien");
		const failed = update(first, {
			type: "fetchSettled",
			...firstToken,
			outcome: { ok: false, error: new SearchError("network", "network error: offline") },
		}).session;
		const { session: second } = run(failed, key(KEY.escape), ...typed("s"), key(KEY.enter));

		expect(second.pending).toEqual({ id: 2, query: "aliens" });
		const transition = update(second, {
			type: "fetchSettled",
			...firstToken,
			outcome: { ok: true, results: ITEMS },
		});
		expect(transition.stale).toBe(true);
		expect(transition.session.mode).toBe("waiting");
	});
});

// ── Failed ───────────────────────────────────────────────────────────────────

describe("failed mode", () => {
	/** Session in failed mode after searching "alien". */
	function failed(): Session {
		const { session, pending } = waitingFor("alien");
		return update(session, {
			type: "fetchSettled",
			...pending,
			outcome: { ok: false, error: new SearchError("decode", "could not decode response: x") },
		}).session;
	}

	it("returns to input on escape and clears the error", () => {
		const { session } = run(failed(), key(KEY.escape));
		expect(session.mode).toBe("input");
		expect(session.lastError).toBeUndefined();
		expect(session.query.text).toBe("alien");
	});

	it("ignores other keys", () => {
		const session = failed();
		expect(update(session, key(KEY.enter)).session).toBe(session);
	});
});

// ── Showing ──────────────────────────────────────────────────────────────────

describe("showing mode", () => {
	it("moves the highlight with arrows and vim keys, wrapping", () => {
		expect(run(showing(), key(KEY.down), key("j")).session.list.highlighted).toBe(2);
		expect(run(showing(), key(KEY.up)).session.list.highlighted).toBe(2);
		expect(run(showing(), key("k"), key("k")).session.list.highlighted).toBe(1);
	});

	it("jumps to the ends", () => {
		expect(run(showing(), key("G")).session.list.highlighted).toBe(2);
		expect(run(showing(), key("G"), key("g")).session.list.highlighted).toBe(0);
	});

	it("pages by the number of entries that fit", () => {
		// No viewport yet: one entry per page
		expect(run(showing(), key(KEY.pageDown)).session.list.highlighted).toBe(1);
		expect(run(showing(), key("G"), key(KEY.pageUp)).session.list.highlighted).toBe(1);
	});

	it("reads kitty page keys and ignores modified ones", () => {
		expect(run(showing(), key("\x1b[6;1:1~")).session.list.highlighted).toBe(1);
		expect(run(showing(), key("\x1b[6;5~")).session.list.highlighted).toBe(0);
	});

	it("launches the highlighted result and quits on enter", () => {
		const { effects } = run(showing(), key(KEY.down), key(KEY.enter));
		expect(effects).toEqual([
			{ type: "launch", url: "https://catalogue.test/watch/aliens" },
			{ type: "quit" },
		]);
	});

	it("goes back to input on escape, dropping results and keeping the query", () => {
		const { session } = run(showing(), key(KEY.escape));
		expect(session.mode).toBe("input");
		expect(session.items).toEqual([]);
		expect(session.query).toEqual({ text: "alien", cursor: 5 });
	});

	it("filters titles and resets the highlight", () => {
		const { session } = run(showing(), key(KEY.down), key("/"), ...typed("pred"));
		expect(session.list).toEqual({ highlighted: 0, filter: "pred", filtering: true });
	});

	it("launches the filtered item after applying the filter", () => {
		const { effects } = run(showing(), key("/"), ...typed("pred"), key(KEY.enter), key(KEY.enter));
		expect(effects[0]).toEqual({ type: "launch", url: "https://catalogue.test/watch/predator" });
	});

	it("does nothing on enter when the filter hides everything", () => {
		const { effects } = run(showing(), key("/"), ...typed("zzz"), key(KEY.enter), key(KEY.enter));
		expect(effects).toEqual([]);
	});

	it("treats q as filter text while filtering", () => {
		const { session, effects } = run(showing(), key("/"), key("q"));
		expect(session.list.filter).toBe("q");
		expect(effects).toEqual([]);
	});

	it("clears the filter with escape before leaving", () => {
		const applied = run(showing(), key("/"), ...typed("ali"), key(KEY.enter)).session;
		expect(applied.list).toEqual({ highlighted: 0, filter: "ali", filtering: false });

		const cleared = run(applied, key(KEY.escape)).session;
		expect(cleared.mode).toBe("showing");
		expect(cleared.list.filter).toBe("");

		expect(run(cleared, key(KEY.escape)).session.mode).toBe("input");
	});

	it("edits the filter with backspace", () => {
		const { session } = run(showing(), key("/"), ...typed("ab"), key(KEY.backspace));
		expect(session.list.filter).toBe("a");
	});
});

// ── Quit ─────────────────────────────────────────────────────────────────────

describe("quit", () => {
	it("quits on ctrl+c from every mode", () => {
		const { session: waiting } = waitingFor("alien");
		const sessions = [createSession({ baseUrl: BASE_URL }), waiting, showing()];
		for (const session of sessions) {
			expect(update(session, key(KEY.ctrlC)).effects).toEqual([{ type: "quit" }]);
		}
	});

	it("quits on q outside input mode", () => {
		const { session: waiting } = waitingFor("alien");
		expect(update(waiting, key("q")).effects).toEqual([{ type: "quit" }]);
		expect(update(showing(), key("q")).effects).toEqual([{ type: "quit" }]);
	});
});

// ── Resize / URL ─────────────────────────────────────────────────────────────

describe("resize", () => {
	it("records the viewport", () => {
		const { session } = run(createSession({ baseUrl: BASE_URL }), {
			type: "resize",
			width: 100,
			height: 30,
		});
		expect(session.viewport).toEqual({ width: 100, height: 30 });
	});
});

describe("resultUrl", () => {
	it("joins site-relative paths onto the base", () => {
		expect(resultUrl(BASE_URL, "/watch/x1")).toBe("https://catalogue.test/watch/x1");
		expect(resultUrl(BASE_URL, "watch/x1")).toBe("https://catalogue.test/watch/x1");
	});

	it("keeps absolute URLs", () => {
		expect(resultUrl(BASE_URL, "https://mirror.test/watch/x1")).toBe(
			"https://mirror.test/watch/x1"
		);
	});
});
