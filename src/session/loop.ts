/**
 * The session loop: owns the terminal, serializes every inbound event into
 * one message stream, feeds it through `update`, runs the resulting effects
 * and repaints.
 *
 * Keys, resizes, spinner ticks and fetch completions may arrive from any
 * callback; they are queued and drained by a single consumer, so `update`
 * never sees two messages at once. A fetch runs off the loop and comes back
 * as a `fetchSettled` message; the state machine decides whether it is stale.
 */

import { isKeyRelease } from "@mariozechner/pi-tui";
import type { BrowserLaunchResult } from "../browser.js";
import { type Logger, silentLogger } from "../logger.js";
import type { SearchFn } from "../search/fetcher.js";
import { toSearchError } from "../search/types.js";
import { type RenderOptions, render } from "../ui/render.js";
import type { PendingFetch, SessionEffect, SessionMessage } from "./messages.js";
import { type Session, update } from "./state.js";

// ─── Terminal control sequences ─────────────────────────────────────────────

const ENTER_ALT_SCREEN = "\x1b[?1049h";
const LEAVE_ALT_SCREEN = "\x1b[?1049l";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";
const CURSOR_HOME = "\x1b[H";
const CLEAR_LINE_RIGHT = "\x1b[K";
const CLEAR_BELOW = "\x1b[J";
const CLEAR_SCREEN = "\x1b[2J";

/** Sequence that returns the terminal to its normal screen. */
export const RESTORE_SCREEN = SHOW_CURSOR + LEAVE_ALT_SCREEN;

/**
 * The part of a terminal the loop needs. pi-tui's ProcessTerminal fits it;
 * tests pass a recorder.
 */
export interface TerminalSurface {
	start(onInput: (data: string) => void, onResize: () => void): void;
	stop(): void;
	write(data: string): void;
	readonly columns: number;
	readonly rows: number;
}

/** Collaborators for {@link SessionLoop}. */
export interface SessionLoopOptions {
	terminal: TerminalSurface;
	/** Initial session, usually from `createSession` */
	session: Session;
	search: SearchFn;
	/** Called after the terminal is restored, when a result was selected */
	openUrl: (url: string) => Promise<BrowserLaunchResult>;
	render: RenderOptions;
	logger?: Logger;
	/** Dispatch the prefilled query as soon as the loop starts */
	submitOnStart?: boolean;
}

/**
 * Build the bytes for one full-frame repaint.
 *
 * @param lines - Rendered frame
 * @param clear - Wipe the screen first (after a resize)
 */
export function frameBytes(lines: readonly string[], clear = false): string {
	const body = lines.map((line) => line + CLEAR_LINE_RIGHT).join("\r\n");
	return (clear ? CLEAR_SCREEN : "") + CURSOR_HOME + body + CLEAR_BELOW;
}

/**
 * Drives one interactive session from start to exit.
 *
 * Usage:
 * ```typescript
 * const loop = new SessionLoop({ terminal, session, search, openUrl, render });
 * const exitCode = await loop.run();
 * ```
 */
export class SessionLoop {
	private session: Session;
	private readonly terminal: TerminalSurface;
	private readonly search: SearchFn;
	private readonly openUrl: (url: string) => Promise<BrowserLaunchResult>;
	private readonly renderOptions: RenderOptions;
	private readonly logger: Logger;
	private readonly submitOnStart: boolean;

	private readonly queue: SessionMessage[] = [];
	private draining = false;
	private running = false;
	private closed = false;
	private clearNext = false;
	private lastFrame: string | undefined;
	private spinnerTimer: ReturnType<typeof setInterval> | undefined;
	private launchUrl: string | undefined;
	private resolveExit: ((code: number) => void) | undefined;

	constructor(options: SessionLoopOptions) {
		this.session = options.session;
		this.terminal = options.terminal;
		this.search = options.search;
		this.openUrl = options.openUrl;
		this.renderOptions = options.render;
		this.logger = options.logger ?? silentLogger;
		this.submitOnStart = options.submitOnStart ?? false;
	}

	/** Current session snapshot. */
	get state(): Session {
		return this.session;
	}

	/** Whether the loop has shut down. */
	get isClosed(): boolean {
		return this.closed;
	}

	/**
	 * Take over the terminal and process events until the user quits.
	 *
	 * @returns Exit code (0 on quit or selection)
	 * @throws {Error} When the terminal cannot be started
	 */
	run(): Promise<number> {
		if (this.running) return Promise.reject(new Error("Session loop is already running"));
		this.running = true;

		return new Promise<number>((resolve, reject) => {
			this.resolveExit = resolve;
			try {
				this.terminal.start(
					(data) => {
						// Kitty reports releases too; only presses are keys
						if (isKeyRelease(data)) return;
						this.post({ type: "key", data });
					},
					() => this.postResize()
				);
				this.terminal.write(ENTER_ALT_SCREEN + HIDE_CURSOR);
			} catch (err) {
				this.closed = true;
				reject(err);
				return;
			}

			this.logger.log("session", "start", {
				columns: this.terminal.columns,
				rows: this.terminal.rows,
				query: this.session.query.text,
			});
			this.postResize();
			if (this.submitOnStart) this.post({ type: "submit" });
		});
	}

	/**
	 * Shut down from outside (signals, stream errors). Restores the terminal
	 * and resolves `run()` with `code`. No-op once closed.
	 *
	 * @param code - Exit code
	 */
	stop(code: number): void {
		this.shutdown(code);
	}

	/**
	 * Queue a message. Ignored once the loop has shut down.
	 *
	 * @param message - Inbound message
	 */
	post(message: SessionMessage): void {
		if (this.closed) return;
		this.queue.push(message);
		this.drain();
	}

	/** Queue a resize carrying the terminal's current size. */
	private postResize(): void {
		this.post({ type: "resize", width: this.terminal.columns, height: this.terminal.rows });
	}

	/** Process queued messages one at a time. Re-entrant posts only enqueue. */
	private drain(): void {
		if (this.draining) return;
		this.draining = true;
		try {
			let message = this.queue.shift();
			while (message && !this.closed) {
				this.step(message);
				message = this.queue.shift();
			}
		} finally {
			this.draining = false;
		}
	}

	/**
	 * Apply one message, run its effects, repaint.
	 *
	 * @param message - Inbound message
	 */
	private step(message: SessionMessage): void {
		const before = this.session;
		const { session, effects, stale } = update(before, message);
		this.session = session;

		if (message.type === "key") {
			this.logger.log("input", "key", { data: JSON.stringify(message.data), mode: before.mode });
		}
		if (message.type === "resize") this.clearNext = true;
		if (stale && message.type === "fetchSettled") {
			this.logger.log("fetch", "stale_discarded", { id: message.id, query: message.query });
		}
		if (session.mode !== before.mode) {
			this.logger.log("session", "transition", { from: before.mode, to: session.mode });
		}

		this.syncSpinner();
		for (const effect of effects) this.runEffect(effect);
		if (!this.closed) this.paint();
	}

	/**
	 * @param effect - Effect emitted by `update`
	 */
	private runEffect(effect: SessionEffect): void {
		switch (effect.type) {
			case "fetch":
				this.dispatch(effect.fetch);
				break;
			case "launch":
				this.launchUrl = effect.url;
				break;
			case "quit":
				this.shutdown(0);
				break;
		}
	}

	/**
	 * Start a search off the loop. Its outcome comes back as a message
	 * tagged with the same token.
	 *
	 * @param pending - Token of the fetch
	 */
	private dispatch(pending: PendingFetch): void {
		const { id, query } = pending;
		const startedAt = Date.now();
		this.logger.log("fetch", "start", { id, query });

		void Promise.resolve()
			.then(() => this.search(query))
			.then(
				(results) => {
					this.logger.log("fetch", "done", {
						id,
						count: results.length,
						ms: Date.now() - startedAt,
					});
					this.post({ type: "fetchSettled", id, query, outcome: { ok: true, results } });
				},
				(err: unknown) => {
					const error = toSearchError(err);
					this.logger.log("fetch", "failed", { id, code: error.code, message: error.message });
					this.post({ type: "fetchSettled", id, query, outcome: { ok: false, error } });
				}
			);
	}

	/** Run the spinner ticker only while waiting. */
	private syncSpinner(): void {
		const waiting = this.session.mode === "waiting" && !this.closed;
		if (waiting && !this.spinnerTimer) {
			this.spinnerTimer = setInterval(
				() => this.post({ type: "tick" }),
				this.renderOptions.spinner.interval
			);
		} else if (!waiting && this.spinnerTimer) {
			clearInterval(this.spinnerTimer);
			this.spinnerTimer = undefined;
		}
	}

	/**
	 * Render the session and write it if it differs from the last frame.
	 * A pending screen wipe always forces a write.
	 */
	private paint(): void {
		const lines = render(this.session, this.renderOptions);
		const body = frameBytes(lines);
		const clear = this.clearNext;
		this.clearNext = false;
		if (!clear && body === this.lastFrame) return;
		this.lastFrame = body;
		this.terminal.write(clear ? frameBytes(lines, true) : body);
	}

	/**
	 * Stop processing, give the terminal back, then open the selected URL.
	 *
	 * @param code - Exit code to resolve `run()` with
	 */
	private shutdown(code: number): void {
		if (this.closed) return;
		this.closed = true;
		this.queue.length = 0;
		this.syncSpinner();

		this.terminal.write(RESTORE_SCREEN);
		this.terminal.stop();
		this.logger.log("session", "exit", { code, mode: this.session.mode });

		const url = this.launchUrl;
		const opened = url ? this.launch(url) : Promise.resolve();
		void opened.finally(() => this.resolveExit?.(code));
	}

	/**
	 * @param url - Selected result URL
	 */
	private async launch(url: string): Promise<void> {
		try {
			const result = await this.openUrl(url);
			this.logger.log("browser", result.opened ? "opened" : "not_opened", { url, ...result });
		} catch (err) {
			this.logger.log("error", "browser_launch", {
				url,
				message: err instanceof Error ? err.message : String(err),
			});
		}
	}
}
